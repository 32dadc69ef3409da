// src/core/auth/CallbackListener.ts

import * as http from 'http';
import type { CallbackResult } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { renderErrorPage, renderSuccessPage } from './callbackPages';
import {
  CallbackError,
  CallbackListenerError,
  CallbackTimeoutError,
  errorMessage,
  systemErrorCode,
} from '../../utils/errors';

export const LOOPBACK_HOST = '127.0.0.1';
export const CALLBACK_PATH = '/callback';
export const DEFAULT_CALLBACK_PORT = 8888;
export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

export interface ListenOptions {
  port: number;
  host?: string;
  path?: string;
  timeoutMs?: number; // 0 waits forever
}

/**
 * One bound listener waiting for one redirect. `result` settles exactly once,
 * after the port has been released.
 */
export interface PendingCallback {
  readonly port: number;
  readonly redirectUri: string;
  readonly result: Promise<CallbackResult>;
  cancel(reason?: string): void;
}

type Outcome = { ok: true; value: CallbackResult } | { ok: false; reason: Error };

interface CallbackResponse {
  status: number;
  page: string;
  result: CallbackResult;
  outcome: 'success' | 'error' | 'missing_params';
}

export function buildRedirectUri(port: number, host = LOOPBACK_HOST, path = CALLBACK_PATH): string {
  return `http://${host}:${port}${path}`;
}

/**
 * Map the redirect's query string to the page we answer with and the result
 * handed to the waiting flow.
 */
export function interpretCallback(params: URLSearchParams): CallbackResponse {
  const error = params.get('error');
  if (error) {
    const errorDescription = params.get('error_description') ?? undefined;
    return {
      status: 400,
      page: renderErrorPage(error, errorDescription),
      result: errorDescription
        ? { type: 'error', error, errorDescription }
        : { type: 'error', error },
      outcome: 'error',
    };
  }

  const code = params.get('code');
  const state = params.get('state');
  if (!code || !state) {
    return {
      status: 400,
      page: renderErrorPage('Missing code or state parameter.'),
      result: { type: 'error', error: 'Missing code or state' },
      outcome: 'missing_params',
    };
  }

  return {
    status: 200,
    page: renderSuccessPage(),
    result: { type: 'success', code, state },
    outcome: 'success',
  };
}

/**
 * Transient loopback HTTP server that captures a single authorization redirect.
 *
 * Each listen() owns its own server and its own single-use result promise;
 * nothing is shared between runs.
 */
export class CallbackListener {
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(logger: Logger, metrics?: MetricsCollector) {
    this.logger = logger;
    this.metrics = metrics;
  }

  /**
   * Bind, wait for the redirect, release the port, return the result
   */
  async awaitCallback(
    port: number,
    options: Omit<ListenOptions, 'port'> = {}
  ): Promise<CallbackResult> {
    const pending = await this.listen({ ...options, port });
    return pending.result;
  }

  /**
   * Bind the listener. Resolves once the port is bound so the caller can
   * present the authorization URL knowing the redirect will be caught.
   */
  listen(options: ListenOptions): Promise<PendingCallback> {
    const host = options.host ?? LOOPBACK_HOST;
    const callbackPath = options.path ?? CALLBACK_PATH;
    const timeoutMs = options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;

    let settle: (outcome: Outcome) => void = () => undefined;
    const result = new Promise<CallbackResult>((resolve, reject) => {
      settle = (outcome) => (outcome.ok ? resolve(outcome.value) : reject(outcome.reason));
    });
    // Consumers attach later (after opening the browser); keep early rejections observed
    result.catch((error: unknown) => {
      this.logger.debug('Callback wait ended without a result', { error: errorMessage(error) });
    });

    let done = false;
    let timer: NodeJS.Timeout | undefined;

    const server = http.createServer((req, res) => {
      if (done) {
        res.writeHead(503, { 'Content-Type': 'text/plain', Connection: 'close' });
        res.end('Authorization already completed');
        return;
      }

      let url: URL;
      try {
        url = new URL(req.url ?? '/', `http://${host}`);
      } catch {
        res.writeHead(400, { 'Content-Type': 'text/plain' });
        res.end('Bad request');
        return;
      }

      if (url.pathname !== callbackPath) {
        this.metrics?.incrementCounter('callback_requests', { outcome: 'not_found' });
        this.logger.debug('Ignoring request to unexpected path', { path: url.pathname });
        res.writeHead(404, { 'Content-Type': 'text/plain' });
        res.end('Not found');
        return;
      }

      if (req.method !== 'GET') {
        this.metrics?.incrementCounter('callback_requests', { outcome: 'method_not_allowed' });
        res.writeHead(405, { 'Content-Type': 'text/plain', Allow: 'GET' });
        res.end('Method not allowed');
        return;
      }

      const response = interpretCallback(url.searchParams);
      done = true;
      if (timer) clearTimeout(timer);

      this.metrics?.incrementCounter('callback_requests', { outcome: response.outcome });
      this.logger.info('Authorization callback received', { outcome: response.outcome });

      res.writeHead(response.status, {
        'Content-Type': 'text/html; charset=utf-8',
        'Cache-Control': 'no-store',
        Connection: 'close',
      });
      res.end(response.page, () => shutdown({ ok: true, value: response.result }));
    });

    const shutdown = (outcome: Outcome): void => {
      server.close(() => settle(outcome));
      server.closeAllConnections();
    };

    const stop = (reason: Error): void => {
      if (done) return;
      done = true;
      if (timer) clearTimeout(timer);
      shutdown({ ok: false, reason });
    };

    return new Promise<PendingCallback>((resolveListening, rejectListening) => {
      const onBindError = (error: Error): void => {
        const code = systemErrorCode(error);
        const message =
          code === 'EADDRINUSE'
            ? `Port ${options.port} already in use. Close the other process and try again.`
            : `Failed to start callback listener on ${host}:${options.port}`;
        this.logger.error(message, { errorCode: code, error: error.message });
        rejectListening(new CallbackListenerError(message, { port: options.port, code, cause: error }));
      };

      server.once('error', onBindError);

      server.listen(options.port, host, () => {
        server.off('error', onBindError);
        server.on('error', (error) => {
          this.logger.error('Callback listener error', { error: error.message });
        });

        const address = server.address();
        const port = address && typeof address === 'object' ? address.port : options.port;
        const redirectUri = buildRedirectUri(port, host, callbackPath);

        if (timeoutMs > 0) {
          timer = setTimeout(() => {
            this.logger.warn('Timed out waiting for authorization callback', { timeoutMs });
            stop(new CallbackTimeoutError(undefined, { timeoutMs }));
          }, timeoutMs);
        }

        this.logger.info('OAuth callback listener ready', { redirectUri });

        resolveListening({
          port,
          redirectUri,
          result,
          cancel: (reason = 'Authorization cancelled') => stop(new CallbackError(reason)),
        });
      });
    });
  }
}
