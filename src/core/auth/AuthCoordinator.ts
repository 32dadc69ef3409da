// src/core/auth/AuthCoordinator.ts

import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import type { AuthState, StateChange, UrlOpener } from './types';
import type { AuthCore } from './AuthCore';
import type { CallbackListener, PendingCallback } from './CallbackListener';
import type { TokenCache } from '../token/TokenCache';
import type { TokenRecord } from '../token/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { ClientHandle } from '../client/ClientHandle';
import { generatePKCE, generateState } from './pkce';
import {
  CallbackError,
  NotAuthenticatedError,
  StateMismatchError,
  errorMessage,
} from '../../utils/errors';
import { addSpanEvent, generateCorrelationId, withOAuthSpan } from '../../observability/tracing';

export interface AuthCoordinatorDeps {
  oauth: AuthCore;
  cache: TokenCache;
  listener: CallbackListener;
  openUrl: UrlOpener;
  logger: Logger;
  metrics: MetricsCollector;
}

export interface AuthCoordinatorOptions {
  callbackPort: number;
  callbackTimeoutMs?: number;
  apiBaseUrl?: string;
  apiTimeout?: number;
}

/**
 * Cache → refresh → interactive PKCE flow.
 *
 * authenticate() calls are serialized through a single-slot queue so only
 * one authorization attempt (and one bound callback port) exists at a time.
 *
 * Events: 'stateChange' ({ from, to }), 'authenticated' (ClientHandle)
 */
export class AuthCoordinator extends EventEmitter {
  private state: AuthState = 'Unauthenticated';
  private handle?: ClientHandle;
  private pending?: PendingCallback;
  private cancelRequested?: string;
  private queue = new PQueue({ concurrency: 1 });
  private oauth: AuthCore;
  private cache: TokenCache;
  private listener: CallbackListener;
  private openUrl: UrlOpener;
  private logger: Logger;
  private metrics: MetricsCollector;

  constructor(
    deps: AuthCoordinatorDeps,
    private options: AuthCoordinatorOptions
  ) {
    super();
    this.oauth = deps.oauth;
    this.cache = deps.cache;
    this.listener = deps.listener;
    this.openUrl = deps.openUrl;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  /**
   * Return a client handle backed by a valid access token, running whatever
   * part of the chain is needed to get one.
   *
   * @throws {CallbackError} Authorization denied, cancelled or timed out
   * @throws {StateMismatchError} Callback state differs from this attempt's nonce
   * @throws {CodeExchangeError} Token endpoint rejected the authorization code
   * @throws {CallbackListenerError} Callback port could not be bound
   */
  async authenticate(): Promise<ClientHandle> {
    return this.queue.add(() => this.runAuthenticate());
  }

  /**
   * Pure accessor, never touches the network
   */
  getClient(): ClientHandle {
    if (this.state !== 'Authenticated' || !this.handle) {
      throw new NotAuthenticatedError();
    }
    return this.handle;
  }

  getState(): AuthState {
    return this.state;
  }

  /**
   * Drop the in-memory session; the next authenticate() starts from the cache
   */
  invalidate(): void {
    this.handle = undefined;
    this.transition('Unauthenticated');
    this.logger.info('Session invalidated');
  }

  /**
   * Abort an interactive flow. A cancel that arrives before the callback
   * port is bound is held and stops the flow before the browser opens.
   */
  cancel(reason = 'Authorization cancelled'): void {
    if (this.pending) {
      this.logger.info('Cancelling pending authorization', { reason });
      this.pending.cancel(reason);
    } else if (this.queue.pending > 0) {
      this.logger.info('Cancelling authorization before the callback listener is ready', {
        reason,
      });
      this.cancelRequested = reason;
    }
  }

  private async runAuthenticate(): Promise<ClientHandle> {
    this.cancelRequested = undefined;

    if (this.handle && this.state === 'Authenticated') {
      if (!this.handle.isExpired()) {
        this.metrics.incrementCounter('auth_requests', { outcome: 'memory' });
        return this.handle;
      }
      this.logger.info('In-memory access token expired, re-authenticating');
      this.handle = undefined;
      this.transition('Unauthenticated');
    }

    return withOAuthSpan('authenticate', this.oauth.clientId, async () => {
      const cached = await this.cache.load();

      if (cached && this.cache.isFresh(cached)) {
        this.transition('CacheValid');
        this.logger.info('Using cached access token');
        this.metrics.incrementCounter('auth_requests', { outcome: 'cache' });
        return this.establish(cached);
      }

      if (cached?.refresh_token) {
        const refreshed = await this.tryRefresh(cached.refresh_token);
        if (refreshed) {
          this.metrics.incrementCounter('auth_requests', { outcome: 'refresh' });
          return this.establish(refreshed);
        }
      }

      try {
        const record = await this.runFullFlow();
        this.metrics.incrementCounter('auth_requests', { outcome: 'full_flow' });
        return this.establish(record);
      } catch (error) {
        this.metrics.incrementCounter('auth_requests', { outcome: 'failed' });
        this.transition('Unauthenticated');
        throw error;
      }
    });
  }

  private async tryRefresh(refreshToken: string): Promise<TokenRecord | undefined> {
    this.transition('CacheRefreshing');
    this.logger.info('Access token expired, refreshing');
    const startTime = Date.now();

    try {
      const response = await this.oauth.refreshToken(refreshToken);
      const record = await this.cache.save(response);

      this.metrics.incrementCounter('token_refresh', { status: 'success' });
      this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
        status: 'success',
      });
      return record;
    } catch (error) {
      this.metrics.incrementCounter('token_refresh', { status: 'failure' });
      this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
        status: 'failure',
      });
      this.transition('CacheRefreshFailed');
      this.logger.warn('Failed to refresh token, starting new authorization flow', {
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private async runFullFlow(): Promise<TokenRecord> {
    this.transition('FullFlowPending');
    const attemptId = generateCorrelationId();
    const startTime = Date.now();

    const pkce = generatePKCE();
    const expectedState = generateState();
    const authUrl = this.oauth.createAuthUrl(pkce, expectedState);

    if (this.cancelRequested !== undefined) {
      const reason = this.cancelRequested;
      this.cancelRequested = undefined;
      throw new CallbackError(reason, { attemptId });
    }

    // Bind before presenting the URL so the redirect cannot arrive first
    const pending = await this.listener.listen({
      port: this.options.callbackPort,
      timeoutMs: this.options.callbackTimeoutMs,
    });
    this.pending = pending;

    try {
      if (this.cancelRequested !== undefined) {
        // cancel() ran while the port was being bound
        pending.cancel(this.cancelRequested);
      } else {
        this.logger.info('Starting authorization flow', { attemptId, redirectUri: pending.redirectUri });
        this.logger.info("Opening browser for authentication. If it doesn't open, visit authUrl", {
          attemptId,
          authUrl,
        });
        await this.presentUrl(authUrl, attemptId);
      }

      const callback = await pending.result;

      if (callback.type === 'error') {
        throw new CallbackError(`OAuth error: ${callback.error}`, {
          attemptId,
          error: callback.error,
          errorDescription: callback.errorDescription,
        });
      }

      if (callback.state !== expectedState) {
        this.logger.error('State mismatch on authorization callback', { attemptId });
        throw new StateMismatchError(undefined, { attemptId });
      }

      this.transition('FullFlowExchanging');
      const response = await this.oauth.exchangeCode(callback.code, callback.state, pkce.verifier);
      const record = await this.cache.save(response);

      this.metrics.recordLatency('authorization_flow_duration', Date.now() - startTime, {
        status: 'success',
      });
      this.logger.info('Authentication successful', { attemptId });
      return record;
    } catch (error) {
      this.metrics.recordLatency('authorization_flow_duration', Date.now() - startTime, {
        status: 'failure',
      });
      this.logger.error('Authorization flow failed', { attemptId, error: errorMessage(error) });
      throw error;
    } finally {
      this.pending = undefined;
      this.cancelRequested = undefined;
    }
  }

  private async presentUrl(authUrl: string, attemptId: string): Promise<void> {
    try {
      await this.openUrl(authUrl);
    } catch (error) {
      // The URL is already logged; the user can still open it by hand
      this.logger.warn('Could not open browser', { attemptId, error: errorMessage(error) });
    }
  }

  private establish(record: TokenRecord): ClientHandle {
    this.handle = new ClientHandle(record, {
      baseUrl: this.options.apiBaseUrl,
      timeout: this.options.apiTimeout,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.transition('Authenticated');
    this.emit('authenticated', this.handle);
    return this.handle;
  }

  private transition(to: AuthState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    const change: StateChange = { from, to };
    addSpanEvent('auth.state_change', { from, to });
    this.logger.debug('Auth state change', { from, to });
    this.emit('stateChange', change);
  }
}
