// tests/unit/CallbackListener.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as http from 'http';
import axios from 'axios';
import {
  CallbackListener,
  buildRedirectUri,
  interpretCallback,
} from '../../src/core/auth/CallbackListener';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  CallbackError,
  CallbackListenerError,
  CallbackTimeoutError,
} from '../../src/utils/errors';

const logger = new Logger({ silent: true });

// Never throws on 4xx/5xx
async function visit(url: string, method: 'GET' | 'POST' = 'GET') {
  return axios.request<string>({ url, method, validateStatus: () => true, responseType: 'text' });
}

function occupy(port = 0): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer((_req, res) => res.end());
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => resolve(server));
  });
}

function release(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

function portOf(server: http.Server): number {
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server not listening');
  return address.port;
}

describe('CallbackListener', () => {
  let listener: CallbackListener;
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector();
    listener = new CallbackListener(logger, metrics);
  });

  it('should build loopback redirect URIs', () => {
    expect(buildRedirectUri(8888)).toBe('http://127.0.0.1:8888/callback');
    expect(buildRedirectUri(9000, 'localhost', '/cb')).toBe('http://localhost:9000/cb');
  });

  describe('listen', () => {
    it('should capture code and state from the redirect', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      expect(pending.port).toBeGreaterThan(0);
      expect(pending.redirectUri).toBe(`http://127.0.0.1:${pending.port}/callback`);

      const response = await visit(`${pending.redirectUri}?code=abc123&state=xyz789`);

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.data).toContain('<h1>Authentication Successful!</h1>');
      await expect(pending.result).resolves.toEqual({
        type: 'success',
        code: 'abc123',
        state: 'xyz789',
      });
      expect(await metrics.getMetrics()).toContain('callback_requests_total{outcome="success"} 1');
    });

    it('should release the port once the result is delivered', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });
      await visit(`${pending.redirectUri}?code=c&state=s`);
      await pending.result;

      const rebound = await occupy(pending.port);
      expect(portOf(rebound)).toBe(pending.port);
      await release(rebound);
    });

    it('should report provider errors with their description', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      const response = await visit(
        `${pending.redirectUri}?error=access_denied&error_description=User%20denied%20access`
      );

      expect(response.status).toBe(400);
      expect(response.data).toContain('<h1>Authentication Failed</h1>');
      expect(response.data).toContain('<div class="error">Error: access_denied</div>');
      expect(response.data).toContain('<p>User denied access</p>');
      await expect(pending.result).resolves.toEqual({
        type: 'error',
        error: 'access_denied',
        errorDescription: 'User denied access',
      });
    });

    it('should reject a redirect without state', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      const response = await visit(`${pending.redirectUri}?code=only-code`);

      expect(response.status).toBe(400);
      expect(response.data).toContain('Error: Missing code or state parameter.');
      await expect(pending.result).resolves.toEqual({
        type: 'error',
        error: 'Missing code or state',
      });
    });

    it('should escape markup in error parameters', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      const response = await visit(`${pending.redirectUri}?error=${encodeURIComponent('<b>x</b>')}`);

      expect(response.data).toContain('Error: &lt;b&gt;x&lt;/b&gt;');
      expect(response.data).not.toContain('<b>x</b>');
      await pending.result;
    });

    it('should answer 404 on other paths and keep waiting', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      const favicon = await visit(`http://127.0.0.1:${pending.port}/favicon.ico`);
      expect(favicon.status).toBe(404);

      await visit(`${pending.redirectUri}?code=later&state=s1`);
      await expect(pending.result).resolves.toEqual({ type: 'success', code: 'later', state: 's1' });
    });

    it('should answer 405 to non-GET requests and keep waiting', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      const post = await visit(`${pending.redirectUri}?code=c&state=s`, 'POST');
      expect(post.status).toBe(405);
      expect(post.headers['allow']).toBe('GET');

      await visit(`${pending.redirectUri}?code=c&state=s`);
      await expect(pending.result).resolves.toMatchObject({ type: 'success' });
    });

    it('should time out when no redirect arrives', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 50 });

      await expect(pending.result).rejects.toBeInstanceOf(CallbackTimeoutError);
      await expect(pending.result).rejects.toThrow('Timed out waiting for authorization callback');
    });

    it('should reject with CallbackError when cancelled', async () => {
      const pending = await listener.listen({ port: 0, timeoutMs: 0 });

      pending.cancel('User closed the prompt');

      await expect(pending.result).rejects.toBeInstanceOf(CallbackError);
      await expect(pending.result).rejects.toThrow('User closed the prompt');
    });

    it('should fail with an actionable message when the port is taken', async () => {
      const blocker = await occupy();
      const port = portOf(blocker);

      try {
        const attempt = listener.listen({ port, timeoutMs: 0 });

        await expect(attempt).rejects.toBeInstanceOf(CallbackListenerError);
        await expect(attempt).rejects.toThrow(
          `Port ${port} already in use. Close the other process and try again.`
        );
      } finally {
        await release(blocker);
      }
    });
  });

  describe('awaitCallback', () => {
    it('should bind, wait and return the callback result', async () => {
      const listenSpy = vi.spyOn(listener, 'listen');

      const result = listener.awaitCallback(0, { timeoutMs: 0 });
      const call = listenSpy.mock.results[0];
      if (call?.type !== 'return') throw new Error('listen() was not called');
      const pending = await call.value;
      await visit(`${pending.redirectUri}?code=direct&state=st`);

      await expect(result).resolves.toEqual({ type: 'success', code: 'direct', state: 'st' });
    });
  });

  describe('interpretCallback', () => {
    it('should prefer the error parameter over code and state', () => {
      const response = interpretCallback(
        new URLSearchParams({ error: 'invalid_scope', code: 'c', state: 's' })
      );

      expect(response.status).toBe(400);
      expect(response.outcome).toBe('error');
      expect(response.result).toEqual({ type: 'error', error: 'invalid_scope' });
    });

    it('should treat empty values as missing', () => {
      const response = interpretCallback(new URLSearchParams({ code: '', state: 's' }));

      expect(response.outcome).toBe('missing_params');
    });
  });
});
