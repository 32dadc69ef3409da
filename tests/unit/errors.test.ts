/**
 * Error Classes Unit Tests
 *
 * Codes, defaults and inheritance of the SDK error hierarchy.
 */

import { describe, it, expect } from 'vitest';
import {
  SDKError,
  AuthError,
  AuthConfigError,
  CallbackError,
  CallbackTimeoutError,
  CallbackListenerError,
  StateMismatchError,
  CodeExchangeError,
  NotAuthenticatedError,
  TokenError,
  TokenRefreshError,
  CacheCorruptError,
  PersistenceError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  errorMessage,
  systemErrorCode,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('SDKError', () => {
    it('should create error with message and code', () => {
      const error = new SDKError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('SDKError');
    });

    it('should create error with details', () => {
      const details = { attemptId: 'attempt-1' };
      const error = new SDKError('Test error', 'TEST_CODE', details);
      expect(error.details).toEqual(details);
    });
  });

  describe('authentication errors', () => {
    it.each([
      [new AuthError('x'), 'AUTH_ERROR', 'AuthError'],
      [new AuthConfigError('x'), 'AUTH_CONFIG_ERROR', 'AuthConfigError'],
      [new CallbackError('x'), 'CALLBACK_ERROR', 'CallbackError'],
      [new CallbackTimeoutError(), 'CALLBACK_TIMEOUT', 'CallbackTimeoutError'],
      [new CallbackListenerError('x'), 'CALLBACK_LISTENER_ERROR', 'CallbackListenerError'],
      [new StateMismatchError(), 'STATE_MISMATCH', 'StateMismatchError'],
      [new CodeExchangeError('x'), 'CODE_EXCHANGE_FAILED', 'CodeExchangeError'],
      [new NotAuthenticatedError(), 'NOT_AUTHENTICATED', 'NotAuthenticatedError'],
    ])('%s should carry code %s', (error, code, name) => {
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
      expect(error).toBeInstanceOf(AuthError);
      expect(error).toBeInstanceOf(SDKError);
    });

    it('should treat a timeout as a callback failure', () => {
      const error = new CallbackTimeoutError(undefined, { timeoutMs: 1000 });
      expect(error).toBeInstanceOf(CallbackError);
      expect(error.message).toBe('Timed out waiting for authorization callback');
      expect(error.details).toEqual({ timeoutMs: 1000 });
    });

    it('should use default messages', () => {
      expect(new StateMismatchError().message).toBe('State mismatch - possible request forgery');
      expect(new NotAuthenticatedError().message).toBe(
        'Not authenticated. Call authenticate() first.'
      );
    });
  });

  describe('token errors', () => {
    it.each([
      [new TokenRefreshError('x'), 'TOKEN_REFRESH_FAILED'],
      [new CacheCorruptError('x'), 'CACHE_CORRUPT'],
      [new PersistenceError('x'), 'PERSISTENCE_FAILED'],
    ])('should carry code %s', (error, code) => {
      expect(error.code).toBe(code);
      expect(error).toBeInstanceOf(TokenError);
    });

    it('should use TOKEN_ERROR for the base class', () => {
      expect(new TokenError('x').code).toBe('TOKEN_ERROR');
    });
  });

  describe('API errors', () => {
    it('should record the status in details', () => {
      const error = new ApiError('Boom', 418, { url: '/teapot' });
      expect(error.status).toBe(418);
      expect(error.code).toBe('API_ERROR');
      expect(error.details).toEqual({ url: '/teapot', status: 418 });
    });

    it('should default client and server statuses', () => {
      expect(new ApiClientError('x').status).toBe(400);
      expect(new ApiClientError('x', { status: 404 }).status).toBe(404);
      expect(new ApiServerError('x').status).toBe(500);
      expect(new ApiServerError('x', { status: 502 }).code).toBe('API_SERVER_ERROR');
    });

    it('should create RateLimitError with retryAfter', () => {
      const error = new RateLimitError(undefined, 30);
      expect(error.message).toBe('Rate limit exceeded');
      expect(error.status).toBe(429);
      expect(error.retryAfter).toBe(30);
      expect(error.code).toBe('RATE_LIMIT_EXCEEDED');
    });
  });

  describe('network errors', () => {
    it('should default the timeout message', () => {
      const error = new NetworkTimeoutError();
      expect(error.message).toBe('Request timeout');
      expect(error.code).toBe('NETWORK_TIMEOUT');
      expect(error).toBeInstanceOf(NetworkError);
    });
  });

  describe('helpers', () => {
    it('should extract messages from unknown values', () => {
      expect(errorMessage(new Error('plain'))).toBe('plain');
      expect(errorMessage('text')).toBe('text');
      expect(errorMessage(42)).toBe('42');
    });

    it('should extract Node system error codes', () => {
      const error = Object.assign(new Error('listen EADDRINUSE'), { code: 'EADDRINUSE' });
      expect(systemErrorCode(error)).toBe('EADDRINUSE');
      expect(systemErrorCode(new Error('no code'))).toBeUndefined();
      expect(systemErrorCode({ code: 'ENOENT' })).toBeUndefined();
    });
  });
});
