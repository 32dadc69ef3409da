// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  configFromEnv,
  validateConfig,
  validateConfigSafe,
} from '../../src/config/ConfigValidator';

describe('ConfigValidator', () => {
  const validConfig = {
    clientId: 'test-client',
    provider: 'spotify' as const,
    scopes: ['user-read-email'],
  };

  it('should validate correct configuration and apply defaults', () => {
    const validated = validateConfig(validConfig);

    expect(validated.clientId).toBe('test-client');
    expect(validated.callbackPort).toBe(8888);
    expect(validated.callbackTimeoutMs).toBe(300000);
    expect(validated.freshnessBufferSeconds).toBe(300);
    expect(validated.openBrowser).toBe(true);
    expect(validated.cacheDir).toBeUndefined();
  });

  it('should accept explicit endpoints instead of a provider', () => {
    const validated = validateConfig({
      clientId: 'test-client',
      scopes: ['read'],
      authorizationEndpoint: 'https://auth.example.com/authorize',
      tokenEndpoint: 'https://auth.example.com/token',
    });

    expect(validated.tokenEndpoint).toBe('https://auth.example.com/token');
  });

  it('should accept an issuer for discovery', () => {
    expect(() =>
      validateConfig({ clientId: 'test-client', scopes: ['openid'], issuer: 'https://id.example.com' })
    ).not.toThrow();
  });

  it('should reject an empty clientId', () => {
    expect(() => validateConfig({ ...validConfig, clientId: '' })).toThrow(/clientId is required/);
  });

  it('should reject an empty scope list', () => {
    expect(() => validateConfig({ ...validConfig, scopes: [] })).toThrow(
      /At least one scope must be requested/
    );
  });

  it('should reject privileged callback ports', () => {
    expect(() => validateConfig({ ...validConfig, callbackPort: 80 })).toThrow(ZodError);
  });

  it('should reject a freshness buffer above one hour', () => {
    expect(() => validateConfig({ ...validConfig, freshnessBufferSeconds: 7200 })).toThrow(ZodError);
  });

  it('should reject an unknown provider', () => {
    expect(() => validateConfig({ ...validConfig, provider: 'myspace' })).toThrow(ZodError);
  });

  it('should require endpoints to come in pairs', () => {
    const result = validateConfigSafe({
      clientId: 'test-client',
      scopes: ['read'],
      provider: 'spotify',
      authorizationEndpoint: 'https://auth.example.com/authorize',
    });

    expect(result).toEqual({
      success: false,
      errors: ['tokenEndpoint: authorizationEndpoint and tokenEndpoint must be configured together'],
    });
  });

  it('should require some way to find the endpoints', () => {
    const result = validateConfigSafe({ clientId: 'test-client', scopes: ['read'] });

    expect(result).toEqual({
      success: false,
      errors: ["One of 'provider', 'authorizationEndpoint'/'tokenEndpoint' or 'issuer' is required"],
    });
  });

  it('should return data from validateConfigSafe on success', () => {
    const result = validateConfigSafe(validConfig);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.provider).toBe('spotify');
  });

  describe('configFromEnv', () => {
    it('should map PKCE_AUTH_* variables', () => {
      const config = configFromEnv({
        PKCE_AUTH_CLIENT_ID: 'env-client',
        PKCE_AUTH_SCOPES: 'user-read-email, playlist-read-private',
        PKCE_AUTH_PROVIDER: 'spotify',
        PKCE_AUTH_CALLBACK_PORT: '9999',
        PKCE_AUTH_OPEN_BROWSER: 'false',
        PKCE_AUTH_LOG_LEVEL: 'debug',
      });

      expect(config).toEqual({
        clientId: 'env-client',
        scopes: ['user-read-email', 'playlist-read-private'],
        provider: 'spotify',
        callbackPort: 9999,
        openBrowser: false,
        logging: { level: 'debug' },
      });
      expect(validateConfig(config).callbackPort).toBe(9999);
    });

    it('should leave unset variables out so defaults apply', () => {
      expect(configFromEnv({})).toEqual({});
    });

    it('should let validation reject a non-numeric port', () => {
      const config = configFromEnv({
        PKCE_AUTH_CLIENT_ID: 'env-client',
        PKCE_AUTH_SCOPES: 'a',
        PKCE_AUTH_PROVIDER: 'spotify',
        PKCE_AUTH_CALLBACK_PORT: 'eighty',
      });

      expect(validateConfigSafe(config).success).toBe(false);
    });
  });
});
