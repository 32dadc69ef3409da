// src/core/token/types.ts

/**
 * Token endpoint response (code exchange and refresh share the shape)
 */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number; // seconds
  refresh_token?: string; // refresh responses often omit it
  scope: string; // space-delimited
}

/**
 * Persisted token set. The on-disk format of token-cache.json.
 */
export interface TokenRecord extends TokenResponse {
  expires_at: number; // epoch seconds, recomputed locally at save time
}

export interface TokenCacheConfig {
  cacheDir: string;
  fileName?: string; // default: token-cache.json
  freshnessBufferSeconds?: number; // default: 300
}
