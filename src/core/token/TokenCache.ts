// src/core/token/TokenCache.ts

import { promises as fs } from 'fs';
import { randomBytes } from 'crypto';
import * as path from 'path';
import { z } from 'zod';
import type { TokenRecord, TokenResponse, TokenCacheConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { withTokenSpan } from '../../observability/tracing';
import {
  CacheCorruptError,
  PersistenceError,
  errorMessage,
  systemErrorCode,
} from '../../utils/errors';

export const DEFAULT_CACHE_FILE = 'token-cache.json';
export const DEFAULT_FRESHNESS_BUFFER_SECONDS = 300;

const TokenRecordSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().int().nonnegative(),
  refresh_token: z.string().optional(),
  scope: z.string(),
  expires_at: z.number(),
});

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * File-backed token cache at <cacheDir>/token-cache.json
 *
 * - Expiry-aware load: expired records are still returned while they carry a refresh token
 * - Atomic save (temp file in the same directory, then rename)
 * - Corrupt files are moved aside to <file>.bak and treated as "no cache"
 */
export class TokenCache {
  readonly path: string;
  private freshnessBufferSeconds: number;
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(config: TokenCacheConfig, logger: Logger, metrics?: MetricsCollector) {
    this.path = path.join(config.cacheDir, config.fileName ?? DEFAULT_CACHE_FILE);
    this.freshnessBufferSeconds = config.freshnessBufferSeconds ?? DEFAULT_FRESHNESS_BUFFER_SECONDS;
    this.logger = logger;
    this.metrics = metrics;
  }

  /**
   * Load the cached record. Never throws: missing, unreadable and corrupt
   * files all come back as undefined.
   */
  async load(): Promise<TokenRecord | undefined> {
    const record = await this.readRecord();
    if (!record) return undefined;

    if (this.isFresh(record)) {
      this.logger.debug('Token cache hit', { path: this.path, expiresAt: record.expires_at });
      return record;
    }

    if (record.refresh_token) {
      this.logger.debug('Cached token expiring, refresh candidate', {
        path: this.path,
        expiresAt: record.expires_at,
      });
      return record;
    }

    this.logger.info('Cached token expired and has no refresh token', { path: this.path });
    return undefined;
  }

  /**
   * True iff the token outlives now + buffer (strictly greater)
   */
  isFresh(record: TokenRecord, now: number = nowInSeconds()): boolean {
    return record.expires_at > now + this.freshnessBufferSeconds;
  }

  /**
   * Persist a token response. Persistence failures are logged and the
   * record is still returned for in-memory use.
   */
  async save(response: TokenResponse): Promise<TokenRecord> {
    return withTokenSpan('save', this.path, async () => {
      const refreshToken = response.refresh_token || (await this.readRecord(true))?.refresh_token;

      const record: TokenRecord = {
        access_token: response.access_token,
        token_type: response.token_type,
        expires_in: response.expires_in,
        scope: response.scope,
        expires_at: nowInSeconds() + response.expires_in,
      };
      if (refreshToken) {
        record.refresh_token = refreshToken;
      }

      try {
        await this.writeAtomic(record);
        this.metrics?.incrementCounter('cache_writes', { status: 'success' });
        this.logger.info('Token cache saved', {
          path: this.path,
          expiresAt: new Date(record.expires_at * 1000).toISOString(),
          hasRefreshToken: Boolean(record.refresh_token),
        });
      } catch (error) {
        const failure = new PersistenceError('Failed to save token cache', {
          path: this.path,
          cause: error,
        });
        this.metrics?.incrementCounter('cache_writes', { status: 'failure' });
        this.logger.error(failure.message, {
          code: failure.code,
          path: this.path,
          error: errorMessage(error),
        });
      }

      return record;
    });
  }

  /**
   * Remove the cache file (explicit disconnect only)
   */
  async clear(): Promise<void> {
    await fs.rm(this.path, { force: true });
    this.logger.info('Token cache cleared', { path: this.path });
  }

  private async readRecord(quiet = false): Promise<TokenRecord | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf8');
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        if (!quiet) this.logger.debug('Token cache not found', { path: this.path });
      } else {
        this.logger.warn('Token cache unreadable, ignoring', {
          path: this.path,
          error: errorMessage(error),
        });
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      if (!quiet) await this.discardCorrupt(errorMessage(error));
      return undefined;
    }

    const result = TokenRecordSchema.safeParse(parsed);
    if (!result.success) {
      if (!quiet) {
        await this.discardCorrupt(
          result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ')
        );
      }
      return undefined;
    }

    // Older writers stored a missing refresh token as ""
    const { refresh_token, ...rest } = result.data;
    return refresh_token ? { ...rest, refresh_token } : rest;
  }

  private async discardCorrupt(reason: string): Promise<void> {
    const corrupt = new CacheCorruptError('Token cache is corrupt, treating as absent', {
      path: this.path,
      reason,
    });
    this.metrics?.incrementCounter('cache_corrupt');
    this.logger.warn(corrupt.message, { errorCode: corrupt.code, path: this.path, reason });

    const backupPath = `${this.path}.bak`;
    try {
      await fs.rename(this.path, backupPath);
      this.logger.info('Corrupt token cache moved aside', { backupPath });
    } catch (error) {
      this.logger.warn('Could not back up corrupt token cache', {
        path: this.path,
        error: errorMessage(error),
      });
    }
  }

  private async writeAtomic(record: TokenRecord): Promise<void> {
    await fs.mkdir(path.dirname(this.path), { recursive: true, mode: 0o700 });

    const tempPath = `${this.path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(record, null, 2), {
        encoding: 'utf8',
        mode: 0o600,
      });
      await fs.rename(tempPath, this.path);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug('Temp cache file cleanup failed', {
          tempPath,
          error: errorMessage(cleanupError),
        });
      });
      throw error;
    }
  }
}
