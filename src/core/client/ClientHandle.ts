// src/core/client/ClientHandle.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import type { TokenRecord } from '../token/types';
import type { ApiRequestConfig, ApiResponse } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import {
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
} from '../../utils/errors';
import { nowInSeconds } from '../token/TokenCache';

export interface ClientHandleOptions {
  baseUrl?: string;
  timeout?: number;
  logger: Logger;
  metrics?: MetricsCollector;
}

/**
 * Authenticated handle around one access token.
 *
 * Goes stale once expiresAt passes; the coordinator replaces it on the next
 * authenticate() rather than mutating it.
 */
export class ClientHandle {
  readonly accessToken: string;
  readonly tokenType: string;
  readonly scopes: string[];
  readonly expiresAt: number; // epoch seconds
  private http: AxiosInstance;
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(record: TokenRecord, options: ClientHandleOptions) {
    this.accessToken = record.access_token;
    this.tokenType = record.token_type;
    this.scopes = record.scope.split(' ').filter(Boolean);
    this.expiresAt = record.expires_at;
    this.logger = options.logger;
    this.metrics = options.metrics;

    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout ?? 30000,
      headers: {
        Authorization: this.authorizationHeader,
        'User-Agent': 'pkce-loopback-auth/1.0',
      },
    });
  }

  /**
   * RFC 6750 bearer header; providers differ in token_type casing
   */
  get authorizationHeader(): string {
    return `Bearer ${this.accessToken}`;
  }

  isExpired(now: number = nowInSeconds()): boolean {
    return this.expiresAt <= now;
  }

  hasScope(scope: string): boolean {
    return this.scopes.includes(scope);
  }

  /**
   * Send a request to the remote API with the bearer token attached
   */
  async request<T = unknown>(config: ApiRequestConfig): Promise<ApiResponse<T>> {
    const method = config.method ?? 'GET';

    try {
      const response = await this.http.request<T>({
        url: config.url,
        method,
        params: config.query,
        data: config.body,
        headers: config.headers,
        timeout: config.timeout,
      });

      this.metrics?.incrementCounter('api_requests', { method, status: response.status });

      return {
        data: response.data,
        status: response.status,
        headers: this.toHeaderRecord(response.headers),
      };
    } catch (error) {
      const status = isAxiosError(error) && error.response ? error.response.status : 'error';
      this.metrics?.incrementCounter('api_requests', { method, status });
      throw this.transformError(error, config.url);
    }
  }

  async get<T = unknown>(url: string, query?: ApiRequestConfig['query']): Promise<ApiResponse<T>> {
    return this.request<T>({ url, method: 'GET', query });
  }

  // Keeps the token out of logs and JSON dumps
  toJSON(): Record<string, unknown> {
    return {
      tokenType: this.tokenType,
      scopes: this.scopes,
      expiresAt: new Date(this.expiresAt * 1000).toISOString(),
    };
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (!isAxiosError(error)) {
      return new NetworkError('Network error', { url, cause: error });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('API error response', {
        url,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const retryAfter = Number(error.response.headers['retry-after']);
        return new RateLimitError(
          'Rate limit exceeded',
          Number.isFinite(retryAfter) ? retryAfter : undefined,
          { url }
        );
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, {
          url,
          status,
          response: error.response.data,
        });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, { url, status });
      }
    }
    if (error.code === 'ECONNABORTED') {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError('Network error', { url, cause: error });
  }
}
