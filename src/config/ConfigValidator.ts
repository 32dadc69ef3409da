// src/config/ConfigValidator.ts

import { z } from 'zod';
import { DEFAULT_CALLBACK_PORT, DEFAULT_CALLBACK_TIMEOUT_MS } from '../core/auth/CallbackListener';
import { DEFAULT_FRESHNESS_BUFFER_SECONDS } from '../core/token/TokenCache';

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Remote API the ClientHandle talks to
const ApiConfigSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    timeout: z.number().int().positive().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z
  .object({
    clientId: z.string().min(1, 'clientId is required'),
    scopes: z.array(z.string().min(1)).min(1, 'At least one scope must be requested'),
    provider: z.enum(['spotify']).optional(),
    authorizationEndpoint: z.string().url().optional(),
    tokenEndpoint: z.string().url().optional(),
    issuer: z.string().url().optional(),
    authorizationParams: z.record(z.string()).optional(),
    callbackPort: z
      .number()
      .int()
      .min(1024, 'callbackPort must be an unprivileged port (1024-65535)')
      .max(65535, 'callbackPort must be an unprivileged port (1024-65535)')
      .default(DEFAULT_CALLBACK_PORT),
    callbackTimeoutMs: z.number().int().min(0).default(DEFAULT_CALLBACK_TIMEOUT_MS),
    cacheDir: z.string().min(1).optional(),
    freshnessBufferSeconds: z.number().int().min(0).max(3600).default(DEFAULT_FRESHNESS_BUFFER_SECONDS),
    openBrowser: z.boolean().default(true),
    api: ApiConfigSchema,
    metrics: MetricsConfigSchema,
    logging: LoggerConfigSchema,
  })
  .refine((data) => Boolean(data.authorizationEndpoint) === Boolean(data.tokenEndpoint), {
    message: 'authorizationEndpoint and tokenEndpoint must be configured together',
    path: ['tokenEndpoint'],
  })
  .refine((data) => Boolean(data.provider || data.authorizationEndpoint || data.issuer), {
    message: "One of 'provider', 'authorizationEndpoint'/'tokenEndpoint' or 'issuer' is required",
  });

/** Configuration as callers write it (defaults not yet applied) */
export type InitConfig = z.input<typeof InitConfigSchema>;

/** Configuration after validation, defaults filled in */
export type ResolvedConfig = z.output<typeof InitConfigSchema>;

/**
 * Validate SDK initialization configuration
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): ResolvedConfig {
  return InitConfigSchema.parse(config);
}

export type ConfigValidationResult =
  | { success: true; data: ResolvedConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return readable errors instead of throwing
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) =>
      err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message
    ),
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function definedOnly(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

/**
 * Build an (unvalidated) InitConfig from PKCE_AUTH_* environment variables.
 * Scopes are space or comma separated. Pass the result to validateConfig().
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const logLevel = env.PKCE_AUTH_LOG_LEVEL;
  const logFormat = env.PKCE_AUTH_LOG_FORMAT;

  return definedOnly({
    clientId: env.PKCE_AUTH_CLIENT_ID,
    scopes: env.PKCE_AUTH_SCOPES?.split(/[\s,]+/).filter(Boolean),
    provider: env.PKCE_AUTH_PROVIDER,
    authorizationEndpoint: env.PKCE_AUTH_AUTHORIZATION_ENDPOINT,
    tokenEndpoint: env.PKCE_AUTH_TOKEN_ENDPOINT,
    issuer: env.PKCE_AUTH_ISSUER,
    callbackPort: parseNumber(env.PKCE_AUTH_CALLBACK_PORT),
    callbackTimeoutMs: parseNumber(env.PKCE_AUTH_CALLBACK_TIMEOUT_MS),
    cacheDir: env.PKCE_AUTH_CACHE_DIR,
    openBrowser: parseBoolean(env.PKCE_AUTH_OPEN_BROWSER),
    logging: logLevel || logFormat ? definedOnly({ level: logLevel, format: logFormat }) : undefined,
  });
}
