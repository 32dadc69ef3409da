// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const REDACTED = '[REDACTED]';

// camelCase and wire (snake_case) spellings of every secret the flow handles
const SENSITIVE_KEYS = [
  'accessToken',
  'refreshToken',
  'access_token',
  'refresh_token',
  'code',
  'codeVerifier',
  'code_verifier',
  'verifier',
  'state',
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      // stdout belongs to the host process (CLIs, stdio servers)
      transports: [
        new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
      ],
    });
  }

  // Copies plain objects and arrays at any depth; the input is left untouched
  private redactSensitive(obj: unknown): unknown {
    if (Array.isArray(obj)) return obj.map((item) => this.redactSensitive(item));
    if (!isPlainObject(obj)) return obj;

    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SENSITIVE_KEYS.includes(key) ? REDACTED : this.redactSensitive(value);
    }
    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  log(level: string, message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.log(level, message, sanitized);
  }
}
