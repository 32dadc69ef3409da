/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Wraps the network-bound parts of authentication in spans:
 * - the whole authenticate() call
 * - authorization code exchange and token refresh
 * - token cache writes
 *
 * No-op unless OTEL_ENABLED=1 (or "true"). Exporter and SDK setup belong
 * to the host application; this module only talks to @opentelemetry/api.
 */

import { trace, context, SpanStatusCode, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'pkce-loopback-auth';

type Attributes = Record<string, string | number | boolean>;

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID (one per authorization attempt)
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute; receives null when tracing is disabled
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Attributes
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for OAuth operations
 *
 * @param operation - 'authenticate', 'exchangeCode', 'refreshToken'
 * @param clientId - OAuth client identifier
 */
export async function withOAuthSpan<T>(
  operation: string,
  clientId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`OAuth ${operation}`, fn, {
    'oauth.operation': operation,
    'oauth.client_id': clientId,
  });
}

/**
 * Create a span for token cache operations
 */
export async function withTokenSpan<T>(
  operation: string,
  cachePath: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Token ${operation}`, fn, {
    'token.operation': operation,
    'token.cache_path': cachePath,
  });
}

export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

/**
 * Add event to current span
 */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = getCurrentSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}
