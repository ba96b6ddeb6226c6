// =============================================================================
// Observability Module - Public Exports
// =============================================================================

export {
  tracingMiddleware,
  getCurrentTraceId,
} from './hono-tracing.js';

export {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

import { trace, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';

/**
 * Create a tracer for a specific component
 *
 * @param name - Component name (e.g., 'agent', 'model-session')
 *
 * @example
 * ```typescript
 * const tracer = createTracer('execution-session');
 *
 * tracer.startActiveSpan('execute', async (span) => {
 *   // ... do work
 *   span.end();
 * });
 * ```
 */
export function createTracer(name: string, version: string = '1.0.0'): Tracer {
  return trace.getTracer(name, version);
}

/**
 * Run `fn` inside an active span, recording a thrown error on the span.
 * The span always ends when `fn` settles.
 */
export async function withSpan<T>(
  tracer: Tracer,
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
