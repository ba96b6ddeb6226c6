// =============================================================================
// Hono Tracing Middleware
// =============================================================================
// One SERVER span per request. W3C trace context is taken from the incoming
// headers and the trace id is echoed back in `x-trace-id`.

import { trace, SpanKind, SpanStatusCode, context, propagation } from '@opentelemetry/api';
import type { MiddlewareHandler } from 'hono';

const TRACER_NAME = 'hono-http';
const TRACER_VERSION = '1.0.0';

const headerGetter = {
  get(carrier: Headers, key: string): string | undefined {
    return carrier.get(key) ?? undefined;
  },
  keys(carrier: Headers): string[] {
    return [...carrier.keys()];
  },
};

export const tracingMiddleware: MiddlewareHandler = async (c, next) => {
  const tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);

  const parentContext = propagation.extract(context.active(), c.req.raw.headers, headerGetter);

  const routePath = c.req.routePath || c.req.path;
  const spanName = `${c.req.method} ${routePath}`;

  return context.with(parentContext, () =>
    tracer.startActiveSpan(
      spanName,
      {
        kind: SpanKind.SERVER,
        attributes: {
          'http.method': c.req.method,
          'http.url': c.req.url,
          'http.target': c.req.path,
          'http.route': routePath,
          'http.user_agent': c.req.header('user-agent') || '',
          'http.correlation_id': c.req.header('x-correlation-id') || '',
        },
      },
      async (span) => {
        try {
          c.header('x-trace-id', span.spanContext().traceId);

          await next();

          span.setAttribute('http.status_code', c.res.status);
          if (c.res.status >= 500) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: `HTTP ${c.res.status}` });
          } else if (c.res.status >= 400) {
            span.setAttribute('http.error_type', 'client_error');
          }
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          span.setAttributes({
            'http.status_code': 500,
            'error.type': err.name,
          });
          throw error;
        } finally {
          span.end();
        }
      }
    )
  );
};

/**
 * Trace id of the active span, if any
 */
export function getCurrentTraceId(): string | undefined {
  return trace.getActiveSpan()?.spanContext().traceId;
}
