// =============================================================================
// Main HTTP Router
// =============================================================================
// Hono-based HTTP router for the taskweave backend

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { createHealthRoutes } from './routes/health.js';
import { createSessionRoutes } from './routes/sessions.js';
import { createApprovalRoutes } from './routes/approvals.js';
import type { AgentSessionService } from '../../application/services/AgentSessionService.js';
import type { ApprovalRegistry } from '../../application/services/ApprovalRegistry.js';
import { AppError } from '../../domain/errors/index.js';
import { correlationMiddleware, logger, type LoggerVariables } from '../../infrastructure/logging/logger.js';
import { tracingMiddleware } from '../../infrastructure/observability/index.js';

// =============================================================================
// App Type
// =============================================================================

/**
 * Hono app with typed context variables
 */
type AppBindings = {
  Variables: LoggerVariables;
};

export interface AppDependencies {
  sessions: AgentSessionService;
  approvals: ApprovalRegistry;
}

type ErrorStatus = 400 | 404 | 408 | 409 | 500 | 502;

function toErrorStatus(statusCode: number): ErrorStatus {
  switch (statusCode) {
    case 400:
      return 400;
    case 404:
      return 404;
    case 408:
      return 408;
    case 409:
      return 409;
    case 502:
      return 502;
    default:
      return 500;
  }
}

// =============================================================================
// Create App
// =============================================================================

export function createApp(deps: AppDependencies) {
  const app = new Hono<AppBindings>();

  // ===========================================================================
  // Global Middleware
  // ===========================================================================

  /**
   * OpenTelemetry tracing middleware
   * MUST be first to capture full request lifecycle
   */
  app.use('*', tracingMiddleware);

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Correlation-ID', 'traceparent', 'tracestate'],
      exposeHeaders: ['X-Correlation-ID', 'X-Trace-ID'],
      maxAge: 86400,
    })
  );

  app.use('*', correlationMiddleware);

  // ===========================================================================
  // Mount Routes
  // ===========================================================================

  app.route('/health', createHealthRoutes({ openSessions: () => deps.sessions.size }));
  app.route('/api/v1/sessions', createSessionRoutes({ sessions: deps.sessions }));
  app.route('/api/v1/approvals', createApprovalRoutes({ approvals: deps.approvals }));

  app.get('/', (c) => {
    return c.json({
      name: 'taskweave',
      version: '0.1.0',
      health: '/health',
      sessions: '/api/v1/sessions',
    });
  });

  // ===========================================================================
  // Error Handling
  // ===========================================================================

  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: `Route ${c.req.method} ${c.req.path} not found`,
        },
      },
      404
    );
  });

  /**
   * Global error handler
   * Maps AppError instances to their status codes
   */
  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(err.toJSON(), toErrorStatus(err.statusCode));
    }

    if (err instanceof HTTPException) {
      return c.json(
        {
          error: {
            code: 'HTTP_ERROR',
            message: err.message,
          },
        },
        err.status
      );
    }

    const log = c.get('logger') ?? logger;
    log.error('Unhandled error', err, { method: c.req.method, path: c.req.path });

    // Don't leak internal error details in production
    const isDev = process.env.NODE_ENV === 'development';

    return c.json(
      {
        error: {
          code: 'INTERNAL_SERVER_ERROR',
          message: isDev ? err.message : 'An unexpected error occurred',
          ...(isDev && { stack: err.stack }),
        },
      },
      500
    );
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;
