// =============================================================================
// Health Check Routes
// =============================================================================

import { Hono } from 'hono';

export interface HealthRouteDependencies {
  /** Number of open agent sessions */
  openSessions: () => number;
}

export function createHealthRoutes(deps: HealthRouteDependencies): Hono {
  const healthRoutes = new Hono();

  /**
   * GET /health
   * Basic health check endpoint
   */
  healthRoutes.get('/', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      sessions: deps.openSessions(),
    });
  });

  /**
   * GET /health/live
   * Liveness check - indicates if the service is alive
   */
  healthRoutes.get('/live', (c) => {
    return c.json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  return healthRoutes;
}
