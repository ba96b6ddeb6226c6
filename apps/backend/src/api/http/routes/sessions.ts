// =============================================================================
// Session Routes
// =============================================================================
// Open agent sessions and stream their events to the client as SSE. Every
// agent event becomes one SSE message named after its type; a fatal error
// is sent as a final `agent.error` message.

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { OpenSessionRequestSchema, StreamRequestSchema, type AgentErrorEvent } from '@taskweave/shared-types';
import type { AgentSessionService } from '../../../application/services/AgentSessionService.js';
import { toWireEvent } from '../../../domain/agent/events.js';
import { AppError } from '../../../domain/errors/index.js';
import { logger } from '../../../infrastructure/logging/logger.js';

export interface SessionRouteDependencies {
  sessions: AgentSessionService;
}

export function createSessionRoutes(deps: SessionRouteDependencies): Hono {
  const sessionRoutes = new Hono();
  const log = logger.child({ route: 'sessions' });

  /**
   * POST /api/v1/sessions
   * Open a new session, or resume a persisted one by id.
   */
  sessionRoutes.post('/', zValidator('json', OpenSessionRequestSchema), async (c) => {
    const { sessionId } = c.req.valid('json');
    const info = await deps.sessions.open(sessionId);
    return c.json(info, 201);
  });

  /**
   * POST /api/v1/sessions/:sessionId/stream
   * Run one exchange on the session's root agent, streamed as SSE.
   * Approval requests are resolved through the approvals routes.
   */
  sessionRoutes.post('/:sessionId/stream', zValidator('json', StreamRequestSchema), async (c) => {
    const sessionId = c.req.param('sessionId');
    const { prompt, maxTurns } = c.req.valid('json');

    // Unknown sessions fail with 404 before the stream opens
    deps.sessions.get(sessionId);
    log.info('Starting stream', { sessionId, promptPreview: prompt.slice(0, 100) });

    return streamSSE(c, async (stream) => {
      let aborted = false;
      stream.onAbort(() => {
        aborted = true;
        log.warn('Client disconnected, cancelling session', { sessionId });
        deps.sessions.cancel(sessionId).catch((error: unknown) => {
          log.error('Failed to cancel session after disconnect', error, { sessionId });
        });
      });

      try {
        for await (const event of deps.sessions.stream(sessionId, prompt, { maxTurns })) {
          if (aborted) {
            break;
          }
          await stream.writeSSE({
            event: event.type,
            data: JSON.stringify(toWireEvent(event)),
          });
        }
        log.info('Stream completed', { sessionId });
      } catch (error) {
        log.error('Stream failed', error, { sessionId });
        const errorEvent: AgentErrorEvent = {
          type: 'agent.error',
          message: error instanceof Error ? error.message : String(error),
          code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
        };
        await stream.writeSSE({
          event: errorEvent.type,
          data: JSON.stringify(errorEvent),
        });
      }
    });
  });

  /**
   * POST /api/v1/sessions/:sessionId/cancel
   * Abort the running exchange; the session stays open.
   */
  sessionRoutes.post('/:sessionId/cancel', async (c) => {
    const sessionId = c.req.param('sessionId');
    await deps.sessions.cancel(sessionId);
    return c.json({ sessionId, cancelled: true });
  });

  /**
   * DELETE /api/v1/sessions/:sessionId
   * Cancel the session's agent and close the session.
   */
  sessionRoutes.delete('/:sessionId', async (c) => {
    const sessionId = c.req.param('sessionId');
    await deps.sessions.close(sessionId);
    return c.json({ sessionId, closed: true });
  });

  return sessionRoutes;
}
