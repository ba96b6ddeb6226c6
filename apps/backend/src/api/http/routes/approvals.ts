// =============================================================================
// Approval Routes
// =============================================================================

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ApprovalDecisionSchema } from '@taskweave/shared-types';
import type { ApprovalRegistry } from '../../../application/services/ApprovalRegistry.js';
import { logger } from '../../../infrastructure/logging/logger.js';

export interface ApprovalRouteDependencies {
  approvals: ApprovalRegistry;
}

export function createApprovalRoutes(deps: ApprovalRouteDependencies): Hono {
  const approvalRoutes = new Hono();
  const log = logger.child({ route: 'approvals' });

  /**
   * GET /api/v1/approvals?sessionId=...
   * List approval requests still waiting for a decision.
   */
  approvalRoutes.get('/', (c) => {
    const sessionId = c.req.query('sessionId');
    const pending = deps.approvals.pending(sessionId).map((request) => request.toWire());
    return c.json({ approvals: pending, count: pending.length });
  });

  /**
   * POST /api/v1/approvals/:requestId
   * Approve or reject a pending request. 404 when unknown or already
   * decided, 409 when it expired or was rejected by a cancel.
   */
  approvalRoutes.post('/:requestId', zValidator('json', ApprovalDecisionSchema), (c) => {
    const requestId = c.req.param('requestId');
    const { decision } = c.req.valid('json');

    const request = deps.approvals.resolve(requestId, decision);
    log.info('Approval resolved', { requestId, toolName: request.toolName, decision });

    return c.json({ id: request.id, status: request.status });
  });

  return approvalRoutes;
}
