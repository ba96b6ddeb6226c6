// =============================================================================
// Approval Registry
// =============================================================================
// Looks up the approval requests streamed to HTTP clients so that a later
// request can resolve them by id.

import type { ApprovalRequest } from '../../domain/agent/ApprovalRequest.js';
import { NotFoundError } from '../../domain/errors/index.js';

interface RegisteredApproval {
  sessionId: string;
  request: ApprovalRequest;
}

export class ApprovalRegistry {
  private readonly requests = new Map<string, RegisteredApproval>();

  /**
   * Track a request until it is resolved. Requests settled elsewhere
   * (expired, or rejected on cancel) are dropped here.
   */
  register(sessionId: string, request: ApprovalRequest): void {
    for (const [id, entry] of this.requests) {
      if (entry.request.status !== 'pending') {
        this.requests.delete(id);
      }
    }
    this.requests.set(request.id, { sessionId, request });
  }

  get size(): number {
    return this.requests.size;
  }

  /**
   * Resolve a registered request and stop tracking it
   *
   * @throws NotFoundError if no request has this id
   * @throws ApprovalAlreadyResolvedError if the request already expired
   */
  resolve(requestId: string, decision: boolean): ApprovalRequest {
    const entry = this.requests.get(requestId);
    if (!entry) {
      throw new NotFoundError('ApprovalRequest', requestId);
    }
    try {
      entry.request.approve(decision);
    } finally {
      this.requests.delete(requestId);
    }
    return entry.request;
  }

  /**
   * Requests still waiting for a decision, oldest first
   */
  pending(sessionId?: string): ApprovalRequest[] {
    return [...this.requests.values()]
      .filter((entry) => sessionId === undefined || entry.sessionId === sessionId)
      .map((entry) => entry.request)
      .filter((request) => request.status === 'pending');
  }

  /**
   * Drop every request of a session
   *
   * @returns number of requests dropped
   */
  forgetSession(sessionId: string): number {
    let dropped = 0;
    for (const [id, entry] of this.requests) {
      if (entry.sessionId === sessionId) {
        this.requests.delete(id);
        dropped++;
      }
    }
    return dropped;
  }
}
