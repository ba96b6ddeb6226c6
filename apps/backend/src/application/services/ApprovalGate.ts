// =============================================================================
// Approval Gate
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { ApprovalRequest } from '../../domain/agent/ApprovalRequest.js';

export interface ApprovalGateOptions {
  agentId: string;
  /** Applied to every request created by this gate */
  approvalTimeoutMs?: number;
}

/**
 * Creates the approval requests of one agent and keeps track of those still
 * pending, so that cancellation can reject them all.
 */
export class ApprovalGate {
  private readonly pending = new Set<ApprovalRequest>();

  constructor(private readonly options: ApprovalGateOptions) {}

  /**
   * Create a pending request. Does not wait for the decision.
   */
  request(
    toolName: string,
    toolArgs: Record<string, unknown>,
    origin: { corrId: string; ptc?: boolean }
  ): ApprovalRequest {
    this.prune();
    const request = new ApprovalRequest({
      id: uuidv4(),
      agentId: this.options.agentId,
      corrId: origin.corrId,
      toolName,
      toolArgs,
      ptc: origin.ptc ?? false,
      timeoutMs: this.options.approvalTimeoutMs,
    });
    this.pending.add(request);
    return request;
  }

  /** Requests created by this gate that have not been resolved yet */
  get pendingCount(): number {
    this.prune();
    return this.pending.size;
  }

  /**
   * Resolve every pending request as rejected
   *
   * @returns number of requests rejected
   */
  rejectPending(): number {
    let rejected = 0;
    for (const request of this.pending) {
      if (request.status === 'pending') {
        request.approve(false);
        rejected++;
      }
    }
    this.pending.clear();
    return rejected;
  }

  private prune(): void {
    for (const request of this.pending) {
      if (request.status !== 'pending') {
        this.pending.delete(request);
      }
    }
  }
}
