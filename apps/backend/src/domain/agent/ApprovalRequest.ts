// =============================================================================
// Approval Request
// =============================================================================

import type { ApprovalRequestEvent } from '@taskweave/shared-types';
import { ApprovalAlreadyResolvedError, ApprovalTimeoutError } from '../errors/index.js';

export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'expired';

export interface ApprovalRequestInit {
  id: string;
  agentId: string;
  corrId: string;
  toolName: string;
  toolArgs: Record<string, unknown>;
  /** Raised by running code rather than proposed by the model */
  ptc?: boolean;
  /** How long `approved()` waits before the request expires */
  timeoutMs?: number;
}

/**
 * A pending action awaiting a human decision.
 *
 * Emitted on the agent's event stream before the action runs. The producer
 * suspends on `approved()`; the consumer resolves the request exactly once
 * with `approve(decision)`.
 */
export class ApprovalRequest {
  readonly type = 'approval.request';
  readonly id: string;
  readonly agentId: string;
  readonly corrId: string;
  readonly toolName: string;
  readonly toolArgs: Record<string, unknown>;
  readonly ptc: boolean;

  private readonly timeoutMs: number | undefined;
  private readonly decision: Promise<boolean>;
  private resolveDecision: (decision: boolean) => void = () => {};
  private waiting: Promise<boolean> | null = null;
  private state: ApprovalStatus = 'pending';

  constructor(init: ApprovalRequestInit) {
    this.id = init.id;
    this.agentId = init.agentId;
    this.corrId = init.corrId;
    this.toolName = init.toolName;
    this.toolArgs = init.toolArgs;
    this.ptc = init.ptc ?? false;
    this.timeoutMs = init.timeoutMs;
    this.decision = new Promise<boolean>((resolve) => {
      this.resolveDecision = resolve;
    });
  }

  get status(): ApprovalStatus {
    return this.state;
  }

  /**
   * Resolve the request
   *
   * @param decision - true runs the action, false rejects it and ends the round
   * @throws ApprovalAlreadyResolvedError if the request was already resolved or expired
   */
  approve(decision: boolean): void {
    if (this.state !== 'pending') {
      throw new ApprovalAlreadyResolvedError(this.id, this.state);
    }
    this.state = decision ? 'approved' : 'rejected';
    this.resolveDecision(decision);
  }

  /**
   * Wait for the decision. The timeout clock starts on the first call.
   *
   * @throws ApprovalTimeoutError if no decision arrives within the timeout
   */
  approved(): Promise<boolean> {
    if (!this.waiting) {
      this.waiting = this.timeoutMs === undefined ? this.decision : this.withTimeout(this.timeoutMs);
    }
    return this.waiting;
  }

  toWire(): ApprovalRequestEvent {
    return {
      type: this.type,
      agentId: this.agentId,
      corrId: this.corrId,
      id: this.id,
      toolName: this.toolName,
      toolArgs: this.toolArgs,
      ptc: this.ptc,
    };
  }

  private withTimeout(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.state === 'pending') {
          this.state = 'expired';
          reject(new ApprovalTimeoutError(this.toolName, timeoutMs));
        }
      }, timeoutMs);

      void this.decision.then((decision) => {
        clearTimeout(timer);
        resolve(decision);
      });
    });
  }
}
