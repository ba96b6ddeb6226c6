import type { ManagedResource } from './ManagedResource.js';

// =============================================================================
// Execution Parts
// =============================================================================

/**
 * Approval request raised by running code, e.g. a tool call the code makes
 * through the execution session. Exactly one of `accept`/`reject` is called.
 */
export interface NestedApproval {
  toolName: string;
  toolArgs: Record<string, unknown>;
  accept(): void;
  reject(): void;
}

export type ExecutionPart =
  | { type: 'chunk'; text: string }
  | { type: 'approval'; approval: NestedApproval }
  | {
      type: 'result';
      /** Combined output, or null when the code printed nothing */
      text: string | null;
      /** Absolute paths of files produced by the run (plots, images) */
      artifacts: string[];
    };

export interface ExecuteOptions {
  /** Bounds the run itself; the clock starts when execution begins */
  timeoutMs?: number;
}

// =============================================================================
// Execution Session Port
// =============================================================================

/**
 * Port interface for the sandbox that runs model-written code.
 *
 * Only one `execute` call may be active at a time; callers serialize.
 * A failing run throws from the generator; the error message is shown to
 * the model.
 */
export interface ExecutionSessionPort extends ManagedResource {
  /**
   * Run source code
   *
   * @yields output chunks and nested approvals in order, then one `result`
   */
  execute(code: string, options?: ExecuteOptions): AsyncGenerator<ExecutionPart, void, unknown>;

  /** Discard session state and start over */
  reset(): Promise<void>;

  /** Stop the active run, if any. The active `execute` then throws. */
  interrupt(): Promise<void>;
}
