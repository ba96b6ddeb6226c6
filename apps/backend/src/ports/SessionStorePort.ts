import type { ConversationMessage } from '@taskweave/shared-types';

// =============================================================================
// Session Store Port
// =============================================================================

export type ToolResultExtension = 'txt' | 'json';

/**
 * Port interface for per-session conversation persistence.
 *
 * Each agent of a session has its own append-only log keyed by agent id.
 */
export interface SessionStorePort {
  readonly sessionId: string;

  /**
   * Append messages to an agent's log
   *
   * @throws PersistenceError when the write fails
   */
  append(agentId: string, messages: ConversationMessage[]): Promise<void>;

  /**
   * Replay an agent's log
   *
   * @returns the persisted messages in order, or [] when the agent has no log
   * @throws PersistenceError when the log is corrupt
   */
  load(agentId: string): Promise<ConversationMessage[]>;

  /**
   * Store an oversized tool result outside the conversation
   *
   * @returns Absolute path of the stored file
   */
  saveToolResult(payload: string, ext: ToolResultExtension): Promise<string>;
}
