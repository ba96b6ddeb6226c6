import type { ConversationMessage, ToolCallProposal, ToolDefinition } from '@taskweave/shared-types';
import type { ManagedResource } from './ManagedResource.js';

// =============================================================================
// Stream Parts
// =============================================================================

export type ModelFinishReason = 'stop' | 'tool_calls' | 'length' | 'error';

/**
 * One part of a streamed model step
 */
export type ModelStreamPart =
  | { type: 'thoughts-delta'; delta: string }
  | { type: 'text-delta'; delta: string }
  | { type: 'tool-call'; toolCall: ToolCallProposal }
  | { type: 'finish'; finishReason: ModelFinishReason };

export interface ModelStreamOptions {
  /** Tools the model may propose in this step */
  tools: ToolDefinition[];
  /** Aborts the underlying request */
  abortSignal?: AbortSignal;
}

// =============================================================================
// Model Session Port
// =============================================================================

/**
 * Port interface for the model that drives an agent.
 *
 * A session generates exactly one model step per `stream` call. The full
 * conversation is passed every time; the session keeps no history of its own.
 * Errors thrown from the generator are fatal to the turn.
 */
export interface ModelSessionPort extends ManagedResource {
  /** Model ID in "provider:model" form */
  readonly modelId: string;

  /**
   * Generate one model step
   *
   * @yields reasoning and text deltas as they arrive, then every proposed
   *   tool call, then a single `finish` part
   */
  stream(
    messages: ConversationMessage[],
    options: ModelStreamOptions
  ): AsyncGenerator<ModelStreamPart, void, unknown>;
}
