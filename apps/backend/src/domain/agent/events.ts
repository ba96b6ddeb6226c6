// =============================================================================
// Agent Events
// =============================================================================
// Closed set of events an agent yields from `stream()`. All but the approval
// request are plain wire objects; the approval request carries its one-shot
// resolution cell.

import type {
  CodeOutputChunkEvent,
  CodeOutputEvent,
  ResponseChunkEvent,
  ResponseEvent,
  ThoughtsChunkEvent,
  ThoughtsEvent,
  ToolOutputEvent,
  ToolResultContent,
  WireEvent,
} from '@taskweave/shared-types';
import { ApprovalRequest } from './ApprovalRequest.js';

export type AgentEvent =
  | ResponseChunkEvent
  | ResponseEvent
  | ThoughtsChunkEvent
  | ThoughtsEvent
  | ApprovalRequest
  | CodeOutputChunkEvent
  | CodeOutputEvent
  | ToolOutputEvent;

export type AgentEventType = AgentEvent['type'];

export interface EventOrigin {
  agentId: string;
  corrId: string;
}

/**
 * Compile-time exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

// =============================================================================
// Constructors
// =============================================================================

export const responseChunk = (origin: EventOrigin, content: string): ResponseChunkEvent => ({
  type: 'response.chunk',
  ...origin,
  content,
});

export const response = (origin: EventOrigin, content: string): ResponseEvent => ({
  type: 'response',
  ...origin,
  content,
});

export const thoughtsChunk = (origin: EventOrigin, content: string): ThoughtsChunkEvent => ({
  type: 'thoughts.chunk',
  ...origin,
  content,
});

export const thoughts = (origin: EventOrigin, content: string): ThoughtsEvent => ({
  type: 'thoughts',
  ...origin,
  content,
});

export const codeOutputChunk = (origin: EventOrigin, text: string): CodeOutputChunkEvent => ({
  type: 'code.output.chunk',
  ...origin,
  text,
});

export const codeOutput = (origin: EventOrigin, text: string | null, images: string[]): CodeOutputEvent => ({
  type: 'code.output',
  ...origin,
  text,
  images,
});

export const toolOutput = (origin: EventOrigin, content: ToolResultContent): ToolOutputEvent => ({
  type: 'tool.output',
  ...origin,
  content,
});

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render code output as text followed by a markdown link per image
 */
export function formatCodeOutput(event: Pick<CodeOutputEvent, 'text' | 'images'>): string {
  const parts: string[] = [];
  if (event.text) {
    parts.push(event.text);
  }
  for (const image of event.images) {
    parts.push(`![Image](${image})`);
  }
  return parts.join('\n');
}

/**
 * Serializable form of an event for SSE clients
 */
export function toWireEvent(event: AgentEvent): WireEvent {
  if (event instanceof ApprovalRequest) {
    return event.toWire();
  }
  return event;
}
