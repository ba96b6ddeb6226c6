import { z } from 'zod';
import { ToolResultContentSchema } from '../domain/agent.js';

// =============================================================================
// Event Origin
// =============================================================================
// Every event names the agent that produced it ("main" or "sub-xxxx") and the
// correlation id linking chunks to their terminal event.

const EventOriginShape = {
  agentId: z.string(),
  corrId: z.string(),
};

// =============================================================================
// Model Output Events
// =============================================================================

export const ResponseChunkEventSchema = z.object({
  type: z.literal('response.chunk'),
  ...EventOriginShape,
  content: z.string(),
});

export type ResponseChunkEvent = z.infer<typeof ResponseChunkEventSchema>;

export const ResponseEventSchema = z.object({
  type: z.literal('response'),
  ...EventOriginShape,
  content: z.string(),
});

export type ResponseEvent = z.infer<typeof ResponseEventSchema>;

export const ThoughtsChunkEventSchema = z.object({
  type: z.literal('thoughts.chunk'),
  ...EventOriginShape,
  content: z.string(),
});

export type ThoughtsChunkEvent = z.infer<typeof ThoughtsChunkEventSchema>;

export const ThoughtsEventSchema = z.object({
  type: z.literal('thoughts'),
  ...EventOriginShape,
  content: z.string(),
});

export type ThoughtsEvent = z.infer<typeof ThoughtsEventSchema>;

// =============================================================================
// Approval Request Event
// =============================================================================

export const ApprovalRequestEventSchema = z.object({
  type: z.literal('approval.request'),
  ...EventOriginShape,
  /** Unique id used to resolve the request */
  id: z.string(),
  toolName: z.string(),
  toolArgs: z.record(z.string(), z.unknown()),
  /** Raised by running code rather than proposed by the model */
  ptc: z.boolean(),
});

export type ApprovalRequestEvent = z.infer<typeof ApprovalRequestEventSchema>;

// =============================================================================
// Action Output Events
// =============================================================================

export const CodeOutputChunkEventSchema = z.object({
  type: z.literal('code.output.chunk'),
  ...EventOriginShape,
  text: z.string(),
});

export type CodeOutputChunkEvent = z.infer<typeof CodeOutputChunkEventSchema>;

export const CodeOutputEventSchema = z.object({
  type: z.literal('code.output'),
  ...EventOriginShape,
  text: z.string().nullable(),
  images: z.array(z.string()),
});

export type CodeOutputEvent = z.infer<typeof CodeOutputEventSchema>;

export const ToolOutputEventSchema = z.object({
  type: z.literal('tool.output'),
  ...EventOriginShape,
  content: ToolResultContentSchema,
});

export type ToolOutputEvent = z.infer<typeof ToolOutputEventSchema>;

// =============================================================================
// Stream Error Event (fatal, sent once before the stream closes)
// =============================================================================

export const AgentErrorEventSchema = z.object({
  type: z.literal('agent.error'),
  message: z.string(),
  code: z.string(),
});

export type AgentErrorEvent = z.infer<typeof AgentErrorEventSchema>;

// =============================================================================
// Wire Event Union
// =============================================================================

export const WireEventSchema = z.discriminatedUnion('type', [
  ResponseChunkEventSchema,
  ResponseEventSchema,
  ThoughtsChunkEventSchema,
  ThoughtsEventSchema,
  ApprovalRequestEventSchema,
  CodeOutputChunkEventSchema,
  CodeOutputEventSchema,
  ToolOutputEventSchema,
  AgentErrorEventSchema,
]);

export type WireEvent = z.infer<typeof WireEventSchema>;
