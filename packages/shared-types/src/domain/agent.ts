import { z } from 'zod';

// =============================================================================
// Tool Call Proposal (one action proposed by the model)
// =============================================================================

export const ToolCallProposalSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.string(), z.unknown()),
});

export type ToolCallProposal = z.infer<typeof ToolCallProposalSchema>;

// =============================================================================
// Tool Result Content
// =============================================================================

/**
 * Content fed back to the model for one action: plain text, or the
 * structured payload a tool back-end returned.
 */
export type ToolResultContent = string | unknown[] | Record<string, unknown>;

export const ToolResultContentSchema: z.ZodType<ToolResultContent> = z.union([
  z.string(),
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

// =============================================================================
// Tool Return (result of one proposal, correlated by toolCallId)
// =============================================================================

export const ToolReturnSchema = z.object({
  toolCallId: z.string(),
  toolName: z.string(),
  content: ToolResultContentSchema,
  rejected: z.boolean(),
});

export type ToolReturn = z.infer<typeof ToolReturnSchema>;

// =============================================================================
// Conversation Message
// =============================================================================

export const SystemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
});

export const UserMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
});

export const AssistantMessageSchema = z.object({
  role: z.literal('assistant'),
  content: z.string(),
  thoughts: z.string().optional(),
  toolCalls: z.array(ToolCallProposalSchema),
});

export const ToolMessageSchema = z.object({
  role: z.literal('tool'),
  results: z.array(ToolReturnSchema),
});

export const ConversationMessageSchema = z.discriminatedUnion('role', [
  SystemMessageSchema,
  UserMessageSchema,
  AssistantMessageSchema,
  ToolMessageSchema,
]);

export type SystemMessage = z.infer<typeof SystemMessageSchema>;
export type UserMessage = z.infer<typeof UserMessageSchema>;
export type AssistantMessage = z.infer<typeof AssistantMessageSchema>;
export type ToolMessage = z.infer<typeof ToolMessageSchema>;
export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

// =============================================================================
// Tool Definition
// =============================================================================

export const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  /** JSON Schema of the argument object */
  parameters: z.record(z.string(), z.unknown()),
});

export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
