import { z } from 'zod';

// =============================================================================
// Open Session Request
// =============================================================================

export const OpenSessionRequestSchema = z.object({
  /** Resume this session; a new id is generated when omitted */
  sessionId: z.string().regex(/^[A-Za-z0-9_-]+$/).max(128).optional(),
});

export type OpenSessionRequest = z.infer<typeof OpenSessionRequestSchema>;

// =============================================================================
// Stream Request
// =============================================================================

export const StreamRequestSchema = z.object({
  prompt: z.string().min(1).max(50000),
  maxTurns: z.number().int().positive().optional(),
});

export type StreamRequest = z.infer<typeof StreamRequestSchema>;

// =============================================================================
// Approval Decision Request
// =============================================================================

export const ApprovalDecisionSchema = z.object({
  decision: z.boolean(),
});

export type ApprovalDecision = z.infer<typeof ApprovalDecisionSchema>;
