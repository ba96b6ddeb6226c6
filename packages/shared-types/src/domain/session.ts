import { z } from 'zod';

// =============================================================================
// Session Log Envelope
// =============================================================================
// One JSON line per persisted conversation message. The message itself is
// validated separately so that envelope and payload errors are reported apart.

export const SESSION_ENVELOPE_VERSION = 1;

export const SessionEnvelopeMetaSchema = z
  .object({
    ts: z.string(),
  })
  .passthrough();

export const SessionEnvelopeSchema = z.object({
  v: z.number().int(),
  message: z.unknown(),
  meta: SessionEnvelopeMetaSchema,
});

export type SessionEnvelope = z.infer<typeof SessionEnvelopeSchema>;
