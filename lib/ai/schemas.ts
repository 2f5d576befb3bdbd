import { z } from "zod";

// ── Inbound invocation payload ──────────────────────────────────────────────
// Several front-ends call the runtime, so the message and ids are accepted
// under more than one key.

export const invocationPayloadSchema = z
  .object({
    prompt: z.unknown().optional(),
    message: z.unknown().optional(),
    input: z.unknown().optional(),
    session_id: z.string().optional(),
    sessionId: z.string().optional(),
    user_id: z.string().optional(),
    userId: z.string().optional(),
  })
  .passthrough();

export type InvocationPayload = z.infer<typeof invocationPayloadSchema>;

// ── Response envelope ───────────────────────────────────────────────────────

export const invocationMetadataSchema = z.object({
  beers_tasted_count: z.number().int().nonnegative(),
  has_preference_profile: z.boolean(),
  message_count: z.number().int().nonnegative(),
});

export const invocationSuccessSchema = z.object({
  status: z.literal("success"),
  response: z.string(),
  session_id: z.string(),
  metadata: invocationMetadataSchema.optional(),
});

export const invocationErrorSchema = z.object({
  status: z.literal("error"),
  response: z.string(),
  session_id: z.string(),
  error: z.string(),
});

export const invocationResponseSchema = z.discriminatedUnion("status", [
  invocationSuccessSchema,
  invocationErrorSchema,
]);

export type InvocationResponse = z.infer<typeof invocationResponseSchema>;
