import { z } from "zod";
import { ValidationError } from "../errors";
import { preferenceProfileSchema } from "./preference";

// ── Conversation messages ───────────────────────────────────────────

export const messageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string().min(1, "Message content must be a non-empty string"),
  timestamp: z.coerce.date().default(() => new Date()),
});

export type Message = z.infer<typeof messageSchema>;

// ── Per-beer evaluation (the four tasting steps + rating) ───────────

export const beerEvaluationSchema = z.object({
  beerId: z.string().min(1, "Beer ID must be a non-empty string"),
  appearanceNotes: z.string().optional(),
  aromaNotes: z.string().optional(),
  tasteNotes: z.string().optional(),
  mouthfeelNotes: z.string().optional(),
  overallRating: z
    .number()
    .int("Overall rating must be an integer between 1 and 5")
    .min(1, "Overall rating must be an integer between 1 and 5")
    .max(5, "Overall rating must be an integer between 1 and 5")
    .optional(),
  timestamp: z.coerce.date().default(() => new Date()),
});

export type BeerEvaluation = z.infer<typeof beerEvaluationSchema>;

// ── Tasting session ─────────────────────────────────────────────────

export const tastingSessionSchema = z.object({
  sessionId: z.string().min(1, "Session ID must be a non-empty string"),
  userId: z.string().nullable().default(null),
  startedAt: z.coerce.date().default(() => new Date()),
  beersTasted: z.array(z.string()).default([]),
  evaluations: z.record(z.string(), beerEvaluationSchema).default({}),
  preferenceProfile: preferenceProfileSchema.nullable().default(null),
  conversationHistory: z.array(messageSchema).default([]),
});

export type TastingSession = z.infer<typeof tastingSessionSchema>;

/** Validate with a schema, surfacing the first issue as a ValidationError. */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? "Invalid value");
  }
  return result.data;
}

export function newSession(sessionId: string, userId?: string | null): TastingSession {
  return parseOrThrow(tastingSessionSchema, { sessionId, userId: userId ?? null });
}

export function parseSession(value: unknown): TastingSession {
  return parseOrThrow(tastingSessionSchema, value);
}

/** JSON-safe form of a session; dates become ISO strings. */
export function serializeSession(session: TastingSession): Record<string, unknown> {
  return JSON.parse(JSON.stringify(session));
}
