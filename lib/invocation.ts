/**
 * Agent runtime entrypoint: one user message in, one reply envelope out.
 *
 * Pipeline:
 *   payload -> message + session id -> get/create session -> runAgent
 *   -> append history -> save -> envelope
 *
 * Never throws. Validation problems and unexpected failures both come back
 * as `status: "error"` envelopes.
 */

import { randomUUID } from "crypto";
import { runAgent, type AgentRequest, type AgentReply } from "./agent";
import {
  invocationPayloadSchema,
  type InvocationPayload,
  type InvocationResponse,
} from "./ai/schemas";
import { errorMessage, ValidationError } from "./errors";
import { createLogger } from "./logger";
import { messageSchema, type TastingSession } from "./models";
import { sessions as sharedSessions, type SessionStore } from "./sessions";

const log = createLogger("invocation");

export const VALIDATION_APOLOGY =
  "Lo siento, hubo un problema con tu mensaje. ¿Podrías intentarlo de nuevo?";
export const GENERIC_APOLOGY =
  "Lo siento, ocurrió un error inesperado. Por favor, intenta de nuevo en un momento.";

export interface InvocationDeps {
  sessions?: SessionStore;
  agent?: (request: AgentRequest) => Promise<AgentReply>;
  /** Forwarded to every `runAgent` call. */
  agentOptions?: Pick<AgentRequest, "model" | "tools">;
}

// ── Payload extraction ──────────────────────────────────────────────

export function extractMessage(payload: InvocationPayload): string {
  const message = payload.prompt || payload.message || payload.input;
  if (!message) throw new ValidationError("No user message found in payload");
  if (typeof message !== "string") {
    throw new ValidationError("User message must be a string");
  }
  return message;
}

export function extractSessionId(payload: InvocationPayload): string {
  const sessionId = payload.session_id || payload.sessionId;
  if (sessionId) return sessionId;

  const generated = randomUUID();
  log.info("generated new session id", { sessionId: generated });
  return generated;
}

function parsePayload(raw: unknown): InvocationPayload {
  const result = invocationPayloadSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` (${issue.path.join(".")})` : "";
    throw new ValidationError(`Invalid payload${where}: ${issue?.message ?? "not an object"}`);
  }
  return result.data;
}

function errorSessionId(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "session_id" in raw) {
    const id = raw.session_id;
    if (typeof id === "string" && id) return id;
  }
  return "unknown";
}

function metadataFor(session: TastingSession) {
  return {
    beers_tasted_count: session.beersTasted.length,
    has_preference_profile: session.preferenceProfile !== null,
    message_count: session.conversationHistory.length,
  };
}

/** Envelope for a payload that never reached the handler (e.g. bad JSON). */
export function rejectPayload(error: string, session_id = "unknown"): InvocationResponse {
  return { status: "error", response: VALIDATION_APOLOGY, session_id, error };
}

// ── Handler ─────────────────────────────────────────────────────────

export async function handleInvocation(
  raw: unknown,
  deps: InvocationDeps = {},
): Promise<InvocationResponse> {
  const store = deps.sessions ?? sharedSessions;
  const agent = deps.agent ?? runAgent;

  try {
    const payload = parsePayload(raw);
    const message = extractMessage(payload);
    const sessionId = extractSessionId(payload);
    const userId = payload.user_id || payload.userId || null;

    log.info("invocation started", { sessionId, preview: message.slice(0, 100) });

    const session = store.get(sessionId) ?? store.create(sessionId, userId);

    const reply = await agent({ ...deps.agentOptions, message, session });

    session.conversationHistory.push(
      messageSchema.parse({ role: "user", content: message }),
      messageSchema.parse({ role: "assistant", content: reply.text }),
    );
    store.save(sessionId, session);

    log.info("invocation completed", { sessionId, toolsUsed: reply.toolsUsed });

    return {
      status: "success",
      response: reply.text,
      session_id: sessionId,
      metadata: metadataFor(session),
    };
  } catch (err) {
    const session_id = errorSessionId(raw);

    if (err instanceof ValidationError) {
      log.warn("invalid invocation payload", { error: err.message });
      return rejectPayload(err.message, session_id);
    }

    log.error("invocation failed", { error: errorMessage(err) });
    return {
      status: "error",
      response: GENERIC_APOLOGY,
      session_id,
      error: "Internal server error",
    };
  }
}
