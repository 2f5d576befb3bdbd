/**
 * HTTP client the front-ends use to reach the agent runtime endpoint.
 */

import { randomUUID } from "crypto";
import { invocationResponseSchema, type InvocationResponse } from "./ai/schemas";
import { env } from "./env";
import { errorMessage, RuntimeClientError, type RuntimeErrorCode } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("runtime-client");

/** The runtime rejects session ids shorter than this. */
export const MIN_SESSION_ID_LENGTH = 33;

export interface RuntimeClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

// Padded once per id, so a short id keeps mapping to the same runtime session.
const paddedIds = new Map<string, string>();

export function padSessionId(sessionId: string): string {
  if (sessionId.length >= MIN_SESSION_ID_LENGTH) return sessionId;

  let padded = paddedIds.get(sessionId);
  if (!padded) {
    padded = `${sessionId}-${randomUUID()}`;
    paddedIds.set(sessionId, padded);
  }
  return padded;
}

function codeForStatus(status: number): RuntimeErrorCode {
  if (status === 429) return "THROTTLED";
  if (status === 400 || status === 422) return "VALIDATION";
  if (status === 404) return "NOT_FOUND";
  return "UNAVAILABLE";
}

function isAbort(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "AbortError" || err.name === "TimeoutError")
  );
}

/**
 * Send one message to the runtime. Resolves with the envelope (which may
 * itself carry `status: "error"`); rejects with a `RuntimeClientError` when
 * the call fails at the transport level.
 */
export async function invokeAgentRuntime(
  message: string,
  sessionId: string,
  options: RuntimeClientOptions = {},
): Promise<InvocationResponse> {
  const doFetch = options.fetch ?? fetch;
  const baseUrl = (options.baseUrl ?? env.AGENT_RUNTIME_URL).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? env.AGENT_TIMEOUT_MS;
  const session_id = padSessionId(sessionId);

  let response: Response;
  try {
    response = await doFetch(`${baseUrl}/invocations`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ prompt: message, session_id }),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (isAbort(err)) {
      throw new RuntimeClientError("TIMEOUT", `Agent runtime timed out after ${timeoutMs}ms`);
    }
    log.error("agent runtime unreachable", { error: errorMessage(err) });
    throw new RuntimeClientError("UNAVAILABLE", `Agent runtime unreachable: ${errorMessage(err)}`);
  }

  if (!response.ok) {
    const code = codeForStatus(response.status);
    log.warn("agent runtime rejected request", { status: response.status, code });
    throw new RuntimeClientError(
      code,
      `Agent runtime answered HTTP ${response.status}`,
      response.status,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new RuntimeClientError("BAD_RESPONSE", `Invalid JSON from agent runtime: ${errorMessage(err)}`);
  }

  const parsed = invocationResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new RuntimeClientError("BAD_RESPONSE", "Unexpected response shape from agent runtime");
  }
  return parsed.data;
}

// ── User-facing text ────────────────────────────────────────────────

const RUNTIME_ERROR_TEXT: Record<RuntimeErrorCode, string> = {
  THROTTLED: "⏱️ Demasiadas solicitudes. Por favor, espera un momento e intenta de nuevo.",
  NOT_FOUND: "🔌 No se encontró el agente. Verifica la configuración.",
  VALIDATION: "Lo siento, no pude procesar tu mensaje. Por favor, intenta de nuevo.",
  TIMEOUT: "Lo siento, no pude procesar tu mensaje. Por favor, intenta de nuevo.",
  UNAVAILABLE: "Lo siento, no pude procesar tu mensaje. Por favor, intenta de nuevo.",
  BAD_RESPONSE: "Lo siento, no pude procesar tu mensaje. Por favor, intenta de nuevo.",
};

export function describeRuntimeError(err: unknown): string {
  if (err instanceof RuntimeClientError) return RUNTIME_ERROR_TEXT[err.code];
  return RUNTIME_ERROR_TEXT.UNAVAILABLE;
}
