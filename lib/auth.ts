import { randomUUID } from "crypto";
import { SignJWT, jwtVerify } from "jose";
import { env } from "./env";

export const SESSION_COOKIE = "cicerone_session";
export const SESSION_MAX_AGE = 60 * 60 * 24 * 30; // 30 days

/** The web chat relay is only mounted when a cookie secret is configured. */
export function hasChatSecret(): boolean {
  return Boolean(env.JWT_SECRET ?? env.TELEGRAM_BOT_TOKEN);
}

function getJwtSecret() {
  const secret = env.JWT_SECRET ?? env.TELEGRAM_BOT_TOKEN;
  if (!secret) throw new Error("JWT_SECRET or TELEGRAM_BOT_TOKEN must be set");
  return new TextEncoder().encode(secret);
}

export function newWebSessionId(): string {
  return `web-session-${randomUUID()}`;
}

// ── JWT chat sessions ───────────────────────────────────────────────────────

/**
 * Sign the runtime session id into a token for the HTTP-only cookie.
 */
export async function signChatSession(sessionId: string): Promise<string> {
  return new SignJWT({ sid: sessionId })
    .setProtectedHeader({ alg: "HS256" })
    .setIssuedAt()
    .setExpirationTime(`${SESSION_MAX_AGE}s`)
    .sign(getJwtSecret());
}

/**
 * Verify a cookie token. Returns the session id, or null when the token is
 * missing, expired or forged.
 */
export async function verifyChatSession(token: string | undefined): Promise<string | null> {
  if (!token) return null;

  try {
    const { payload } = await jwtVerify(token, getJwtSecret());
    return typeof payload.sid === "string" && payload.sid ? payload.sid : null;
  } catch {
    return null;
  }
}
