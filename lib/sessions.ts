/**
 * In-memory tasting sessions.
 *
 * Every method is synchronous, so a read-modify-write never interleaves with
 * another request on the event loop. Expired sessions are swept lazily on
 * every `get`.
 */

import { env } from "./env";
import { ValidationError } from "./errors";
import { createLogger } from "./logger";
import { newSession, type TastingSession } from "./models";

const log = createLogger("sessions");

const HOUR_MS = 60 * 60 * 1000;

export interface SessionStoreOptions {
  timeoutHours?: number;
  now?: () => number;
}

function assertSessionId(sessionId: unknown): asserts sessionId is string {
  if (typeof sessionId !== "string" || !sessionId) {
    throw new ValidationError("Session ID must be a non-empty string");
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, TastingSession>();
  readonly timeoutHours: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.timeoutHours = options.timeoutHours ?? env.SESSION_TIMEOUT_HOURS;
    this.now = options.now ?? Date.now;
  }

  get(sessionId: string): TastingSession | null {
    assertSessionId(sessionId);
    this.cleanup();
    return this.sessions.get(sessionId) ?? null;
  }

  save(sessionId: string, session: TastingSession): void {
    assertSessionId(sessionId);
    if (session.sessionId !== sessionId) {
      throw new ValidationError(
        "Session ID mismatch: provided ID does not match session object ID",
      );
    }
    this.sessions.set(sessionId, session);
  }

  create(sessionId: string, userId?: string | null): TastingSession {
    assertSessionId(sessionId);
    const session = newSession(sessionId, userId);
    this.save(sessionId, session);
    return session;
  }

  delete(sessionId: string): boolean {
    assertSessionId(sessionId);
    return this.sessions.delete(sessionId);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  count(): number {
    return this.sessions.size;
  }

  /** Drop sessions started before the timeout window. Returns how many. */
  cleanup(): number {
    const cutoff = this.now() - this.timeoutHours * HOUR_MS;
    let removed = 0;

    for (const [id, session] of this.sessions) {
      if (session.startedAt.getTime() < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }

    if (removed) log.info("expired sessions removed", { removed });
    return removed;
  }
}

export const sessions = new SessionStore();
