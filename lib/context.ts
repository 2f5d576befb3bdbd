import type { PreferenceProfile, TastingSession } from "./models";

// ── Types ───────────────────────────────────────────────────────────────────

export interface SessionContext {
  sessionId: string;
  userId: string | null;
  beersTasted: {
    beerId: string;
    rating: number | null;
  }[];
  preferenceProfile: PreferenceProfile | null;
  messageCount: number;
}

// ── Builder ─────────────────────────────────────────────────────────────────

/**
 * Snapshot of the tasting session for injection into the system prompt.
 */
export function buildContext(session: TastingSession): SessionContext {
  return {
    sessionId: session.sessionId,
    userId: session.userId,
    beersTasted: session.beersTasted.map((beerId) => ({
      beerId,
      rating: session.evaluations[beerId]?.overallRating ?? null,
    })),
    preferenceProfile: session.preferenceProfile,
    messageCount: session.conversationHistory.length,
  };
}
