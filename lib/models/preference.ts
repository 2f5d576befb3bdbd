import { z } from "zod";

export const bitternessEnum = z.enum(["low", "medium", "high"]);
export const alcoholEnum = z.enum(["light", "moderate", "strong"]);
export const bodyEnum = z.enum(["light", "medium", "full"]);

export const preferenceProfileSchema = z.object({
  preferredStyles: z.array(z.string()).default([]),
  bitternessPreference: bitternessEnum.default("medium"),
  alcoholTolerance: alcoholEnum.default("moderate"),
  flavorNotes: z.array(z.string()).default([]),
  bodyPreference: bodyEnum.default("medium"),
});

export type PreferenceProfile = z.infer<typeof preferenceProfileSchema>;

/** Values the agent may store under a preference key. */
export const preferenceValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
]);

export type PreferenceValue = z.infer<typeof preferenceValueSchema>;

// Keys as the agent stores them (see the system prompt) → profile fields.
const PROFILE_KEYS = {
  preferred_styles: "preferredStyles",
  bitterness_preference: "bitternessPreference",
  alcohol_tolerance: "alcoholTolerance",
  flavor_notes: "flavorNotes",
  body_preference: "bodyPreference",
} as const;

function toList(value: PreferenceValue): string[] {
  if (Array.isArray(value)) return value;
  if (typeof value === "string") {
    return value
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return [];
}

/**
 * Build a profile from loose key/value preferences. Unknown keys are ignored
 * and invalid values fall back to the defaults. Null when no profile key is
 * present at all.
 */
export function buildPreferenceProfile(
  preferences: Record<string, PreferenceValue>,
): PreferenceProfile | null {
  const present = Object.keys(PROFILE_KEYS).filter((k) => k in preferences);
  if (!present.length) return null;

  const styles = preferences.preferred_styles;
  const notes = preferences.flavor_notes;
  const bitterness = bitternessEnum.safeParse(preferences.bitterness_preference);
  const alcohol = alcoholEnum.safeParse(preferences.alcohol_tolerance);
  const body = bodyEnum.safeParse(preferences.body_preference);

  return preferenceProfileSchema.parse({
    preferredStyles: styles === undefined ? [] : toList(styles),
    flavorNotes: notes === undefined ? [] : toList(notes),
    bitternessPreference: bitterness.success ? bitterness.data : undefined,
    alcoholTolerance: alcohol.success ? alcohol.data : undefined,
    bodyPreference: body.success ? body.data : undefined,
  });
}

export function isProfileKey(key: string): boolean {
  return key in PROFILE_KEYS;
}
