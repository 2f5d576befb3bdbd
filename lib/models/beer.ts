import { z } from "zod";

// ── Beer ────────────────────────────────────────────────────────────

export const beerSchema = z.object({
  id: z.string().min(1, "Beer id must be a non-empty string"),
  name: z.string().min(1, "Beer name must be a non-empty string"),
  style: z.string().min(1, "Beer style must be a non-empty string"),
  abv: z
    .number({ invalid_type_error: "Beer ABV must be a number between 0 and 20" })
    .min(0, "Beer ABV must be a number between 0 and 20")
    .max(20, "Beer ABV must be a number between 0 and 20"),
  ibu: z
    .number()
    .int("Beer IBU must be an integer between 0 and 120")
    .min(0, "Beer IBU must be an integer between 0 and 120")
    .max(120, "Beer IBU must be an integer between 0 and 120")
    .nullable(),
  description: z.string(),
  imageUrl: z.string().nullable().default(null),
});

export type Beer = z.infer<typeof beerSchema>;

export const catalogSchema = z.array(beerSchema);

// ── Beer details (detail page) ──────────────────────────────────────

export const beerDetailsSchema = z.object({
  beer: beerSchema,
  tastingNotes: z.string().optional(),
  ingredients: z.string().optional(),
  brewingProcess: z.string().optional(),
  foodPairings: z.array(z.string()).optional(),
});

export type BeerDetails = z.infer<typeof beerDetailsSchema>;
