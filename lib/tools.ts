import { tool } from "ai";
import { z } from "zod";
import { calculate } from "./calculator";
import { resolveAllowedUrl } from "./catalog/domain";
import { fetchPage } from "./catalog/http";
import { getScraper, type CatalogScraper } from "./catalog/scraper";
import { env } from "./env";
import { errorMessage, ValidationError } from "./errors";
import { createLogger } from "./logger";
import {
  beerSchema,
  buildPreferenceProfile,
  isProfileKey,
  preferenceValueSchema,
  type TastingSession,
} from "./models";
import { preferenceStore, type PreferenceStore } from "./preferences";
import {
  collectShippingInfo,
  generateDiscountCode,
  generatePaymentLink,
  processPurchaseAssistance,
  type RandomInt,
} from "./sales";

const log = createLogger("tools");

// Raw pages go back to the model; keep them inside a sane context budget.
const MAX_PAGE_CHARS = 60_000;

// ── Standardized response ───────────────────────────────────────────

export interface ToolResponse {
  ok: boolean;
  code: string;
  message: string;
  data?: Record<string, unknown>;
}

function success(
  code: string,
  message: string,
  data?: Record<string, unknown>,
): ToolResponse {
  return { ok: true, code, message, data };
}

function fail(
  code: string,
  message: string,
  data?: Record<string, unknown>,
): ToolResponse {
  return { ok: false, code, message, data };
}

/** Tools report failures to the model instead of throwing at it. */
function guarded<I>(
  name: string,
  fn: (input: I) => Promise<ToolResponse>,
): (input: I) => Promise<ToolResponse> {
  return async (input) => {
    try {
      return await fn(input);
    } catch (err) {
      log.error("tool failed", { tool: name, error: errorMessage(err) });
      if (err instanceof ValidationError) return fail("INVALID_INPUT", err.message);
      return fail("ERROR", errorMessage(err));
    }
  };
}

// ── Input schemas ───────────────────────────────────────────────────

const empty = z.object({});

const fetchPageInput = z.object({
  url: z
    .string()
    .describe(
      `Full URL or path on ${env.ALLOWED_DOMAIN}, e.g. "/inicio/cervezas/"`,
    ),
});

const getCatalogInput = z.object({
  force_refresh: z
    .boolean()
    .default(false)
    .describe("Ignore a valid cache and scrape the site again"),
});

const beerIdInput = z.object({
  beer_id: z.string().min(1).describe("Beer ID from the catalog"),
});

const saveCatalogInput = z.object({
  catalog_data: z.array(beerSchema).min(1).describe("Beers to cache"),
});

const storePreferenceInput = z.object({
  preference_key: z
    .string()
    .min(1)
    .describe(
      "preferred_styles, bitterness_preference, alcohol_tolerance, flavor_notes, body_preference, or any other key",
    ),
  preference_value: preferenceValueSchema.describe(
    "Value to store: text, number, boolean or a list of text",
  ),
});

const storeEvaluationInput = z.object({
  beer_id: z.string().min(1).describe("Beer ID from the catalog"),
  appearance_notes: z.string().optional().describe("Colour, clarity, foam"),
  aroma_notes: z.string().optional().describe("What the user smelled"),
  taste_notes: z.string().optional().describe("What the user tasted"),
  mouthfeel_notes: z.string().optional().describe("Body, carbonation, finish"),
  overall_rating: z
    .number()
    .int()
    .min(1)
    .max(5)
    .optional()
    .describe("Overall rating from 1 to 5"),
});

const discountInput = z.object({
  user_name: z.string().default("Cliente").describe("Customer's name"),
  earned_discount: z
    .boolean()
    .default(true)
    .describe("True after a tasting or guided purchase (10-19%), false for a flat 5%"),
});

const purchaseInput = z.object({
  user_name: z.string().min(1).describe("Customer's name"),
  beers: z.array(z.string().min(1)).min(1).describe("Beer names to buy"),
  discount_code: z
    .string()
    .nullable()
    .default(null)
    .describe("Discount code to apply, if any"),
});

const shippingInput = z.object({
  full_name: z.string().describe("Full name"),
  email: z.string().describe("Email address"),
  phone: z.string().describe("Phone number, at least 10 digits"),
  address: z.string().describe("Street and number"),
  city: z.string().describe("City"),
  state: z.string().describe("State"),
  postal_code: z.string().describe("Postal code"),
});

const paymentInput = z.object({
  order_id: z.string().min(1).describe("Order ID from process_purchase_assistance"),
  customer_name: z.string().min(1).describe("Customer's full name"),
  customer_email: z.string().min(1).describe("Customer's email"),
  items: z.array(z.string()).min(1).describe("Beer names in the order"),
  total_amount: z.number().positive().describe("Total in MXN after discount"),
  discount_code: z.string().nullable().default(null).describe("Applied discount code"),
});

const calculatorInput = z.object({
  expression: z.string().min(1).describe("Arithmetic expression, e.g. 504 * (1 - 15/100)"),
});

// ── Handlers ────────────────────────────────────────────────────────

export interface ToolContext {
  session: TastingSession;
  scraper?: CatalogScraper;
  preferences?: PreferenceStore;
  random?: RandomInt;
  fetch?: typeof fetch;
}

/**
 * Plain async handlers behind every tool. The session is captured here, so a
 * tool can only ever read or write the conversation it was built for.
 */
export function createToolHandlers(ctx: ToolContext) {
  const { session } = ctx;
  const scraper = ctx.scraper ?? getScraper();
  const prefs = ctx.preferences ?? preferenceStore;
  const sessionId = session.sessionId;

  return {
    // ── Catalog ─────────────────────────────────────────────────────

    fetchPage: guarded("fetch_page", async ({ url }: z.infer<typeof fetchPageInput>) => {
      const check = resolveAllowedUrl(url);
      if (!check.ok) {
        log.warn("url not allowed", { url });
        return fail("URL_NOT_ALLOWED", check.message, {
          allowedDomain: env.ALLOWED_DOMAIN,
        });
      }

      try {
        const page = await fetchPage(check.url, { fetch: ctx.fetch });
        const truncated = page.html.length > MAX_PAGE_CHARS;
        return success("FETCHED", `Fetched ${page.url} (status ${page.status}).`, {
          url: page.url,
          status: page.status,
          html: truncated ? page.html.slice(0, MAX_PAGE_CHARS) : page.html,
          contentLength: page.html.length,
          truncated,
        });
      } catch (err) {
        log.error("page fetch failed", { url: check.url, error: errorMessage(err) });
        return fail("FETCH_FAILED", errorMessage(err), { url: check.url });
      }
    }),

    getCatalog: guarded(
      "get_catalog",
      async ({ force_refresh }: z.infer<typeof getCatalogInput>) => {
        const beers = await scraper.getCatalog(force_refresh);
        return success("OK", `${beers.length} beer(s) in catalog.`, { beers });
      },
    ),

    getBeerDetails: guarded(
      "get_beer_details",
      async ({ beer_id }: z.infer<typeof beerIdInput>) => {
        const details = await scraper.getBeerDetails(beer_id);
        if (!details) {
          return fail("NOT_FOUND", `No beer with ID "${beer_id}" in the catalog.`);
        }
        return success("FOUND", `Details for ${details.beer.name}.`, { ...details });
      },
    ),

    getCachedCatalog: guarded("get_cached_catalog", async () => {
      const info = await scraper.cache.info();
      const beers = info ? await scraper.cache.load() : null;
      if (!info || !beers) {
        return fail("CACHE_NOT_FOUND", "No cached catalog data available.");
      }
      return success("CACHED", `${beers.length} beer(s) cached.`, {
        beers,
        cacheAgeHours: info.ageHours,
        cachedAt: info.cachedAt,
      });
    }),

    saveCatalogCache: guarded(
      "save_catalog_cache",
      async ({ catalog_data }: z.infer<typeof saveCatalogInput>) => {
        const saved = await scraper.cache.save(catalog_data);
        if (!saved) return fail("CACHE_SAVE_FAILED", "Could not write the catalog cache.");
        return success("SAVED", `Cached ${catalog_data.length} beer(s).`, {
          beersCached: catalog_data.length,
          cacheFile: scraper.cache.cacheFile,
        });
      },
    ),

    // ── Preferences & evaluations ───────────────────────────────────

    storePreference: guarded(
      "store_preference",
      async ({ preference_key, preference_value }: z.infer<typeof storePreferenceInput>) => {
        const all = await prefs.storePreference(sessionId, preference_key, preference_value);
        if (isProfileKey(preference_key)) {
          session.preferenceProfile = buildPreferenceProfile(all) ?? session.preferenceProfile;
        }
        return success("STORED", `Stored preference "${preference_key}".`, {
          preferences: all,
        });
      },
    ),

    getPreferences: guarded("get_preferences", async () => {
      const preferences = await prefs.getPreferences(sessionId);
      const count = Object.keys(preferences).length;
      if (!count) return success("EMPTY", "No preferences stored yet.", { preferences });
      return success("OK", `${count} preference(s) stored.`, { preferences });
    }),

    storeEvaluation: guarded(
      "store_evaluation",
      async (input: z.infer<typeof storeEvaluationInput>) => {
        const { evaluation, total } = await prefs.storeEvaluation(sessionId, {
          beerId: input.beer_id,
          appearanceNotes: input.appearance_notes,
          aromaNotes: input.aroma_notes,
          tasteNotes: input.taste_notes,
          mouthfeelNotes: input.mouthfeel_notes,
          overallRating: input.overall_rating,
        });

        if (!session.beersTasted.includes(evaluation.beerId)) {
          session.beersTasted.push(evaluation.beerId);
        }
        session.evaluations[evaluation.beerId] = evaluation;

        return success("STORED", `Evaluation for "${evaluation.beerId}" saved.`, {
          evaluation,
          totalEvaluations: total,
        });
      },
    ),

    getEvaluations: guarded("get_evaluations", async () => {
      const evaluations = await prefs.getEvaluations(sessionId);
      if (!evaluations.length) {
        return success("EMPTY", "No evaluations yet.", { evaluations, count: 0 });
      }
      return success("OK", `${evaluations.length} evaluation(s).`, {
        evaluations,
        count: evaluations.length,
      });
    }),

    analyzePreferences: guarded("analyze_preferences", async () => {
      const analysis = await prefs.analyzePreferences(sessionId);
      const data = { evaluations: analysis.evaluations, count: analysis.evaluations.length };
      return analysis.ready
        ? success("READY", analysis.message, data)
        : fail("INSUFFICIENT_DATA", analysis.message, data);
    }),

    // ── Sales ───────────────────────────────────────────────────────

    generateDiscountCode: guarded(
      "generate_discount_code",
      async ({ user_name, earned_discount }: z.infer<typeof discountInput>) => {
        const discount = generateDiscountCode(user_name, earned_discount, ctx.random);
        return success("GENERATED", discount.message, { ...discount });
      },
    ),

    processPurchaseAssistance: guarded(
      "process_purchase_assistance",
      async ({ user_name, beers, discount_code }: z.infer<typeof purchaseInput>) => {
        const summary = processPurchaseAssistance(user_name, beers, discount_code, ctx.random);
        return success("ORDER_READY", summary.message, { ...summary });
      },
    ),

    collectShippingInfo: guarded(
      "collect_shipping_info",
      async (input: z.infer<typeof shippingInput>) => {
        const result = collectShippingInfo({
          fullName: input.full_name,
          email: input.email,
          phone: input.phone,
          address: input.address,
          city: input.city,
          state: input.state,
          postalCode: input.postal_code,
        });
        if (!result.ok) return fail("INVALID_SHIPPING", result.message, { error: result.error });
        return success("SHIPPING_CONFIRMED", result.message, {
          shippingInfo: result.shippingInfo,
        });
      },
    ),

    generatePaymentLink: guarded(
      "generate_payment_link",
      async (input: z.infer<typeof paymentInput>) => {
        const link = generatePaymentLink(
          {
            orderId: input.order_id,
            customerName: input.customer_name,
            customerEmail: input.customer_email,
            items: input.items,
            totalAmount: input.total_amount,
            discountCode: input.discount_code,
          },
          ctx.random,
        );
        return success("PAYMENT_LINK", link.message, { ...link });
      },
    ),

    calculator: guarded("calculator", async ({ expression }: z.infer<typeof calculatorInput>) => {
      const result = calculate(expression);
      if (!result.ok) return fail("INVALID_EXPRESSION", result.error, { expression });
      return success("OK", `${expression} = ${result.result}`, {
        expression,
        result: result.result,
      });
    }),
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

// ── Tool factory ────────────────────────────────────────────────────

/**
 * Create the full tool set for one tasting session. The session is baked into
 * every tool via closure so the model can never touch another session's data.
 */
export function createTools(ctx: ToolContext) {
  const h = createToolHandlers(ctx);

  return {
    // ── Catalog ─────────────────────────────────────────────────────

    fetch_page: tool({
      description: `Fetch the raw HTML of any page on ${env.ALLOWED_DOMAIN}. Use it to explore the site and follow links to beer pages. Other domains are rejected.`,
      inputSchema: fetchPageInput,
      execute: h.fetchPage,
    }),

    get_catalog: tool({
      description:
        "Get the beer catalog (id, name, style, ABV, IBU, description, image). Served from cache when fresh; falls back to a stale cache when the site is down.",
      inputSchema: getCatalogInput,
      execute: h.getCatalog,
    }),

    get_beer_details: tool({
      description:
        "Get tasting notes, ingredients, brewing process and food pairings for one beer by catalog ID.",
      inputSchema: beerIdInput,
      execute: h.getBeerDetails,
    }),

    get_cached_catalog: tool({
      description:
        "Read the locally cached catalog and its age. Use as a fallback when fetching fails.",
      inputSchema: empty,
      execute: h.getCachedCatalog,
    }),

    save_catalog_cache: tool({
      description: "Save beers you extracted from the site to the local catalog cache.",
      inputSchema: saveCatalogInput,
      execute: h.saveCatalogCache,
    }),

    // ── Preferences & evaluations ───────────────────────────────────

    store_preference: tool({
      description:
        "Save one preference for this user. Profile keys: preferred_styles, bitterness_preference (low|medium|high), alcohol_tolerance (light|moderate|strong), flavor_notes, body_preference (light|medium|full).",
      inputSchema: storePreferenceInput,
      execute: h.storePreference,
    }),

    get_preferences: tool({
      description: "Get every preference stored for this user.",
      inputSchema: empty,
      execute: h.getPreferences,
    }),

    store_evaluation: tool({
      description:
        "Save the user's tasting notes for a beer (appearance, aroma, taste, mouthfeel, rating 1-5). Call after each beer in a guided tasting.",
      inputSchema: storeEvaluationInput,
      execute: h.storeEvaluation,
    }),

    get_evaluations: tool({
      description: "Get every tasting evaluation this user has recorded.",
      inputSchema: empty,
      execute: h.getEvaluations,
    }),

    analyze_preferences: tool({
      description:
        "Check whether there are enough evaluations (2+) to infer the user's profile, and return them for analysis.",
      inputSchema: empty,
      execute: h.analyzePreferences,
    }),

    // ── Sales ───────────────────────────────────────────────────────

    generate_discount_code: tool({
      description:
        "Generate a discount code. Earned (after a tasting or guided purchase) gives 10-19%; asked for directly gives 5%.",
      inputSchema: discountInput,
      execute: h.generateDiscountCode,
    }),

    process_purchase_assistance: tool({
      description:
        "Create an order with an order ID and a product link per beer. Call when the user decides what to buy.",
      inputSchema: purchaseInput,
      execute: h.processPurchaseAssistance,
    }),

    collect_shipping_info: tool({
      description:
        "Validate and confirm the user's shipping details (name, email, phone, address, city, state, postal code).",
      inputSchema: shippingInput,
      execute: h.collectShippingInfo,
    }),

    generate_payment_link: tool({
      description:
        "Generate a payment link (MXN, valid 24 hours) once the order and shipping info are confirmed.",
      inputSchema: paymentInput,
      execute: h.generatePaymentLink,
    }),

    calculator: tool({
      description: "Evaluate an arithmetic expression. Use it for totals and discounts.",
      inputSchema: calculatorInput,
      execute: h.calculator,
    }),
  };
}
