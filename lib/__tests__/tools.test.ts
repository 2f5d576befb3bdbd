import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { CatalogCache } from "../catalog/cache";
import { CatalogScraper } from "../catalog/scraper";
import { newSession, type Beer, type TastingSession } from "../models";
import { PreferenceStore } from "../preferences";
import type { RandomInt } from "../sales";
import { createToolHandlers, createTools, type ToolContext } from "../tools";

const lowest: RandomInt = (min) => min;

const IPPOLITA: Beer = {
  id: "ippolita",
  name: "Ippolita",
  style: "IPA",
  abv: 6.8,
  ibu: 60,
  description: "La insignia de la casa.",
  imageUrl: null,
};

let dir: string;
let session: TastingSession;
let fetchStub: Mock<typeof fetch>;
let ctx: ToolContext;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "tools-"));
  session = newSession("tools-session");
  fetchStub = vi.fn<typeof fetch>(async () => new Response("<p>hola</p>"));
  ctx = {
    session,
    scraper: new CatalogScraper({
      baseUrl: "https://cervezafortuna.com/inicio/cervezas/",
      cache: new CatalogCache({ cacheDir: dir }),
      fetch: fetchStub,
      sleep: async () => {},
    }),
    preferences: new PreferenceStore({ cacheDir: dir }),
    random: lowest,
    fetch: fetchStub,
  };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("createTools", () => {
  it("exposes the full tool set", () => {
    expect(Object.keys(createTools(ctx)).sort()).toEqual([
      "analyze_preferences",
      "calculator",
      "collect_shipping_info",
      "fetch_page",
      "generate_discount_code",
      "generate_payment_link",
      "get_beer_details",
      "get_cached_catalog",
      "get_catalog",
      "get_evaluations",
      "get_preferences",
      "process_purchase_assistance",
      "save_catalog_cache",
      "store_evaluation",
      "store_preference",
    ]);
  });
});

describe("fetch_page", () => {
  it("fetches paths on the allowed domain", async () => {
    const h = createToolHandlers(ctx);
    const result = await h.fetchPage({ url: "/contacto/" });

    expect(fetchStub.mock.calls[0]?.[0]).toBe("https://cervezafortuna.com/contacto/");
    expect(result).toMatchObject({
      ok: true,
      code: "FETCHED",
      data: { status: 200, html: "<p>hola</p>", truncated: false },
    });
  });

  it("refuses other domains without fetching", async () => {
    const h = createToolHandlers(ctx);
    const result = await h.fetchPage({ url: "https://example.com/" });

    expect(result.ok).toBe(false);
    expect(result.code).toBe("URL_NOT_ALLOWED");
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it("reports HTTP failures", async () => {
    fetchStub.mockImplementation(async () => new Response("", { status: 404 }));
    const result = await createToolHandlers(ctx).fetchPage({ url: "/nope/" });

    expect(result).toMatchObject({ ok: false, code: "FETCH_FAILED", message: "HTTP 404" });
  });
});

describe("catalog tools", () => {
  it("turns an unavailable catalog into a failure result", async () => {
    fetchStub.mockImplementation(async () => {
      throw new TypeError("fetch failed");
    });
    const result = await createToolHandlers(ctx).getCatalog({ force_refresh: false });

    expect(result).toEqual({
      ok: false,
      code: "ERROR",
      message: "Failed to fetch beer catalog and no cache available",
      data: undefined,
    });
  });

  it("saves and reads the cache", async () => {
    const h = createToolHandlers(ctx);
    expect((await h.getCachedCatalog({})).code).toBe("CACHE_NOT_FOUND");

    const saved = await h.saveCatalogCache({ catalog_data: [IPPOLITA] });
    expect(saved).toMatchObject({ ok: true, data: { beersCached: 1 } });

    const cached = await h.getCachedCatalog({});
    expect(cached).toMatchObject({ ok: true, code: "CACHED", data: { beers: [IPPOLITA] } });
  });

  it("reports unknown beers", async () => {
    const h = createToolHandlers(ctx);
    await h.saveCatalogCache({ catalog_data: [IPPOLITA] });

    expect((await h.getBeerDetails({ beer_id: "lager" })).code).toBe("NOT_FOUND");
  });
});

describe("session tools", () => {
  it("records tasted beers once and keeps the latest evaluation", async () => {
    const h = createToolHandlers(ctx);
    await h.storeEvaluation({ beer_id: "ippolita", overall_rating: 3 });
    const result = await h.storeEvaluation({ beer_id: "ippolita", overall_rating: 5 });

    expect(result).toMatchObject({ ok: true, code: "STORED", data: { totalEvaluations: 2 } });
    expect(session.beersTasted).toEqual(["ippolita"]);
    expect(session.evaluations["ippolita"]?.overallRating).toBe(5);
  });

  it("reports invalid evaluations instead of throwing", async () => {
    const result = await createToolHandlers(ctx).storeEvaluation({
      beer_id: "ippolita",
      overall_rating: 9,
    });
    expect(result).toMatchObject({
      ok: false,
      code: "INVALID_INPUT",
      message: "Overall rating must be an integer between 1 and 5",
    });
    expect(session.beersTasted).toEqual([]);
  });

  it("refreshes the preference profile for profile keys only", async () => {
    const h = createToolHandlers(ctx);
    await h.storePreference({ preference_key: "favorite_food", preference_value: "tacos" });
    expect(session.preferenceProfile).toBeNull();

    await h.storePreference({ preference_key: "bitterness_preference", preference_value: "high" });
    expect(session.preferenceProfile?.bitternessPreference).toBe("high");

    const prefs = await h.getPreferences({});
    expect(prefs.data).toEqual({
      preferences: { favorite_food: "tacos", bitterness_preference: "high" },
    });
  });

  it("waits for two evaluations before analysing", async () => {
    const h = createToolHandlers(ctx);
    expect((await h.analyzePreferences({})).code).toBe("INSUFFICIENT_DATA");

    await h.storeEvaluation({ beer_id: "ippolita" });
    await h.storeEvaluation({ beer_id: "oat-stout" });
    expect((await h.analyzePreferences({})).code).toBe("READY");
  });
});

describe("sales tools", () => {
  it("generates codes with the injected randomness", async () => {
    const result = await createToolHandlers(ctx).generateDiscountCode({
      user_name: "David",
      earned_discount: true,
    });
    expect(result.data?.code).toBe("FORTUNA10-DAV1000");
  });

  it("walks the purchase flow", async () => {
    const h = createToolHandlers(ctx);

    const order = await h.processPurchaseAssistance({
      user_name: "Ana",
      beers: ["Ippolita"],
      discount_code: "FORTUNA10-ANA1000",
    });
    expect(order.data?.orderId).toBe("FORT-10000");

    const shipping = await h.collectShippingInfo({
      full_name: "Ana López",
      email: "ana.example.com",
      phone: "5512345678",
      address: "Av. Reforma 100",
      city: "CDMX",
      state: "CDMX",
      postal_code: "06600",
    });
    expect(shipping).toMatchObject({ ok: false, code: "INVALID_SHIPPING" });

    const total = await h.calculator({ expression: "504 * (1 - 10/100)" });
    expect(total.data?.result).toBe(453.6);

    const link = await h.generatePaymentLink({
      order_id: "FORT-10000",
      customer_name: "Ana López",
      customer_email: "ana@example.com",
      items: ["Ippolita"],
      total_amount: 453.6,
      discount_code: "FORTUNA10-ANA1000",
    });
    expect(link.data?.paymentLink).toBe("https://checkout.stripe.com/c/pay/cs_test_100000000000");
  });

  it("reports bad expressions", async () => {
    const result = await createToolHandlers(ctx).calculator({ expression: "2 +" });
    expect(result).toMatchObject({ ok: false, code: "INVALID_EXPRESSION" });
  });
});
