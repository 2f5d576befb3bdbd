import { afterEach, describe, expect, it, vi } from "vitest";

async function loadEnv() {
  vi.resetModules();
  const { env } = await import("../env");
  return env;
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.resetModules();
});

describe("env", () => {
  it("reads valid numbers", async () => {
    vi.stubEnv("CACHE_TTL_HOURS", "1.5");
    vi.stubEnv("MAX_RETRIES", "4");

    const env = await loadEnv();
    expect(env.CACHE_TTL_HOURS).toBe(1.5);
    expect(env.MAX_RETRIES).toBe(4);
  });

  it("falls back on non-numeric and non-positive values", async () => {
    vi.stubEnv("CACHE_TTL_HOURS", "soon");
    vi.stubEnv("REQUEST_TIMEOUT_MS", "0");
    vi.stubEnv("SESSION_TIMEOUT_HOURS", "-3");

    const env = await loadEnv();
    expect(env.CACHE_TTL_HOURS).toBe(24);
    expect(env.REQUEST_TIMEOUT_MS).toBe(10_000);
    expect(env.SESSION_TIMEOUT_HOURS).toBe(24);
  });

  it("requires whole numbers for counts", async () => {
    vi.stubEnv("MAX_RETRIES", "2.5");
    vi.stubEnv("AGENT_MAX_STEPS", "3.2");
    vi.stubEnv("PORT", "80.8");

    const env = await loadEnv();
    expect(env.MAX_RETRIES).toBe(2);
    expect(env.AGENT_MAX_STEPS).toBe(8);
    expect(env.PORT).toBe(8080);
  });

  it("treats empty secrets as unset", async () => {
    vi.stubEnv("JWT_SECRET", "");

    const env = await loadEnv();
    expect(env.JWT_SECRET).toBeUndefined();
  });

  it("derives the allowed domain from the catalog URL", async () => {
    vi.stubEnv("BEER_CATALOG_URL", "https://tienda.example.com/cervezas/");

    const env = await loadEnv();
    expect(env.ALLOWED_DOMAIN).toBe("tienda.example.com");
  });
});
