import { env } from "../env";
import { CatalogUnavailableError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { Beer, BeerDetails } from "../models";
import { CatalogCache } from "./cache";
import { fetchWithRetry, type FetchOptions } from "./http";
import { parseBeerCatalog, parseBeerDetails } from "./parser";

const log = createLogger("catalog.scraper");

export interface ScraperOptions extends FetchOptions {
  baseUrl?: string;
  cache?: CatalogCache;
}

/**
 * Catalog source: fresh scrape when the cache is stale, cache fallback when
 * the site is down.
 */
export class CatalogScraper {
  readonly baseUrl: string;
  cache: CatalogCache;
  private readonly fetchOptions: FetchOptions;

  constructor(options: ScraperOptions = {}) {
    const { baseUrl, cache, ...fetchOptions } = options;
    this.baseUrl = baseUrl ?? env.BEER_CATALOG_URL;
    this.cache = cache ?? new CatalogCache();
    this.fetchOptions = fetchOptions;
  }

  async getCatalog(forceRefresh = false): Promise<Beer[]> {
    if (!forceRefresh && (await this.cache.isValid())) {
      const cached = await this.cache.load();
      if (cached?.length) {
        log.info("using cached beer catalog");
        return cached;
      }
    }

    log.info("fetching fresh beer catalog", { url: this.baseUrl });
    const html = await fetchWithRetry(this.baseUrl, this.fetchOptions);

    if (html !== null) {
      try {
        const beers = parseBeerCatalog(html, this.baseUrl);
        if (beers.length) {
          await this.cache.save(beers);
          return beers;
        }
        log.warn("parsed 0 beers from website");
      } catch (err) {
        log.error("failed to parse beer catalog", { error: errorMessage(err) });
      }
    }

    log.warn("website fetch failed, attempting to use cached data");
    const stale = await this.cache.load();
    if (stale?.length) {
      log.info("using stale cache as fallback", { beers: stale.length });
      return stale;
    }

    const error = new CatalogUnavailableError();
    log.error(error.message);
    throw error;
  }

  /**
   * Detail page for one beer (`<catalog URL><id>/`). When the page cannot be
   * fetched the details carry only the catalog entry.
   */
  async getBeerDetails(beerId: string): Promise<BeerDetails | null> {
    const catalog = await this.getCatalog();
    const beer = catalog.find((b) => b.id === beerId);
    if (!beer) return null;

    const url = new URL(`${encodeURIComponent(beer.id)}/`, this.baseUrl).toString();
    const html = await fetchWithRetry(url, this.fetchOptions);
    if (html === null) return { beer };

    return parseBeerDetails(html, beer);
  }
}

// ── Shared instance ─────────────────────────────────────────────────

let shared: CatalogScraper | null = null;

export function getScraper(): CatalogScraper {
  shared ??= new CatalogScraper();
  return shared;
}

export function getBeerCatalog(forceRefresh = false): Promise<Beer[]> {
  return getScraper().getCatalog(forceRefresh);
}
