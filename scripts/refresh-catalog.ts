/**
 * Scrape the beer catalog and rewrite the local cache.
 *
 *   npm run catalog:refresh
 */

import { getScraper } from "../lib/catalog/scraper";
import { createLogger } from "../lib/logger";

const log = createLogger("catalog:refresh");

const scraper = getScraper();
const beers = await scraper.getCatalog(true);
const info = await scraper.cache.info();

log.info("catalog refreshed", {
  beers: beers.length,
  cacheFile: scraper.cache.cacheFile,
  cachedAt: info?.cachedAt ?? null,
});

for (const beer of beers) {
  process.stdout.write(`${beer.id}\t${beer.style}\t${beer.abv}%\t${beer.name}\n`);
}
