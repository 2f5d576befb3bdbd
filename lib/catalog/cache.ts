import { mkdir, readFile, stat, writeFile } from "fs/promises";
import path from "path";
import { env } from "../env";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import { catalogSchema, type Beer } from "../models";

const log = createLogger("catalog.cache");

const HOUR_MS = 60 * 60 * 1000;

export interface CatalogCacheOptions {
  cacheDir?: string;
  ttlHours?: number;
  now?: () => number;
}

export interface CacheInfo {
  ageHours: number;
  cachedAt: string;
}

/** Catalog snapshot in a JSON file; validity follows the file's mtime. */
export class CatalogCache {
  readonly cacheDir: string;
  readonly cacheFile: string;
  readonly ttlHours: number;
  private readonly now: () => number;

  constructor(options: CatalogCacheOptions = {}) {
    this.cacheDir = options.cacheDir ?? env.CACHE_DIR;
    this.cacheFile = path.join(this.cacheDir, "beer_catalog.json");
    this.ttlHours = options.ttlHours ?? env.CACHE_TTL_HOURS;
    this.now = options.now ?? Date.now;
  }

  private async mtimeMs(): Promise<number | null> {
    try {
      return (await stat(this.cacheFile)).mtimeMs;
    } catch {
      return null;
    }
  }

  async info(): Promise<CacheInfo | null> {
    const mtime = await this.mtimeMs();
    if (mtime === null) return null;
    return {
      ageHours: Math.round(((this.now() - mtime) / HOUR_MS) * 10) / 10,
      cachedAt: new Date(mtime).toISOString(),
    };
  }

  async isValid(): Promise<boolean> {
    const mtime = await this.mtimeMs();
    if (mtime === null) return false;

    const ageMs = this.now() - mtime;
    const valid = ageMs < this.ttlHours * HOUR_MS;
    log.info(valid ? "cache valid" : "cache expired", {
      ageHours: Number((ageMs / HOUR_MS).toFixed(2)),
      ttlHours: this.ttlHours,
    });
    return valid;
  }

  /** Cached beers, or null when the file is missing or unreadable. */
  async load(): Promise<Beer[] | null> {
    let raw: string;
    try {
      raw = await readFile(this.cacheFile, "utf-8");
    } catch {
      log.warn("cache file does not exist", { file: this.cacheFile });
      return null;
    }

    try {
      const beers = catalogSchema.parse(JSON.parse(raw));
      log.info("loaded beers from cache", { beers: beers.length });
      return beers;
    } catch (err) {
      log.error("failed to load cache", { error: errorMessage(err) });
      return null;
    }
  }

  /** False when the write failed; the failure is logged, not thrown. */
  async save(beers: Beer[]): Promise<boolean> {
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(this.cacheFile, JSON.stringify(beers, null, 2), "utf-8");
      log.info("saved beers to cache", { beers: beers.length });
      return true;
    } catch (err) {
      log.error("failed to save cache", { error: errorMessage(err) });
      return false;
    }
  }
}
