import { load, type CheerioAPI } from "cheerio";
import { hasChildren, isText, type AnyNode, type Element } from "domhandler";
import { env } from "../env";
import { createLogger } from "../logger";
import { beerSchema, type Beer, type BeerDetails } from "../models";

const log = createLogger("catalog.parser");

const NAME_TAGS = ["h2", "h3", "h4"];
const NAME_CLASSES = ["title", "product-title", "beer-name"];
const STYLE_CLASSES = ["style", "beer-style", "category"];
const DESCRIPTION_CLASSES = ["description", "excerpt", "beer-description"];

const NAME_SELECTOR = NAME_TAGS.flatMap((tag) =>
  NAME_CLASSES.map((cls) => `${tag}.${cls}`),
).join(", ");
const STYLE_SELECTOR = STYLE_CLASSES.map((cls) => `.${cls}`).join(", ");
const DESCRIPTION_SELECTOR = ["p", "div"]
  .flatMap((tag) => DESCRIPTION_CLASSES.map((cls) => `${tag}.${cls}`))
  .join(", ");

const ABV_PATTERN = /(\d+\.?\d*)\s*%/;
const IBU_PATTERN = /(\d+)\s*IBU|IBU\s*:?\s*(\d+)/i;

// ── Helpers ─────────────────────────────────────────────────────────

function clean(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** First text node (document order) that satisfies `match`. */
function findText(node: AnyNode, match: (text: string) => boolean): string | null {
  if (isText(node)) return match(node.data) ? node.data : null;
  if (hasChildren(node)) {
    for (const child of node.children) {
      const found = findText(child, match);
      if (found !== null) return found;
    }
  }
  return null;
}

export function slugify(name: string): string {
  return name.toLowerCase().replace(/ /g, "-").replace(/\//g, "-");
}

function parseAbv(element: Element): number {
  const text = findText(element, (t) => t.toUpperCase().includes("ABV"));
  const match = text?.match(ABV_PATTERN);
  return match ? parseFloat(match[1]) : 0;
}

function parseIbu(element: Element): number | null {
  const text = findText(element, (t) => t.toUpperCase().includes("IBU"));
  const match = text?.match(IBU_PATTERN);
  if (!match) return null;
  return parseInt(match[1] ?? match[2], 10);
}

// ── Catalog page ────────────────────────────────────────────────────

/** Parse one catalog entry. Null when it has no name or fails validation. */
export function parseBeerElement(
  $: CheerioAPI,
  element: Element,
  index: number,
  baseUrl: string = env.BEER_CATALOG_URL,
): Beer | null {
  const el = $(element);

  let nameEl = el.find(NAME_SELECTOR).first();
  if (!nameEl.length) nameEl = el.find(NAME_TAGS.join(", ")).first();
  const name = clean(nameEl.text());
  if (!name) {
    log.warn("no name found for beer element", { index });
    return null;
  }

  const styleEl = el.find(STYLE_SELECTOR).first();
  const style = styleEl.length ? clean(styleEl.text()) || "Unknown" : "Unknown";

  let descEl = el.find(DESCRIPTION_SELECTOR).first();
  if (!descEl.length) descEl = el.find("p").first();
  const description = descEl.length ? clean(descEl.text()) : "";

  const img = el.find("img").first();
  let imageUrl: string | null = img.attr("src") || img.attr("data-src") || null;
  if (imageUrl && !imageUrl.startsWith("http")) {
    imageUrl = new URL(imageUrl, baseUrl).toString();
  }

  const parsed = beerSchema.safeParse({
    id: slugify(name),
    name,
    style,
    abv: parseAbv(element),
    ibu: parseIbu(element),
    description,
    imageUrl,
  });

  if (!parsed.success) {
    log.warn("invalid beer element", {
      index,
      name,
      error: parsed.error.issues[0]?.message,
    });
    return null;
  }

  return parsed.data;
}

/** Extract every beer on the catalog page. Empty when no known layout matches. */
export function parseBeerCatalog(
  html: string,
  baseUrl: string = env.BEER_CATALOG_URL,
): Beer[] {
  const $ = load(html);

  let elements = $("div.beer-item").toArray();
  if (!elements.length) elements = $("article.product").toArray();

  if (!elements.length) {
    log.warn("no beer elements found with known selectors");
    return [];
  }

  const beers: Beer[] = [];
  elements.forEach((element, idx) => {
    const beer = parseBeerElement($, element, idx, baseUrl);
    if (beer) beers.push(beer);
  });

  log.info("parsed catalog", { beers: beers.length });
  return beers;
}

// ── Detail page ─────────────────────────────────────────────────────

export function parseBeerDetails(html: string, beer: Beer): BeerDetails {
  const $ = load(html);

  const section = (selector: string): string | undefined => {
    const text = clean($(selector).first().text());
    return text || undefined;
  };

  const pairings = $(".food-pairings li")
    .toArray()
    .map((li) => clean($(li).text()))
    .filter(Boolean);

  return {
    beer,
    tastingNotes: section(".tasting-notes"),
    ingredients: section(".ingredients"),
    brewingProcess: section(".brewing-process"),
    foodPairings: pairings.length ? pairings : undefined,
  };
}
