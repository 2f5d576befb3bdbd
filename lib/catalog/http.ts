import { env } from "../env";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("catalog.http");

export const USER_AGENT = "Mozilla/5.0 (compatible; BeerTastingAgent/1.0)";

export interface FetchOptions {
  /** Total attempts, including the first. */
  maxRetries?: number;
  timeoutMs?: number;
  /** Backoff before attempt n+1 is `backoffBaseMs * 2^n`. */
  backoffBaseMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchedPage {
  html: string;
  status: number;
  url: string;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Single GET with timeout. Throws on network errors and non-2xx statuses. */
export async function fetchPage(
  url: string,
  options: Pick<FetchOptions, "timeoutMs" | "fetch"> = {},
): Promise<FetchedPage> {
  const doFetch = options.fetch ?? fetch;
  const response = await doFetch(url, {
    method: "GET",
    headers: { "User-Agent": USER_AGENT },
    redirect: "follow",
    signal: AbortSignal.timeout(options.timeoutMs ?? env.REQUEST_TIMEOUT_MS),
  });

  if (!response.ok) {
    await response.body?.cancel();
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }

  return {
    html: await response.text(),
    status: response.status,
    url: response.url || url,
  };
}

/**
 * GET with a fixed number of attempts and exponential backoff between them.
 * Returns null when every attempt failed.
 */
export async function fetchWithRetry(
  url: string,
  options: FetchOptions = {},
): Promise<string | null> {
  const maxRetries = options.maxRetries ?? env.MAX_RETRIES;
  const backoffBaseMs = options.backoffBaseMs ?? 1000;
  const sleep = options.sleep ?? delay;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      log.info("fetching", { url, attempt: attempt + 1, of: maxRetries });
      const page = await fetchPage(url, options);
      log.info("fetched", { url, status: page.status });
      return page.html;
    } catch (err) {
      log.warn("fetch failed", {
        url,
        attempt: attempt + 1,
        error: errorMessage(err),
      });
      if (attempt < maxRetries - 1) {
        await sleep(backoffBaseMs * 2 ** attempt);
      }
    }
  }

  return null;
}
