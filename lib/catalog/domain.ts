import { env } from "../env";

export type UrlCheck =
  | { ok: true; url: string }
  | { ok: false; message: string };

/**
 * Resolve a URL the agent wants to fetch and check it stays on the brand's
 * domain. Relative paths ("/inicio/cervezas/") resolve against the domain root.
 */
export function resolveAllowedUrl(
  raw: string,
  domain: string = env.ALLOWED_DOMAIN,
): UrlCheck {
  let url: URL;
  try {
    url = new URL(raw.trim(), `https://${domain}/`);
  } catch {
    return { ok: false, message: `Invalid URL: ${raw}` };
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    return { ok: false, message: `Protocol '${url.protocol}' is not allowed.` };
  }

  if (url.hostname !== domain) {
    return {
      ok: false,
      message: `Domain '${url.hostname}' is not allowed. Only '${domain}' is permitted.`,
    };
  }

  return { ok: true, url: url.toString() };
}
