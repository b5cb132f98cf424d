// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Anything that can look up a response header by name */
export interface HeaderReader {
  get(name: string): string | null;
}

export interface RateLimitSnapshot {
  /** Requests allowed per window (`x-ratelimit-limit`) */
  limit: number | null;
  /** Requests left in the current window (`x-ratelimit-remaining`) */
  remaining: number | null;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Largest `per_page` the gists endpoint accepts */
export const MAX_PAGE_SIZE = 100;

const LINK_ENTRY = /<([^>]*)>\s*((?:;\s*[^;,]+)*)/g;
const REL_PARAM = /;\s*rel\s*=\s*"?([^";]+)"?/i;

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

/**
 * Parse an RFC 8288 `Link` header into a rel -> URL map.
 * A single entry may carry several space-separated rels.
 */
export function parseLinkHeader(header: string | null): Map<string, string> {
  const links = new Map<string, string>();
  if (!header) return links;

  for (const match of header.matchAll(LINK_ENTRY)) {
    const [, url, params] = match;
    const rel = REL_PARAM.exec(params)?.[1];
    if (!rel) continue;
    for (const name of rel.trim().split(/\s+/)) {
      links.set(name.toLowerCase(), url);
    }
  }

  return links;
}

export function hasNextPage(headers: HeaderReader): boolean {
  return parseLinkHeader(headers.get("link")).has("next");
}

function parseCount(value: string | null): number | null {
  if (value === null || !/^\s*\d+\s*$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

export function parseRateLimit(headers: HeaderReader): RateLimitSnapshot {
  return {
    limit: parseCount(headers.get("x-ratelimit-limit")),
    remaining: parseCount(headers.get("x-ratelimit-remaining")),
  };
}

/**
 * Bring a requested page size into the range the API accepts.
 * Oversized values are clamped rather than rejected.
 */
export function clampPageSize(requested: number): number {
  if (!Number.isFinite(requested)) return MAX_PAGE_SIZE;
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(requested)));
}
