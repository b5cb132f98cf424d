import { decodeGistPage, type GistSummary } from "./gist.js";
import type { GitHubClient, JsonResponse } from "./github-client.js";
import { createNoopLogger, type Logger } from "./logger.js";
import {
  MAX_PAGE_SIZE,
  clampPageSize,
  hasNextPage,
  parseRateLimit,
  type RateLimitSnapshot,
} from "./pagination.js";
import { notifyObserver, type GistObserver } from "./ports/observer.js";
import { ApiRequestError, ListError } from "./errors/core.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ListOptions {
  username: string;
  /** Stop once this many gists are collected; unset lists everything */
  limit?: number;
  /** Requested `per_page`; defaults to the limit (or 100) and is clamped to 1..100 */
  pageSize?: number;
  observer?: GistObserver;
  logger?: Logger;
}

export interface GistPage {
  page: number;
  /** Gists of this page, already truncated to the limit */
  gists: GistSummary[];
  rateLimit: RateLimitSnapshot;
  hasNextPage: boolean;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function resolvePageSize(limit: number | undefined, pageSize: number | undefined): number {
  if (pageSize !== undefined) return clampPageSize(pageSize);
  if (limit !== undefined && limit > 0) return clampPageSize(limit);
  return MAX_PAGE_SIZE;
}

/**
 * Walk `GET /users/{username}/gists` page by page.
 *
 * Stops on a short page, on a missing `rel="next"` link, or once `limit` gists
 * have been yielded. Any failed page throws a `ListError`.
 */
export async function* iterateGistPages(
  client: Pick<GitHubClient, "getJson">,
  options: ListOptions
): AsyncGenerator<GistPage, void, undefined> {
  const { username, limit, observer } = options;
  const logger = (options.logger ?? createNoopLogger()).child({ username });
  const perPage = resolvePageSize(limit, options.pageSize);

  if (limit !== undefined && limit <= 0) {
    logger.debug("Limit is zero; nothing to list");
    return;
  }

  const path = `/users/${encodeURIComponent(username)}/gists`;
  let page = 1;
  let accumulated = 0;

  while (true) {
    logger.debug("Requesting gist page", { page, perPage });

    let response: JsonResponse;
    try {
      response = await client.getJson(path, { per_page: perPage, page });
    } catch (error) {
      if (error instanceof ApiRequestError) throw ListError.fromRequestFailure(page, error);
      throw error;
    }

    const decoded = decodeGistPage(response.data);
    if (!decoded.success) {
      throw new ListError(
        { kind: "decode", page },
        `Listing page ${page} returned a malformed body: ${decoded.message}`
      );
    }

    const received = decoded.gists.length;
    const remaining = limit === undefined ? received : limit - accumulated;
    const gists = decoded.gists.slice(0, remaining);
    accumulated += gists.length;

    const rateLimit = parseRateLimit(response.headers);
    const more = hasNextPage(response.headers);
    notifyObserver(logger, "onPageFetched", () =>
      observer?.onPageFetched?.({
        username,
        page,
        count: received,
        accumulated,
        hasNextPage: more,
        rateLimit,
      })
    );

    yield { page, gists, rateLimit, hasNextPage: more };

    if (limit !== undefined && accumulated >= limit) break;
    if (received < perPage) break;
    if (!more) break;

    page++;
  }

  logger.debug("Listing complete", { pages: page, accumulated });
}

/**
 * Collect the gists of `username`, never more than `limit`.
 * A failure on any page rejects with `ListError` and discards what was gathered.
 */
export async function listGists(
  client: Pick<GitHubClient, "getJson">,
  options: ListOptions
): Promise<GistSummary[]> {
  const all: GistSummary[] = [];
  for await (const page of iterateGistPages(client, options)) {
    all.push(...page.gists);
  }
  return all;
}

/**
 * Stream gists one at a time, for feeding `downloadAll` while pages arrive.
 */
export async function* iterateGists(
  client: Pick<GitHubClient, "getJson">,
  options: ListOptions
): AsyncGenerator<GistSummary, void, undefined> {
  for await (const page of iterateGistPages(client, options)) {
    yield* page.gists;
  }
}
