import type { RequestInit } from "node-fetch";
import fetch from "node-fetch";
import { ApiRequestError } from "./errors/core.js";
import { parseRateLimit, type HeaderReader } from "./pagination.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The subset of a fetch response the client reads */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: HeaderReader;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<FetchResponseLike>;

export interface GitHubClientOptions {
  baseUrl?: string;
  token?: string;
  /** Deadline for each individual HTTP call */
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export interface JsonResponse {
  status: number;
  data: unknown;
  headers: HeaderReader;
}

export type QueryParams = Record<string, string | number>;

export interface GitHubClient {
  /** Resolve `path` against the API base URL and decode the JSON body */
  getJson(path: string, query?: QueryParams): Promise<JsonResponse>;
  /** Fetch the raw bytes behind an absolute URL */
  getRaw(url: string): Promise<Uint8Array>;
  readonly baseUrl: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_BASE_URL = "https://api.github.com";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = "local-gist";
const API_VERSION = "2022-11-28";

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Create a GitHub REST client.
 * Every failure is thrown as an `ApiRequestError` tagged http, decode or transport.
 */
export function createGitHubClient({
  baseUrl = DEFAULT_BASE_URL,
  token,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  userAgent = DEFAULT_USER_AGENT,
  fetchImpl = fetch,
}: GitHubClientOptions = {}): GitHubClient {
  const apiOrigin = new URL(baseUrl).origin;
  const apiBase = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;

  function headersFor(url: URL, accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: accept,
      "User-Agent": userAgent,
    };
    // Tokens never leave the API origin (raw content is served elsewhere)
    if (url.origin === apiOrigin) {
      headers["X-GitHub-Api-Version"] = API_VERSION;
      if (token) headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }

  async function send(url: URL, accept: string): Promise<FetchResponseLike> {
    const href = url.toString();
    let response: FetchResponseLike;
    try {
      response = await fetchImpl(href, {
        method: "GET",
        headers: headersFor(url, accept),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new ApiRequestError(
        {
          kind: "transport",
          url: href,
          message: error instanceof Error ? error.message : String(error),
          timedOut: isTimeout(error),
        },
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ApiRequestError({
        kind: "http",
        status: response.status,
        statusText: response.statusText,
        url: href,
        rateLimit: parseRateLimit(response.headers),
      });
    }

    return response;
  }

  async function readBody<T>(href: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw new ApiRequestError(
        {
          kind: "transport",
          url: href,
          message: error instanceof Error ? error.message : String(error),
          timedOut: isTimeout(error),
        },
        { cause: error }
      );
    }
  }

  async function getJson(path: string, query: QueryParams = {}): Promise<JsonResponse> {
    const url = new URL(path.replace(/^\//, ""), apiBase);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }

    const response = await send(url, "application/vnd.github+json");
    const text = await readBody(url.toString(), () => response.text());

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ApiRequestError(
        {
          kind: "decode",
          url: url.toString(),
          message: error instanceof Error ? error.message : String(error),
        },
        { cause: error }
      );
    }

    return { status: response.status, data, headers: response.headers };
  }

  async function getRaw(rawUrl: string): Promise<Uint8Array> {
    const url = new URL(rawUrl);
    const response = await send(url, "*/*");
    const buffer = await readBody(url.toString(), () => response.arrayBuffer());
    return new Uint8Array(buffer);
  }

  return { getJson, getRaw, baseUrl };
}
