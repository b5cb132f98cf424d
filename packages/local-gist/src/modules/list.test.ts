import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import chalk from "chalk";
import { runList } from "./list.js";
import type { Runtime } from "../lib/runtime.js";
import type { JsonResponse, QueryParams } from "../lib/github-client.js";
import { resolveConfig } from "../lib/config.js";
import { createNoopLogger } from "../lib/logger.js";
import { ApiRequestError } from "../lib/errors/core.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const GISTS = [
  {
    id: "abc123",
    description: "Shell helpers",
    public: true,
    created_at: "2024-03-01T10:00:00Z",
    updated_at: "2024-03-02T10:00:00Z",
    html_url: "https://gist.github.com/abc123",
    files: {
      "aliases.sh": { filename: "aliases.sh", language: "Shell", raw_url: "https://gist.example.test/abc123/aliases.sh", size: 40 },
      "notes.md": { filename: "notes.md", language: "Markdown", raw_url: "https://gist.example.test/abc123/notes.md", size: 12 },
    },
  },
  {
    id: "def456",
    description: null,
    public: true,
    created_at: "2024-04-01T10:00:00Z",
    updated_at: "2024-04-01T10:00:00Z",
    files: {
      "x.txt": { filename: "x.txt", raw_url: "https://gist.example.test/def456/x.txt", size: 1 },
    },
  },
];

function runtimeWith(getJson: (path: string, query?: QueryParams) => Promise<JsonResponse>): () => Runtime {
  return () => ({
    config: resolveConfig(),
    configSources: [],
    logger: createNoopLogger(),
    client: { baseUrl: "https://api.github.com", getJson, getRaw: vi.fn() },
    tokenSource: "none",
  });
}

const pageOf = (data: unknown): JsonResponse => ({ status: 200, data, headers: { get: () => null } });

describe("runList", () => {
  let consoleLogSpy: MockInstance;
  let originalLevel: typeof chalk.level;

  beforeEach(() => {
    originalLevel = chalk.level;
    chalk.level = 0;
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = originalLevel;
    vi.restoreAllMocks();
    resetContext();
  });

  it("prints one line per gist in plain mode", async () => {
    initContext(["node", "test", "--quiet"], {});
    const getJson = vi.fn().mockResolvedValue(pageOf(GISTS));

    await runList(runtimeWith(getJson), { username: "octocat", plain: true });

    expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
      "abc123 - Shell helpers (aliases.sh, notes.md)",
      "def456 - <no description> (x.txt)",
      "2 gists",
    ]);
  });

  it("requests the configured limit as page size", async () => {
    initContext(["node", "test", "--quiet"], {});
    const getJson = vi.fn().mockResolvedValue(pageOf(GISTS));

    await runList(runtimeWith(getJson), { username: "octocat", plain: true });

    expect(getJson).toHaveBeenCalledWith("/users/octocat/gists", { per_page: 10, page: 1 });
  });

  it("lifts the limit with --all", async () => {
    initContext(["node", "test", "--quiet"], {});
    const getJson = vi.fn().mockResolvedValue(pageOf(GISTS));

    await runList(runtimeWith(getJson), { username: "octocat", all: true, plain: true });

    expect(getJson).toHaveBeenCalledWith("/users/octocat/gists", { per_page: 100, page: 1 });
  });

  it("prints a JSON document in JSON mode", async () => {
    initContext(["node", "test", "--json"], {});
    const getJson = vi.fn().mockResolvedValue(pageOf(GISTS.slice(1)));

    await runList(runtimeWith(getJson), { username: "octocat" });

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
      success: true,
      data: {
        username: "octocat",
        count: 1,
        gists: [
          {
            id: "def456",
            description: null,
            public: true,
            createdAt: "2024-04-01T10:00:00Z",
            updatedAt: "2024-04-01T10:00:00Z",
            url: null,
            files: [{ name: "x.txt", size: 1, language: null }],
          },
        ],
      },
    });
  });

  it("says so when the account has no gists", async () => {
    initContext(["node", "test", "--quiet"], {});
    const getJson = vi.fn().mockResolvedValue(pageOf([]));

    await runList(runtimeWith(getJson), { username: "octocat" });

    expect(consoleLogSpy).toHaveBeenCalledWith("octocat has no public gists.");
  });

  it("renders a table by default", async () => {
    initContext(["node", "test", "--quiet"], {});
    const getJson = vi.fn().mockResolvedValue(pageOf(GISTS));

    await runList(runtimeWith(getJson), { username: "octocat" });

    const table = String(consoleLogSpy.mock.calls[0]?.[0]);
    expect(table).toContain("abc123");
    expect(table).toContain("2024-04-01");
  });

  it("reports an unknown account by name", async () => {
    initContext(["node", "test", "--quiet"], {});
    const getJson = vi.fn().mockRejectedValue(
      new ApiRequestError({
        kind: "http",
        status: 404,
        statusText: "Not Found",
        url: "https://api.github.com/users/ghost-account/gists",
        rateLimit: { limit: 60, remaining: 59 },
      })
    );

    await expect(runList(runtimeWith(getJson), { username: "ghost-account" })).rejects.toMatchObject({
      code: "API_NOT_FOUND",
      message: 'No GitHub account named "ghost-account"',
    });
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});
