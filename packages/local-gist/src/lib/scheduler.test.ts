import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { downloadAll, validateConcurrency, type DownloadOutcome } from "./scheduler.js";
import type { GistSummary } from "./gist.js";
import type { FileStore } from "./ports/file-store.js";
import type { Logger } from "./logger.js";
import { ApiRequestError, SchedulerError } from "./errors/core.js";

function gist(id: string, names: string[]): GistSummary {
  return {
    id,
    description: null,
    public: true,
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    htmlUrl: null,
    files: names.map((name) => ({
      name,
      size: 1,
      rawUrl: `https://gist.example.test/${id}/${name}`,
      language: null,
      type: null,
    })),
  };
}

/**
 * Raw content server: serves `<id>:<name>` for every file of `served`,
 * answers 404 for anything else.
 */
function fakeRaw(served: GistSummary[], { delayMs = 0 }: { delayMs?: number } = {}) {
  const bodies = new Map<string, string>();
  for (const g of served) {
    for (const f of g.files) bodies.set(f.rawUrl, `${g.id}:${f.name}`);
  }

  const stats = { inFlight: 0, maxInFlight: 0 };
  const getRaw = vi.fn(async (url: string): Promise<Uint8Array> => {
    stats.inFlight++;
    stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
    try {
      if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
      const body = bodies.get(url);
      if (body === undefined) {
        throw new ApiRequestError({
          kind: "http",
          status: 404,
          statusText: "Not Found",
          url,
          rateLimit: { limit: null, remaining: null },
        });
      }
      return new TextEncoder().encode(body);
    } finally {
      stats.inFlight--;
    }
  });

  return { client: { getRaw }, stats };
}

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

async function* fromAsync<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    await Promise.resolve();
    yield item;
  }
}

describe("validateConcurrency", () => {
  it("accepts whole numbers of at least 1", () => {
    expect(validateConcurrency(1)).toBe(1);
    expect(validateConcurrency(64)).toBe(64);
  });

  it("rejects everything else", () => {
    expect(() => validateConcurrency(0)).toThrow(SchedulerError);
    expect(() => validateConcurrency(-2)).toThrow("Concurrency must be a whole number of at least 1 (got -2)");
    expect(() => validateConcurrency(2.5)).toThrow(SchedulerError);
    expect(() => validateConcurrency(Number.NaN)).toThrow(SchedulerError);
  });
});

describe("downloadAll", () => {
  let destination: string;

  beforeEach(async () => {
    destination = await mkdtemp(join(tmpdir(), "local-gist-test-"));
  });

  afterEach(async () => {
    await rm(destination, { recursive: true, force: true });
  });

  it("rejects an invalid concurrency before touching anything", async () => {
    const gists = [gist("a1", ["x.txt"])];

    for (const concurrency of [0, -1]) {
      const { client } = fakeRaw(gists);
      const error: unknown = await downloadAll(gists, { concurrency, destination, client }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SchedulerError);
      expect(error).toMatchObject({ detail: { kind: "invalid-concurrency", value: concurrency } });
      expect(client.getRaw).not.toHaveBeenCalled();
    }
    expect(await readdir(destination)).toEqual([]);
  });

  it("writes every file under <destination>/<gist id>/<file name>", async () => {
    const gists = [gist("a1", ["one.txt", "two.md"]), gist("b2", ["solo.py"])];
    const { client } = fakeRaw(gists);

    const report = await downloadAll(gists, { concurrency: 2, destination, client });

    expect(report.downloadedCount).toBe(2);
    expect(report.filesWritten).toBe(3);
    expect([...report.failedIds]).toEqual([]);
    expect(await readFile(join(destination, "a1", "one.txt"), "utf-8")).toBe("a1:one.txt");
    expect(await readFile(join(destination, "a1", "two.md"), "utf-8")).toBe("a1:two.md");
    expect(await readFile(join(destination, "b2", "solo.py"), "utf-8")).toBe("b2:solo.py");
    expect((await readdir(destination)).sort()).toEqual(["a1", "b2"]);
  });

  it("never downloads more gists at once than the concurrency", async () => {
    const gists = Array.from({ length: 12 }, (_, i) => gist(`g${i}`, ["f.txt"]));
    const { client, stats } = fakeRaw(gists, { delayMs: 5 });

    const report = await downloadAll(gists, { concurrency: 3, destination, client });

    expect(stats.maxInFlight).toBeLessThanOrEqual(3);
    expect(report.peakConcurrency).toBe(3);
    expect(report.downloadedCount).toBe(12);
  });

  it("keeps going when one gist fails", async () => {
    const good = [gist("ok1", ["a.txt"]), gist("ok2", ["b.txt"])];
    const bad = gist("missing", ["gone.txt"]);
    const { client } = fakeRaw(good);

    const report = await downloadAll([good[0] ?? bad, bad, good[1] ?? bad], { concurrency: 2, destination, client });

    expect(report.downloadedCount).toBe(2);
    expect([...report.failedIds]).toEqual(["missing"]);
    expect(report.failures).toEqual([
      {
        status: "failure",
        gistId: "missing",
        filesWritten: 0,
        cause: {
          kind: "http",
          status: 404,
          statusText: "Not Found",
          url: "https://gist.example.test/missing/gone.txt",
          rateLimit: { limit: null, remaining: null },
        },
      },
    ]);
    expect(await readFile(join(destination, "ok2", "b.txt"), "utf-8")).toBe("ok2:b.txt");
  });

  it("leaves files already written when a later file of the gist fails", async () => {
    const partial = gist("p1", ["first.txt", "second.txt"]);
    const { client } = fakeRaw([gist("p1", ["first.txt"])]);

    const report = await downloadAll([partial], { concurrency: 1, destination, client });

    expect(report.failures[0]).toMatchObject({ gistId: "p1", filesWritten: 1, cause: { kind: "http", status: 404 } });
    expect(report.filesWritten).toBe(1);
    expect(await readFile(join(destination, "p1", "first.txt"), "utf-8")).toBe("p1:first.txt");
    expect(await readdir(join(destination, "p1"))).toEqual(["first.txt"]);
  });

  it("overwrites existing files and produces the same report on a second run", async () => {
    const gists = [gist("r1", ["x.txt"]), gist("r2", ["y.txt"])];
    const { client } = fakeRaw(gists);

    const first = await downloadAll(gists, { concurrency: 2, destination, client });
    const second = await downloadAll(gists, { concurrency: 2, destination, client });

    expect(second.downloadedCount).toBe(first.downloadedCount);
    expect(second.filesWritten).toBe(first.filesWritten);
    expect(await readFile(join(destination, "r1", "x.txt"), "utf-8")).toBe("r1:x.txt");
  });

  it("reaches the same outcome at any concurrency", async () => {
    const served = Array.from({ length: 8 }, (_, i) => gist(`c${i}`, ["f.txt"]));
    const requested = [...served, gist("nope", ["f.txt"])];

    const serial = await downloadAll(requested, { concurrency: 1, destination, client: fakeRaw(served).client });
    const parallel = await downloadAll(requested, { concurrency: 10, destination, client: fakeRaw(served).client });

    expect(parallel.downloadedCount).toBe(serial.downloadedCount);
    expect(parallel.filesWritten).toBe(serial.filesWritten);
    expect([...parallel.failedIds]).toEqual([...serial.failedIds]);
    expect(serial.downloadedCount).toBe(8);
  });

  it("consumes an async source", async () => {
    const gists = [gist("s1", ["a.txt"]), gist("s2", ["b.txt"]), gist("s3", ["c.txt"])];
    const { client } = fakeRaw(gists);

    const report = await downloadAll(fromAsync(gists), { concurrency: 2, destination, client });

    expect(report.downloadedCount).toBe(3);
  });

  it("records write failures as io causes", async () => {
    const gists = [gist("w1", ["a.txt"])];
    const { client } = fakeRaw(gists);
    const store: FileStore = { write: () => Promise.reject(new Error("disk full")) };

    const report = await downloadAll(gists, { concurrency: 1, destination, client, store });

    expect(report.failures).toEqual([
      {
        status: "failure",
        gistId: "w1",
        filesWritten: 0,
        cause: { kind: "io", path: join(destination, "w1", "a.txt"), message: "disk full" },
      },
    ]);
  });

  it("skips gists listed twice", async () => {
    const gists = [gist("d1", ["a.txt"]), gist("d1", ["a.txt"])];
    const { client } = fakeRaw(gists);
    const logger = createMockLogger();

    const report = await downloadAll(gists, { concurrency: 2, destination, client, logger });

    expect(report.downloadedCount).toBe(1);
    expect(client.getRaw).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Skipping duplicate gist", { gistId: "d1" });
  });

  it("reports each gist to the observer and times the run", async () => {
    const gists = [gist("o1", ["a.txt"]), gist("o2", ["b.txt"])];
    const { client } = fakeRaw([gists[0] ?? gist("o1", [])]);
    const outcomes: DownloadOutcome[] = [];
    const now = vi.fn().mockReturnValueOnce(1000).mockReturnValueOnce(1250);

    const report = await downloadAll(gists, {
      concurrency: 1,
      destination,
      client,
      now,
      observer: { onRecordResult: (outcome) => outcomes.push(outcome) },
    });

    expect(outcomes.map((o) => [o.gistId, o.status])).toEqual([
      ["o1", "success"],
      ["o2", "failure"],
    ]);
    expect(report.durationMs).toBe(250);
  });

  it("keeps a gist's outcome when the observer throws", async () => {
    const gists = [gist("a1", ["x.txt"])];
    const { client } = fakeRaw(gists);
    const logger = createMockLogger();
    const onRecordResult = vi.fn(() => {
      throw new Error("observer boom");
    });

    const report = await downloadAll(gists, {
      concurrency: 1,
      destination,
      client,
      logger,
      observer: { onRecordResult },
    });

    expect(report.downloadedCount).toBe(1);
    expect([...report.failedIds]).toEqual([]);
    expect(report.failures).toEqual([]);
    expect(onRecordResult).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Observer hook failed", {
      hook: "onRecordResult",
      error: "observer boom",
    });
  });

  it("fails a gist whose file names flatten to the same path", async () => {
    const clash = gist("c1", ["a/b.txt", "a_b.txt"]);
    const { client } = fakeRaw([clash]);

    const report = await downloadAll([clash], { concurrency: 1, destination, client });

    expect(report.failures).toEqual([
      {
        status: "failure",
        gistId: "c1",
        filesWritten: 1,
        cause: {
          kind: "io",
          path: join(destination, "c1", "a_b.txt"),
          message: '"a_b.txt" maps to a path already written for this gist',
        },
      },
    ]);
    expect(client.getRaw).toHaveBeenCalledTimes(1);
    expect(await readFile(join(destination, "c1", "a_b.txt"), "utf-8")).toBe("c1:a/b.txt");
  });

  it("lets started downloads finish when the source throws", async () => {
    const gists = [gist("t1", ["a.txt"])];
    const { client } = fakeRaw(gists);
    async function* broken(): AsyncGenerator<GistSummary> {
      yield gists[0] ?? gist("t1", []);
      throw new Error("listing broke");
    }

    await expect(downloadAll(broken(), { concurrency: 1, destination, client })).rejects.toThrow("listing broke");
    expect(await readFile(join(destination, "t1", "a.txt"), "utf-8")).toBe("t1:a.txt");
  });
});
