import { describe, it, expect, vi, beforeAll, afterEach } from "vitest";
import chalk from "chalk";
import { createLogger, createNoopLogger, isLogLevel } from "./logger.js";

describe("logger", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function capture() {
    const lines: string[] = [];
    return { lines, write: (line: string) => lines.push(line) };
  }

  describe("level filtering", () => {
    it("logs debug when level is debug", () => {
      const sink = capture();
      createLogger({ level: "debug", json: false, write: sink.write }).debug("hello");
      expect(sink.lines).toHaveLength(1);
    });

    it("drops debug and info when level is warn", () => {
      const sink = capture();
      const logger = createLogger({ level: "warn", json: false, write: sink.write });
      logger.debug("one");
      logger.info("two");
      logger.warn("three");
      expect(sink.lines).toHaveLength(1);
      expect(sink.lines[0]).toContain("three");
    });

    it("drops warn when level is error", () => {
      const sink = capture();
      createLogger({ level: "error", json: false, write: sink.write }).warn("nope");
      expect(sink.lines).toHaveLength(0);
    });
  });

  describe("output routing", () => {
    it("writes every level to stderr by default", () => {
      const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

      const logger = createLogger({ level: "debug", json: true });
      logger.debug("a");
      logger.info("b");
      logger.error("c");

      expect(stderrSpy).toHaveBeenCalledTimes(3);
      expect(stdoutSpy).not.toHaveBeenCalled();
    });
  });

  describe("JSON format", () => {
    it("writes one JSON object per line with metadata", () => {
      const sink = capture();
      createLogger({ level: "info", json: true, write: sink.write }).info("Fetched page", {
        page: 2,
        count: 10,
      });

      const parsed = JSON.parse(sink.lines[0]);
      expect(parsed.level).toBe("info");
      expect(parsed.message).toBe("Fetched page");
      expect(parsed.page).toBe(2);
      expect(parsed.count).toBe(10);
      expect(typeof parsed.timestamp).toBe("string");
    });
  });

  describe("human-readable format", () => {
    it("prefixes a timestamp and the padded upper-case level", () => {
      const sink = capture();
      createLogger({ level: "debug", json: false, write: sink.write }).info("ready");

      expect(sink.lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO  ready$/);
    });

    it("appends metadata as compact JSON", () => {
      const sink = capture();
      createLogger({ level: "debug", json: false, write: sink.write }).warn("slow", { ms: 5 });

      expect(sink.lines[0].endsWith(' WARN  slow {"ms":5}')).toBe(true);
    });
  });

  describe("child logger", () => {
    it("merges default meta, with per-call meta taking precedence", () => {
      const sink = capture();
      const child = createLogger({ level: "debug", json: true, write: sink.write })
        .child({ component: "lister", page: 1 })
        .child({ username: "octocat" });

      child.info("message", { page: 3 });

      const parsed = JSON.parse(sink.lines[0]);
      expect(parsed.component).toBe("lister");
      expect(parsed.username).toBe("octocat");
      expect(parsed.page).toBe(3);
    });
  });

  describe("createNoopLogger", () => {
    it("discards everything, including from children", () => {
      const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const logger = createNoopLogger();

      logger.error("error");
      logger.child({ a: 1 }).info("info");

      expect(stderrSpy).not.toHaveBeenCalled();
    });
  });

  describe("isLogLevel", () => {
    it("accepts known levels only", () => {
      expect(isLogLevel("warn")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
    });
  });
});
