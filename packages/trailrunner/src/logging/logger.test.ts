import { existsSync, readFileSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { _resetFileLoggingState, createLogger, parseLogLevel, stripAnsi } from "./logger.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("createLogger", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.TRAILRUNNER_LOG_LEVEL;
    delete process.env.TRAILRUNNER_LOG_FILE;
    delete process.env.TRAILRUNNER_LOG_RESET;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("defaults to warn level, pretty output and the runtime name", () => {
    const logger = createLogger();

    expect(logger.settings.minLevel).toBe(4);
    expect(logger.settings.type).toBe("pretty");
    expect(logger.settings.name).toBe("trailrunner");
  });

  it("respects explicit options", () => {
    const logger = createLogger({ minLevel: 2, type: "json", name: "mode-stack" });

    expect(logger.settings.minLevel).toBe(2);
    expect(logger.settings.type).toBe("json");
    expect(logger.settings.name).toBe("mode-stack");
    expect(logger.settings.hideLogPositionForProduction).toBe(true);
  });

  it("reads TRAILRUNNER_LOG_LEVEL by name", () => {
    process.env.TRAILRUNNER_LOG_LEVEL = "DEBUG";

    expect(createLogger().settings.minLevel).toBe(2);
  });

  it("prefers the option over the environment", () => {
    process.env.TRAILRUNNER_LOG_LEVEL = "2";

    expect(createLogger({ minLevel: 5 }).settings.minLevel).toBe(5);
  });

  it("does not throw when a hidden logger is used", () => {
    const logger = createLogger({ type: "hidden" });

    expect(() => logger.debug("mode added", { modeId: "travel" })).not.toThrow();
  });
});

describe("parseLogLevel", () => {
  it("maps every level name", () => {
    const levels = [
      ["silly", 0],
      ["trace", 1],
      ["debug", 2],
      ["info", 3],
      ["warn", 4],
      ["error", 5],
      ["fatal", 6],
    ] as const;

    for (const [name, expected] of levels) {
      expect(parseLogLevel(name)).toBe(expected);
    }
  });

  it("clamps numbers to 0..6", () => {
    expect(parseLogLevel("10")).toBe(6);
    expect(parseLogLevel("-1")).toBe(0);
  });

  it("ignores blank and unknown values", () => {
    expect(parseLogLevel("")).toBeUndefined();
    expect(parseLogLevel("   ")).toBeUndefined();
    expect(parseLogLevel("loud")).toBeUndefined();
  });
});

describe("stripAnsi", () => {
  it("removes color codes", () => {
    expect(stripAnsi("\x1b[1m\x1b[32mbold green\x1b[0m normal")).toBe("bold green normal");
  });

  it("leaves plain text alone", () => {
    expect(stripAnsi("no colors here")).toBe("no colors here");
  });
});

describe("file logging", () => {
  const originalEnv = { ...process.env };
  let testLogFile: string;

  beforeEach(() => {
    testLogFile = join(
      tmpdir(),
      `trailrunner-test-${Date.now()}-${Math.random().toString(36).slice(2)}.log`,
    );
    _resetFileLoggingState();
    delete process.env.TRAILRUNNER_LOG_LEVEL;
    delete process.env.TRAILRUNNER_LOG_FILE;
    delete process.env.TRAILRUNNER_LOG_RESET;
  });

  afterEach(async () => {
    _resetFileLoggingState();
    process.env = { ...originalEnv };
    await sleep(50);
    if (existsSync(testLogFile)) {
      unlinkSync(testLogFile);
    }
  });

  it("writes messages to TRAILRUNNER_LOG_FILE", async () => {
    process.env.TRAILRUNNER_LOG_FILE = testLogFile;
    process.env.TRAILRUNNER_LOG_LEVEL = "0";
    const logger = createLogger({ name: "scheduler" });

    logger.info("tick finished");
    await sleep(50);

    const content = readFileSync(testLogFile, "utf-8");
    expect(content).toContain("tick finished");
    expect(content).toContain("[scheduler]");
    // biome-ignore lint/suspicious/noControlCharactersInRegex: checking that escape codes were stripped
    expect(content).not.toMatch(/\x1b\[/);
  });

  it("truncates the file when TRAILRUNNER_LOG_RESET=true", async () => {
    process.env.TRAILRUNNER_LOG_FILE = testLogFile;
    process.env.TRAILRUNNER_LOG_LEVEL = "0";
    process.env.TRAILRUNNER_LOG_RESET = "true";

    createLogger({ name: "first" }).info("first message");
    await sleep(50);

    _resetFileLoggingState();
    createLogger({ name: "second" }).info("second message");
    await sleep(50);

    const content = readFileSync(testLogFile, "utf-8");
    expect(content).toContain("second message");
    expect(content).not.toContain("first message");
  });
});
