import { describe, expect, it } from "vitest";
import { Logger } from "../src/logger";
import { captureLogs } from "./helpers";

describe("Logger", () => {
  it("drops entries below the configured level", () => {
    const logs = captureLogs();
    const logger = new Logger({ sink: logs.sink, level: "warn", prettyPrint: false });

    logger.debug("hidden");
    logger.info("hidden too");
    logger.warn("shown");
    logger.error("also shown");

    expect(logs.messages()).toEqual(["shown", "also shown"]);
    expect(logs.entries.map((entry) => entry.level)).toEqual([40, 50]);
  });

  it("writes JSON lines with name and context", () => {
    const lines: string[] = [];
    const logger = new Logger({ sink: (line) => lines.push(line), prettyPrint: false });

    logger.child({ provider: "openai" }).info("Falling back to ChatGPT...", { attempt: 1 });

    const parsed = JSON.parse(lines[0]);
    expect(parsed).toMatchObject({
      level: 30,
      msg: "Falling back to ChatGPT...",
      name: "diff-timer",
      provider: "openai",
      attempt: 1
    });
  });

  it("redacts secret-looking keys at any depth and serializes errors", () => {
    const logs = captureLogs();
    const logger = new Logger({ sink: logs.sink, prettyPrint: false });

    logger.error("request failed", {
      headers: { "x-api-key": "test-secret", accept: "application/json" },
      api_key: "test-secret",
      error: new TypeError("fetch failed")
    });

    expect(logs.entries[0]).toMatchObject({
      headers: { "x-api-key": "[REDACTED]", accept: "application/json" },
      api_key: "[REDACTED]",
      error: { name: "TypeError", message: "fetch failed" }
    });
  });

  it("changes level at runtime and keeps it for children", () => {
    const logs = captureLogs();
    const logger = new Logger({ sink: logs.sink, level: "error", prettyPrint: false });

    expect(logger.isLevelEnabled("info")).toBe(false);
    logger.setLevel("debug");
    expect(logger.isLevelEnabled("debug")).toBe(true);
    expect(logger.isLevelEnabled("trace")).toBe(false);
    logger.child({ target: "HEAD" }).debug("Running git diff");

    expect(logs.entries[0]).toMatchObject({ level: 20, target: "HEAD", msg: "Running git diff" });
  });

  it("formats pretty lines with the level name", () => {
    const lines: string[] = [];
    const logger = new Logger({ sink: (line) => lines.push(line), prettyPrint: true });

    logger.warn("Error with Claude API: overloaded", { statusCode: 529 });

    expect(lines[0]).toMatch(/ \x1b\[33mWARN \x1b\[0m \[diff-timer\] Error with Claude API: overloaded \{"statusCode":529\}$/);
  });
});
