import { describe, expect, it } from "vitest";
import { createLogger, createStreamSink } from "../src/utils/logger.js";

function collect(format: "text" | "json" = "text") {
  const lines: string[] = [];
  const log = createLogger({ sinks: [createStreamSink((line) => lines.push(line), format)] });
  return { lines, log };
}

describe("logger", () => {
  it("filters by level", () => {
    const { lines, log } = collect();
    log.debug("hidden");
    log.info("shown");
    log.setLevel("debug");
    log.debug("now shown");
    expect(lines).toEqual(["shown", "now shown"]);
  });

  it("redacts sensitive keys and assignments", () => {
    const { lines, log } = collect();
    log.info("calling", "https://example.test/?token=abc&x=1", { password: "pw", user: "ops" });
    expect(lines).toEqual([
      'calling https://example.test/?token=***REDACTED***&x=1 {"password":"***REDACTED***","user":"ops"}',
    ]);
  });

  it("redacts registered secret values", () => {
    const { lines, log } = collect();
    log.addSecret("test-secret");
    log.addSecret("abc");
    log.warn("value test-secret abc");
    expect(lines).toEqual(["value ***REDACTED*** abc"]);
  });

  it("formats errors with their name", () => {
    const { lines, log } = collect();
    log.error("failed:", new TypeError("boom"));
    expect(lines).toEqual(["failed: TypeError: boom"]);
  });

  it("writes JSON lines", () => {
    const { lines, log } = collect("json");
    log.info("hello", 1);

    const [line] = lines;
    const parsed: unknown = JSON.parse(line ?? "");
    expect(parsed).toMatchObject({ level: "info", message: "hello 1", args: ["hello", 1] });
  });
});
