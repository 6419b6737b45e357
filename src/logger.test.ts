import { describe, it, expect } from "vitest";
import { createLogger, levelFromEnv, silentLogger } from "./logger.js";

function capture(level: Parameters<typeof createLogger>[1]) {
  const lines: string[] = [];
  const log = createLogger("test", level, (line) => lines.push(line));
  return { log, lines };
}

describe("createLogger", () => {
  it("prefixes messages with scope and level", () => {
    const { log, lines } = capture("debug");
    log.error("boom");
    log.debug("details");
    expect(lines).toEqual(["[test] error: boom", "[test] debug: details"]);
  });

  it("drops messages below the threshold", () => {
    const { log, lines } = capture("warn");
    log.error("a");
    log.warn("b");
    log.info("c");
    log.debug("d");
    expect(lines).toEqual(["[test] error: a", "[test] warn: b"]);
  });

  it("writes nothing when silent", () => {
    const { log, lines } = capture("silent");
    log.error("a");
    expect(lines).toEqual([]);
    expect(() => silentLogger.error("ignored")).not.toThrow();
  });
});

describe("levelFromEnv", () => {
  it("reads MIDI_BEEPER_LOG case-insensitively", () => {
    expect(levelFromEnv({ MIDI_BEEPER_LOG: "DEBUG" })).toBe("debug");
    expect(levelFromEnv({ MIDI_BEEPER_LOG: "silent" })).toBe("silent");
  });

  it("falls back to warn", () => {
    expect(levelFromEnv({})).toBe("warn");
    expect(levelFromEnv({ MIDI_BEEPER_LOG: "verbose" })).toBe("warn");
  });
});
