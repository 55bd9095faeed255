import { describe, expect, test } from "vitest";

import { createLogger, errorMessage, type LogLevel } from "../src/lib/logger.js";

describe("logger", () => {
  test("writes one JSON line with context fields", () => {
    const lines: Array<{ level: LogLevel; line: string }> = [];
    const log = createLogger("info", (level, line) => lines.push({ level, line }));

    log.warn("Failed to fetch weather data", { city: "Bahia" });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe("warn");
    const payload: unknown = JSON.parse(lines[0]?.line ?? "");
    expect(payload).toMatchObject({ level: "warn", message: "Failed to fetch weather data", city: "Bahia" });
  });

  test("drops entries below the minimum level", () => {
    const levels: LogLevel[] = [];
    const log = createLogger("warn", (level) => levels.push(level));

    log.debug("a");
    log.info("b");
    log.warn("c");
    log.error("d");

    expect(levels).toEqual(["warn", "error"]);
  });

  test("formats unknown errors", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
