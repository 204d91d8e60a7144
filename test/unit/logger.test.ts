import { describe, it, expect } from "vitest";
import { createLogger, createSilentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger({ level: "info", json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("child loggers inherit the level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "rebuilder" });
    expect(child.level).toBe("warn");
  });
});

describe("createSilentLogger", () => {
  it("drops everything", () => {
    const logger = createSilentLogger();
    expect(logger.level).toBe("silent");
    expect(logger.isLevelEnabled("error")).toBe(false);
  });
});
