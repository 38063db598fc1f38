import { describe, it, expect } from "vitest";
import { createLogger, resolveMinLevel } from "./index.js";

describe("createLogger", () => {
  it("creates a logger with the given name", () => {
    const log = createLogger("telemetry:test");
    expect(log).toBeDefined();
    expect(log.settings.name).toBe("telemetry:test");
    expect(log.settings.type).toBe("pretty");
  });
});

describe("resolveMinLevel", () => {
  it("logs everything outside production", () => {
    expect(resolveMinLevel({ NODE_ENV: "test" })).toBe(0);
  });

  it("starts at info in production", () => {
    expect(resolveMinLevel({ NODE_ENV: "production" })).toBe(3);
  });

  it("honours DIAGKIT_LOG_LEVEL by name", () => {
    expect(resolveMinLevel({ NODE_ENV: "production", DIAGKIT_LOG_LEVEL: "ERROR" })).toBe(5);
    expect(resolveMinLevel({ DIAGKIT_LOG_LEVEL: "warn" })).toBe(4);
  });

  it("ignores an unknown level name", () => {
    expect(resolveMinLevel({ NODE_ENV: "production", DIAGKIT_LOG_LEVEL: "loud" })).toBe(3);
  });
});
