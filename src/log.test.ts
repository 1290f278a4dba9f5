import { afterEach, describe, expect, it, vi } from "vitest";
import winston from "winston";
import { BoPiConfigError } from "./errors.js";
import { createLogger } from "./log.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses the requested level", () => {
    expect(createLogger({ level: "debug", silent: true }).level).toBe("debug");
  });

  it("falls back to LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "Warn");
    expect(createLogger({ silent: true }).level).toBe("warn");
  });

  it("rejects an unknown LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "loud");
    expect(() => createLogger({ silent: true })).toThrow(BoPiConfigError);
  });

  it("can be silenced", () => {
    expect(createLogger({ silent: true }).silent).toBe(true);
    expect(createLogger({ level: "info" }).silent).toBe(false);
  });

  it("writes to a single console transport", () => {
    const logger = createLogger({ silent: true });
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});
