import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { BoPiConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ BOPI_HOST: "192.168.1.50" })).toEqual({
      device: { host: "192.168.1.50", port: 80, requestTimeout: 10 },
      logLevel: "info",
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        BOPI_HOST: " bopi.local ",
        BOPI_PORT: "8080",
        BOPI_REQUEST_TIMEOUT: "2.5",
        LOG_LEVEL: "DEBUG",
      }),
    ).toEqual({
      device: { host: "bopi.local", port: 8080, requestTimeout: 2.5 },
      logLevel: "debug",
    });
  });

  it("requires the host", () => {
    expect(() => loadConfig({})).toThrow(new BoPiConfigError("BOPI_HOST environment variable is required"));
    expect(() => loadConfig({ BOPI_HOST: "  " })).toThrow(BoPiConfigError);
  });

  it("rejects numbers it cannot parse", () => {
    expect(() => loadConfig({ BOPI_HOST: "bopi.local", BOPI_PORT: "eighty" })).toThrow(
      "Environment variable BOPI_PORT must be a number",
    );
    expect(() => loadConfig({ BOPI_HOST: "bopi.local", BOPI_REQUEST_TIMEOUT: "soon" })).toThrow(
      "Environment variable BOPI_REQUEST_TIMEOUT must be a number",
    );
  });

  it("leaves range checks to the client", () => {
    expect(loadConfig({ BOPI_HOST: "bopi.local", BOPI_PORT: "0" }).device.port).toBe(0);
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ BOPI_HOST: "bopi.local", LOG_LEVEL: "loud" })).toThrow(
      "LOG_LEVEL must be one of: error, warn, info, http, verbose, debug, silly",
    );
  });
});
