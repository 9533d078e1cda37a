import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/nexus/config.js";
import { NexusError } from "../src/nexus/errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.maxIterations).toBe(10);
    expect(config.runTimeoutMs).toBe(300_000);
    expect(config.maxConcurrentCapabilities).toBe(5);
    expect(config.maxConcurrentRuns).toBe(5);
    expect(config.queueTimeoutMs).toBe(30_000);
    expect(config.reasoning).toEqual({
      baseUrl: "https://api.deepseek.com/v1",
      model: "deepseek-chat",
      routerModel: "deepseek-chat",
      timeoutMs: 60_000
    });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 8000 });
    expect(config.logLevel).toBe("info");
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ NEXUS_MAX_ITERATIONS: "3", PORT: "9090", NEXUS_RUN_TIMEOUT_MS: "1500" });
    expect(config.maxIterations).toBe(3);
    expect(config.server.port).toBe(9090);
    expect(config.runTimeoutMs).toBe(1500);
  });

  it("sets the api key only when provided", () => {
    expect("apiKey" in loadConfig({}).reasoning).toBe(false);
    expect("apiKey" in loadConfig({ REASONING_API_KEY: "   " }).reasoning).toBe(false);
    expect(loadConfig({ REASONING_API_KEY: "test-secret" }).reasoning.apiKey).toBe("test-secret");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it("rejects invalid values with INVALID_CONFIG", () => {
    let caught: unknown;
    try {
      loadConfig({ NEXUS_MAX_ITERATIONS: "0", LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NexusError);
    if (caught instanceof NexusError) {
      expect(caught.code).toBe("INVALID_CONFIG");
      expect(caught.message).toMatch(/^Invalid configuration: /);
      expect(caught.message).toContain("NEXUS_MAX_ITERATIONS");
      expect(caught.message).toContain("LOG_LEVEL");
    }
  });

  it("caps the run deadline at the largest timer delay", () => {
    expect(loadConfig({ NEXUS_RUN_TIMEOUT_MS: "2147483647" }).runTimeoutMs).toBe(2_147_483_647);
    expect(() => loadConfig({ NEXUS_RUN_TIMEOUT_MS: "3000000000" })).toThrow(/NEXUS_RUN_TIMEOUT_MS/);
  });

  it("reads the log level", () => {
    expect(loadConfig({}).logLevel).toBe("info");
    expect(loadConfig({ LOG_LEVEL: "debug" }).logLevel).toBe("debug");
  });
});
