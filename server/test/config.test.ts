import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      host: "0.0.0.0",
      logLevel: "info",
      tickEveryMs: 16,
      simDt: 1 / 60,
      simulateMaxSteps: 1_000_000,
      maxMass: 1e12
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({ PORT: "8080", HOST: "127.0.0.1", TICK_EVERY_MS: "8", SIM_DT: "0.01" });

    expect(config.port).toBe(8080);
    expect(config.host).toBe("127.0.0.1");
    expect(config.tickEveryMs).toBe(8);
    expect(config.simDt).toBe(0.01);
    expect(loadConfig({ SIMULATE_MAX_MASS: "1e8" }).maxMass).toBe(1e8);
  });

  it("rejects invalid numbers", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("PORT must be a positive number");
    expect(() => loadConfig({ SIM_DT: "-1" })).toThrow("SIM_DT must be a positive number");
    expect(() => loadConfig({ SIMULATE_MAX_STEPS: "1.5" })).toThrow("SIMULATE_MAX_STEPS must be an integer");
  });
});
