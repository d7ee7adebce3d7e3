import { describe, it, expect } from "vitest";
import { CONFIG_BATCHED, CONFIG_DEFAULT, getConfigPreset, loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("config presets", () => {
  it("returns presets by name", () => {
    expect(getConfigPreset("default")).toBe(CONFIG_DEFAULT);
    expect(getConfigPreset("batched").bus.async).toBe(true);
  });

  it("spreads senate decay rates over thirty days", () => {
    expect(CONFIG_DEFAULT.relationships.decayPerDay["political"]).toBeCloseTo(0.08 / 30, 12);
    expect(CONFIG_BATCHED.relationships).toBe(CONFIG_DEFAULT.relationships);
  });
});

describe("loadConfig", () => {
  it("uses the default preset for an empty environment", () => {
    expect(loadConfig({})).toEqual(CONFIG_DEFAULT);
  });

  it("applies environment overrides on top of the chosen preset", () => {
    const config = loadConfig({
      AGORA_PRESET: "batched",
      AGORA_BUS_BATCH_SIZE: "25",
      AGORA_BUS_OVERFLOW: "reject",
      AGORA_MEMORY_AUTOSAVE: "true",
      AGORA_MEMORY_INDEXED: "false",
      AGORA_SEED: "fixed-seed",
      AGORA_LOG_LEVEL: "debug",
    });
    expect(config.preset).toBe("batched");
    expect(config.bus).toEqual({ ...CONFIG_BATCHED.bus, batchSize: 25, overflow: "reject" });
    expect(config.memory.autoSave).toBe(true);
    expect(config.memory.indexed).toBe(false);
    expect(CONFIG_BATCHED.memory.indexed).toBe(true);
    expect(config.simulation.seed).toBe("fixed-seed");
    expect(config.log.level).toBe("debug");
  });

  it("rejects an unknown preset", () => {
    expect(() => loadConfig({ AGORA_PRESET: "turbo" })).toThrow('Unknown config preset "turbo"');
  });

  it("lists every invalid field", () => {
    let caught: unknown;
    try {
      loadConfig({ AGORA_BUS_BATCH_SIZE: "0", AGORA_BUS_ASYNC: "maybe", AGORA_LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const message = caught instanceof Error ? caught.message : "";
    expect(message.split("\n")[0]).toBe("Agora config validation failed:");
    expect(message).toContain("  - bus.async:");
    expect(message).toContain("  - bus.batchSize:");
    expect(message).toContain("  - log.level:");
  });
});
