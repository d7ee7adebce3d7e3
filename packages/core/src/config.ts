// Runtime configuration: named presets, overridable from AGORA_* environment variables

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./logging/logger.js";

export type OverflowPolicy = "drop-newest" | "drop-oldest" | "reject";

export interface BusConfig {
  async: boolean;
  batchSize: number;
  maxQueueSize: number;
  overflow: OverflowPolicy;
  batchIntervalMs: number; // pause between worker batches while the queue is non-empty
  stopTimeoutMs: number;
}

export interface MemoryConfig {
  pruneThreshold: number;
  defaultImportance: number;
  defaultDecayRate: number;
  autoSave: boolean;
  indexed: boolean; // serve memory queries from a MemoryIndex
}

export interface RelationshipConfig {
  decayPerDay: Record<string, number>;
}

export interface SimulationConfig {
  seed: string;
  daysPerTick: number;
  decayEvery: number; // ticks between relationship decay passes, 0 disables
  pruneEvery: number; // ticks between memory pruning passes, 0 disables
}

export interface AgoraConfig {
  preset: PresetName;
  bus: BusConfig;
  memory: MemoryConfig;
  relationships: RelationshipConfig;
  simulation: SimulationConfig;
  log: { level: LogLevel };
}

export type PresetName = "default" | "batched";

const DECAY_PER_DAY: Record<string, number> = {
  political: 0.08 / 30,
  personal: 0.04 / 30,
  mentor: 0.02 / 30,
  rival: 0.05 / 30,
  family: 0.01 / 30,
};

export const CONFIG_DEFAULT: AgoraConfig = {
  preset: "default",

  bus: {
    async: false,
    batchSize: 10,
    maxQueueSize: 10_000,
    overflow: "drop-newest",
    batchIntervalMs: 0,
    stopTimeoutMs: 1_000,
  },

  memory: {
    pruneThreshold: 0.1,
    defaultImportance: 0.5,
    defaultDecayRate: 0.1,
    autoSave: false,
    indexed: false,
  },

  relationships: {
    decayPerDay: DECAY_PER_DAY,
  },

  simulation: {
    seed: "agora",
    daysPerTick: 1,
    decayEvery: 30,
    pruneEvery: 10,
  },

  log: { level: "info" },
};

export const CONFIG_BATCHED: AgoraConfig = {
  ...CONFIG_DEFAULT,
  preset: "batched",

  bus: {
    async: true,
    batchSize: 50,
    maxQueueSize: 50_000,
    overflow: "drop-oldest",
    batchIntervalMs: 1,
    stopTimeoutMs: 2_000,
  },

  memory: {
    ...CONFIG_DEFAULT.memory,
    autoSave: false,
    indexed: true,
  },
};

const CONFIG_PRESETS: Record<PresetName, AgoraConfig> = {
  default: CONFIG_DEFAULT,
  batched: CONFIG_BATCHED,
};

export function getConfigPreset(name: PresetName): AgoraConfig {
  return CONFIG_PRESETS[name];
}

const unit = z.number().min(0).max(1);

export const configSchema = z.object({
  preset: z.enum(["default", "batched"]),
  bus: z.object({
    async: z.boolean(),
    batchSize: z.number().int().positive(),
    maxQueueSize: z.number().int().positive(),
    overflow: z.enum(["drop-newest", "drop-oldest", "reject"]),
    batchIntervalMs: z.number().int().nonnegative(),
    stopTimeoutMs: z.number().int().nonnegative(),
  }),
  memory: z.object({
    pruneThreshold: unit,
    defaultImportance: unit,
    defaultDecayRate: unit,
    autoSave: z.boolean(),
    indexed: z.boolean(),
  }),
  relationships: z.object({
    decayPerDay: z.record(z.number().nonnegative()),
  }),
  simulation: z.object({
    seed: z.string().min(1),
    daysPerTick: z.number().positive(),
    decayEvery: z.number().int().nonnegative(),
    pruneEvery: z.number().int().nonnegative(),
  }),
  log: z.object({ level: z.enum(["debug", "info", "warn", "error"]) }),
}) satisfies z.ZodType<AgoraConfig>;

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | string | undefined {
  const v = env[key];
  if (v === undefined || v === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : v;
}

function envBool(env: Env, key: string): boolean | string | undefined {
  const v = env[key];
  if (v === undefined || v === "") return undefined;
  if (v === "true") return true;
  if (v === "false") return false;
  return v;
}

function isPresetName(value: string): value is PresetName {
  return Object.hasOwn(CONFIG_PRESETS, value);
}

/**
 * Builds the configuration from `AGORA_PRESET` plus per-field overrides and
 * validates the result. Throws a ConfigurationError listing every bad field.
 */
export function loadConfig(env: Env = process.env): AgoraConfig {
  const presetName = env["AGORA_PRESET"] ?? "default";
  if (!isPresetName(presetName)) {
    throw new ConfigurationError(`Unknown config preset "${presetName}"`);
  }
  const base = CONFIG_PRESETS[presetName];
  const level = env["AGORA_LOG_LEVEL"];

  const candidate = {
    ...base,
    bus: {
      ...base.bus,
      async: envBool(env, "AGORA_BUS_ASYNC") ?? base.bus.async,
      batchSize: envNumber(env, "AGORA_BUS_BATCH_SIZE") ?? base.bus.batchSize,
      maxQueueSize: envNumber(env, "AGORA_BUS_MAX_QUEUE") ?? base.bus.maxQueueSize,
      overflow: env["AGORA_BUS_OVERFLOW"] ?? base.bus.overflow,
    },
    memory: {
      ...base.memory,
      pruneThreshold: envNumber(env, "AGORA_MEMORY_PRUNE_THRESHOLD") ?? base.memory.pruneThreshold,
      autoSave: envBool(env, "AGORA_MEMORY_AUTOSAVE") ?? base.memory.autoSave,
      indexed: envBool(env, "AGORA_MEMORY_INDEXED") ?? base.memory.indexed,
    },
    simulation: {
      ...base.simulation,
      seed: env["AGORA_SEED"] ?? base.simulation.seed,
      daysPerTick: envNumber(env, "AGORA_DAYS_PER_TICK") ?? base.simulation.daysPerTick,
    },
    log: { level: level !== undefined && level !== "" ? level : base.log.level },
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const report = parsed.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigurationError(`Agora config validation failed:\n${report}`);
  }
  return parsed.data;
}
