import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import {
  createLogger,
  describeError,
  MemoryItem,
  PersistenceError,
  type MemoryPersistence,
  type MemoryRecord,
} from "@agora/core";

const log = createLogger("memory-files");

export const MEMORY_FILE_VERSION = 1;
const FILE_SUFFIX = "_memories.json";

const currentFileSchema = z.object({
  version: z.literal(MEMORY_FILE_VERSION),
  agentId: z.string(),
  savedAt: z.string().optional(),
  memories: z.array(z.unknown()),
});

/** Unversioned files: a bare array, or an object holding `memories` or `events`. */
const legacyFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ version: z.undefined(), memories: z.array(z.unknown()) }),
  z.object({ version: z.undefined(), events: z.array(z.unknown()) }),
]);

type MemoryFile = z.infer<typeof currentFileSchema>;

/** Brings any known file shape up to the current version. Throws PersistenceError otherwise. */
export function migrateMemoryFile(raw: unknown, agentId: string): MemoryFile {
  const current = currentFileSchema.safeParse(raw);
  if (current.success) return current.data;

  const legacy = legacyFileSchema.safeParse(raw);
  if (!legacy.success) {
    throw new PersistenceError(`Unrecognised memory file format for agent "${agentId}"`);
  }
  const data = legacy.data;
  const memories = Array.isArray(data) ? data : "memories" in data ? data.memories : data.events;
  log.info("Migrating legacy memory file", { agentId, count: memories.length });
  return { version: MEMORY_FILE_VERSION, agentId, memories };
}

function fileNameFor(agentId: string): string {
  return `${agentId.replace(/[^A-Za-z0-9_.-]/g, "_")}${FILE_SUFFIX}`;
}

/**
 * One human-readable JSON file per agent. Writes are not atomic; a crash
 * mid-write can leave a truncated file, which then loads as empty.
 */
export class JsonFileMemoryPersistence implements MemoryPersistence {
  constructor(private readonly dir: string) {}

  pathFor(agentId: string): string {
    return join(this.dir, fileNameFor(agentId));
  }

  saveMemories(agentId: string, items: readonly MemoryItem[]): boolean {
    const file: { version: number; agentId: string; savedAt: string; memories: MemoryRecord[] } = {
      version: MEMORY_FILE_VERSION,
      agentId,
      savedAt: new Date().toISOString(),
      memories: items.map((m) => m.toRecord()),
    };
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(this.pathFor(agentId), JSON.stringify(file, null, 2), "utf-8");
      log.debug("Saved memories", { agentId, count: items.length });
      return true;
    } catch (err) {
      log.error("Failed to save memories", { agentId, error: describeError(err) });
      return false;
    }
  }

  loadMemories(agentId: string): MemoryItem[] {
    const path = this.pathFor(agentId);
    if (!existsSync(path)) return [];

    let file: MemoryFile;
    try {
      const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
      file = migrateMemoryFile(raw, agentId);
    } catch (err) {
      log.error("Failed to load memories", { agentId, path, error: describeError(err) });
      return [];
    }

    const items: MemoryItem[] = [];
    for (const record of file.memories) {
      try {
        items.push(MemoryItem.fromRecord(record));
      } catch (err) {
        log.warn("Skipped unreadable memory", { agentId, error: describeError(err) });
      }
    }
    return items;
  }

  deleteMemories(agentId: string): boolean {
    const path = this.pathFor(agentId);
    try {
      if (!existsSync(path)) return false;
      unlinkSync(path);
      return true;
    } catch (err) {
      log.error("Failed to delete memories", { agentId, error: describeError(err) });
      return false;
    }
  }

  /** Copies the agent's file beside itself; the copy is not listed by `listAgentIds`. */
  backupMemories(agentId: string, suffix: string = new Date().toISOString().replace(/[:.]/g, "-")): boolean {
    const path = this.pathFor(agentId);
    try {
      if (!existsSync(path)) return false;
      copyFileSync(path, `${path}.${suffix}.bak`);
      return true;
    } catch (err) {
      log.error("Failed to back up memories", { agentId, error: describeError(err) });
      return false;
    }
  }

  listAgentIds(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((name) => name.endsWith(FILE_SUFFIX))
      .map((name) => name.slice(0, -FILE_SUFFIX.length))
      .sort();
  }
}
