import { createLogger, describeError } from "../logging/logger.js";
import { MemoryIndex, type MemoryIndexOptions } from "./memory-index.js";
import type { MemoryItem } from "./memory-item.js";
import type { MemoryPersistence } from "./persistence.js";
import { matchesQuery, newestFirst } from "./query.js";
import type { MemoryQuery, MemoryUpdate } from "./types.js";

const log = createLogger("memory-store");

export interface MemoryStoreOptions {
  persistence?: MemoryPersistence;
  /** Save after every mutation. Only meaningful with a persistence backend. */
  autoSave?: boolean;
  /** Answer `retrieveMemories` from a MemoryIndex kept in step with the store. */
  index?: boolean | MemoryIndexOptions;
}

/** One agent's memories, optionally backed by a persistence layer. */
export class MemoryStore {
  private readonly memories = new Map<string, MemoryItem>();
  private readonly persistence: MemoryPersistence | undefined;
  private readonly autoSave: boolean;
  private readonly index: MemoryIndex | undefined;

  constructor(
    readonly agentId: string,
    opts: MemoryStoreOptions = {},
  ) {
    this.persistence = opts.persistence;
    this.autoSave = opts.autoSave ?? false;
    this.index = opts.index ? new MemoryIndex(opts.index === true ? {} : opts.index) : undefined;
    if (this.persistence) this.load(this.persistence);
  }

  get size(): number {
    return this.memories.size;
  }

  addMemory(item: MemoryItem): string {
    this.memories.set(item.id, item);
    this.index?.indexMemory(item);
    this.changed();
    return item.id;
  }

  getMemory(id: string): MemoryItem | undefined {
    return this.memories.get(id);
  }

  getAllMemories(): MemoryItem[] {
    return [...this.memories.values()];
  }

  updateMemory(id: string, update: MemoryUpdate): boolean {
    const item = this.memories.get(id);
    if (!item) return false;
    if (update.importance !== undefined) item.updateImportance(update.importance);
    if (update.associations) {
      for (const [key, value] of Object.entries(update.associations)) item.addAssociation(key, value);
    }
    if (update.content !== undefined) item.content = update.content;
    this.index?.updateMemory(item);
    this.changed();
    return true;
  }

  forget(id: string): boolean {
    if (!this.memories.delete(id)) return false;
    this.index?.removeMemory(id);
    this.changed();
    return true;
  }

  clear(): void {
    this.memories.clear();
    this.index?.clear();
    this.changed();
  }

  get isIndexed(): boolean {
    return this.index !== undefined;
  }

  /** Newest first; `limit` applies after sorting. */
  retrieveMemories(query: MemoryQuery = {}, limit?: number, importanceThreshold?: number): MemoryItem[] {
    if (this.index) return this.index.search(query, limit, importanceThreshold);
    const matches = [...this.memories.values()]
      .filter((m) => matchesQuery(m, query, importanceThreshold))
      .sort(newestFirst);
    return limit !== undefined ? matches.slice(0, Math.max(0, limit)) : matches;
  }

  pruneWeakMemories(threshold: number, now: Date = new Date()): number {
    let removed = 0;
    for (const item of [...this.memories.values()]) {
      if (!item.isCore() && item.currentStrength(now) < threshold) {
        this.memories.delete(item.id);
        this.index?.removeMemory(item.id);
        removed++;
      }
    }
    if (removed > 0) this.changed();
    return removed;
  }

  /** False when there is no backend or the backend refused the write. */
  save(): boolean {
    if (!this.persistence) return false;
    return this.persistence.saveMemories(this.agentId, this.getAllMemories());
  }

  private load(persistence: MemoryPersistence): void {
    try {
      for (const item of persistence.loadMemories(this.agentId)) {
        this.memories.set(item.id, item);
        this.index?.indexMemory(item);
      }
      log.debug("Loaded memories", { agentId: this.agentId, count: this.memories.size });
    } catch (err) {
      log.error("Failed to load memories", { agentId: this.agentId, error: describeError(err) });
    }
  }

  private changed(): void {
    if (this.autoSave && this.persistence && !this.save()) {
      log.warn("Auto-save failed", { agentId: this.agentId });
    }
  }
}
