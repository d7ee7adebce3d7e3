import { MemoryItem } from "./memory-item.js";
import type { MemoryRecord } from "./types.js";

/**
 * Storage backend for per-agent memories. Implementations report failure
 * through their return values and log the cause; they do not throw.
 */
export interface MemoryPersistence {
  saveMemories(agentId: string, items: readonly MemoryItem[]): boolean;
  loadMemories(agentId: string): MemoryItem[];
  deleteMemories(agentId: string): boolean;
  backupMemories(agentId: string, suffix?: string): boolean;
  listAgentIds(): string[];
}

/** Keeps serialised records in a map so stored state never aliases live items. */
export class InMemoryMemoryPersistence implements MemoryPersistence {
  private readonly records = new Map<string, MemoryRecord[]>();

  saveMemories(agentId: string, items: readonly MemoryItem[]): boolean {
    this.records.set(agentId, items.map((m) => m.toRecord()));
    return true;
  }

  loadMemories(agentId: string): MemoryItem[] {
    return (this.records.get(agentId) ?? []).map((r) => MemoryItem.fromRecord(r));
  }

  deleteMemories(agentId: string): boolean {
    return this.records.delete(agentId);
  }

  backupMemories(agentId: string, suffix = "backup"): boolean {
    const current = this.records.get(agentId);
    if (!current) return false;
    this.records.set(`${agentId}_${suffix}`, [...current]);
    return true;
  }

  listAgentIds(): string[] {
    return [...this.records.keys()].sort();
  }
}
