import type { PayloadValue } from "../events/types.js";
import { createLogger } from "../logging/logger.js";
import type { MemoryItem } from "./memory-item.js";
import { importanceFloor, newestFirst } from "./query.js";
import { contentTokens, tokenize } from "./text.js";
import type { MemoryQuery } from "./types.js";

const log = createLogger("memory-index");

const BUCKET_COUNT = 11;

interface TimelineEntry {
  time: number;
  id: string;
}

/** What an item was indexed under, so removal does not depend on its current state. */
interface IndexedKeys {
  tags: string[];
  time: number;
  bucket: number;
  associations: string[];
  tokens: string[];
}

interface CachedResult {
  expiresAt: number;
  ids: string[];
}

export interface MemoryIndexOptions {
  /** Query cache lifetime; 0 disables caching. */
  cacheTtlMs?: number;
}

export type IndexStructure = "id" | "tags" | "timeline" | "importance" | "associations" | "tokens";

function bucketFor(importance: number): number {
  return Math.min(BUCKET_COUNT - 1, Math.max(0, Math.floor(importance * 10)));
}

function isScalar(value: PayloadValue): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function associationKey(key: string, value: string | number | boolean): string {
  return `${key}=${JSON.stringify(value)}`;
}

function addTo(map: Map<string, Set<string>>, key: string, id: string): void {
  let set = map.get(key);
  if (!set) {
    set = new Set();
    map.set(key, set);
  }
  set.add(id);
}

function removeFrom(map: Map<string, Set<string>>, key: string, id: string): void {
  const set = map.get(key);
  if (!set) return;
  set.delete(id);
  if (set.size === 0) map.delete(key);
}

function intersect(current: Set<string> | undefined, next: Iterable<string>): Set<string> {
  if (current === undefined) return new Set(next);
  const out = new Set<string>();
  for (const id of next) if (current.has(id)) out.add(id);
  return out;
}

/**
 * Multi-key index over memory items: tags, timestamps (sorted), importance
 * buckets, scalar associations and content tokens. Every structure is kept
 * in step with the id map; `tracesOf` reports any drift.
 */
export class MemoryIndex {
  private readonly items = new Map<string, MemoryItem>();
  private readonly keys = new Map<string, IndexedKeys>();
  private readonly byTag = new Map<string, Set<string>>();
  private readonly timeline: TimelineEntry[] = [];
  private readonly buckets: Set<string>[] = Array.from({ length: BUCKET_COUNT }, () => new Set<string>());
  private readonly byAssociation = new Map<string, Set<string>>();
  private readonly byToken = new Map<string, Set<string>>();
  private readonly cache = new Map<string, CachedResult>();
  private readonly cacheTtlMs: number;

  constructor(opts: MemoryIndexOptions = {}) {
    this.cacheTtlMs = opts.cacheTtlMs ?? 5_000;
  }

  get size(): number {
    return this.items.size;
  }

  indexMemory(item: MemoryItem): void {
    if (this.items.has(item.id)) this.unindex(item.id);

    const keys: IndexedKeys = {
      tags: [...item.tags],
      time: item.timestamp.getTime(),
      bucket: bucketFor(item.importance),
      associations: Object.entries(item.associations).flatMap(([k, v]) =>
        isScalar(v) ? [associationKey(k, v)] : [],
      ),
      tokens: [...contentTokens(item.content)],
    };

    this.items.set(item.id, item);
    this.keys.set(item.id, keys);
    for (const tag of keys.tags) addTo(this.byTag, tag, item.id);
    this.timeline.splice(this.lowerBound(keys.time, item.id), 0, { time: keys.time, id: item.id });
    this.buckets[keys.bucket]?.add(item.id);
    for (const a of keys.associations) addTo(this.byAssociation, a, item.id);
    for (const t of keys.tokens) addTo(this.byToken, t, item.id);
    this.cache.clear();
  }

  removeMemory(id: string): boolean {
    if (!this.items.has(id)) return false;
    this.unindex(id);
    this.cache.clear();
    return true;
  }

  /** Re-indexes an item whose fields changed after it was indexed. */
  updateMemory(item: MemoryItem): void {
    this.removeMemory(item.id);
    this.indexMemory(item);
  }

  getMemory(id: string): MemoryItem | undefined {
    return this.items.get(id);
  }

  getAllMemories(): MemoryItem[] {
    return [...this.items.values()];
  }

  clear(): void {
    this.items.clear();
    this.keys.clear();
    this.byTag.clear();
    this.timeline.length = 0;
    for (const bucket of this.buckets) bucket.clear();
    this.byAssociation.clear();
    this.byToken.clear();
    this.cache.clear();
  }

  search(query: MemoryQuery, limit?: number, importanceThreshold?: number): MemoryItem[] {
    const cacheKey = this.cacheKey(query, limit, importanceThreshold);
    const cached = this.cacheTtlMs > 0 ? this.cache.get(cacheKey) : undefined;
    if (cached && cached.expiresAt > Date.now()) {
      return cached.ids.flatMap((id) => {
        const item = this.items.get(id);
        return item ? [item] : [];
      });
    }

    const ids = this.matchingIds(query, importanceThreshold);
    const results = [...ids].flatMap((id) => {
      const item = this.items.get(id);
      return item ? [item] : [];
    });
    results.sort(newestFirst);
    const limited = limit !== undefined ? results.slice(0, Math.max(0, limit)) : results;

    if (this.cacheTtlMs > 0) {
      this.cache.set(cacheKey, { expiresAt: Date.now() + this.cacheTtlMs, ids: limited.map((m) => m.id) });
    }
    return limited;
  }

  /** Removes every non-core item weaker than `threshold`; returns how many went. */
  pruneWeakMemories(threshold: number, now: Date = new Date()): number {
    const weak = [...this.items.values()].filter((m) => !m.isCore() && m.currentStrength(now) < threshold);
    for (const m of weak) this.unindex(m.id);
    if (weak.length > 0) {
      this.cache.clear();
      log.debug("Pruned weak memories", { count: weak.length, threshold });
    }
    return weak.length;
  }

  getRecent(count: number): MemoryItem[] {
    const out: MemoryItem[] = [];
    for (let i = this.timeline.length - 1; i >= 0 && out.length < count; i--) {
      const entry = this.timeline[i];
      const item = entry ? this.items.get(entry.id) : undefined;
      if (item) out.push(item);
    }
    return out;
  }

  getStrongest(count: number, now: Date = new Date()): MemoryItem[] {
    return [...this.items.values()]
      .map((item) => ({ item, strength: item.currentStrength(now) }))
      .sort((a, b) => b.strength - a.strength || newestFirst(a.item, b.item))
      .slice(0, Math.max(0, count))
      .map(({ item }) => item);
  }

  /** Names of the structures that still reference `id`. Empty once it is fully removed. */
  tracesOf(id: string): IndexStructure[] {
    const traces: IndexStructure[] = [];
    if (this.items.has(id)) traces.push("id");
    if ([...this.byTag.values()].some((s) => s.has(id))) traces.push("tags");
    if (this.timeline.some((e) => e.id === id)) traces.push("timeline");
    if (this.buckets.some((b) => b.has(id))) traces.push("importance");
    if ([...this.byAssociation.values()].some((s) => s.has(id))) traces.push("associations");
    if ([...this.byToken.values()].some((s) => s.has(id))) traces.push("tokens");
    return traces;
  }

  private matchingIds(query: MemoryQuery, importanceThreshold?: number): Set<string> {
    let ids: Set<string> | undefined;

    if (query.timestampMin !== undefined || query.timestampMax !== undefined) {
      const min = query.timestampMin?.getTime() ?? Number.NEGATIVE_INFINITY;
      const max = query.timestampMax?.getTime() ?? Number.POSITIVE_INFINITY;
      const inRange: string[] = [];
      for (let i = this.lowerBound(min); i < this.timeline.length; i++) {
        const entry = this.timeline[i];
        if (!entry || entry.time > max) break;
        inRange.push(entry.id);
      }
      ids = intersect(ids, inRange);
      if (ids.size === 0) return ids;
    }

    const floor = importanceFloor(query, importanceThreshold);
    if (floor !== undefined) {
      const candidates: string[] = [];
      for (let b = bucketFor(floor); b < BUCKET_COUNT; b++) {
        for (const id of this.buckets[b] ?? []) {
          const item = this.items.get(id);
          if (item && item.importance >= floor) candidates.push(id);
        }
      }
      ids = intersect(ids, candidates);
      if (ids.size === 0) return ids;
    }

    for (const tag of query.tags ?? []) {
      ids = intersect(ids, this.byTag.get(tag) ?? []);
      if (ids.size === 0) return ids;
    }

    for (const [key, value] of Object.entries(query.associations ?? {})) {
      ids = intersect(ids, this.byAssociation.get(associationKey(key, value)) ?? []);
      if (ids.size === 0) return ids;
    }

    for (const token of query.text !== undefined ? tokenize(query.text) : []) {
      ids = intersect(ids, this.byToken.get(token) ?? []);
      if (ids.size === 0) return ids;
    }

    return ids ?? new Set(this.items.keys());
  }

  private unindex(id: string): void {
    const keys = this.keys.get(id);
    this.items.delete(id);
    this.keys.delete(id);
    if (!keys) return;
    for (const tag of keys.tags) removeFrom(this.byTag, tag, id);
    const pos = this.lowerBound(keys.time, id);
    if (this.timeline[pos]?.id === id) this.timeline.splice(pos, 1);
    this.buckets[keys.bucket]?.delete(id);
    for (const a of keys.associations) removeFrom(this.byAssociation, a, id);
    for (const t of keys.tokens) removeFrom(this.byToken, t, id);
  }

  /** First timeline position not ordered before (time, id). */
  private lowerBound(time: number, id = ""): number {
    let lo = 0;
    let hi = this.timeline.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.timeline[mid];
      if (entry && (entry.time < time || (entry.time === time && entry.id < id))) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  private cacheKey(query: MemoryQuery, limit?: number, threshold?: number): string {
    return JSON.stringify({
      min: query.timestampMin?.toISOString(),
      max: query.timestampMax?.toISOString(),
      imp: query.importanceMin,
      tags: query.tags,
      assoc: query.associations,
      text: query.text,
      limit,
      threshold,
    });
  }
}
