import type { MemoryItem } from "./memory-item.js";
import { contentTokens, tokenize } from "./text.js";
import type { MemoryQuery } from "./types.js";

/** The effective importance floor when both a query bound and a threshold are given. */
export function importanceFloor(query: MemoryQuery, threshold?: number): number | undefined {
  const bounds = [query.importanceMin, threshold].filter((b): b is number => b !== undefined);
  return bounds.length > 0 ? Math.max(...bounds) : undefined;
}

/** Linear check of one item against every filter in the query. */
export function matchesQuery(item: MemoryItem, query: MemoryQuery, threshold?: number): boolean {
  const time = item.timestamp.getTime();
  if (query.timestampMin && time < query.timestampMin.getTime()) return false;
  if (query.timestampMax && time > query.timestampMax.getTime()) return false;

  const floor = importanceFloor(query, threshold);
  if (floor !== undefined && item.importance < floor) return false;

  if (query.tags && !query.tags.every((t) => item.tags.includes(t))) return false;

  if (query.associations) {
    for (const [key, value] of Object.entries(query.associations)) {
      if (item.associations[key] !== value) return false;
    }
  }

  if (query.text !== undefined) {
    const wanted = tokenize(query.text);
    if (wanted.length > 0) {
      const have = contentTokens(item.content);
      if (!wanted.every((t) => have.has(t))) return false;
    }
  }
  return true;
}

export function newestFirst(a: MemoryItem, b: MemoryItem): number {
  return b.timestamp.getTime() - a.timestamp.getTime() || a.id.localeCompare(b.id);
}
