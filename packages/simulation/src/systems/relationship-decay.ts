import { createLogger, type RelationshipManager } from "@agora/core";

const log = createLogger("relationship-decay");

/** Pulls every relationship with a configured rate toward neutral. Returns how many moved. */
export function runRelationshipDecay(
  relationships: RelationshipManager,
  days: number,
  ratesPerDay: Readonly<Record<string, number>>,
  now: Date,
): number {
  const changed = relationships.applyTimeDecay(days, ratesPerDay, now);
  if (changed > 0) log.debug("Relationships decayed", { days, changed });
  return changed;
}
