import { createLogger, type BaseAgent } from "@agora/core";

const log = createLogger("memory-prune");

export function runMemoryPrune(agents: readonly BaseAgent[], threshold: number, now: Date): number {
  let removed = 0;
  for (const agent of agents) removed += agent.memory.pruneWeakMemories(threshold, now);
  if (removed > 0) log.debug("Weak memories pruned", { agents: agents.length, removed, threshold });
  return removed;
}
