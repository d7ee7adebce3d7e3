import type { Relationship } from "./relationship.js";
import type { RelationshipManager } from "./relationship-manager.js";

export interface SocialGraphEdge {
  id: string;
  agentA: string;
  agentB: string;
  type: string;
  strength: number;
}

export interface SocialGraph {
  center: string;
  /** Agents reached within `depth` hops, excluding the center, in discovery order. */
  agents: string[];
  relationships: SocialGraphEdge[];
}

function toEdge(rel: Relationship): SocialGraphEdge {
  return { id: rel.id, agentA: rel.agentA, agentB: rel.agentB, type: rel.type, strength: rel.strength };
}

/** Breadth-first neighbourhood of `centerId` up to `depth` hops. */
export function socialGraph(manager: RelationshipManager, centerId: string, depth: number): SocialGraph {
  const visited = new Set<string>([centerId]);
  const queue: { id: string; currentDepth: number }[] = [{ id: centerId, currentDepth: 0 }];
  const agents: string[] = [];
  const edges = new Map<string, SocialGraphEdge>();

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    const { id, currentDepth } = next;
    if (currentDepth >= depth) continue;

    for (const rel of manager.getAgentRelationships(id)) {
      edges.set(rel.id, toEdge(rel));

      const neighborId = rel.otherAgent(id);
      if (neighborId === undefined || visited.has(neighborId)) continue;
      visited.add(neighborId);
      agents.push(neighborId);
      queue.push({ id: neighborId, currentDepth: currentDepth + 1 });
    }
  }

  return { center: centerId, agents, relationships: [...edges.values()] };
}
