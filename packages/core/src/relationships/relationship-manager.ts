import { ConfigurationError } from "../errors.js";
import type { EventBus, Unsubscribe } from "../events/event-bus.js";
import { involvedAgents } from "../events/event.js";
import type { PayloadValue, SimulationEvent } from "../events/types.js";
import { createLogger, describeError } from "../logging/logger.js";
import { RelationshipTypeRegistry } from "./registry.js";
import { canonicalPair, type Relationship, type RelationshipRecord } from "./relationship.js";

const log = createLogger("relationships");

/** Where `saveRelationships` / `loadRelationships` keep the edge set. */
export interface RelationshipSnapshotStore {
  /** False when the write failed; the store logs the cause. */
  saveSnapshot(records: readonly RelationshipRecord[]): boolean;
  /** Undefined when nothing could be read. */
  loadSnapshot(): unknown[] | undefined;
}

export interface RelationshipManagerOptions {
  registry?: RelationshipTypeRegistry;
}

function pairKey(a: string, b: string, type: string): string {
  const [x, y] = canonicalPair(a, b);
  return JSON.stringify([x, y, type]);
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

export class RelationshipManager {
  readonly registry: RelationshipTypeRegistry;
  private readonly byId = new Map<string, Relationship>();
  private readonly byPair = new Map<string, string>();
  private readonly byAgent = new Map<string, Set<string>>();
  private readonly byType = new Map<string, Set<string>>();
  private detachFromBus: Unsubscribe | undefined;

  constructor(opts: RelationshipManagerOptions = {}) {
    this.registry = opts.registry ?? new RelationshipTypeRegistry();
  }

  get size(): number {
    return this.byId.size;
  }

  /** Throws when the id or the (pair, type) is already taken. */
  addRelationship(rel: Relationship): Relationship {
    if (this.byId.has(rel.id)) {
      throw new ConfigurationError(`Relationship "${rel.id}" already exists`);
    }
    const key = pairKey(rel.agentA, rel.agentB, rel.type);
    if (this.byPair.has(key)) {
      throw new ConfigurationError(
        `A ${rel.type} relationship between ${rel.agentA} and ${rel.agentB} already exists`,
      );
    }
    this.byId.set(rel.id, rel);
    this.byPair.set(key, rel.id);
    addTo(this.byAgent, rel.agentA, rel.id);
    addTo(this.byAgent, rel.agentB, rel.id);
    addTo(this.byType, rel.type, rel.id);
    return rel;
  }

  createRelationship(
    agentA: string,
    agentB: string,
    type: string,
    strength?: number,
    attributes?: Record<string, PayloadValue>,
  ): Relationship {
    if (this.byPair.has(pairKey(agentA, agentB, type))) {
      throw new ConfigurationError(`A ${type} relationship between ${agentA} and ${agentB} already exists`);
    }
    return this.addRelationship(this.registry.create({ agentA, agentB, type, strength, attributes }));
  }

  removeRelationship(id: string): boolean {
    const rel = this.byId.get(id);
    if (!rel) return false;
    this.byId.delete(id);
    this.byPair.delete(pairKey(rel.agentA, rel.agentB, rel.type));
    removeFrom(this.byAgent, rel.agentA, id);
    removeFrom(this.byAgent, rel.agentB, id);
    removeFrom(this.byType, rel.type, id);
    return true;
  }

  getRelationship(id: string): Relationship | undefined {
    return this.byId.get(id);
  }

  /** Without a type, the earliest-added relationship of any type between the two. */
  getRelationshipBetween(a: string, b: string, type?: string): Relationship | undefined {
    if (type !== undefined) {
      const id = this.byPair.get(pairKey(a, b, type));
      return id !== undefined ? this.byId.get(id) : undefined;
    }
    return this.getRelationshipsBetween(a, b)[0];
  }

  getRelationshipsBetween(a: string, b: string): Relationship[] {
    return this.getAgentRelationships(a).filter((r) => r.otherAgent(a) === b);
  }

  getAgentRelationships(agentId: string): Relationship[] {
    return this.resolve(this.byAgent.get(agentId));
  }

  getRelationshipsByType(type: string): Relationship[] {
    return this.resolve(this.byType.get(type));
  }

  getAllRelationships(): Relationship[] {
    return [...this.byId.values()];
  }

  /** Offers the event to every relationship among its involved agents; returns how many changed. */
  updateRelationships(event: SimulationEvent): number {
    const agents = involvedAgents(event);
    if (agents.length < 2) return 0;

    let changed = 0;
    for (let i = 0; i < agents.length; i++) {
      for (let j = i + 1; j < agents.length; j++) {
        const a = agents[i];
        const b = agents[j];
        if (a === undefined || b === undefined) continue;
        for (const rel of this.getRelationshipsBetween(a, b)) {
          if (rel.update(event)) changed++;
        }
      }
    }
    if (changed > 0) log.debug("Relationships updated", { kind: event.kind, changed });
    return changed;
  }

  /**
   * Decays every relationship whose type has a rate in `ratesByType` (per day).
   * Returns how many moved.
   */
  applyTimeDecay(days: number, ratesByType: Readonly<Record<string, number>>, at: Date = new Date()): number {
    let changed = 0;
    for (const [type, rate] of Object.entries(ratesByType)) {
      for (const rel of this.getRelationshipsByType(type)) {
        if (rel.decayTowardZero(days, rate, at)) changed++;
      }
    }
    return changed;
  }

  /** Keeps relationships current from the bus's event flow until `detach`. */
  attachTo(bus: EventBus, priority = 0): void {
    this.detach();
    const relationshipUpdater = (event: SimulationEvent): void => {
      this.updateRelationships(event);
    };
    this.detachFromBus = bus.subscribeToAll(relationshipUpdater, priority);
  }

  detach(): void {
    this.detachFromBus?.();
    this.detachFromBus = undefined;
  }

  toRecords(): RelationshipRecord[] {
    return this.getAllRelationships().map((r) => r.toRecord());
  }

  /**
   * Replaces the whole edge set. Every record is validated first, so a bad
   * record leaves the current state untouched.
   */
  loadRecords(records: readonly unknown[]): void {
    const staged = new RelationshipManager({ registry: this.registry });
    for (const record of records) staged.addRelationship(this.registry.fromRecord(record));
    this.clear();
    for (const rel of staged.getAllRelationships()) this.addRelationship(rel);
  }

  saveRelationships(store: RelationshipSnapshotStore): boolean {
    return store.saveSnapshot(this.toRecords());
  }

  loadRelationships(store: RelationshipSnapshotStore): boolean {
    const records = store.loadSnapshot();
    if (records === undefined) return false;
    try {
      this.loadRecords(records);
      log.info("Relationships loaded", { count: this.size });
      return true;
    } catch (err) {
      log.error("Failed to load relationships", { error: describeError(err) });
      return false;
    }
  }

  clear(): void {
    this.byId.clear();
    this.byPair.clear();
    this.byAgent.clear();
    this.byType.clear();
  }

  private resolve(ids: Set<string> | undefined): Relationship[] {
    if (!ids) return [];
    return [...ids].flatMap((id) => {
      const rel = this.byId.get(id);
      return rel ? [rel] : [];
    });
  }
}
