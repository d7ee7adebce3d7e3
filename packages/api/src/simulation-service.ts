import {
  createLogger,
  eventToRecord,
  socialGraph,
  type AgentRecord,
  type AgoraConfig,
  type BusMetrics,
  type EventRecord,
  type HandlerMetrics,
  type MemoryQuery,
  type MemoryRecord,
  type RelationshipRecord,
  type SocialGraph,
} from "@agora/core";
import { createScenario, type Engine, type EngineState } from "@agora/simulation";
import { JsonFileMemoryPersistence, SqliteEventJournal, type JournalEntry } from "@agora/storage";

const log = createLogger("simulation-service");

export interface SimulationServiceOptions {
  domain: string;
  /** Senators, or merchants for the marketplace. */
  agents?: number;
  customers?: number;
  config?: AgoraConfig;
  journal?: SqliteEventJournal;
  /** Saves agent memories as JSON files here when given. */
  memoryDir?: string;
}

export interface TickResult {
  tick: number;
  now: string;
  events: EventRecord[];
}

export interface JournalRecord {
  seq: number;
  tick: number | null;
  event: EventRecord;
}

export interface EventLogQuery {
  agentId?: string;
  otherAgentId?: string;
  kind?: string;
  fromTick?: number;
  toTick?: number;
  limit: number;
}

export interface SimulationMetrics {
  tick: number;
  bus: BusMetrics;
  handlers: HandlerMetrics[];
  journaledEvents: number;
  memories: number;
  relationshipsByType: Record<string, number>;
}

function toJournalRecord(entry: JournalEntry): JournalRecord {
  return { seq: entry.seq, tick: entry.tick, event: eventToRecord(entry.event) };
}

/** One running simulation plus its event journal, shaped for the API. */
export class SimulationService {
  readonly engine: Engine;
  private readonly journal: SqliteEventJournal;

  constructor(options: SimulationServiceOptions) {
    this.journal = options.journal ?? new SqliteEventJournal();
    this.engine = createScenario({
      domain: options.domain,
      agents: options.agents,
      customers: options.customers,
      config: options.config,
      journal: this.journal,
      memoryPersistence: options.memoryDir ? new JsonFileMemoryPersistence(options.memoryDir) : undefined,
    });
    log.info("Simulation ready", { domain: options.domain, agents: this.engine.agents.size });
  }

  get currentTick(): number {
    return this.engine.tick;
  }

  /** Runs one tick and waits for an async bus to dispatch what it produced. */
  async advanceTick(): Promise<TickResult> {
    const events = this.engine.advanceTick();
    await this.engine.settle();
    return { tick: this.engine.tick, now: this.engine.now.toISOString(), events: events.map(eventToRecord) };
  }

  getState(): EngineState {
    return this.engine.getState();
  }

  getMetrics(): SimulationMetrics {
    const relationshipsByType: Record<string, number> = {};
    for (const rel of this.engine.relationships.getAllRelationships()) {
      relationshipsByType[rel.type] = (relationshipsByType[rel.type] ?? 0) + 1;
    }
    return {
      tick: this.engine.tick,
      bus: this.engine.bus.getMetrics(),
      handlers: this.engine.bus.getHandlerMetrics(),
      journaledEvents: this.journal.count(),
      memories: this.engine.agents.getAllAgents().reduce((n, agent) => n + agent.memory.size, 0),
      relationshipsByType,
    };
  }

  getAgents(type?: string): AgentRecord[] {
    const agents = type !== undefined ? this.engine.agents.getAgentsByType(type) : this.engine.agents.getAllAgents();
    return agents.map((agent) => agent.toRecord());
  }

  getAgent(id: string): AgentRecord | undefined {
    return this.engine.agents.getAgent(id)?.toRecord();
  }

  /** Undefined for an unknown agent. */
  getMemories(agentId: string, query: MemoryQuery, limit?: number): MemoryRecord[] | undefined {
    const agent = this.engine.agents.getAgent(agentId);
    if (!agent) return undefined;
    return agent.memory.retrieveMemories(query, limit).map((item) => item.toRecord());
  }

  getRelationshipsBetween(agentA: string, agentB: string, type?: string): RelationshipRecord[] {
    const { relationships } = this.engine;
    if (type === undefined) return relationships.getRelationshipsBetween(agentA, agentB).map((r) => r.toRecord());
    const rel = relationships.getRelationshipBetween(agentA, agentB, type);
    return rel ? [rel.toRecord()] : [];
  }

  getRelationshipsOf(agentId: string): RelationshipRecord[] {
    return this.engine.relationships.getAgentRelationships(agentId).map((r) => r.toRecord());
  }

  getRelationshipsByType(type: string): RelationshipRecord[] {
    return this.engine.relationships.getRelationshipsByType(type).map((r) => r.toRecord());
  }

  getGraph(centerId: string, depth: number): SocialGraph {
    return socialGraph(this.engine.relationships, centerId, depth);
  }

  /**
   * Journaled events, narrowed by agent (or pair), kind and tick range; the
   * latest `limit` of them, oldest first.
   */
  getEventLog(query: EventLogQuery): JournalRecord[] {
    let entries: JournalEntry[];
    if (query.agentId !== undefined && query.otherAgentId !== undefined) {
      entries = this.journal.getByPair(query.agentId, query.otherAgentId);
    } else if (query.agentId !== undefined) {
      entries = this.journal.getByAgent(query.agentId);
    } else if (query.kind !== undefined) {
      entries = this.journal.getByKind(query.kind);
    } else if (query.fromTick !== undefined || query.toTick !== undefined) {
      entries = this.journal.getByTickRange(query.fromTick ?? 0, query.toTick ?? this.engine.tick);
    } else {
      return this.journal.getRecent(query.limit).map(toJournalRecord);
    }

    const { kind, fromTick, toTick } = query;
    const matching = entries.filter(
      (e) =>
        (kind === undefined || e.event.kind === kind) &&
        (fromTick === undefined || (e.tick !== null && e.tick >= fromTick)) &&
        (toTick === undefined || (e.tick !== null && e.tick <= toTick)),
    );
    return matching.slice(-query.limit).map(toJournalRecord);
  }

  stop(): void {
    this.engine.stop();
    this.journal.close();
  }
}
