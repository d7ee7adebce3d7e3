import {
  AgentFactory,
  AgentManager,
  CONFIG_DEFAULT,
  ConfigurationError,
  createLogger,
  EventBus,
  MemoryStore,
  RelationshipManager,
  RelationshipTypeRegistry,
  type AgoraConfig,
  type BaseAgent,
  type MemoryPersistence,
  type PayloadValue,
  type Relationship,
  type RelationshipRecord,
  type SimulationEvent,
} from "@agora/core";
import type { DomainContext, DomainDefinition } from "./domain-registry.js";
import { createRandom, type Random } from "./random.js";
import { runRelationshipDecay } from "./systems/relationship-decay.js";
import { runMemoryPrune } from "./systems/memory-prune.js";

const log = createLogger("engine");

const DAY_MS = 86_400_000;
export const DEFAULT_START = new Date("2000-01-01T00:00:00.000Z");

/** Relationship maintenance runs ahead of agents so they react to updated edges. */
export const RELATIONSHIP_PRIORITY = 10;

export interface AgentSpec {
  type: string;
  id: string;
  name?: string;
  template?: string;
  attributes?: Record<string, PayloadValue>;
  subscriptions?: string[];
}

export interface RelationshipSeed {
  agentA: string;
  agentB: string;
  type: string;
  strength?: number;
  attributes?: Record<string, PayloadValue>;
}

/** Anything that records the event stream, such as the SQLite journal. */
export interface EventSink {
  attachTo(bus: EventBus): void;
  setTick(tick: number | null): void;
  detach(): void;
}

export interface EngineOptions {
  config?: AgoraConfig;
  start?: Date;
  journal?: EventSink;
  memoryPersistence?: MemoryPersistence;
}

export interface EngineState {
  tick: number;
  now: string;
  domain: string | null;
  agents: number;
  relationships: number;
  queueLength: number;
}

export class Engine {
  readonly config: AgoraConfig;
  readonly bus: EventBus;
  readonly relationships: RelationshipManager;
  readonly factory = new AgentFactory();
  readonly agents = new AgentManager();
  readonly random: Random;

  private readonly journal: EventSink | undefined;
  private readonly memoryPersistence: MemoryPersistence | undefined;
  private readonly registry = new RelationshipTypeRegistry();
  private decayRates: Record<string, number>;
  private domain: DomainDefinition | undefined;
  private clock: number;
  private _tick = 0;

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? CONFIG_DEFAULT;
    this.clock = (options.start ?? DEFAULT_START).getTime();
    this.random = createRandom(this.config.simulation.seed);
    this.bus = new EventBus({ ...this.config.bus });
    this.relationships = new RelationshipManager({ registry: this.registry });
    this.relationships.attachTo(this.bus, RELATIONSHIP_PRIORITY);
    this.decayRates = { ...this.config.relationships.decayPerDay };
    this.memoryPersistence = options.memoryPersistence;
    this.journal = options.journal;
    this.journal?.attachTo(this.bus);
  }

  get tick(): number {
    return this._tick;
  }

  get now(): Date {
    return new Date(this.clock);
  }

  get domainName(): string | undefined {
    return this.domain?.name;
  }

  /** Called through DomainRegistry.initialize. One domain per engine. */
  installDomain(domain: DomainDefinition): void {
    if (this.domain) {
      throw new ConfigurationError(`Engine already runs domain "${this.domain.name}"`);
    }
    for (const [type, ctor] of Object.entries(domain.relationshipTypes)) this.registry.register(type, ctor);
    domain.registerAgentTypes(this.factory, this.context());
    this.decayRates = { ...(domain.decayPerDay ?? {}), ...this.config.relationships.decayPerDay };
    this.domain = domain;
  }

  getDecayRates(): Record<string, number> {
    return { ...this.decayRates };
  }

  loadAgents(specs: readonly AgentSpec[]): BaseAgent[] {
    const loaded: BaseAgent[] = [];
    for (const spec of specs) {
      const memory = new MemoryStore(spec.id, {
        persistence: this.memoryPersistence,
        autoSave: this.config.memory.autoSave,
        index: this.config.memory.indexed,
      });
      const agent = this.factory.createAgent(
        spec.type,
        {
          id: spec.id,
          name: spec.name,
          attributes: spec.attributes,
          subscriptions: spec.subscriptions,
          memory,
          memoryDefaults: {
            importance: this.config.memory.defaultImportance,
            decayRate: this.config.memory.defaultDecayRate,
          },
        },
        spec.template,
      );
      this.agents.addAgent(agent);
      agent.attachTo(this.bus);
      loaded.push(agent);
    }
    log.info("Agents loaded", { count: loaded.length, total: this.agents.size });
    return loaded;
  }

  loadRelationships(seeds: readonly RelationshipSeed[]): Relationship[] {
    return seeds.map((s) => this.relationships.createRelationship(s.agentA, s.agentB, s.type, s.strength, s.attributes));
  }

  publish(event: SimulationEvent): boolean {
    return this.bus.publish(event);
  }

  /**
   * One step: the clock moves `daysPerTick` days, every agent may act, the
   * domain may add its own events, all of them are published, then the
   * periodic decay and pruning passes run.
   */
  advanceTick(): SimulationEvent[] {
    const { daysPerTick, decayEvery, pruneEvery } = this.config.simulation;
    this._tick++;
    this.clock += daysPerTick * DAY_MS;
    const now = this.now;
    this.journal?.setTick(this._tick);

    const events = this.agents.updateAll(now);
    events.push(...(this.domain?.onTick?.(this, now) ?? []));
    for (const event of events) this.bus.publish(event);

    if (decayEvery > 0 && this._tick % decayEvery === 0) {
      runRelationshipDecay(this.relationships, daysPerTick * decayEvery, this.decayRates, now);
    }
    if (pruneEvery > 0 && this._tick % pruneEvery === 0) {
      runMemoryPrune(this.agents.getAllAgents(), this.config.memory.pruneThreshold, now);
    }

    log.debug("Tick complete", { tick: this._tick, events: events.length });
    return events;
  }

  runTicks(count: number): SimulationEvent[] {
    const all: SimulationEvent[] = [];
    for (let i = 0; i < count; i++) all.push(...this.advanceTick());
    return all;
  }

  /** Resolves once an async bus has dispatched everything queued so far. */
  settle(): Promise<void> {
    return this.bus.drain();
  }

  getRelationships(): RelationshipRecord[] {
    return this.relationships.toRecords();
  }

  getState(): EngineState {
    return {
      tick: this._tick,
      now: this.now.toISOString(),
      domain: this.domain?.name ?? null,
      agents: this.agents.size,
      relationships: this.relationships.size,
      queueLength: this.bus.queueLength,
    };
  }

  /** Drains the bus, detaches the journal and saves every agent's memories. */
  stop(): void {
    this.bus.stop();
    this.journal?.detach();
    this.relationships.detach();
    if (this.memoryPersistence) {
      for (const agent of this.agents.getAllAgents()) agent.memory.save();
    }
    log.info("Engine stopped", { tick: this._tick });
  }

  private context(): DomainContext {
    return {
      random: this.random,
      relationships: this.relationships,
      peers: (type) => this.agents.getAgentsByType(type).map((a) => a.id),
    };
  }
}
