import {
  ConfigurationError,
  createLogger,
  type AgentFactory,
  type RelationshipConstructor,
  type RelationshipManager,
  type SimulationEvent,
} from "@agora/core";
import type { Random } from "./random.js";
import type { Engine } from "./engine.js";

const log = createLogger("domains");

/** What a domain's agents may reach at construction time. */
export interface DomainContext {
  random: Random;
  relationships: RelationshipManager;
  /** Ids of the live agents of `type`, in insertion order. */
  peers(type: string): string[];
}

export interface DomainDefinition {
  name: string;
  registerAgentTypes(factory: AgentFactory, ctx: DomainContext): void;
  relationshipTypes: Readonly<Record<string, RelationshipConstructor>>;
  /** Per-day decay rates for this domain's relationship types; config overrides them. */
  decayPerDay?: Readonly<Record<string, number>>;
  setup?(engine: Engine): void;
  /** Domain-level events for the tick, published after the agents' own. */
  onTick?(engine: Engine, now: Date): SimulationEvent[];
  teardown?(engine: Engine): void;
}

/**
 * Known domains, passed explicitly to whoever builds an engine. An engine
 * initialises at most one domain from it.
 */
export class DomainRegistry {
  private readonly domains = new Map<string, DomainDefinition>();

  register(domain: DomainDefinition): this {
    if (this.domains.has(domain.name)) {
      throw new ConfigurationError(`Domain "${domain.name}" is already registered`);
    }
    this.domains.set(domain.name, domain);
    return this;
  }

  unregister(name: string): boolean {
    return this.domains.delete(name);
  }

  has(name: string): boolean {
    return this.domains.has(name);
  }

  get(name: string): DomainDefinition | undefined {
    return this.domains.get(name);
  }

  list(): string[] {
    return [...this.domains.keys()].sort();
  }

  /** Installs the domain's agent and relationship types into `engine` and runs its setup. */
  initialize(name: string, engine: Engine): DomainDefinition {
    const domain = this.domains.get(name);
    if (!domain) throw new ConfigurationError(`Unknown domain "${name}"`);
    engine.installDomain(domain);
    domain.setup?.(engine);
    log.info("Domain initialized", { domain: name });
    return domain;
  }

  teardown(name: string, engine: Engine): boolean {
    const domain = this.domains.get(name);
    if (!domain) return false;
    domain.teardown?.(engine);
    log.info("Domain torn down", { domain: name });
    return true;
  }

  clear(): void {
    this.domains.clear();
  }
}
