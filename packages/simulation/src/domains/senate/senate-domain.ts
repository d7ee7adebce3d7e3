import { createLogger, SimpleRelationship } from "@agora/core";
import type { DomainDefinition } from "../../domain-registry.js";
import type { AgentSpec, Engine } from "../../engine.js";
import { agendaEvent } from "./events.js";
import { PERSONAL, PersonalRelationship, POLITICAL, PoliticalRelationship, SENATE_DECAY_PER_DAY } from "./relationships.js";
import { SenatorAgent } from "./senator-agent.js";
import { FACTIONS, TOPIC_IDS } from "./topics.js";

const log = createLogger("senate");

export const SENATE_DOMAIN = "senate";

export interface SenateOptions {
  /** Ticks between agenda items; the first is tabled on tick 1. */
  agendaEvery?: number;
}

/** Senators debating a rolling agenda of topics. */
export function senateDomain(options: SenateOptions = {}): DomainDefinition {
  const agendaEvery = Math.max(1, options.agendaEvery ?? 5);

  return {
    name: SENATE_DOMAIN,

    relationshipTypes: {
      [POLITICAL]: (init) => new PoliticalRelationship(init),
      [PERSONAL]: (init) => new PersonalRelationship(init),
      mentor: (init) => new SimpleRelationship(init),
      rival: (init) => new SimpleRelationship(init),
      family: (init) => new SimpleRelationship(init),
    },

    decayPerDay: SENATE_DECAY_PER_DAY,

    registerAgentTypes(factory, ctx) {
      factory.registerAgentType(SenatorAgent.TYPE, (config) => new SenatorAgent(config, ctx));
      factory.registerTemplate("orator", (config) => ({
        ...config,
        attributes: { ...config.attributes, eloquence: 0.9, stubbornness: 0.6 },
      }));
      factory.registerTemplate("firebrand", (config) => ({
        ...config,
        attributes: { ...config.attributes, temperament: 0.9, stubbornness: 0.8 },
      }));
    },

    onTick(engine, now) {
      if (engine.tick !== 1 && engine.tick % agendaEvery !== 0) return [];
      const topic = engine.random.pick(TOPIC_IDS);
      if (!topic) return [];
      log.debug("Agenda tabled", { tick: engine.tick, topic });
      return [agendaEvent({ topic, timestamp: now })];
    },
  };
}

/** Senators spread across the factions in turn. */
export function senateRoster(count: number): AgentSpec[] {
  const specs: AgentSpec[] = [];
  for (let i = 1; i <= count; i++) {
    const faction = FACTIONS[(i - 1) % FACTIONS.length] ?? "moderates";
    specs.push({ type: SenatorAgent.TYPE, id: `senator-${i}`, name: `Senator ${i}`, attributes: { faction } });
  }
  return specs;
}

/**
 * Gives every pair of senators a political tie, warm within a faction and
 * cool across, and a personal tie of mild random regard.
 */
export function seedSenate(engine: Engine): number {
  const { random, relationships } = engine;
  const senators = engine.agents
    .getAgentsByType(SenatorAgent.TYPE)
    .filter((a): a is SenatorAgent => a instanceof SenatorAgent);
  let created = 0;

  for (let i = 0; i < senators.length; i++) {
    for (let j = i + 1; j < senators.length; j++) {
      const a = senators[i];
      const b = senators[j];
      if (!a || !b) continue;
      if (!relationships.getRelationshipBetween(a.id, b.id, POLITICAL)) {
        const base = a.faction === b.faction ? 0.3 : -0.1;
        relationships.createRelationship(a.id, b.id, POLITICAL, base + random.uniform(-0.1, 0.1));
        created++;
      }
      if (!relationships.getRelationshipBetween(a.id, b.id, PERSONAL)) {
        relationships.createRelationship(a.id, b.id, PERSONAL, random.uniform(-0.2, 0.3));
        created++;
      }
    }
  }
  log.info("Senate relationships seeded", { created });
  return created;
}
