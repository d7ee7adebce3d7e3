export { createRandom, SeededRandom, type Random } from "./random.js";
export { DomainRegistry, type DomainContext, type DomainDefinition } from "./domain-registry.js";
export {
  DEFAULT_START,
  Engine,
  RELATIONSHIP_PRIORITY,
  type AgentSpec,
  type EngineOptions,
  type EngineState,
  type EventSink,
  type RelationshipSeed,
} from "./engine.js";
export { runRelationshipDecay } from "./systems/relationship-decay.js";
export { runMemoryPrune } from "./systems/memory-prune.js";
export { createScenario, defaultDomains, type ScenarioOptions } from "./scenario.js";

export * from "./domains/marketplace/events.js";
export * from "./domains/marketplace/items.js";
export * from "./domains/marketplace/relationships.js";
export * from "./domains/marketplace/merchant-agent.js";
export * from "./domains/marketplace/customer-agent.js";
export * from "./domains/marketplace/marketplace-domain.js";

export * from "./domains/senate/events.js";
export * from "./domains/senate/topics.js";
export * from "./domains/senate/relationships.js";
export * from "./domains/senate/senator-agent.js";
export * from "./domains/senate/senate-domain.js";
