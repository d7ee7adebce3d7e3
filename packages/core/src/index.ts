export * from "./errors.js";
export * from "./config.js";
export * from "./logging/logger.js";

export * from "./events/types.js";
export * from "./events/event.js";
export * from "./events/event-bus.js";

export * from "./memory/types.js";
export * from "./memory/text.js";
export * from "./memory/memory-item.js";
export * from "./memory/memory-index.js";
export * from "./memory/memory-store.js";
export * from "./memory/persistence.js";

export * from "./relationships/relationship.js";
export * from "./relationships/registry.js";
export * from "./relationships/relationship-manager.js";
export * from "./relationships/social-graph.js";

export * from "./agents/base-agent.js";
export * from "./agents/agent-factory.js";
export * from "./agents/agent-manager.js";
