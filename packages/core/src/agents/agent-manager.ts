import { ConfigurationError } from "../errors.js";
import type { SimulationEvent } from "../events/types.js";
import { createLogger, describeError } from "../logging/logger.js";
import type { BaseAgent } from "./base-agent.js";

const log = createLogger("agents");

export class AgentManager {
  private readonly agents = new Map<string, BaseAgent>();

  get size(): number {
    return this.agents.size;
  }

  addAgent(agent: BaseAgent): void {
    if (this.agents.has(agent.id)) throw new ConfigurationError(`Agent "${agent.id}" already exists`);
    this.agents.set(agent.id, agent);
  }

  /** Detaches the agent from its bus; its memories stay with the agent object. */
  removeAgent(id: string): boolean {
    const agent = this.agents.get(id);
    if (!agent) return false;
    agent.detach();
    return this.agents.delete(id);
  }

  getAgent(id: string): BaseAgent | undefined {
    return this.agents.get(id);
  }

  getAllAgents(): BaseAgent[] {
    return [...this.agents.values()];
  }

  getAgentsByType(type: string): BaseAgent[] {
    return this.getAllAgents().filter((a) => a.type === type);
  }

  /**
   * Asks every agent for its next action, in insertion order. An agent that
   * throws is logged and skipped for this tick.
   */
  updateAll(now: Date = new Date()): SimulationEvent[] {
    const events: SimulationEvent[] = [];
    for (const agent of this.agents.values()) {
      try {
        const action = agent.generateAction(now);
        if (action) events.push(action);
      } catch (err) {
        log.error("Agent action failed", { agentId: agent.id, type: agent.type, error: describeError(err) });
      }
    }
    return events;
  }

  clear(): void {
    for (const agent of this.agents.values()) agent.detach();
    this.agents.clear();
  }
}
