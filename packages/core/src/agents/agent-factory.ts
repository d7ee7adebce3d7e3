import { ConfigurationError } from "../errors.js";
import type { AgentConfig, BaseAgent } from "./base-agent.js";

export type AgentConstructor = (config: AgentConfig) => BaseAgent;

/** Adjusts a config before construction, e.g. to preset traits for an archetype. */
export type AgentTemplate = (config: AgentConfig) => AgentConfig;

export class AgentFactory {
  private readonly types = new Map<string, AgentConstructor>();
  private readonly templates = new Map<string, AgentTemplate>();

  registerAgentType(name: string, ctor: AgentConstructor): void {
    if (this.types.has(name)) throw new ConfigurationError(`Agent type "${name}" is already registered`);
    this.types.set(name, ctor);
  }

  registerTemplate(name: string, template: AgentTemplate): void {
    if (this.templates.has(name)) throw new ConfigurationError(`Agent template "${name}" is already registered`);
    this.templates.set(name, template);
  }

  createAgent(type: string, config: AgentConfig, template?: string): BaseAgent {
    const ctor = this.types.get(type);
    if (!ctor) throw new ConfigurationError(`Unknown agent type "${type}"`);

    let resolved = config;
    if (template !== undefined) {
      const transform = this.templates.get(template);
      if (!transform) throw new ConfigurationError(`Unknown agent template "${template}"`);
      resolved = transform({ ...config, attributes: { ...(config.attributes ?? {}) } });
    }
    return ctor(resolved);
  }

  getRegisteredTypes(): string[] {
    return [...this.types.keys()];
  }

  getRegisteredTemplates(): string[] {
    return [...this.templates.keys()];
  }
}
