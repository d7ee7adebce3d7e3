import { ConfigurationError } from "@agora/core";
import { DomainRegistry } from "./domain-registry.js";
import { Engine, type EngineOptions } from "./engine.js";
import {
  MARKETPLACE_DOMAIN,
  marketplaceDomain,
  marketplaceRoster,
  seedMarketplace,
} from "./domains/marketplace/marketplace-domain.js";
import { SENATE_DOMAIN, senateDomain, senateRoster, seedSenate } from "./domains/senate/senate-domain.js";

/** A registry holding both bundled domains. */
export function defaultDomains(): DomainRegistry {
  return new DomainRegistry().register(marketplaceDomain()).register(senateDomain());
}

export interface ScenarioOptions extends EngineOptions {
  domain: string;
  /** Senators, or merchants for the marketplace. */
  agents?: number;
  /** Marketplace only. */
  customers?: number;
  registry?: DomainRegistry;
}

/** An engine with the domain installed, its roster loaded and relationships seeded. */
export function createScenario(options: ScenarioOptions): Engine {
  const registry = options.registry ?? defaultDomains();
  const engine = new Engine(options);
  registry.initialize(options.domain, engine);

  switch (options.domain) {
    case MARKETPLACE_DOMAIN:
      engine.loadAgents(marketplaceRoster(options.agents ?? 4, options.customers ?? 6));
      seedMarketplace(engine);
      break;
    case SENATE_DOMAIN:
      engine.loadAgents(senateRoster(options.agents ?? 9));
      seedSenate(engine);
      break;
    default:
      throw new ConfigurationError(`No roster for domain "${options.domain}"`);
  }
  return engine;
}
