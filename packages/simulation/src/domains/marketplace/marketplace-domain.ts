import { createLogger, type SimulationEvent, type Unsubscribe } from "@agora/core";
import type { DomainDefinition } from "../../domain-registry.js";
import { RELATIONSHIP_PRIORITY, type AgentSpec, type Engine } from "../../engine.js";
import type { Random } from "../../random.js";
import { CustomerAgent } from "./customer-agent.js";
import { MARKET_EVENTS, marketTrendEvent } from "./events.js";
import { ITEM_TYPES } from "./items.js";
import { MerchantAgent } from "./merchant-agent.js";
import {
  BusinessRelationship,
  competitionTargets,
  CompetitorRelationship,
  SupplierRelationship,
} from "./relationships.js";

const log = createLogger("marketplace");

export const MARKETPLACE_DOMAIN = "marketplace";
export const MARKET_TREND_PROBABILITY = 0.1;

const RISING_TRENDS = ["inflation", "scarcity", "demand_increase"];
const FALLING_TRENDS = ["surplus", "demand_decrease"];

export interface MarketplaceOptions {
  trendProbability?: number;
}

function rollMarketTrend(random: Random, now: Date): SimulationEvent | undefined {
  const trendType = random.pick([...RISING_TRENDS, ...FALLING_TRENDS]);
  if (!trendType) return undefined;
  const rising = RISING_TRENDS.includes(trendType);
  const affectedItems: Record<string, number> = {};
  const count = random.int(1, 3);
  for (let i = 0; i < count; i++) {
    const item = random.pick(ITEM_TYPES);
    if (item) affectedItems[item] = rising ? random.uniform(1.05, 1.3) : random.uniform(0.7, 0.95);
  }
  const impact = Object.values(affectedItems)[0] ?? 1;
  return marketTrendEvent({ trendType, affectedItems, impact, timestamp: now });
}

/**
 * Merchants and customers trading goods. Price moves and listings concern a
 * single merchant, so a tracker hands them to that merchant's competitor edges.
 */
export function marketplaceDomain(options: MarketplaceOptions = {}): DomainDefinition {
  const trendProbability = options.trendProbability ?? MARKET_TREND_PROBABILITY;
  let untrack: Unsubscribe[] = [];

  return {
    name: MARKETPLACE_DOMAIN,

    relationshipTypes: {
      [BusinessRelationship.TYPE]: (init) => new BusinessRelationship(init),
      [CompetitorRelationship.TYPE]: (init) => new CompetitorRelationship(init),
      [SupplierRelationship.TYPE]: (init) => new SupplierRelationship(init),
    },

    registerAgentTypes(factory, ctx) {
      factory.registerAgentType(MerchantAgent.TYPE, (config) => new MerchantAgent(config, ctx));
      factory.registerAgentType(CustomerAgent.TYPE, (config) => new CustomerAgent(config, ctx));
      factory.registerTemplate("specialist", (config) => ({
        ...config,
        attributes: { ...config.attributes, tradingSkill: 0.9, marketKnowledge: 0.8, negotiationSkill: 0.4 },
      }));
      factory.registerTemplate("haggler", (config) => ({
        ...config,
        attributes: { ...config.attributes, bargainingSkill: 0.8, impulsiveness: 0.1 },
      }));
    },

    setup(engine) {
      const competitionTracker = (event: SimulationEvent): void => {
        const competitors = engine.relationships
          .getRelationshipsByType(CompetitorRelationship.TYPE)
          .filter((rel): rel is CompetitorRelationship => rel instanceof CompetitorRelationship);
        for (const rel of competitionTargets(event, competitors)) rel.update(event);
      };
      untrack = [MARKET_EVENTS.priceChange, MARKET_EVENTS.itemListing, MARKET_EVENTS.marketTrend].map((kind) =>
        engine.bus.subscribe(kind, competitionTracker, RELATIONSHIP_PRIORITY),
      );
    },

    teardown() {
      for (const unsubscribe of untrack) unsubscribe();
      untrack = [];
    },

    onTick(engine, now) {
      if (!engine.random.chance(trendProbability)) return [];
      const trend = rollMarketTrend(engine.random, now);
      return trend ? [trend] : [];
    },
  };
}

export function marketplaceRoster(merchants: number, customers: number): AgentSpec[] {
  const specs: AgentSpec[] = [];
  for (let i = 1; i <= merchants; i++) specs.push({ type: MerchantAgent.TYPE, id: `merchant-${i}`, name: `Merchant ${i}` });
  for (let i = 1; i <= customers; i++) specs.push({ type: CustomerAgent.TYPE, id: `customer-${i}`, name: `Customer ${i}` });
  return specs;
}

/**
 * Links the loaded agents: merchants sharing specialties compete over them,
 * and every customer starts with a business tie to each merchant.
 */
export function seedMarketplace(engine: Engine): number {
  const { random, relationships } = engine;
  const merchants = engine.agents
    .getAgentsByType(MerchantAgent.TYPE)
    .filter((a): a is MerchantAgent => a instanceof MerchantAgent);
  const customers = engine.agents.getAgentsByType(CustomerAgent.TYPE);
  let created = 0;

  for (let i = 0; i < merchants.length; i++) {
    for (let j = i + 1; j < merchants.length; j++) {
      const a = merchants[i];
      const b = merchants[j];
      if (!a || !b) continue;
      const shared = a.getState().specialties.filter((item) => b.getState().specialties.includes(item));
      if (shared.length === 0 || relationships.getRelationshipBetween(a.id, b.id, CompetitorRelationship.TYPE)) continue;
      relationships.createRelationship(a.id, b.id, CompetitorRelationship.TYPE, random.uniform(-0.5, -0.1), {
        competingItems: shared,
      });
      created++;
    }
  }
  for (const customer of customers) {
    for (const merchant of merchants) {
      if (relationships.getRelationshipBetween(customer.id, merchant.id, BusinessRelationship.TYPE)) continue;
      relationships.createRelationship(customer.id, merchant.id, BusinessRelationship.TYPE, random.uniform(0.1, 0.5));
      created++;
    }
  }
  log.info("Marketplace relationships seeded", { created });
  return created;
}
