import {
  involvedAgents,
  payloadNumber,
  payloadNumberMap,
  payloadRecord,
  payloadString,
  relationshipImpact,
  Relationship,
  type RelationshipInit,
  type SimulationEvent,
} from "@agora/core";
import { MARKET_EVENTS } from "./events.js";

const DAY_MS = 86_400_000;

const clampUnit = (v: number): number => Math.max(0, Math.min(1, v));
const sum = (m: Record<string, number>): number => Object.values(m).reduce((a, b) => a + b, 0);

/**
 * Regular trading partners. Trades, negotiations and deals strengthen it,
 * breaches weaken it; trust follows strength at its own pace.
 */
export class BusinessRelationship extends Relationship {
  static readonly TYPE = "business";
  static readonly DEFAULT_STRENGTH = 0.3;

  constructor(init: RelationshipInit) {
    const strength = init.strength ?? BusinessRelationship.DEFAULT_STRENGTH;
    super({
      ...init,
      strength,
      attributes: {
        transactionCount: 0,
        averageTransactionValue: 0,
        lastTransactionTime: null,
        trustLevel: strength * 0.5 + 0.5,
        relationshipAge: 0,
        activeDeals: [],
        ...init.attributes,
      },
    });
  }

  get trustLevel(): number {
    return this.numberAttribute("trustLevel", 0.5);
  }

  update(event: SimulationEvent): boolean {
    if (!this.isRelevant(event)) return false;

    let updated = false;
    switch (event.kind) {
      case MARKET_EVENTS.trade:
        updated = this.onTrade(event);
        break;
      case MARKET_EVENTS.negotiation:
        this.updateStrength(relationshipImpact(event, 0.02), "Negotiation", event.timestamp);
        updated = true;
        break;
      case MARKET_EVENTS.businessDeal:
        updated = this.onDeal(event);
        break;
      case MARKET_EVENTS.dealBreach:
        updated = this.onBreach(event);
        break;
    }

    const age = this.numberAttribute("relationshipAge", 0) + 1;
    this.setAttribute("relationshipAge", age);
    if (age % 10 === 0) {
      this.updateStrength(-0.01, "Natural relationship decay", event.timestamp);
      updated = true;
    }
    return updated;
  }

  private onTrade(event: SimulationEvent): boolean {
    const value = sum(payloadNumberMap(event, "itemsGiven")) + sum(payloadNumberMap(event, "itemsReceived"));
    const count = this.numberAttribute("transactionCount", 0) + 1;
    const average = this.numberAttribute("averageTransactionValue", 0);
    this.setAttribute("transactionCount", count);
    this.setAttribute("averageTransactionValue", ((count - 1) * average + value) / count);
    this.setAttribute("lastTransactionTime", event.timestamp.toISOString());

    const impact = relationshipImpact(event, 0.05);
    this.updateStrength(impact, "Successful trade", event.timestamp);
    this.adjustTrust(impact * 0.5);
    return true;
  }

  private onDeal(event: SimulationEvent): boolean {
    const impact = relationshipImpact(event, 0.15);
    this.updateStrength(impact, "Business deal established", event.timestamp);
    this.adjustTrust(impact * 0.7);
    const dealId = payloadString(event, "dealId");
    if (dealId) this.setAttribute("activeDeals", [...this.stringListAttribute("activeDeals"), dealId]);
    return true;
  }

  private onBreach(event: SimulationEvent): boolean {
    const severity = payloadNumber(event, "severity", 0.5);
    const impact = relationshipImpact(event, -0.2 * severity);
    this.updateStrength(impact, "Deal breach", event.timestamp);
    this.adjustTrust(impact * 1.5);
    const dealId = payloadString(event, "dealId");
    if (dealId) this.setAttribute("activeDeals", this.stringListAttribute("activeDeals").filter((d) => d !== dealId));
    return true;
  }

  private adjustTrust(delta: number): void {
    this.setAttribute("trustLevel", clampUnit(this.trustLevel + delta));
  }
}

/**
 * Merchants selling the same goods. Price cuts escalate a price war; outside
 * the band [-0.7, -0.1] strength drifts 0.02 back toward it every 15 updates.
 */
export class CompetitorRelationship extends Relationship {
  static readonly TYPE = "competitor";
  static readonly DEFAULT_STRENGTH = -0.3;

  constructor(init: RelationshipInit) {
    super({
      ...init,
      strength: init.strength ?? CompetitorRelationship.DEFAULT_STRENGTH,
      attributes: {
        competingItems: [],
        marketShareDifference: 0,
        priceWarIntensity: 0,
        lastPriceChangeTime: null,
        relationshipAge: 0,
        ...init.attributes,
      },
    });
  }

  get competingItems(): string[] {
    return this.stringListAttribute("competingItems");
  }

  get priceWarIntensity(): number {
    return this.numberAttribute("priceWarIntensity", 0);
  }

  /**
   * Pairwise events between the two, any listing by either, a price move by
   * either on a contested item, and any market trend.
   */
  concerns(event: SimulationEvent): boolean {
    if (this.isRelevant(event)) return true;
    if (event.kind === MARKET_EVENTS.marketTrend) return true;
    const bySide = event.source !== undefined && this.involves(event.source);
    if (event.kind === MARKET_EVENTS.itemListing) return bySide;
    if (event.kind === MARKET_EVENTS.priceChange) {
      const itemId = payloadString(event, "itemId");
      return bySide && itemId !== undefined && this.competingItems.includes(itemId);
    }
    return false;
  }

  update(event: SimulationEvent): boolean {
    if (!this.concerns(event)) return false;

    let updated = false;
    switch (event.kind) {
      case MARKET_EVENTS.priceChange:
        updated = this.onPriceChange(event);
        break;
      case MARKET_EVENTS.itemListing:
        updated = this.onItemListing(event);
        break;
      case MARKET_EVENTS.marketTrend:
        updated = this.onMarketTrend(event);
        break;
    }

    const age = this.numberAttribute("relationshipAge", 0) + 1;
    this.setAttribute("relationshipAge", age);
    if (age % 15 === 0) {
      if (this.strength < -0.7) {
        this.updateStrength(0.02, "Competition normalization", event.timestamp);
        updated = true;
      } else if (this.strength > -0.1) {
        this.updateStrength(-0.02, "Competition normalization", event.timestamp);
        updated = true;
      }
    }
    return updated;
  }

  private addCompetingItem(itemId: string): boolean {
    const items = this.competingItems;
    if (items.includes(itemId)) return false;
    this.setAttribute("competingItems", [...items, itemId]);
    return true;
  }

  private onPriceChange(event: SimulationEvent): boolean {
    const itemId = payloadString(event, "itemId");
    const oldPrice = payloadNumber(event, "oldPrice", 0);
    const newPrice = payloadNumber(event, "newPrice", oldPrice);
    if (itemId) this.addCompetingItem(itemId);
    this.setAttribute("lastPriceChangeTime", event.timestamp.toISOString());

    if (newPrice < oldPrice && oldPrice > 0) {
      const decrease = (oldPrice - newPrice) / oldPrice;
      if (decrease > 0.05) {
        const escalation = decrease * 2;
        this.setAttribute("priceWarIntensity", Math.min(1, this.priceWarIntensity + escalation));
        this.updateStrength(-0.05 * escalation, "Price war escalation", event.timestamp);
        return true;
      }
    }
    if (newPrice > oldPrice) {
      this.setAttribute("priceWarIntensity", Math.max(0, this.priceWarIntensity - 0.1));
      this.updateStrength(0.01, "Price war de-escalation", event.timestamp);
    }
    return true;
  }

  private onItemListing(event: SimulationEvent): boolean {
    const itemId = payloadString(event, "itemId");
    if (!itemId || !this.addCompetingItem(itemId)) return false;
    this.updateStrength(-0.02, "New competing item", event.timestamp);
    return true;
  }

  private onMarketTrend(event: SimulationEvent): boolean {
    const impact = payloadNumber(event, "impact", 1);
    const trend = payloadString(event, "trendType") ?? "unknown";
    if (impact < 1) {
      this.updateStrength(-(1 - impact) * 0.2, `Market contraction: ${trend}`, event.timestamp);
      return true;
    }
    if (impact > 1) {
      this.updateStrength((impact - 1) * 0.1, `Market expansion: ${trend}`, event.timestamp);
      return true;
    }
    return false;
  }
}

/**
 * A directed supply line. The supplier is the first agent given at creation;
 * since the edge stores its agents sorted, the roles live in attributes.
 */
export class SupplierRelationship extends Relationship {
  static readonly TYPE = "supplier";
  static readonly DEFAULT_STRENGTH = 0.4;
  /** Without a delivery for this long, reliability slips at the periodic check. */
  static readonly STALE_DELIVERY_MS = 30 * DAY_MS;

  constructor(init: RelationshipInit) {
    super({
      ...init,
      strength: init.strength ?? SupplierRelationship.DEFAULT_STRENGTH,
      attributes: {
        supplierId: init.agentA,
        customerId: init.agentB,
        suppliedItems: {},
        reliability: 0.7,
        deliveryQuality: 0.7,
        lastDeliveryTime: null,
        relationshipAge: 0,
        activeDeals: [],
        ...init.attributes,
      },
    });
  }

  get supplierId(): string {
    const v = this.getAttribute("supplierId");
    return typeof v === "string" ? v : this.agentA;
  }

  get customerId(): string {
    const v = this.getAttribute("customerId");
    return typeof v === "string" ? v : this.agentB;
  }

  get reliability(): number {
    return this.numberAttribute("reliability", 0.7);
  }

  update(event: SimulationEvent): boolean {
    if (!this.isRelevant(event)) return false;

    let updated = false;
    switch (event.kind) {
      case MARKET_EVENTS.trade:
        updated = this.onTrade(event);
        break;
      case MARKET_EVENTS.businessDeal:
        updated = this.onDeal(event);
        break;
      case MARKET_EVENTS.dealBreach:
        updated = this.onBreach(event);
        break;
    }

    const age = this.numberAttribute("relationshipAge", 0) + 1;
    this.setAttribute("relationshipAge", age);
    if (age % 10 === 0) {
      this.updateStrength(-0.02, "Natural relationship decay", event.timestamp);
      const last = this.getAttribute("lastDeliveryTime");
      const stale =
        typeof last !== "string" ||
        event.timestamp.getTime() - new Date(last).getTime() > SupplierRelationship.STALE_DELIVERY_MS;
      if (stale) {
        this.setAttribute("reliability", Math.max(0, this.reliability - 0.05));
        this.setAttribute("deliveryQuality", Math.max(0, this.numberAttribute("deliveryQuality", 0.7) - 0.03));
      }
      updated = true;
    }
    return updated;
  }

  private onTrade(event: SimulationEvent): boolean {
    if (event.source === this.supplierId && event.target === this.customerId) {
      const supplied = this.numberMapAttribute("suppliedItems");
      for (const [item, qty] of Object.entries(payloadNumberMap(event, "itemsGiven"))) {
        supplied[item] = (supplied[item] ?? 0) + qty;
      }
      this.setAttribute("suppliedItems", supplied);
      this.setAttribute("lastDeliveryTime", event.timestamp.toISOString());
      this.updateStrength(relationshipImpact(event, 0.05), "Successful delivery", event.timestamp);
      this.setAttribute("reliability", Math.min(1, this.reliability + 0.02));
      return true;
    }
    if (event.source === this.customerId && event.target === this.supplierId) {
      this.updateStrength(relationshipImpact(event, 0.02), "Customer payment", event.timestamp);
      return true;
    }
    return false;
  }

  private onDeal(event: SimulationEvent): boolean {
    this.updateStrength(relationshipImpact(event, 0.15), "Supply agreement established", event.timestamp);
    const dealId = payloadString(event, "dealId");
    if (dealId) {
      this.setAttribute("activeDeals", [...this.stringListAttribute("activeDeals"), dealId]);
      const terms = payloadRecord(event, "terms");
      const items = terms["items"];
      if (items !== null && typeof items === "object" && !Array.isArray(items)) {
        const supplied = this.numberMapAttribute("suppliedItems");
        for (const item of Object.keys(items)) supplied[item] = supplied[item] ?? 0;
        this.setAttribute("suppliedItems", supplied);
      }
    }
    return true;
  }

  private onBreach(event: SimulationEvent): boolean {
    const severity = payloadNumber(event, "severity", 0.5);
    const impact = relationshipImpact(event, -0.2 * severity);
    if (event.source === this.supplierId) {
      this.setAttribute("reliability", Math.max(0, this.reliability - 0.1 * severity));
      this.updateStrength(impact * 1.5, "Supplier breach of contract", event.timestamp);
    } else {
      this.updateStrength(impact, "Customer breach of contract", event.timestamp);
    }
    const dealId = payloadString(event, "dealId");
    if (dealId) this.setAttribute("activeDeals", this.stringListAttribute("activeDeals").filter((d) => d !== dealId));
    return true;
  }
}

/** Offers single-agent market events to the competitor edges of their source. */
export function competitionTargets(event: SimulationEvent, competitors: readonly CompetitorRelationship[]): CompetitorRelationship[] {
  if (involvedAgents(event).length >= 2) return [];
  return competitors.filter((rel) => rel.concerns(event));
}
