import {
  BaseAgent,
  payloadNumber,
  payloadNumberMap,
  payloadString,
  type AgentConfig,
  type PayloadValue,
  type SimulationEvent,
} from "@agora/core";
import type { DomainContext } from "../../domain-registry.js";
import type { Random } from "../../random.js";
import {
  businessDealEvent,
  dealBreachEvent,
  itemListingEvent,
  MARKET_EVENTS,
  negotiationEvent,
  priceChangeEvent,
  tradeEvent,
  type ItemQuantities,
} from "./events.js";
import { adjustInventory, initialPriceBeliefs, ITEM_TYPES, UNKNOWN_ITEM_PRICE, valueOf } from "./items.js";

const DAY_MS = 86_400_000;
const TRADE_HISTORY_LIMIT = 50;

export type TradeRecord = {
  timestamp: string;
  partnerId: string;
  itemsGiven: ItemQuantities;
  itemsReceived: ItemQuantities;
};

export type DealRecord = {
  dealId: string;
  partnerId: string;
  active: boolean;
};

export type MerchantState = {
  inventory: ItemQuantities;
  priceBeliefs: Record<string, number>;
  specialties: string[];
  tradeHistory: TradeRecord[];
  businessDeals: DealRecord[];
  reputation: number;
  profitMargin: number;
  riskTolerance: number;
};

const BASE_IMPORTANCE: Record<string, number> = {
  [MARKET_EVENTS.trade]: 0.6,
  [MARKET_EVENTS.priceChange]: 0.4,
  [MARKET_EVENTS.itemListing]: 0.3,
  [MARKET_EVENTS.negotiation]: 0.5,
  [MARKET_EVENTS.businessDeal]: 0.8,
  [MARKET_EVENTS.dealBreach]: 0.9,
  [MARKET_EVENTS.marketTrend]: 0.7,
};

function stringList(value: PayloadValue | undefined): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((v): v is string => typeof v === "string");
  return items.length > 0 ? items : undefined;
}

/**
 * Buys, sells and lists goods, keeps a belief about every price and learns
 * from what it sees traded. Specialty goods are stocked deeper.
 */
export class MerchantAgent extends BaseAgent<MerchantState> {
  static readonly TYPE = "merchant";
  readonly type = MerchantAgent.TYPE;

  constructor(
    config: AgentConfig,
    private readonly ctx: DomainContext,
  ) {
    super(MerchantAgent.withTraits(config, ctx.random), MerchantAgent.initialState(config, ctx.random));
    for (const kind of Object.values(MARKET_EVENTS)) this.subscribeToEvent(kind);
  }

  private static withTraits(config: AgentConfig, random: Random): AgentConfig {
    return {
      ...config,
      attributes: {
        tradingSkill: random.uniform(0.3, 0.9),
        negotiationSkill: random.uniform(0.3, 0.9),
        marketKnowledge: random.uniform(0.3, 0.9),
        cooldownDays: 1,
        ...config.attributes,
      },
    };
  }

  private static initialState(config: AgentConfig, random: Random): MerchantState {
    const specialties = stringList(config.attributes?.["specialties"]) ?? random.sample(ITEM_TYPES, random.int(2, 4));
    const inventory: ItemQuantities = {};
    for (const item of specialties) inventory[item] = random.int(5, 15);
    const others = ITEM_TYPES.filter((item) => !specialties.includes(item));
    for (const item of random.sample(others, 2)) inventory[item] = random.int(1, 5);
    return {
      inventory,
      priceBeliefs: initialPriceBeliefs(random),
      specialties,
      tradeHistory: [],
      businessDeals: [],
      reputation: random.uniform(0.3, 0.8),
      profitMargin: random.uniform(0.1, 0.3),
      riskTolerance: random.uniform(0.2, 0.8),
    };
  }

  priceOf(item: string): number {
    return this.state.priceBeliefs[item] ?? UNKNOWN_ITEM_PRICE;
  }

  processEvent(event: SimulationEvent): void {
    this.remember(event, { importance: this.eventImportance(event), tags: ["marketplace"] });

    switch (event.kind) {
      case MARKET_EVENTS.trade:
        this.onTrade(event);
        break;
      case MARKET_EVENTS.priceChange:
        this.onPriceChange(event);
        break;
      case MARKET_EVENTS.itemListing:
        this.onItemListing(event);
        break;
      case MARKET_EVENTS.businessDeal:
        this.onBusinessDeal(event);
        break;
      case MARKET_EVENTS.dealBreach:
        this.onDealBreach(event);
        break;
      case MARKET_EVENTS.marketTrend:
        this.onMarketTrend(event);
        break;
    }
  }

  generateAction(now: Date): SimulationEvent | undefined {
    if (!this.readyToAct(now, this.numberAttribute("cooldownDays", 1) * DAY_MS)) return undefined;
    this.markActed(now);

    const { random } = this.ctx;
    const trading = this.numberAttribute("tradingSkill", 0.5);
    const knowledge = this.numberAttribute("marketKnowledge", 0.5);
    const negotiating = this.numberAttribute("negotiationSkill", 0.5);
    const activeDeals = this.state.businessDeals.filter((d) => d.active);

    const action = random.weighted([
      [MARKET_EVENTS.trade, 0.4 * trading],
      [MARKET_EVENTS.priceChange, 0.2 * knowledge],
      [MARKET_EVENTS.itemListing, 0.2 * knowledge],
      [MARKET_EVENTS.negotiation, 0.1 * negotiating],
      [MARKET_EVENTS.businessDeal, 0.1 * negotiating],
      [MARKET_EVENTS.dealBreach, activeDeals.length > 0 ? 0.05 * this.state.riskTolerance : 0],
    ]);

    switch (action) {
      case MARKET_EVENTS.trade:
        return this.offerTrade(now);
      case MARKET_EVENTS.priceChange:
        return this.changePrice(now);
      case MARKET_EVENTS.itemListing:
        return this.listItem(now);
      case MARKET_EVENTS.negotiation:
        return this.negotiate(now);
      case MARKET_EVENTS.businessDeal:
        return this.proposeDeal(now);
      case MARKET_EVENTS.dealBreach:
        return this.breachDeal(now, activeDeals);
      default:
        return undefined;
    }
  }

  // ── Reactions ───────────────────────────────────────────────────────────────

  private eventImportance(event: SimulationEvent): number {
    let importance = BASE_IMPORTANCE[event.kind] ?? 0.5;
    if (event.source === this.id || event.target === this.id) importance += 0.2;
    const items =
      event.kind === MARKET_EVENTS.trade
        ? [...Object.keys(payloadNumberMap(event, "itemsGiven")), ...Object.keys(payloadNumberMap(event, "itemsReceived"))]
        : [payloadString(event, "itemId") ?? ""];
    if (items.some((item) => this.state.specialties.includes(item))) importance += 0.1;
    return Math.min(1, importance);
  }

  private onTrade(event: SimulationEvent): void {
    const given = payloadNumberMap(event, "itemsGiven");
    const received = payloadNumberMap(event, "itemsReceived");
    const isSource = event.source === this.id;
    const isTarget = event.target === this.id;

    if (isSource || isTarget) {
      const mine = isSource ? { gave: given, got: received } : { gave: received, got: given };
      const partnerId = (isSource ? event.target : event.source) ?? "unknown";
      this.state = {
        ...this.state,
        inventory: adjustInventory(adjustInventory(this.state.inventory, mine.gave, -1), mine.got, 1),
        tradeHistory: [
          ...this.state.tradeHistory,
          { timestamp: event.timestamp.toISOString(), partnerId, itemsGiven: mine.gave, itemsReceived: mine.got },
        ].slice(-TRADE_HISTORY_LIMIT),
      };
    }
    this.learnFromTrade(given, received);
  }

  /** Each side of an observed trade implies a unit price for the other side's goods. */
  private learnFromTrade(given: ItemQuantities, received: ItemQuantities): void {
    const givenQty = Object.values(given).reduce((a, b) => a + b, 0);
    const receivedQty = Object.values(received).reduce((a, b) => a + b, 0);
    if (givenQty <= 0 || receivedQty <= 0) return;

    const beliefs = { ...this.state.priceBeliefs };
    const givenValue = valueOf(given, beliefs);
    const receivedValue = valueOf(received, beliefs);
    for (const item of Object.keys(given)) {
      beliefs[item] = 0.8 * (beliefs[item] ?? UNKNOWN_ITEM_PRICE) + 0.2 * (receivedValue / givenQty);
    }
    for (const item of Object.keys(received)) {
      beliefs[item] = 0.8 * (beliefs[item] ?? UNKNOWN_ITEM_PRICE) + 0.2 * (givenValue / receivedQty);
    }
    this.updateState({ priceBeliefs: beliefs });
  }

  private onPriceChange(event: SimulationEvent): void {
    const item = payloadString(event, "itemId");
    const newPrice = payloadNumber(event, "newPrice", Number.NaN);
    if (!item || Number.isNaN(newPrice)) return;
    if (event.source === this.id) {
      this.setBelief(item, newPrice);
      return;
    }
    const trust = 0.3 + 0.4 * this.numberAttribute("marketKnowledge", 0.5);
    this.setBelief(item, (1 - trust) * this.priceOf(item) + trust * newPrice);
  }

  private onItemListing(event: SimulationEvent): void {
    const item = payloadString(event, "itemId");
    const price = payloadNumber(event, "price", Number.NaN);
    if (!item || Number.isNaN(price)) return;
    const trust = 0.2 + 0.3 * this.numberAttribute("marketKnowledge", 0.5);
    this.setBelief(item, (1 - trust) * this.priceOf(item) + trust * price);
  }

  private onBusinessDeal(event: SimulationEvent): void {
    if (event.source !== this.id && event.target !== this.id) return;
    const dealId = payloadString(event, "dealId");
    const partnerId = event.source === this.id ? event.target : event.source;
    if (!dealId || !partnerId) return;
    this.updateState({ businessDeals: [...this.state.businessDeals, { dealId, partnerId, active: true }] });
  }

  /** A severe breach ends the deal; the breaching side loses reputation. */
  private onDealBreach(event: SimulationEvent): void {
    if (event.source !== this.id && event.target !== this.id) return;
    const dealId = payloadString(event, "dealId");
    const severity = payloadNumber(event, "severity", 0.5);
    const deals = this.state.businessDeals.map((d) =>
      d.dealId === dealId && severity > 0.7 ? { ...d, active: false } : d,
    );
    const reputation =
      event.source === this.id ? Math.max(0, this.state.reputation - 0.1 * severity) : this.state.reputation;
    this.updateState({ businessDeals: deals, reputation });
  }

  private onMarketTrend(event: SimulationEvent): void {
    const adjustment = 0.5 + 0.5 * this.numberAttribute("marketKnowledge", 0.5);
    const beliefs = { ...this.state.priceBeliefs };
    for (const [item, impact] of Object.entries(payloadNumberMap(event, "affectedItems"))) {
      const current = beliefs[item];
      if (current === undefined) continue;
      beliefs[item] = Math.max(1, current * (1 + (impact - 1) * adjustment));
    }
    this.updateState({ priceBeliefs: beliefs });
  }

  private setBelief(item: string, price: number): void {
    this.updateState({ priceBeliefs: { ...this.state.priceBeliefs, [item]: price } });
  }

  // ── Actions ─────────────────────────────────────────────────────────────────

  /** Customers first, then fellow merchants. */
  private pickPartner(): string | undefined {
    const { random, peers } = this.ctx;
    return random.pick(peers("customer")) ?? random.pick(peers(MerchantAgent.TYPE).filter((id) => id !== this.id));
  }

  private stockedItems(): string[] {
    return Object.keys(this.state.inventory);
  }

  private offerTrade(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const target = this.pickPartner();
    const offerItem = random.pick(this.stockedItems());
    if (!target || !offerItem) return undefined;

    const offerQty = Math.min(random.int(1, 3), this.state.inventory[offerItem] ?? 0);
    const wanted = Object.keys(this.state.priceBeliefs).filter(
      (item) => !(item in this.state.inventory) || this.state.specialties.includes(item),
    );
    const requestItem = random.pick(wanted.length > 0 ? wanted : Object.keys(this.state.priceBeliefs));
    if (!requestItem || offerQty <= 0) return undefined;

    const desiredValue = offerQty * this.priceOf(offerItem) * (1 + this.state.profitMargin);
    const requestQty = Math.max(1, Math.round(desiredValue / this.priceOf(requestItem)));
    return tradeEvent({
      source: this.id,
      target,
      itemsGiven: { [offerItem]: offerQty },
      itemsReceived: { [requestItem]: requestQty },
      timestamp: now,
    });
  }

  private changePrice(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const item = random.pick(this.stockedItems());
    if (!item) return undefined;
    const oldPrice = this.priceOf(item);
    const factor = random.uniform(-0.1, 0.15) * (0.5 + this.state.riskTolerance);
    return priceChangeEvent({
      source: this.id,
      itemId: item,
      oldPrice,
      newPrice: Math.max(1, oldPrice * (1 + factor)),
      timestamp: now,
    });
  }

  private listItem(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const item = random.pick(this.stockedItems());
    if (!item) return undefined;
    return itemListingEvent({
      source: this.id,
      itemId: item,
      quantity: Math.min(random.int(1, 5), this.state.inventory[item] ?? 0),
      price: this.priceOf(item) * (1 + this.state.profitMargin),
      timestamp: now,
    });
  }

  private negotiate(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const target = this.pickPartner();
    const item = random.pick(this.stockedItems());
    if (!target || !item) return undefined;
    const skill = this.numberAttribute("negotiationSkill", 0.5);
    return negotiationEvent({
      source: this.id,
      target,
      proposal: {
        itemId: item,
        quantity: Math.min(random.int(1, 3), this.state.inventory[item] ?? 0),
        price: this.priceOf(item) * (1.1 + 0.2 * skill),
        flexible: random.chance(skill),
      },
      timestamp: now,
    });
  }

  private proposeDeal(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const target = this.pickPartner();
    const specialties = this.stockedItems().filter((item) => this.state.specialties.includes(item));
    const candidates = specialties.length > 0 ? specialties : this.stockedItems();
    if (!target || candidates.length === 0) return undefined;

    const items: Record<string, PayloadValue> = {};
    for (const item of random.sample(candidates, 2)) {
      items[item] = {
        quantity: Math.min(random.int(1, 3), this.state.inventory[item] ?? 0),
        price: this.priceOf(item) * (1 + this.state.profitMargin) * 0.95,
      };
    }
    return businessDealEvent({
      source: this.id,
      target,
      dealId: `deal_${this.id}_${random.int(1000, 9999)}`,
      terms: {
        duration: random.int(5, 20),
        items,
        exclusivity: random.chance(this.state.reputation * 0.5),
        renewalOption: random.chance(0.3),
      },
      timestamp: now,
    });
  }

  private breachDeal(now: Date, activeDeals: readonly DealRecord[]): SimulationEvent | undefined {
    const { random } = this.ctx;
    const deal = random.pick(activeDeals);
    if (!deal) return undefined;
    return dealBreachEvent({
      source: this.id,
      target: deal.partnerId,
      dealId: deal.dealId,
      breachType: random.pick(["late_delivery", "short_delivery", "price_change"]) ?? "late_delivery",
      severity: random.uniform(0.2, 1),
      timestamp: now,
    });
  }
}
