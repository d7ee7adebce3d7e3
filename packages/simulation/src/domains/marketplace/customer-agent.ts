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
import { businessDealEvent, MARKET_EVENTS, negotiationEvent, tradeEvent, type ItemQuantities } from "./events.js";
import { adjustInventory, CONSUMER_GOODS, CURRENCY_ITEMS, referencePrice } from "./items.js";
import type { DealRecord, TradeRecord } from "./merchant-agent.js";

const DAY_MS = 86_400_000;
const PURCHASE_HISTORY_LIMIT = 50;

export type MerchantOpinion = {
  trust: number;
  satisfaction: number;
  transactionCount: number;
  lastTransaction: string | null;
};

export type CustomerState = {
  inventory: ItemQuantities;
  budget: number;
  /** Item → priority in [0, 1]. */
  needs: Record<string, number>;
  preferredMerchants: Record<string, string[]>;
  merchantOpinions: Record<string, MerchantOpinion>;
  purchaseHistory: TradeRecord[];
  businessDeals: DealRecord[];
  satisfaction: number;
  priceSensitivity: number;
};

const BASE_IMPORTANCE: Record<string, number> = {
  [MARKET_EVENTS.trade]: 0.6,
  [MARKET_EVENTS.priceChange]: 0.3,
  [MARKET_EVENTS.itemListing]: 0.5,
  [MARKET_EVENTS.negotiation]: 0.4,
  [MARKET_EVENTS.businessDeal]: 0.7,
};

const clampUnit = (v: number): number => Math.max(0, Math.min(1, v));

function numberMap(value: PayloadValue | undefined): Record<string, number> | undefined {
  if (value === null || value === undefined || typeof value !== "object" || Array.isArray(value)) return undefined;
  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(value)) if (typeof v === "number") out[k] = clampUnit(v);
  return Object.keys(out).length > 0 ? out : undefined;
}

/** Shops for what it needs, paying in coin where it can, and remembers who served it well. */
export class CustomerAgent extends BaseAgent<CustomerState> {
  static readonly TYPE = "customer";
  readonly type = CustomerAgent.TYPE;

  constructor(
    config: AgentConfig,
    private readonly ctx: DomainContext,
  ) {
    super(CustomerAgent.withTraits(config, ctx.random), CustomerAgent.initialState(config, ctx.random));
    for (const kind of [
      MARKET_EVENTS.trade,
      MARKET_EVENTS.priceChange,
      MARKET_EVENTS.itemListing,
      MARKET_EVENTS.negotiation,
      MARKET_EVENTS.businessDeal,
    ]) {
      this.subscribeToEvent(kind);
    }
  }

  private static withTraits(config: AgentConfig, random: Random): AgentConfig {
    return {
      ...config,
      attributes: {
        bargainingSkill: random.uniform(0.2, 0.8),
        loyalty: random.uniform(0.3, 0.9),
        impulsiveness: random.uniform(0.1, 0.7),
        cooldownDays: 2,
        ...config.attributes,
      },
    };
  }

  private static initialState(config: AgentConfig, random: Random): CustomerState {
    let needs = numberMap(config.attributes?.["needs"]);
    if (!needs) {
      needs = {};
      for (const item of random.sample(CONSUMER_GOODS, random.int(2, 4))) needs[item] = random.uniform(0.3, 1);
    }
    const inventory: ItemQuantities = { gold: random.int(5, 15), silver: random.int(3, 10) };
    for (const item of random.sample(["food", "tools", "clothing"], random.int(1, 2))) inventory[item] = random.int(1, 3);

    const preferredMerchants: Record<string, string[]> = {};
    for (const item of Object.keys(needs)) preferredMerchants[item] = [];

    return {
      inventory,
      budget: random.uniform(50, 200),
      needs,
      preferredMerchants,
      merchantOpinions: {},
      purchaseHistory: [],
      businessDeals: [],
      satisfaction: random.uniform(0.4, 0.8),
      priceSensitivity: random.uniform(0.3, 0.9),
    };
  }

  opinionOf(merchantId: string): MerchantOpinion | undefined {
    const opinion = this.state.merchantOpinions[merchantId];
    return opinion ? { ...opinion } : undefined;
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
    }
  }

  generateAction(now: Date): SimulationEvent | undefined {
    if (!this.readyToAct(now, this.numberAttribute("cooldownDays", 2) * DAY_MS)) return undefined;
    this.markActed(now);

    const bargaining = this.numberAttribute("bargainingSkill", 0.5);
    const impulsiveness = this.numberAttribute("impulsiveness", 0.3);
    const tradeWeight = 0.6 * (1 - 0.5 * this.state.satisfaction) * (0.7 + 0.3 * impulsiveness);

    const action = this.ctx.random.weighted([
      [MARKET_EVENTS.trade, tradeWeight],
      [MARKET_EVENTS.negotiation, 0.3 * bargaining],
      [MARKET_EVENTS.businessDeal, 0.1 * (1 - impulsiveness)],
    ]);
    switch (action) {
      case MARKET_EVENTS.trade:
        return this.requestTrade(now);
      case MARKET_EVENTS.negotiation:
        return this.negotiate(now);
      case MARKET_EVENTS.businessDeal:
        return this.proposeDeal(now);
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
    const needed = items.find((item) => item in this.state.needs);
    if (needed !== undefined) importance += 0.1 * (this.state.needs[needed] ?? 0);
    return Math.min(1, importance);
  }

  private onTrade(event: SimulationEvent): void {
    const isSource = event.source === this.id;
    if (!isSource && event.target !== this.id) return;
    const given = payloadNumberMap(event, "itemsGiven");
    const received = payloadNumberMap(event, "itemsReceived");
    const gave = isSource ? given : received;
    const got = isSource ? received : given;
    const merchantId = (isSource ? event.target : event.source) ?? "unknown";

    let satisfaction = this.state.satisfaction;
    for (const item of Object.keys(got)) {
      const priority = this.state.needs[item];
      if (priority !== undefined) satisfaction = Math.min(1, satisfaction + 0.1 * priority);
    }

    this.state = {
      ...this.state,
      inventory: adjustInventory(adjustInventory(this.state.inventory, gave, -1), got, 1),
      satisfaction,
      purchaseHistory: [
        ...this.state.purchaseHistory,
        { timestamp: event.timestamp.toISOString(), partnerId: merchantId, itemsGiven: gave, itemsReceived: got },
      ].slice(-PURCHASE_HISTORY_LIMIT),
    };
    this.reviewMerchant(merchantId, got, event.timestamp);
  }

  /** Needed goods and a fair price raise satisfaction; loyal customers turn it into trust faster. */
  private reviewMerchant(merchantId: string, got: ItemQuantities, at: Date): void {
    const opinion = this.opinionOf(merchantId) ?? { trust: 0.5, satisfaction: 0.5, transactionCount: 0, lastTransaction: null };

    let change = 0;
    for (const [item, qty] of Object.entries(got)) {
      const priority = this.state.needs[item];
      if (priority !== undefined) change += 0.05 * priority * qty;
    }
    change += this.ctx.random.next() > this.state.priceSensitivity ? 0.05 : -0.05;

    const loyalty = this.numberAttribute("loyalty", 0.5);
    const updated: MerchantOpinion = {
      trust: clampUnit(opinion.trust + change * (0.5 + 0.5 * loyalty)),
      satisfaction: clampUnit(opinion.satisfaction + change),
      transactionCount: opinion.transactionCount + 1,
      lastTransaction: at.toISOString(),
    };

    const preferred = { ...this.state.preferredMerchants };
    for (const item of Object.keys(got)) {
      const list = preferred[item];
      if (list && !list.includes(merchantId)) preferred[item] = [...list, merchantId];
    }
    this.updateState({
      merchantOpinions: { ...this.state.merchantOpinions, [merchantId]: updated },
      preferredMerchants: preferred,
    });
  }

  /** A steep rise on a needed good costs the merchant trust, scaled by price sensitivity. */
  private onPriceChange(event: SimulationEvent): void {
    const item = payloadString(event, "itemId");
    const merchantId = event.source;
    if (!item || !merchantId || !(item in this.state.needs)) return;
    const oldPrice = payloadNumber(event, "oldPrice", 0);
    const newPrice = payloadNumber(event, "newPrice", oldPrice);
    if (oldPrice <= 0 || newPrice <= oldPrice) return;

    const increase = (newPrice - oldPrice) / oldPrice;
    const opinion = this.opinionOf(merchantId);
    if (increase <= 0.1 || !opinion) return;
    const trust = Math.max(0, opinion.trust - 0.05 * this.state.priceSensitivity * (increase / 0.1));
    this.updateState({ merchantOpinions: { ...this.state.merchantOpinions, [merchantId]: { ...opinion, trust } } });
  }

  private onItemListing(event: SimulationEvent): void {
    const item = payloadString(event, "itemId");
    const merchantId = event.source;
    if (!item || !merchantId) return;
    const list = this.state.preferredMerchants[item];
    if (!list || list.includes(merchantId)) return;
    this.updateState({ preferredMerchants: { ...this.state.preferredMerchants, [item]: [...list, merchantId] } });
  }

  private onBusinessDeal(event: SimulationEvent): void {
    if (event.source !== this.id && event.target !== this.id) return;
    const dealId = payloadString(event, "dealId");
    const partnerId = event.source === this.id ? event.target : event.source;
    if (!dealId || !partnerId) return;

    const opinions = { ...this.state.merchantOpinions };
    const opinion = opinions[partnerId];
    if (opinion) {
      const loyalty = this.numberAttribute("loyalty", 0.5);
      opinions[partnerId] = { ...opinion, trust: Math.min(1, opinion.trust + 0.1 * (0.5 + 0.5 * loyalty)) };
    }
    this.updateState({
      businessDeals: [...this.state.businessDeals, { dealId, partnerId, active: true }],
      merchantOpinions: opinions,
    });
  }

  // ── Actions ─────────────────────────────────────────────────────────────────

  /** Loyal customers go back to the merchant they trust most. */
  private pickMerchant(item?: string): string | undefined {
    const { random, peers } = this.ctx;
    const merchants = peers("merchant");
    if (merchants.length === 0) return undefined;

    if (random.chance(this.numberAttribute("loyalty", 0.5))) {
      const preferred = item ? (this.state.preferredMerchants[item] ?? []) : [];
      const known = merchants
        .filter((id) => this.state.merchantOpinions[id] !== undefined || preferred.includes(id))
        .sort((a, b) => (this.state.merchantOpinions[b]?.trust ?? 0.5) - (this.state.merchantOpinions[a]?.trust ?? 0.5));
      if (known[0] !== undefined) return known[0];
    }
    return random.pick(merchants);
  }

  private mostNeeded(): string | undefined {
    const { random } = this.ctx;
    const needed = Object.keys(this.state.needs).sort((a, b) => (this.state.needs[b] ?? 0) - (this.state.needs[a] ?? 0));
    return random.chance(0.7) ? needed[0] : random.pick(needed);
  }

  private requestTrade(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const requestItem = this.mostNeeded();
    if (!requestItem) return undefined;
    const target = this.pickMerchant(requestItem);
    if (!target) return undefined;
    const requestQty = random.int(1, 3);

    const stocked = Object.keys(this.state.inventory);
    const coin = stocked.filter((item) => CURRENCY_ITEMS.includes(item));
    const spare = stocked.filter((item) => !(item in this.state.needs));
    const offerItem = random.pick(coin.length > 0 ? coin : spare.length > 0 ? spare : stocked);
    if (!offerItem) return undefined;

    const discount = 1 - 0.2 * this.numberAttribute("bargainingSkill", 0.5);
    const wantedQty = Math.ceil((requestQty * referencePrice(requestItem) * discount) / referencePrice(offerItem));
    const offerQty = Math.min(Math.max(1, wantedQty), this.state.inventory[offerItem] ?? 0);
    if (offerQty <= 0) return undefined;

    return tradeEvent({
      source: this.id,
      target,
      itemsGiven: { [offerItem]: offerQty },
      itemsReceived: { [requestItem]: requestQty },
      timestamp: now,
    });
  }

  private negotiate(now: Date): SimulationEvent | undefined {
    const item = this.mostNeeded();
    const target = item ? this.pickMerchant(item) : undefined;
    if (!item || !target) return undefined;
    const bargaining = this.numberAttribute("bargainingSkill", 0.5);
    return negotiationEvent({
      source: this.id,
      target,
      proposal: {
        itemId: item,
        quantity: this.ctx.random.int(1, 3),
        price: referencePrice(item) * (1 - 0.3 * bargaining),
        flexible: this.ctx.random.chance(1 - bargaining),
      },
      timestamp: now,
    });
  }

  private proposeDeal(now: Date): SimulationEvent | undefined {
    const { random } = this.ctx;
    const item = this.mostNeeded();
    const target = item ? this.pickMerchant(item) : undefined;
    if (!item || !target) return undefined;
    return businessDealEvent({
      source: this.id,
      target,
      dealId: `deal_${this.id}_${random.int(1000, 9999)}`,
      terms: {
        duration: random.int(5, 20),
        items: { [item]: { quantity: random.int(1, 5), price: referencePrice(item) } },
        exclusivity: false,
        renewalOption: random.chance(0.5),
      },
      timestamp: now,
    });
  }
}
