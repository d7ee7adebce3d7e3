import { createEvent, RELATIONSHIP_IMPACT_KEY, type PayloadValue, type SimulationEvent } from "@agora/core";

export const MARKET_EVENTS = {
  trade: "trade",
  priceChange: "price_change",
  itemListing: "item_listing",
  negotiation: "negotiation",
  businessDeal: "business_deal",
  dealBreach: "deal_breach",
  marketTrend: "market_trend",
} as const;

export type MarketEventKind = (typeof MARKET_EVENTS)[keyof typeof MARKET_EVENTS];

export type ItemQuantities = Record<string, number>;

/** Default relationship impact carried by each pairwise event. */
export const TRADE_IMPACT = 0.05;
export const NEGOTIATION_IMPACT = 0.02;
export const DEAL_IMPACT = 0.15;
export const BREACH_IMPACT_PER_SEVERITY = -0.2;

export function tradeEvent(p: {
  source: string;
  target: string;
  itemsGiven: ItemQuantities;
  itemsReceived: ItemQuantities;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: MARKET_EVENTS.trade,
    source: p.source,
    target: p.target,
    timestamp: p.timestamp,
    payload: {
      itemsGiven: p.itemsGiven,
      itemsReceived: p.itemsReceived,
      [RELATIONSHIP_IMPACT_KEY]: TRADE_IMPACT,
      participants: [p.source, p.target],
    },
  });
}

export function priceChangeEvent(p: {
  source: string;
  itemId: string;
  oldPrice: number;
  newPrice: number;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: MARKET_EVENTS.priceChange,
    source: p.source,
    timestamp: p.timestamp,
    payload: {
      itemId: p.itemId,
      oldPrice: p.oldPrice,
      newPrice: p.newPrice,
      percentChange: p.oldPrice > 0 ? (p.newPrice - p.oldPrice) / p.oldPrice : 0,
      isIncrease: p.newPrice > p.oldPrice,
    },
  });
}

export function itemListingEvent(p: {
  source: string;
  itemId: string;
  quantity: number;
  price: number;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: MARKET_EVENTS.itemListing,
    source: p.source,
    timestamp: p.timestamp,
    payload: { itemId: p.itemId, quantity: p.quantity, price: p.price, totalValue: p.quantity * p.price },
  });
}

export function negotiationEvent(p: {
  source: string;
  target: string;
  proposal: Record<string, PayloadValue>;
  isCounter?: boolean;
  previousProposalId?: string;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: MARKET_EVENTS.negotiation,
    source: p.source,
    target: p.target,
    timestamp: p.timestamp,
    payload: {
      proposal: p.proposal,
      isCounter: p.isCounter ?? false,
      previousProposalId: p.previousProposalId ?? null,
      [RELATIONSHIP_IMPACT_KEY]: NEGOTIATION_IMPACT,
      participants: [p.source, p.target],
    },
  });
}

export function businessDealEvent(p: {
  source: string;
  target: string;
  dealId: string;
  terms: Record<string, PayloadValue>;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: MARKET_EVENTS.businessDeal,
    source: p.source,
    target: p.target,
    timestamp: p.timestamp,
    payload: {
      dealId: p.dealId,
      terms: p.terms,
      [RELATIONSHIP_IMPACT_KEY]: DEAL_IMPACT,
      participants: [p.source, p.target],
    },
  });
}

/** `source` is the party in breach. Severity is clamped to [0, 1]. */
export function dealBreachEvent(p: {
  source: string;
  target: string;
  dealId: string;
  breachType: string;
  severity: number;
  timestamp?: Date;
}): SimulationEvent {
  const severity = Math.max(0, Math.min(1, p.severity));
  return createEvent({
    kind: MARKET_EVENTS.dealBreach,
    source: p.source,
    target: p.target,
    timestamp: p.timestamp,
    payload: {
      dealId: p.dealId,
      breachType: p.breachType,
      severity,
      [RELATIONSHIP_IMPACT_KEY]: BREACH_IMPACT_PER_SEVERITY * severity,
      participants: [p.source, p.target],
    },
  });
}

/** `impact` is a multiplier: below 1 the market contracts, above 1 it expands. */
export function marketTrendEvent(p: {
  trendType: string;
  affectedItems: Record<string, number>;
  impact: number;
  source?: string;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: MARKET_EVENTS.marketTrend,
    source: p.source,
    timestamp: p.timestamp,
    payload: {
      trendType: p.trendType,
      affectedItems: p.affectedItems,
      impact: p.impact,
      isPositive: p.impact > 1,
    },
  });
}
