import type { Random } from "../../random.js";
import type { ItemQuantities } from "./events.js";

/** Price range a newcomer believes each good trades in. */
export const ITEM_PRICE_RANGES: Readonly<Record<string, readonly [number, number]>> = {
  gold: [15, 25],
  silver: [8, 15],
  food: [3, 8],
  tools: [5, 12],
  clothing: [7, 18],
  luxury_goods: [20, 40],
  raw_materials: [2, 6],
  crafted_goods: [10, 20],
};

export const ITEM_TYPES: readonly string[] = Object.keys(ITEM_PRICE_RANGES);
export const CURRENCY_ITEMS: readonly string[] = ["gold", "silver"];
export const CONSUMER_GOODS: readonly string[] = ["food", "tools", "clothing", "luxury_goods", "crafted_goods"];

/** Assumed unit price for goods nobody has formed a belief about. */
export const UNKNOWN_ITEM_PRICE = 10;

export function initialPriceBeliefs(random: Random): Record<string, number> {
  const beliefs: Record<string, number> = {};
  for (const item of ITEM_TYPES) {
    const range = ITEM_PRICE_RANGES[item];
    if (range) beliefs[item] = random.uniform(range[0], range[1]);
  }
  return beliefs;
}

/** Adds `delta` per item; items falling to zero or below leave the inventory. */
export function adjustInventory(inventory: ItemQuantities, delta: ItemQuantities, sign: 1 | -1): ItemQuantities {
  const next = { ...inventory };
  for (const [item, qty] of Object.entries(delta)) {
    const value = (next[item] ?? 0) + sign * qty;
    if (value > 0) next[item] = value;
    else delete next[item];
  }
  return next;
}

export function valueOf(items: ItemQuantities, beliefs: Readonly<Record<string, number>>): number {
  let total = 0;
  for (const [item, qty] of Object.entries(items)) total += qty * (beliefs[item] ?? UNKNOWN_ITEM_PRICE);
  return total;
}

/** Midpoint of the item's range, for agents that keep no price beliefs. */
export function referencePrice(item: string): number {
  const range = ITEM_PRICE_RANGES[item];
  return range ? (range[0] + range[1]) / 2 : UNKNOWN_ITEM_PRICE;
}
