import type { Random } from "../../random.js";
import type { Stance } from "./events.js";

export const FACTIONS = ["optimates", "populares", "moderates"] as const;
export type Faction = (typeof FACTIONS)[number];

export interface Topic {
  title: string;
  /** Faction leaning in [-1, 1]: positive favours support. */
  lean: Readonly<Record<Faction, number>>;
}

export const TOPICS: Readonly<Record<string, Topic>> = {
  grain_dole: { title: "the grain dole", lean: { optimates: -0.7, populares: 0.8, moderates: 0.1 } },
  land_reform: { title: "land reform", lean: { optimates: -0.8, populares: 0.7, moderates: -0.1 } },
  military_funding: { title: "funding the legions", lean: { optimates: 0.6, populares: -0.2, moderates: 0.3 } },
  road_construction: { title: "a new road north", lean: { optimates: 0.2, populares: 0.3, moderates: 0.5 } },
  tax_farming: { title: "tax farming contracts", lean: { optimates: 0.5, populares: -0.6, moderates: 0 } },
  citizenship: { title: "citizenship for the allies", lean: { optimates: -0.5, populares: 0.5, moderates: 0.2 } },
};

export const TOPIC_IDS: readonly string[] = Object.keys(TOPICS);

export function isFaction(value: string): value is Faction {
  return FACTIONS.some((f) => f === value);
}

export function topicTitle(topic: string): string {
  return TOPICS[topic]?.title ?? topic.replace(/_/g, " ");
}

/** A fifth of senators stay neutral; the rest split by their faction's lean. */
export function formStance(faction: Faction, topic: string, random: Random): Stance {
  const lean = TOPICS[topic]?.lean[faction] ?? 0;
  return (
    random.weighted<Stance>([
      ["support", 0.8 * ((1 + lean) / 2)],
      ["oppose", 0.8 * ((1 - lean) / 2)],
      ["neutral", 0.2],
    ]) ?? "neutral"
  );
}
