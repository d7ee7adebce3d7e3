import {
  payloadString,
  Relationship,
  relationshipImpact,
  relationshipReason,
  type SimulationEvent,
} from "@agora/core";
import { NEGATIVE_REACTIONS, POSITIVE_REACTIONS, SENATE_EVENTS } from "./events.js";

export const POLITICAL = "political";
export const PERSONAL = "personal";

/** Per-day decay toward neutral, expressed per 30-day month. */
export const SENATE_DECAY_PER_DAY: Readonly<Record<string, number>> = {
  political: 0.08 / 30,
  personal: 0.04 / 30,
  mentor: 0.02 / 30,
  rival: 0.05 / 30,
  family: 0.01 / 30,
};

/** The interjection type, or undefined for any other event. */
function interjection(event: SimulationEvent): string | undefined {
  return event.kind === SENATE_EVENTS.interjection ? payloadString(event, "interjectionType") : undefined;
}

/**
 * Standing on the floor. Stance agreement is applied by the listening senator,
 * since only the listener knows its own stance; interjections land here.
 */
export class PoliticalRelationship extends Relationship {
  update(event: SimulationEvent): boolean {
    if (!this.isRelevant(event)) return false;
    switch (interjection(event)) {
      case "support":
        this.updateStrength(0.08, "Supported me during a speech", event.timestamp);
        return true;
      case "challenge":
        this.updateStrength(-0.08, "Challenged me during a speech", event.timestamp);
        return true;
    }
    const impact = relationshipImpact(event, 0);
    if (impact === 0) return false;
    this.updateStrength(impact, relationshipReason(event) ?? `Event: ${event.kind}`, event.timestamp);
    return true;
  }
}

/** Personal regard, moved by reactions to speeches and by interjections. */
export class PersonalRelationship extends Relationship {
  update(event: SimulationEvent): boolean {
    if (!this.isRelevant(event)) return false;

    if (event.kind === SENATE_EVENTS.reaction) {
      const reaction = payloadString(event, "reactionType") ?? "";
      if (POSITIVE_REACTIONS.includes(reaction)) {
        this.updateStrength(0.05, `Reacted positively to a speech (${reaction})`, event.timestamp);
        return true;
      }
      if (NEGATIVE_REACTIONS.includes(reaction)) {
        this.updateStrength(-0.03, `Reacted negatively to a speech (${reaction})`, event.timestamp);
        return true;
      }
      return false;
    }

    switch (interjection(event)) {
      case "support":
        this.updateStrength(0.05, "Supported me during a speech", event.timestamp);
        return true;
      case "emotional":
        this.updateStrength(-0.1, "Emotional outburst during my speech", event.timestamp);
        return true;
    }
    return false;
  }
}
