import { createEvent, type SimulationEvent } from "@agora/core";

export const SENATE_EVENTS = {
  agenda: "agenda",
  speech: "speech",
  reaction: "reaction",
  interjection: "interjection",
  vote: "vote",
} as const;

export type Stance = "support" | "oppose" | "neutral";
export type ReactionType = "agreement" | "interest" | "disagreement" | "skepticism" | "indifference";
export type InterjectionType = "support" | "challenge" | "emotional" | "procedural";
export type Vote = "for" | "against" | "abstain";

export const POSITIVE_REACTIONS: readonly string[] = ["agreement", "interest"];
export const NEGATIVE_REACTIONS: readonly string[] = ["disagreement", "skepticism"];

export function isStance(value: string | undefined): value is Stance {
  return value === "support" || value === "oppose" || value === "neutral";
}

/** Opens debate on a topic; senators without a stance form one. */
export function agendaEvent(p: { topic: string; timestamp?: Date }): SimulationEvent {
  return createEvent({ kind: SENATE_EVENTS.agenda, timestamp: p.timestamp, payload: { topic: p.topic } });
}

export function speechEvent(p: {
  speaker: string;
  topic: string;
  stance: Stance;
  persuasiveness: number;
  text: string;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: SENATE_EVENTS.speech,
    source: p.speaker,
    timestamp: p.timestamp,
    payload: { topic: p.topic, stance: p.stance, persuasiveness: p.persuasiveness, text: p.text },
  });
}

export function reactionEvent(p: {
  reactor: string;
  speaker: string;
  speechId: string;
  topic: string;
  reactionType: ReactionType;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: SENATE_EVENTS.reaction,
    source: p.reactor,
    target: p.speaker,
    timestamp: p.timestamp,
    payload: { speechId: p.speechId, topic: p.topic, reactionType: p.reactionType },
  });
}

export function interjectionEvent(p: {
  interjector: string;
  speaker: string;
  speechId: string;
  topic: string;
  interjectionType: InterjectionType;
  text: string;
  timestamp?: Date;
}): SimulationEvent {
  return createEvent({
    kind: SENATE_EVENTS.interjection,
    source: p.interjector,
    target: p.speaker,
    timestamp: p.timestamp,
    payload: { speechId: p.speechId, topic: p.topic, interjectionType: p.interjectionType, text: p.text },
  });
}

export function voteEvent(p: { voter: string; topic: string; vote: Vote; timestamp?: Date }): SimulationEvent {
  return createEvent({
    kind: SENATE_EVENTS.vote,
    source: p.voter,
    timestamp: p.timestamp,
    payload: { topic: p.topic, vote: p.vote },
  });
}
