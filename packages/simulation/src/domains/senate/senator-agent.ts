import {
  BaseAgent,
  payloadNumber,
  payloadString,
  relationshipImpactMemory,
  stanceChangeMemory,
  type AgentConfig,
  type PayloadValue,
  type Relationship,
  type SimulationEvent,
} from "@agora/core";
import type { DomainContext } from "../../domain-registry.js";
import type { Random } from "../../random.js";
import {
  interjectionEvent,
  isStance,
  NEGATIVE_REACTIONS,
  POSITIVE_REACTIONS,
  reactionEvent,
  SENATE_EVENTS,
  speechEvent,
  voteEvent,
  type InterjectionType,
  type ReactionType,
  type Stance,
  type Vote,
} from "./events.js";
import { POLITICAL } from "./relationships.js";
import { FACTIONS, formStance, isFaction, topicTitle, type Faction } from "./topics.js";

const DAY_MS = 86_400_000;

export type HeardSpeech = {
  id: string;
  speakerId: string;
  topic: string;
  stance: Stance;
  responded: boolean;
};

export type SenatorState = {
  faction: Faction;
  stances: Record<string, Stance>;
  currentTopic: string | null;
  lastSpeech: HeardSpeech | null;
  speechesGiven: number;
  votes: Record<string, Vote>;
};

const STANCE_CHANGE_RATE = 0.2;

function stanceMap(value: PayloadValue | undefined): Record<string, Stance> {
  const out: Record<string, Stance> = {};
  if (value === null || value === undefined || typeof value !== "object" || Array.isArray(value)) return out;
  for (const [topic, stance] of Object.entries(value)) {
    if (typeof stance === "string" && isStance(stance)) out[topic] = stance;
  }
  return out;
}

function opposed(a: Stance, b: Stance): boolean {
  return a !== b && a !== "neutral" && b !== "neutral";
}

/**
 * Debates the topic on the agenda: speaks, reacts to and interjects in
 * others' speeches, and votes. Listening to a speech moves the political tie
 * with its speaker and may change the listener's mind.
 */
export class SenatorAgent extends BaseAgent<SenatorState> {
  static readonly TYPE = "senator";
  readonly type = SenatorAgent.TYPE;

  constructor(
    config: AgentConfig,
    private readonly ctx: DomainContext,
  ) {
    const withTraits = SenatorAgent.withTraits(config, ctx.random);
    super(withTraits, SenatorAgent.initialState(withTraits));
    for (const kind of Object.values(SENATE_EVENTS)) this.subscribeToEvent(kind);
  }

  private static withTraits(config: AgentConfig, random: Random): AgentConfig {
    return {
      ...config,
      attributes: {
        faction: random.pick(FACTIONS) ?? "moderates",
        eloquence: random.uniform(0.3, 0.9),
        temperament: random.uniform(0.1, 0.9),
        stubbornness: random.uniform(0.2, 0.9),
        cooldownDays: 1,
        ...config.attributes,
      },
    };
  }

  private static initialState(config: AgentConfig): SenatorState {
    const faction = config.attributes?.["faction"];
    return {
      faction: typeof faction === "string" && isFaction(faction) ? faction : "moderates",
      stances: stanceMap(config.attributes?.["stances"]),
      currentTopic: null,
      lastSpeech: null,
      speechesGiven: 0,
      votes: {},
    };
  }

  get faction(): Faction {
    return this.state.faction;
  }

  stanceOn(topic: string): Stance | undefined {
    return this.state.stances[topic];
  }

  processEvent(event: SimulationEvent): void {
    switch (event.kind) {
      case SENATE_EVENTS.agenda:
        this.onAgenda(event);
        break;
      case SENATE_EVENTS.speech:
        this.onSpeech(event);
        break;
      case SENATE_EVENTS.reaction:
        this.onReaction(event);
        break;
      case SENATE_EVENTS.interjection:
        this.onInterjection(event);
        break;
      case SENATE_EVENTS.vote:
        this.remember(event, { importance: 0.3, tags: ["senate"] });
        break;
    }
  }

  generateAction(now: Date): SimulationEvent | undefined {
    const topic = this.state.currentTopic;
    if (!topic) return undefined;
    if (!this.readyToAct(now, this.numberAttribute("cooldownDays", 1) * DAY_MS)) return undefined;
    this.markActed(now);

    const pending = this.state.lastSpeech?.responded === false ? this.state.lastSpeech : undefined;
    const action = this.ctx.random.weighted([
      [SENATE_EVENTS.speech, 0.3 + 0.3 * this.numberAttribute("eloquence", 0.5)],
      [SENATE_EVENTS.reaction, pending ? 0.4 : 0],
      [SENATE_EVENTS.interjection, pending ? 0.15 + 0.25 * this.numberAttribute("temperament", 0.5) : 0],
      [SENATE_EVENTS.vote, topic in this.state.votes ? 0 : 0.2],
    ]);

    switch (action) {
      case SENATE_EVENTS.speech:
        return this.speak(topic, now);
      case SENATE_EVENTS.reaction:
        return pending ? this.react(pending, now) : undefined;
      case SENATE_EVENTS.interjection:
        return pending ? this.interject(pending, now) : undefined;
      case SENATE_EVENTS.vote:
        return this.vote(topic, now);
      default:
        return undefined;
    }
  }

  // ── Reactions ───────────────────────────────────────────────────────────────

  private onAgenda(event: SimulationEvent): void {
    const topic = payloadString(event, "topic");
    if (!topic) return;
    const stances = { ...this.state.stances };
    stances[topic] ??= formStance(this.state.faction, topic, this.ctx.random);
    this.updateState({ currentTopic: topic, stances });
    this.remember(event, { importance: 0.6, tags: ["senate", "agenda"] });
  }

  private onSpeech(event: SimulationEvent): void {
    const topic = payloadString(event, "topic");
    const stance = payloadString(event, "stance");
    const speaker = event.source;
    if (!topic || !isStance(stance) || !speaker) return;

    if (speaker === this.id) {
      this.remember(event, { importance: 0.5, tags: ["senate", "own_speech"] });
      return;
    }

    const mine = this.state.stances[topic];
    this.remember(event, {
      importance: mine !== undefined && opposed(mine, stance) ? 0.6 : 0.4,
      tags: ["senate", topic],
    });
    this.updateState({ lastSpeech: { id: event.id, speakerId: speaker, topic, stance, responded: false } });
    if (mine === undefined) return;

    const tie = this.politicalTie(speaker);
    if (mine === stance) {
      tie.updateStrength(0.05, `Agreed with stance on ${topicTitle(topic)}`, event.timestamp);
    } else if (opposed(mine, stance)) {
      tie.updateStrength(-0.05, `Disagreed with stance on ${topicTitle(topic)}`, event.timestamp);
    }

    if (mine !== stance) this.consider(event, topic, mine, stance, speaker, tie);
  }

  /** A persuasive speaker the senator already respects may change its mind. */
  private consider(
    event: SimulationEvent,
    topic: string,
    mine: Stance,
    theirs: Stance,
    speaker: string,
    tie: Relationship,
  ): void {
    const chance =
      payloadNumber(event, "persuasiveness", 0.5) *
      STANCE_CHANGE_RATE *
      (1 - this.numberAttribute("stubbornness", 0.5)) *
      (1 + Math.max(0, tie.strength));
    if (!this.ctx.random.chance(chance)) return;

    this.updateState({ stances: { ...this.state.stances, [topic]: theirs } });
    this.memory.addMemory(
      stanceChangeMemory({
        topic,
        oldStance: mine,
        newStance: theirs,
        reason: `Persuaded by ${speaker}`,
        eventId: event.id,
        timestamp: event.timestamp,
      }),
    );
  }

  private onReaction(event: SimulationEvent): void {
    const reactor = event.source;
    if (event.target !== this.id || !reactor) {
      this.remember(event, { importance: 0.2, tags: ["senate"] });
      return;
    }
    const reaction = payloadString(event, "reactionType") ?? "";
    const change = POSITIVE_REACTIONS.includes(reaction) ? 0.05 : NEGATIVE_REACTIONS.includes(reaction) ? -0.03 : 0;
    if (change === 0) return;
    this.memory.addMemory(
      relationshipImpactMemory({
        subject: reactor,
        relationshipType: "personal",
        change,
        reason: `${reactor} reacted to my speech with ${reaction}`,
        eventId: event.id,
        timestamp: event.timestamp,
      }),
    );
  }

  private onInterjection(event: SimulationEvent): void {
    if (event.target !== this.id) {
      this.remember(event, { importance: 0.3, tags: ["senate"] });
      return;
    }
    const kind = payloadString(event, "interjectionType");
    const emotionalImpact = kind === "support" ? 0.3 : kind === "challenge" ? -0.3 : kind === "emotional" ? -0.6 : 0;
    this.remember(event, { importance: 0.7, emotionalImpact, tags: ["senate", "interjection"] });
  }

  private politicalTie(other: string): Relationship {
    const { relationships } = this.ctx;
    return (
      relationships.getRelationshipBetween(this.id, other, POLITICAL) ??
      relationships.createRelationship(this.id, other, POLITICAL)
    );
  }

  // ── Actions ─────────────────────────────────────────────────────────────────

  private speak(topic: string, now: Date): SimulationEvent {
    const stance = this.state.stances[topic] ?? "neutral";
    const position = stance === "support" ? "in favour of" : stance === "oppose" ? "against" : "on";
    this.updateState({ speechesGiven: this.state.speechesGiven + 1 });
    return speechEvent({
      speaker: this.id,
      topic,
      stance,
      persuasiveness: this.numberAttribute("eloquence", 0.5),
      text: `${this.name} speaks ${position} ${topicTitle(topic)}`,
      timestamp: now,
    });
  }

  private react(speech: HeardSpeech, now: Date): SimulationEvent {
    const { random } = this.ctx;
    const mine = this.state.stances[speech.topic] ?? "neutral";
    let reactionType: ReactionType;
    if (mine === speech.stance) reactionType = random.chance(0.7) ? "agreement" : "interest";
    else if (opposed(mine, speech.stance)) reactionType = random.chance(0.7) ? "disagreement" : "skepticism";
    else reactionType = random.chance(0.5) ? "interest" : "indifference";

    this.updateState({ lastSpeech: { ...speech, responded: true } });
    return reactionEvent({
      reactor: this.id,
      speaker: speech.speakerId,
      speechId: speech.id,
      topic: speech.topic,
      reactionType,
      timestamp: now,
    });
  }

  private interject(speech: HeardSpeech, now: Date): SimulationEvent {
    const mine = this.state.stances[speech.topic] ?? "neutral";
    let interjectionType: InterjectionType = "procedural";
    if (mine === speech.stance) interjectionType = "support";
    else if (opposed(mine, speech.stance)) {
      interjectionType = this.numberAttribute("temperament", 0.5) > 0.6 ? "emotional" : "challenge";
    }

    const lines: Record<InterjectionType, string> = {
      support: "Hear, hear!",
      challenge: "The senator is mistaken.",
      emotional: "This is an outrage!",
      procedural: "Point of order.",
    };
    this.updateState({ lastSpeech: { ...speech, responded: true } });
    return interjectionEvent({
      interjector: this.id,
      speaker: speech.speakerId,
      speechId: speech.id,
      topic: speech.topic,
      interjectionType,
      text: lines[interjectionType],
      timestamp: now,
    });
  }

  private vote(topic: string, now: Date): SimulationEvent {
    const stance = this.state.stances[topic] ?? "neutral";
    const vote: Vote = stance === "support" ? "for" : stance === "oppose" ? "against" : "abstain";
    this.updateState({ votes: { ...this.state.votes, [topic]: vote } });
    return voteEvent({ voter: this.id, topic, vote, timestamp: now });
  }
}
