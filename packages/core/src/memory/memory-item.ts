import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { eventToRecord, payloadValueSchema } from "../events/event.js";
import type { PayloadValue, SimulationEvent } from "../events/types.js";
import type {
  AssociationValue,
  MemoryCategory,
  MemoryKind,
  MemoryRecord,
  RelevanceContext,
} from "./types.js";

const MS_PER_DAY = 86_400_000;

export interface MemoryInit {
  id?: string;
  kind?: MemoryKind;
  timestamp?: Date;
  content: PayloadValue;
  importance?: number;
  decayRate?: number;
  emotionalImpact?: number;
  tags?: string[];
  associations?: Record<string, AssociationValue>;
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export class MemoryItem {
  readonly id: string;
  readonly kind: MemoryKind;
  readonly timestamp: Date;
  content: PayloadValue;
  readonly tags: string[];
  readonly associations: Record<string, AssociationValue>;
  private _importance: number;
  private _decayRate: number;
  private _emotionalImpact: number;

  constructor(init: MemoryInit) {
    this.id = init.id ?? `mem_${randomUUID()}`;
    this.kind = init.kind ?? "generic";
    this.timestamp = init.timestamp ?? new Date();
    this.content = init.content;
    this._importance = clamp(init.importance ?? 0.5, 0, 1);
    this._decayRate = clamp(init.decayRate ?? 0.1, 0, 1);
    this._emotionalImpact = clamp(init.emotionalImpact ?? 0, -1, 1);
    this.tags = [...new Set(init.tags ?? [])];
    this.associations = { ...(init.associations ?? {}) };
  }

  get importance(): number {
    return this._importance;
  }

  get decayRate(): number {
    return this._decayRate;
  }

  get emotionalImpact(): number {
    return this._emotionalImpact;
  }

  updateImportance(value: number): void {
    this._importance = clamp(value, 0, 1);
  }

  updateDecayRate(value: number): void {
    this._decayRate = clamp(value, 0, 1);
  }

  addAssociation(key: string, value: AssociationValue): void {
    this.associations[key] = value;
  }

  addTag(tag: string): void {
    if (!this.tags.includes(tag)) this.tags.push(tag);
  }

  /**
   * importance × e^(−decayRate × days) × (1 + 0.5 × |emotionalImpact|), clamped to [0, 1].
   * Times before the memory's own timestamp count as zero days.
   */
  currentStrength(now: Date = new Date()): number {
    const days = Math.max(0, (now.getTime() - this.timestamp.getTime()) / MS_PER_DAY);
    const decayed = this._importance * Math.exp(-this._decayRate * days);
    const emotional = 1 + Math.abs(this._emotionalImpact) * 0.5;
    return clamp(decayed * emotional, 0, 1);
  }

  /** Core memories never decay and are never pruned. */
  isCore(): boolean {
    return this._decayRate === 0 && this._importance >= 0.9;
  }

  category(): MemoryCategory {
    if (this.isCore()) return "core";
    if (this._importance >= 0.7) return "long_term";
    if (this._importance >= 0.4) return "medium_term";
    return "short_term";
  }

  relevance(context: RelevanceContext, now: Date = new Date()): number {
    let score = 0;
    const contextTags = context.tags ?? [];
    const matching = this.tags.filter((t) => contextTags.includes(t)).length;
    if (matching > 0) {
      score += 0.3 * (matching / Math.max(this.tags.length, contextTags.length));
    }
    if (context.topic !== undefined && this.associations["topic"] === context.topic) score += 0.3;
    if (context.subject !== undefined && this.associations["subject"] === context.subject) score += 0.4;
    return clamp(score * 0.7 + this.currentStrength(now) * 0.3, 0, 1);
  }

  toRecord(): MemoryRecord {
    return {
      id: this.id,
      kind: this.kind,
      timestamp: this.timestamp.toISOString(),
      content: this.content,
      importance: this._importance,
      decayRate: this._decayRate,
      emotionalImpact: this._emotionalImpact,
      tags: [...this.tags],
      associations: { ...this.associations },
    };
  }

  static fromRecord(raw: unknown): MemoryItem {
    const parsed = memoryRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid memory record at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`,
      );
    }
    const r = parsed.data;
    return new MemoryItem({
      id: r.id,
      kind: r.kind,
      timestamp: new Date(r.timestamp),
      content: r.content,
      importance: r.importance,
      decayRate: r.decayRate,
      emotionalImpact: r.emotionalImpact,
      tags: r.tags,
      associations: r.associations,
    });
  }
}

export const memoryRecordSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["generic", "event", "reaction", "stance_change", "relationship_impact"]).default("generic"),
  timestamp: z.string().datetime({ offset: true }),
  content: payloadValueSchema,
  importance: z.number().default(0.5),
  decayRate: z.number().default(0.1),
  emotionalImpact: z.number().default(0),
  tags: z.array(z.string()).default([]),
  associations: z.record(payloadValueSchema).default({}),
});

// ── Specialised memories ──────────────────────────────────────────────────────

export interface EventMemoryOptions {
  importance?: number;
  decayRate?: number;
  emotionalImpact?: number;
  tags?: string[];
  timestamp?: Date;
}

/** Remembers an observed event; tagged with its kind and source. */
export function memoryFromEvent(event: SimulationEvent, opts: EventMemoryOptions = {}): MemoryItem {
  const tags = [...(opts.tags ?? []), event.kind];
  if (event.source) tags.push(event.source);

  const associations: Record<string, AssociationValue> = { eventKind: event.kind, eventId: event.id };
  if (event.source) associations["source"] = event.source;
  if (event.target) associations["target"] = event.target;
  const topic = event.payload["topic"];
  if (typeof topic === "string") associations["topic"] = topic;

  return new MemoryItem({
    id: `event_${event.id}_${randomUUID().slice(0, 8)}`,
    kind: "event",
    timestamp: opts.timestamp ?? event.timestamp,
    content: eventToRecord(event),
    importance: opts.importance,
    decayRate: opts.decayRate,
    emotionalImpact: opts.emotionalImpact,
    tags,
    associations,
  });
}

export function reactionMemory(params: {
  eventId: string;
  reactionType: string;
  content: string;
  timestamp?: Date;
  importance?: number;
  emotionalImpact?: number;
}): MemoryItem {
  return new MemoryItem({
    kind: "reaction",
    timestamp: params.timestamp,
    content: params.content,
    importance: params.importance ?? 0.5,
    decayRate: 0.1,
    emotionalImpact: params.emotionalImpact,
    tags: ["reaction", params.reactionType],
    associations: { reactionType: params.reactionType, eventId: params.eventId },
  });
}

export function stanceChangeMemory(params: {
  topic: string;
  oldStance: string;
  newStance: string;
  reason: string;
  eventId?: string;
  timestamp?: Date;
}): MemoryItem {
  const associations: Record<string, AssociationValue> = {
    topic: params.topic,
    oldStance: params.oldStance,
    newStance: params.newStance,
  };
  if (params.eventId) associations["eventId"] = params.eventId;
  return new MemoryItem({
    kind: "stance_change",
    timestamp: params.timestamp,
    content: `Changed stance on ${params.topic} from ${params.oldStance} to ${params.newStance}: ${params.reason}`,
    importance: 0.7,
    decayRate: 0.05,
    tags: [params.topic, "stance_change"],
    associations,
  });
}

export function relationshipImpactMemory(params: {
  subject: string;
  relationshipType: string;
  change: number;
  reason: string;
  eventId?: string;
  timestamp?: Date;
  importance?: number;
}): MemoryItem {
  const associations: Record<string, AssociationValue> = {
    subject: params.subject,
    relationshipType: params.relationshipType,
    change: params.change,
  };
  if (params.eventId) associations["eventId"] = params.eventId;
  return new MemoryItem({
    kind: "relationship_impact",
    timestamp: params.timestamp,
    content: params.reason,
    importance: params.importance ?? 0.6,
    decayRate: 0.08,
    emotionalImpact: Math.max(-1, Math.min(1, params.change * 5)),
    tags: ["relationship", params.subject],
    associations,
  });
}
