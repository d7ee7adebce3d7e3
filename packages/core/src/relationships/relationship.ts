import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { involvedAgents, payloadValueSchema, relationshipImpact, relationshipReason } from "../events/event.js";
import type { PayloadValue, SimulationEvent } from "../events/types.js";

export interface RelationshipChange {
  timestamp: Date;
  oldStrength: number;
  newStrength: number;
  delta: number;
  reason: string;
}

export type RelationshipChangeRecord = {
  timestamp: string;
  oldStrength: number;
  newStrength: number;
  delta: number;
  reason: string;
};

export type RelationshipRecord = {
  id: string;
  agentA: string;
  agentB: string;
  type: string;
  strength: number;
  attributes: Record<string, PayloadValue>;
  history: RelationshipChangeRecord[];
};

export interface RelationshipInit {
  id?: string;
  agentA: string;
  agentB: string;
  type: string;
  strength?: number;
  attributes?: Record<string, PayloadValue>;
  history?: RelationshipChange[];
}

export const relationshipRecordSchema = z.object({
  id: z.string().min(1),
  agentA: z.string().min(1),
  agentB: z.string().min(1),
  type: z.string().min(1),
  strength: z.number(),
  attributes: z.record(payloadValueSchema).default({}),
  history: z
    .array(
      z.object({
        timestamp: z.string().datetime({ offset: true }),
        oldStrength: z.number(),
        newStrength: z.number(),
        delta: z.number(),
        reason: z.string(),
      }),
    )
    .default([]),
});

export function clampStrength(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(-1, Math.min(1, value));
}

/** Sorted so that (a, b) and (b, a) name the same edge. */
export function canonicalPair(a: string, b: string): [string, string] {
  return a <= b ? [a, b] : [b, a];
}

/**
 * A typed, bounded edge between two agents. Subclasses decide how events move
 * it; every change goes through `updateStrength` so the history stays complete.
 */
export abstract class Relationship {
  readonly id: string;
  readonly agentA: string;
  readonly agentB: string;
  readonly type: string;
  protected readonly attributes: Record<string, PayloadValue>;
  private _strength: number;
  private readonly history: RelationshipChange[];

  constructor(init: RelationshipInit) {
    if (init.agentA === init.agentB) {
      throw new ConfigurationError(`Relationship needs two distinct agents, got "${init.agentA}" twice`);
    }
    if (!init.type) throw new ConfigurationError("Relationship type must be non-empty");
    const [a, b] = canonicalPair(init.agentA, init.agentB);
    this.id = init.id ?? `rel_${randomUUID()}`;
    this.agentA = a;
    this.agentB = b;
    this.type = init.type;
    this._strength = clampStrength(init.strength ?? 0);
    this.attributes = { ...(init.attributes ?? {}) };
    this.history = (init.history ?? []).map((h) => ({ ...h, timestamp: new Date(h.timestamp.getTime()) }));
  }

  get strength(): number {
    return this._strength;
  }

  /** Applies an event; true when the strength or attributes changed. */
  abstract update(event: SimulationEvent): boolean;

  sentiment(): number {
    return this._strength;
  }

  /** Clamps to [-1, 1] and records one history entry. Returns the delta actually applied. */
  updateStrength(delta: number, reason: string, at: Date = new Date()): number {
    const oldStrength = this._strength;
    this._strength = clampStrength(oldStrength + delta);
    const applied = this._strength - oldStrength;
    this.history.push({ timestamp: at, oldStrength, newStrength: this._strength, delta: applied, reason });
    return applied;
  }

  /**
   * Moves strength toward zero by `ratePerDay * days`, never past it.
   * Changes smaller than 0.01 are skipped.
   */
  decayTowardZero(days: number, ratePerDay: number, at: Date = new Date()): boolean {
    const amount = Math.min(Math.abs(this._strength), Math.max(0, ratePerDay * days));
    if (amount < 0.01) return false;
    this.updateStrength(this._strength > 0 ? -amount : amount, `Time decay (${days} days)`, at);
    return true;
  }

  getAttribute(key: string): PayloadValue | undefined {
    return this.attributes[key];
  }

  setAttribute(key: string, value: PayloadValue): void {
    this.attributes[key] = value;
  }

  protected numberAttribute(key: string, fallback: number): number {
    const value = this.attributes[key];
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
  }

  protected stringListAttribute(key: string): string[] {
    const value = this.attributes[key];
    if (!Array.isArray(value)) return [];
    return value.filter((item): item is string => typeof item === "string");
  }

  protected numberMapAttribute(key: string): Record<string, number> {
    const value = this.attributes[key];
    const out: Record<string, number> = {};
    if (value === null || typeof value !== "object" || Array.isArray(value)) return out;
    for (const [k, n] of Object.entries(value)) {
      if (typeof n === "number") out[k] = n;
    }
    return out;
  }

  getAttributes(): Record<string, PayloadValue> {
    return { ...this.attributes };
  }

  involves(agentId: string): boolean {
    return this.agentA === agentId || this.agentB === agentId;
  }

  otherAgent(agentId: string): string | undefined {
    if (agentId === this.agentA) return this.agentB;
    if (agentId === this.agentB) return this.agentA;
    return undefined;
  }

  getHistory(): RelationshipChange[] {
    return this.history.map((h) => ({ ...h, timestamp: new Date(h.timestamp.getTime()) }));
  }

  toRecord(): RelationshipRecord {
    return {
      id: this.id,
      agentA: this.agentA,
      agentB: this.agentB,
      type: this.type,
      strength: this._strength,
      attributes: { ...this.attributes },
      history: this.history.map((h) => ({ ...h, timestamp: h.timestamp.toISOString() })),
    };
  }

  /** Both agents appear among the event's source, target or participants. */
  protected isRelevant(event: SimulationEvent): boolean {
    const involved = involvedAgents(event);
    return involved.includes(this.agentA) && involved.includes(this.agentB);
  }
}

/** Applies `relationship_impact` from any event involving both agents. */
export class SimpleRelationship extends Relationship {
  update(event: SimulationEvent): boolean {
    if (!this.isRelevant(event)) return false;
    const impact = relationshipImpact(event, 0);
    if (impact === 0) return false;
    const reason = relationshipReason(event) ?? `Event: ${event.kind}`;
    this.updateStrength(impact, reason, event.timestamp);
    return true;
  }
}

export function initFromRecord(record: RelationshipRecord): RelationshipInit {
  return {
    id: record.id,
    agentA: record.agentA,
    agentB: record.agentB,
    type: record.type,
    strength: record.strength,
    attributes: record.attributes,
    history: record.history.map((h) => ({ ...h, timestamp: new Date(h.timestamp) })),
  };
}
