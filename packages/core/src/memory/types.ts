import type { PayloadValue } from "../events/types.js";

/** Scalar association values are indexed; structured ones are stored but not searchable. */
export type AssociationValue = PayloadValue;

export type MemoryKind = "generic" | "event" | "reaction" | "stance_change" | "relationship_impact";

export type MemoryCategory = "core" | "long_term" | "medium_term" | "short_term";

export type MemoryRecord = {
  id: string;
  kind: MemoryKind;
  timestamp: string;
  content: PayloadValue;
  importance: number;
  decayRate: number;
  emotionalImpact: number;
  tags: string[];
  associations: Record<string, AssociationValue>;
};

export interface MemoryQuery {
  timestampMin?: Date;
  timestampMax?: Date;
  importanceMin?: number;
  /** Every tag must be present. */
  tags?: string[];
  /** Exact match on every key/value pair. */
  associations?: Record<string, string | number | boolean>;
  /** Every token (lower-cased, longer than two characters) must appear. */
  text?: string;
}

export interface MemoryUpdate {
  importance?: number;
  associations?: Record<string, AssociationValue>;
  content?: PayloadValue;
}

export interface RelevanceContext {
  tags?: string[];
  topic?: string;
  subject?: string;
}
