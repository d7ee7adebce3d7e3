import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { EventInit, EventRecord, PayloadValue, SimulationEvent } from "./types.js";

export function createEvent(init: EventInit): SimulationEvent {
  if (init.kind.trim() === "") {
    throw new ConfigurationError("Event kind must be a non-empty string");
  }
  return Object.freeze({
    id: init.id ?? randomUUID(),
    kind: init.kind,
    timestamp: init.timestamp ?? new Date(),
    ...(init.source !== undefined ? { source: init.source } : {}),
    ...(init.target !== undefined ? { target: init.target } : {}),
    payload: Object.freeze({ ...(init.payload ?? {}) }),
  });
}

/** Source, target and payload participants, de-duplicated in encounter order. */
export function involvedAgents(event: SimulationEvent): string[] {
  const ids = new Set<string>();
  if (event.source) ids.add(event.source);
  if (event.target) ids.add(event.target);
  for (const p of payloadStringList(event, "participants")) ids.add(p);
  return [...ids];
}

export function payloadNumber(event: SimulationEvent, key: string, fallback: number): number {
  const v = event.payload[key];
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

export function payloadString(event: SimulationEvent, key: string): string | undefined {
  const v = event.payload[key];
  return typeof v === "string" ? v : undefined;
}

export const RELATIONSHIP_IMPACT_KEY = "relationship_impact";
export const RELATIONSHIP_REASON_KEY = "relationship_reason";

/** `relationship_impact` from the payload; the camel-case `relationshipImpact` is read as an alias. */
export function relationshipImpact(event: SimulationEvent, fallback: number): number {
  return payloadNumber(event, RELATIONSHIP_IMPACT_KEY, payloadNumber(event, "relationshipImpact", fallback));
}

/** `relationship_reason`, or its alias `relationshipReason`. */
export function relationshipReason(event: SimulationEvent): string | undefined {
  return payloadString(event, RELATIONSHIP_REASON_KEY) ?? payloadString(event, "relationshipReason");
}

export function payloadStringList(event: SimulationEvent, key: string): string[] {
  const v = event.payload[key];
  if (!Array.isArray(v)) return [];
  return v.filter((item): item is string => typeof item === "string");
}

export function payloadNumberMap(event: SimulationEvent, key: string): Record<string, number> {
  const v = event.payload[key];
  const out: Record<string, number> = {};
  if (v === null || typeof v !== "object" || Array.isArray(v)) return out;
  for (const [k, n] of Object.entries(v)) {
    if (typeof n === "number") out[k] = n;
  }
  return out;
}

export function payloadRecord(event: SimulationEvent, key: string): Record<string, PayloadValue> {
  const v = event.payload[key];
  if (v === null || typeof v !== "object" || Array.isArray(v)) return {};
  return { ...v };
}

export const payloadValueSchema: z.ZodType<PayloadValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(payloadValueSchema),
    z.record(payloadValueSchema),
  ]),
);

export const eventRecordSchema = z.object({
  id: z.string().min(1),
  kind: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  source: z.string().nullable(),
  target: z.string().nullable(),
  payload: z.record(payloadValueSchema),
});

export function eventToRecord(event: SimulationEvent): EventRecord {
  return {
    id: event.id,
    kind: event.kind,
    timestamp: event.timestamp.toISOString(),
    source: event.source ?? null,
    target: event.target ?? null,
    payload: { ...event.payload },
  };
}

export function eventFromRecord(raw: unknown): SimulationEvent {
  const parsed = eventRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid event record: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  const r = parsed.data;
  return createEvent({
    id: r.id,
    kind: r.kind,
    timestamp: new Date(r.timestamp),
    source: r.source ?? undefined,
    target: r.target ?? undefined,
    payload: r.payload,
  });
}
