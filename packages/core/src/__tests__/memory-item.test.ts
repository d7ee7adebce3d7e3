import { describe, it, expect } from "vitest";
import {
  MemoryItem,
  memoryFromEvent,
  relationshipImpactMemory,
  stanceChangeMemory,
} from "../memory/memory-item.js";
import { tokenize, contentTokens } from "../memory/text.js";
import { createEvent } from "../events/event.js";
import { ConfigurationError } from "../errors.js";

const T0 = new Date("2024-03-01T00:00:00.000Z");
const daysAfter = (days: number): Date => new Date(T0.getTime() + days * 86_400_000);

describe("MemoryItem", () => {
  it("decays exponentially with elapsed days", () => {
    const m = new MemoryItem({ content: "x", timestamp: T0, importance: 0.8, decayRate: 0.1, emotionalImpact: 0 });
    expect(m.currentStrength(daysAfter(10))).toBeCloseTo(0.2943, 4);
  });

  it("never gets stronger as time passes", () => {
    const m = new MemoryItem({ content: "x", timestamp: T0, importance: 0.6, decayRate: 0.2 });
    const samples = [0, 0.5, 1, 3, 7, 30].map((d) => m.currentStrength(daysAfter(d)));
    for (let i = 1; i < samples.length; i++) {
      expect(samples[i]).toBeLessThanOrEqual(samples[i - 1] ?? 1);
    }
  });

  it("holds constant strength with a zero decay rate", () => {
    const m = new MemoryItem({ content: "x", timestamp: T0, importance: 0.4, decayRate: 0 });
    expect(m.currentStrength(daysAfter(0))).toBe(0.4);
    expect(m.currentStrength(daysAfter(365))).toBe(0.4);
  });

  it("boosts strength by emotional impact and clamps at 1", () => {
    const m = new MemoryItem({ content: "x", timestamp: T0, importance: 0.5, decayRate: 0, emotionalImpact: -0.8 });
    expect(m.currentStrength(T0)).toBeCloseTo(0.7, 10);
    const strong = new MemoryItem({ content: "x", timestamp: T0, importance: 0.9, decayRate: 0, emotionalImpact: 1 });
    expect(strong.currentStrength(T0)).toBe(1);
  });

  it("treats a query time before the memory as zero elapsed days", () => {
    const m = new MemoryItem({ content: "x", timestamp: T0, importance: 0.5, decayRate: 0.5 });
    expect(m.currentStrength(daysAfter(-3))).toBe(0.5);
  });

  it("clamps every numeric field on construction and update", () => {
    const m = new MemoryItem({ content: "x", importance: 2, decayRate: -1, emotionalImpact: -3 });
    expect(m.importance).toBe(1);
    expect(m.decayRate).toBe(0);
    expect(m.emotionalImpact).toBe(-1);

    m.updateImportance(-0.5);
    m.updateDecayRate(7);
    expect(m.importance).toBe(0);
    expect(m.decayRate).toBe(1);
  });

  it("categorises by importance, with core reserved for non-decaying memories", () => {
    const at = (importance: number, decayRate = 0.1): string =>
      new MemoryItem({ content: "x", importance, decayRate }).category();
    expect(at(0.95, 0)).toBe("core");
    expect(at(0.95)).toBe("long_term");
    expect(at(0.7)).toBe("long_term");
    expect(at(0.4)).toBe("medium_term");
    expect(at(0.39)).toBe("short_term");
  });

  it("scores relevance from tags, topic and subject blended with strength", () => {
    const m = new MemoryItem({
      content: "x",
      timestamp: T0,
      importance: 0.5,
      decayRate: 0.1,
      tags: ["trade", "a"],
      associations: { topic: "grain" },
    });
    // tags 0.3 * 1/2 + topic 0.3 = 0.45; 0.45 * 0.7 + 0.5 * 0.3
    expect(m.relevance({ tags: ["trade"], topic: "grain" }, T0)).toBeCloseTo(0.465, 10);
    expect(m.relevance({ subject: "nobody" }, T0)).toBeCloseTo(0.15, 10);
  });

  it("round-trips through its record form", () => {
    const m = new MemoryItem({
      id: "mem-1",
      kind: "reaction",
      timestamp: T0,
      content: { text: "applause", score: 3, nested: [true, null] },
      importance: 0.65,
      decayRate: 0.07,
      emotionalImpact: -0.25,
      tags: ["reaction", "speech"],
      associations: { eventId: "e-9", weight: 2 },
    });
    const copy = MemoryItem.fromRecord(JSON.parse(JSON.stringify(m.toRecord())));
    expect(copy.toRecord()).toEqual(m.toRecord());
    expect(copy.timestamp.getTime()).toBe(T0.getTime());
  });

  it("rejects malformed records", () => {
    expect(() => MemoryItem.fromRecord({ id: "", timestamp: "yesterday", content: 1 })).toThrow(ConfigurationError);
  });
});

describe("memory factories", () => {
  it("remembers an event with its kind, source and topic", () => {
    const event = createEvent({
      id: "evt-7",
      kind: "speech",
      source: "cato",
      target: "cicero",
      timestamp: T0,
      payload: { topic: "grain" },
    });
    const m = memoryFromEvent(event, { importance: 0.6 });
    expect(m.kind).toBe("event");
    expect(m.tags).toEqual(["speech", "cato"]);
    expect(m.associations).toEqual({
      eventKind: "speech",
      eventId: "evt-7",
      source: "cato",
      target: "cicero",
      topic: "grain",
    });
    expect(m.importance).toBe(0.6);
    expect(m.timestamp).toEqual(T0);
  });

  it("records stance changes as fairly durable memories", () => {
    const m = stanceChangeMemory({ topic: "tariffs", oldStance: "oppose", newStance: "support", reason: "persuaded" });
    expect(m.importance).toBe(0.7);
    expect(m.decayRate).toBe(0.05);
    expect(m.associations["newStance"]).toBe("support");
    expect(m.content).toBe("Changed stance on tariffs from oppose to support: persuaded");
  });

  it("derives emotional impact from a relationship change", () => {
    const m = relationshipImpactMemory({ subject: "b", relationshipType: "business", change: -0.1, reason: "breach" });
    expect(m.importance).toBe(0.6);
    expect(m.decayRate).toBe(0.08);
    expect(m.emotionalImpact).toBeCloseTo(-0.5, 10);
    expect(m.tags).toEqual(["relationship", "b"]);
  });
});

describe("tokenize", () => {
  it("lower-cases, strips edge punctuation and drops short tokens", () => {
    expect(tokenize("The Senate's VOTE, on (grain)!")).toEqual(["the", "senate's", "vote", "grain"]);
  });

  it("collects tokens from every string inside structured content", () => {
    const tokens = contentTokens({ title: "Grain prices", lines: ["rising fast", 42], meta: { note: "Up!" } });
    expect([...tokens].sort()).toEqual(["fast", "grain", "prices", "rising"]);
  });
});
