import { describe, it, expect } from "vitest";
import {
  createEvent,
  eventFromRecord,
  eventToRecord,
  involvedAgents,
  payloadNumber,
  payloadNumberMap,
  payloadStringList,
} from "../events/event.js";
import { ConfigurationError } from "../errors.js";

describe("createEvent", () => {
  it("assigns a unique id and freezes the result", () => {
    const a = createEvent({ kind: "trade" });
    const b = createEvent({ kind: "trade" });
    expect(a.id).not.toBe(b.id);
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.payload)).toBe(true);
  });

  it("rejects an empty kind", () => {
    expect(() => createEvent({ kind: "  " })).toThrow(ConfigurationError);
  });

  it("does not share the caller's payload object", () => {
    const payload = { price: 3 };
    const event = createEvent({ kind: "price_change", payload });
    payload.price = 9;
    expect(event.payload["price"]).toBe(3);
  });
});

describe("payload accessors", () => {
  const event = createEvent({
    kind: "deal",
    source: "a",
    target: "b",
    payload: { participants: ["b", "c", 4, "a"], impact: "high", weights: { x: 1, y: "no" } },
  });

  it("lists involved agents once each in encounter order", () => {
    expect(involvedAgents(event)).toEqual(["a", "b", "c"]);
  });

  it("falls back when a value has the wrong type", () => {
    expect(payloadNumber(event, "impact", 0.5)).toBe(0.5);
    expect(payloadStringList(event, "impact")).toEqual([]);
    expect(payloadNumberMap(event, "weights")).toEqual({ x: 1 });
  });
});

describe("event records", () => {
  it("round-trips through JSON", () => {
    const event = createEvent({
      kind: "speech",
      source: "cato",
      timestamp: new Date("2024-03-01T12:00:00.000Z"),
      payload: { topic: "grain", stance: 0.4 },
    });
    const record = eventToRecord(event);
    expect(record.target).toBeNull();
    const restored = eventFromRecord(JSON.parse(JSON.stringify(record)));
    expect(eventToRecord(restored)).toEqual(record);
    expect(restored.target).toBeUndefined();
  });

  it("rejects records without a timestamp", () => {
    expect(() => eventFromRecord({ id: "x", kind: "k", source: null, target: null, payload: {} })).toThrow(
      ConfigurationError,
    );
  });
});
