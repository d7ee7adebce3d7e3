import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EventBus } from "../events/event-bus.js";
import { createEvent } from "../events/event.js";
import type { SimulationEvent } from "../events/types.js";
import { QueueOverflowError } from "../errors.js";
import { CaptureSink, setLogSink, setLogLevel, ConsoleSink } from "../logging/logger.js";

function speech(id?: string): SimulationEvent {
  return createEvent({ kind: "speech", source: "a", id });
}

describe("EventBus", () => {
  let sink: CaptureSink;

  beforeEach(() => {
    sink = new CaptureSink();
    setLogSink(sink);
    setLogLevel("debug");
  });

  afterEach(() => {
    setLogSink(new ConsoleSink());
    setLogLevel("info");
  });

  describe("synchronous dispatch", () => {
    it("invokes handlers in descending priority", () => {
      const bus = new EventBus();
      const calls: string[] = [];
      bus.subscribe("speech", () => { calls.push("H3"); }, 0);
      bus.subscribe("speech", () => { calls.push("H1"); }, 2);
      bus.subscribe("speech", () => { calls.push("H2"); }, 1);

      expect(bus.publish(speech())).toBe(true);
      expect(calls).toEqual(["H1", "H2", "H3"]);
    });

    it("breaks priority ties by registration order", () => {
      const bus = new EventBus();
      const calls: string[] = [];
      bus.subscribe("speech", () => { calls.push("first"); });
      bus.subscribeToAll(() => { calls.push("wildcard"); });
      bus.subscribe("speech", () => { calls.push("third"); });

      bus.publish(speech());
      expect(calls).toEqual(["first", "wildcard", "third"]);
    });

    it("counts wildcard and type-specific deliveries separately", () => {
      const bus = new EventBus();
      let wildcard = 0;
      let specific = 0;
      bus.subscribeToAll(() => { wildcard++; });
      bus.subscribe("speech", () => { specific++; });

      bus.publish(createEvent({ kind: "speech" }));
      bus.publish(createEvent({ kind: "reaction" }));

      expect(wildcard).toBe(2);
      expect(specific).toBe(1);
    });

    it("treats a repeated subscription as one, keeping the latest priority", () => {
      const bus = new EventBus();
      const calls: string[] = [];
      const repeated = (): void => { calls.push("repeated"); };
      bus.subscribe("speech", repeated, 0);
      bus.subscribe("speech", () => { calls.push("other"); }, 1);
      bus.subscribe("speech", repeated, 5);

      bus.publish(speech());
      expect(calls).toEqual(["repeated", "other"]);
    });

    it("delivers a handler subscribed both ways only once", () => {
      const bus = new EventBus();
      let count = 0;
      const handler = (): void => { count++; };
      bus.subscribe("speech", handler);
      bus.subscribeToAll(handler);

      bus.publish(speech());
      expect(count).toBe(1);
      expect(bus.getHandlers("speech")).toHaveLength(1);
    });

    it("stops delivering after unsubscribe", () => {
      const bus = new EventBus();
      let count = 0;
      const off = bus.subscribe("speech", () => { count++; });
      bus.publish(speech());
      off();
      bus.publish(speech());
      bus.unsubscribe("speech", () => undefined);
      expect(count).toBe(1);
    });

    it("invalidates cached handler lists when a wildcard handler leaves", () => {
      const bus = new EventBus();
      const wildcard = (): void => undefined;
      bus.subscribeToAll(wildcard);
      expect(bus.getHandlers("vote")).toEqual([wildcard]);
      bus.unsubscribeFromAll(wildcard);
      expect(bus.getHandlers("vote")).toEqual([]);
    });

    it("hands out a copy of the handler list that dispatch does not see", () => {
      const bus = new EventBus();
      const calls: string[] = [];
      const first = (): void => { calls.push("first"); };
      bus.subscribe("speech", first);

      const listed = bus.getHandlers("speech");
      listed.push(() => { calls.push("extra"); });
      listed.reverse();
      bus.publish(speech());

      expect(calls).toEqual(["first"]);
      expect(bus.getHandlers("speech")).toEqual([first]);
    });
  });

  describe("filters", () => {
    it("drops rejected events before any handler runs", () => {
      const bus = new EventBus();
      let count = 0;
      bus.subscribe("speech", () => { count++; });
      const noSpeeches = (e: SimulationEvent): boolean => e.kind !== "speech";
      bus.addFilter(noSpeeches);

      expect(bus.publish(speech())).toBe(false);
      expect(count).toBe(0);
      expect(bus.getMetrics().eventsFiltered).toBe(1);

      bus.removeFilter(noSpeeches);
      expect(bus.publish(speech())).toBe(true);
      expect(count).toBe(1);
    });
  });

  describe("handler errors", () => {
    it("keeps delivering after a handler throws and logs the failure", () => {
      const bus = new EventBus();
      const calls: string[] = [];
      const failing = (): void => {
        throw new Error("boom");
      };
      bus.subscribe("speech", failing, 1);
      bus.subscribe("speech", () => { calls.push("after"); }, 0);

      expect(bus.publish(speech("evt-1"))).toBe(true);
      expect(calls).toEqual(["after"]);
      expect(bus.getMetrics().handlerErrors).toBe(1);

      const [entry] = sink.byLevel("error");
      expect(entry?.message).toBe("Event handler failed");
      expect(entry?.data).toEqual({ handler: "failing", kind: "speech", eventId: "evt-1", error: "boom" });
    });

    it("counts a rejected async handler as an error", async () => {
      const bus = new EventBus();
      bus.subscribe("speech", async () => {
        throw new Error("later");
      });
      bus.publish(speech());
      await new Promise((resolve) => setTimeout(resolve, 0));
      expect(bus.getMetrics().handlerErrors).toBe(1);
    });

    it("tracks per-handler call counts", () => {
      const bus = new EventBus();
      const tally = (): void => undefined;
      bus.subscribe("speech", tally);
      bus.publish(speech());
      bus.publish(speech());
      const [stats] = bus.getHandlerMetrics();
      expect(stats?.name).toBe("tally");
      expect(stats?.calls).toBe(2);
      expect(stats?.errors).toBe(0);
    });
  });

  describe("asynchronous mode", () => {
    it("queues on publish and drains on stop", () => {
      const bus = new EventBus({ async: true });
      const seen: string[] = [];
      bus.subscribe("speech", (e) => { seen.push(e.id); });

      expect(bus.publish(speech("e1"))).toBe(true);
      expect(bus.publish(speech("e2"))).toBe(true);
      expect(seen).toEqual([]);
      expect(bus.queueLength).toBe(2);

      bus.stop();
      expect(seen).toEqual(["e1", "e2"]);
      expect(bus.queueLength).toBe(0);
      expect(bus.getMetrics().eventsProcessed).toBe(2);
    });

    it("processes queued events in publish order through the worker", async () => {
      const bus = new EventBus({ async: true, batchSize: 2 });
      const seen: string[] = [];
      bus.subscribe("speech", (e) => { seen.push(e.id); });
      for (const id of ["e1", "e2", "e3", "e4", "e5"]) bus.publish(speech(id));

      await bus.drain();
      expect(seen).toEqual(["e1", "e2", "e3", "e4", "e5"]);
      bus.stop();
    });

    it("applies filters at publish time so rejected events never queue", () => {
      const bus = new EventBus({ async: true });
      bus.addFilter(() => false);
      expect(bus.publish(speech())).toBe(false);
      expect(bus.queueLength).toBe(0);
      expect(bus.getMetrics().eventsFiltered).toBe(1);
      bus.stop();
    });

    it("drops the incoming event when full under drop-newest", () => {
      const bus = new EventBus({ async: true, maxQueueSize: 2, overflow: "drop-newest" });
      const seen: string[] = [];
      bus.subscribe("speech", (e) => { seen.push(e.id); });

      bus.publish(speech("e1"));
      bus.publish(speech("e2"));
      expect(bus.publish(speech("e3"))).toBe(false);

      bus.stop();
      expect(seen).toEqual(["e1", "e2"]);
      expect(bus.getMetrics().eventsDropped).toBe(1);
    });

    it("evicts the oldest event when full under drop-oldest", () => {
      const bus = new EventBus({ async: true, maxQueueSize: 2, overflow: "drop-oldest" });
      const seen: string[] = [];
      bus.subscribe("speech", (e) => { seen.push(e.id); });

      bus.publish(speech("e1"));
      bus.publish(speech("e2"));
      expect(bus.publish(speech("e3"))).toBe(true);

      bus.stop();
      expect(seen).toEqual(["e2", "e3"]);
      expect(bus.getMetrics().queueHighWaterMark).toBe(2);
    });

    it("throws when full under reject", () => {
      const bus = new EventBus({ async: true, maxQueueSize: 1, overflow: "reject" });
      bus.publish(speech());
      expect(() => bus.publish(speech())).toThrow(QueueOverflowError);
      bus.stop();
    });

    it("finishes everything queued on shutdown", async () => {
      const bus = new EventBus({ async: true, batchSize: 1, batchIntervalMs: 5 });
      let count = 0;
      bus.subscribe("speech", () => { count++; });
      for (let i = 0; i < 4; i++) bus.publish(speech());

      await bus.shutdown(1);
      expect(count).toBe(4);
      expect(bus.queueLength).toBe(0);
    });

    it("stays halted after stop, dispatching later publishes on the caller", () => {
      const bus = new EventBus({ async: true });
      const seen: string[] = [];
      bus.subscribe("speech", (e) => {
        seen.push(e.id);
        if (e.id === "e1") bus.publish(speech("reply"));
      });

      bus.publish(speech("e1"));
      bus.stop();
      expect(seen).toEqual(["e1", "reply"]);

      expect(bus.publish(speech("late"))).toBe(true);
      expect(seen).toEqual(["e1", "reply", "late"]);
      expect(bus.queueLength).toBe(0);
      expect(sink.entries.filter((e) => e.message === "Event worker started")).toHaveLength(1);

      bus.start();
      bus.publish(speech("queued"));
      expect(bus.queueLength).toBe(1);
      bus.stop();
      expect(seen).toEqual(["e1", "reply", "late", "queued"]);
    });
  });

  it("clear removes subscriptions, filters and queued events", () => {
    const bus = new EventBus({ async: true });
    let count = 0;
    bus.subscribe("speech", () => { count++; });
    bus.addFilter(() => true);
    bus.publish(speech());
    bus.clear();
    bus.stop();
    expect(count).toBe(0);
    expect(bus.getHandlers("speech")).toEqual([]);
  });
});
