import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CaptureSink, ConsoleSink, setLogSink } from "@agora/core";
import { appRouter } from "../app-router.js";
import { SimulationService } from "../simulation-service.js";
import { createCallerFactory } from "../trpc.js";

const createCaller = createCallerFactory(appRouter);

describe("appRouter", () => {
  let simulation: SimulationService;
  let caller: ReturnType<typeof createCaller>;

  beforeEach(() => {
    setLogSink(new CaptureSink());
    simulation = new SimulationService({ domain: "senate", agents: 3 });
    caller = createCaller({ simulation });
  });

  afterEach(() => {
    simulation.stop();
    setLogSink(new ConsoleSink());
  });

  it("advances a tick and reports the new state", async () => {
    const result = await caller.simulation.advanceTick();
    expect(result.tick).toBe(1);
    expect(result.now).toBe("2000-01-02T00:00:00.000Z");
    expect(result.events.map((e) => e.kind)).toEqual(["agenda"]);

    const state = await caller.simulation.getState();
    expect(state).toEqual({
      tick: 1,
      now: "2000-01-02T00:00:00.000Z",
      domain: "senate",
      agents: 3,
      relationships: 6,
      queueLength: 0,
    });
  });

  it("journals published events with their tick", async () => {
    await caller.simulation.advanceTick();

    const log = await caller.events.getLog({ kind: "agenda" });
    expect(log).toHaveLength(1);
    expect(log[0]?.tick).toBe(1);
    expect(log[0]?.event.kind).toBe("agenda");

    const metrics = await caller.simulation.getMetrics();
    expect(metrics.journaledEvents).toBe(1);
    expect(metrics.relationshipsByType).toEqual({ political: 3, personal: 3 });
  });

  it("lists agents and returns null for an unknown id", async () => {
    const agents = await caller.agents.getAll();
    expect(agents.map((a) => a.id)).toEqual(["senator-1", "senator-2", "senator-3"]);
    expect((await caller.agents.getById({ id: "senator-2" }))?.type).toBe("senator");
    expect(await caller.agents.getById({ id: "nobody" })).toBeNull();
  });

  it("queries an agent's memories", async () => {
    await caller.simulation.advanceTick();

    const memories = await caller.agents.getMemories({ agentId: "senator-1", tags: ["agenda"] });
    expect(memories).toHaveLength(1);
    expect(memories?.[0]?.kind).toBe("event");
    expect(await caller.agents.getMemories({ agentId: "nobody" })).toBeNull();
  });

  it("answers relationship queries", async () => {
    const between = await caller.relationships.getBetween({ agentA: "senator-2", agentB: "senator-1" });
    expect(between.map((r) => r.type).sort()).toEqual(["personal", "political"]);
    expect(await caller.relationships.getBetween({ agentA: "senator-1", agentB: "senator-2", type: "rival" })).toEqual([]);

    expect(await caller.relationships.getOfAgent({ agentId: "senator-1" })).toHaveLength(4);
    expect(await caller.relationships.getByType({ type: "political" })).toHaveLength(3);

    const graph = await caller.relationships.getGraph({ centerId: "senator-1", depth: 1 });
    expect(graph.agents.sort()).toEqual(["senator-2", "senator-3"]);
    expect(graph.relationships).toHaveLength(4);
  });

  it("rejects a graph deeper than three hops", async () => {
    await expect(caller.relationships.getGraph({ centerId: "senator-1", depth: 5 })).rejects.toThrow();
  });
});
