import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { BaseAgent, type AgentConfig } from "../agents/base-agent.js";
import { AgentFactory } from "../agents/agent-factory.js";
import { AgentManager } from "../agents/agent-manager.js";
import { EventBus } from "../events/event-bus.js";
import { createEvent } from "../events/event.js";
import type { SimulationEvent } from "../events/types.js";
import { ConfigurationError } from "../errors.js";
import { CaptureSink, ConsoleSink, setLogSink } from "../logging/logger.js";

type EchoState = { heard: number; lastKind: string };

class EchoAgent extends BaseAgent<EchoState> {
  readonly type = "echo";

  constructor(config: AgentConfig) {
    super(config, { heard: 0, lastKind: "" });
  }

  processEvent(event: SimulationEvent): void {
    this.updateState({ heard: this.state.heard + 1, lastKind: event.kind });
    this.remember(event);
  }

  generateAction(now: Date): SimulationEvent | undefined {
    if (!this.readyToAct(now, 1_000)) return undefined;
    this.markActed(now);
    return createEvent({ kind: "echo", source: this.id, timestamp: now });
  }
}

class BrokenAgent extends BaseAgent {
  readonly type = "broken";

  constructor(config: AgentConfig) {
    super(config, {});
  }

  processEvent(): void {}

  generateAction(): SimulationEvent | undefined {
    throw new Error("gears jammed");
  }
}

const T0 = new Date("2024-03-01T00:00:00.000Z");

describe("BaseAgent", () => {
  it("receives subscribed events from the bus and remembers them", () => {
    const bus = new EventBus();
    const agent = new EchoAgent({ id: "e1", subscriptions: ["speech"], memoryDefaults: { importance: 0.7, decayRate: 0.02 } });
    agent.attachTo(bus);

    bus.publish(createEvent({ kind: "speech", source: "x" }));
    bus.publish(createEvent({ kind: "vote", source: "x" }));

    expect(agent.getState()).toEqual({ heard: 1, lastKind: "speech" });
    const [memory] = agent.memory.getAllMemories();
    expect(memory?.importance).toBe(0.7);
    expect(memory?.decayRate).toBe(0.02);
  });

  it("follows subscription changes while attached and stops after detach", () => {
    const bus = new EventBus();
    const agent = new EchoAgent({ id: "e1" });
    agent.attachTo(bus);
    agent.subscribeToEvent("vote");
    bus.publish(createEvent({ kind: "vote" }));
    agent.unsubscribeFromEvent("vote");
    bus.publish(createEvent({ kind: "vote" }));
    agent.subscribeToEvent("vote");
    agent.detach();
    bus.publish(createEvent({ kind: "vote" }));

    expect(agent.getState().heard).toBe(1);
    expect(agent.getSubscriptions()).toEqual(["vote"]);
  });

  it("keeps its attach priority for kinds subscribed later", () => {
    const bus = new EventBus();
    const order: string[] = [];
    bus.subscribe("vote", () => { order.push("observer"); }, 5);
    const agent = new EchoAgent({ id: "e1" });
    agent.attachTo(bus, 10);
    agent.subscribeToEvent("vote");
    bus.subscribe("vote", () => { order.push(`after:${agent.getState().heard}`); }, 1);

    bus.publish(createEvent({ kind: "vote" }));

    expect(order).toEqual(["observer", "after:1"]);
    expect(bus.getHandlers("vote")[0]?.name).toBe("agent:e1");
  });

  it("names its bus handler after the agent", () => {
    const bus = new EventBus();
    const agent = new EchoAgent({ id: "e7", subscriptions: ["speech"] });
    agent.attachTo(bus);
    bus.publish(createEvent({ kind: "speech" }));
    expect(bus.getHandlerMetrics().map((m) => m.name)).toEqual(["agent:e7"]);
  });

  it("paces itself with a cooldown", () => {
    const agent = new EchoAgent({ id: "e1" });
    expect(agent.generateAction(T0)?.kind).toBe("echo");
    expect(agent.generateAction(new Date(T0.getTime() + 500))).toBeUndefined();
    expect(agent.generateAction(new Date(T0.getTime() + 1_000))?.source).toBe("e1");
  });

  it("serialises its identity, traits and state", () => {
    const agent = new EchoAgent({ id: "e1", name: "Echo", attributes: { volume: 3 }, subscriptions: ["speech"] });
    expect(agent.toRecord()).toEqual({
      id: "e1",
      type: "echo",
      name: "Echo",
      attributes: { volume: 3 },
      state: { heard: 0, lastKind: "" },
      subscriptions: ["speech"],
    });
  });
});

describe("AgentFactory", () => {
  let factory: AgentFactory;

  beforeEach(() => {
    factory = new AgentFactory();
    factory.registerAgentType("echo", (config) => new EchoAgent(config));
  });

  it("builds agents by type name", () => {
    const agent = factory.createAgent("echo", { id: "e1" });
    expect(agent).toBeInstanceOf(EchoAgent);
    expect(factory.getRegisteredTypes()).toEqual(["echo"]);
  });

  it("applies a template before construction", () => {
    factory.registerTemplate("loud", (config) => ({ ...config, attributes: { ...config.attributes, volume: 11 } }));
    const agent = factory.createAgent("echo", { id: "e1", attributes: { pitch: 2 } }, "loud");
    expect(agent.getAttribute("volume")).toBe(11);
    expect(agent.getAttribute("pitch")).toBe(2);
    expect(factory.getRegisteredTemplates()).toEqual(["loud"]);
  });

  it("fails fast on duplicate registrations and unknown names", () => {
    expect(() => factory.registerAgentType("echo", (config) => new EchoAgent(config))).toThrow(ConfigurationError);
    factory.registerTemplate("t", (c) => c);
    expect(() => factory.registerTemplate("t", (c) => c)).toThrow(ConfigurationError);
    expect(() => factory.createAgent("ghost", { id: "g" })).toThrow('Unknown agent type "ghost"');
    expect(() => factory.createAgent("echo", { id: "g" }, "ghost")).toThrow('Unknown agent template "ghost"');
  });
});

describe("AgentManager", () => {
  let sink: CaptureSink;

  beforeEach(() => {
    sink = new CaptureSink();
    setLogSink(sink);
  });

  afterEach(() => {
    setLogSink(new ConsoleSink());
  });

  it("collects one action per ready agent and survives a failing agent", () => {
    const manager = new AgentManager();
    manager.addAgent(new EchoAgent({ id: "e1" }));
    manager.addAgent(new BrokenAgent({ id: "b1" }));
    manager.addAgent(new EchoAgent({ id: "e2" }));

    const events = manager.updateAll(T0);
    expect(events.map((e) => e.source)).toEqual(["e1", "e2"]);
    expect(sink.byLevel("error").map((e) => e.data)).toEqual([
      { agentId: "b1", type: "broken", error: "gears jammed" },
    ]);
    expect(manager.updateAll(T0)).toEqual([]);
  });

  it("looks agents up by id and type", () => {
    const manager = new AgentManager();
    manager.addAgent(new EchoAgent({ id: "e1" }));
    manager.addAgent(new BrokenAgent({ id: "b1" }));

    expect(manager.getAgent("e1")?.type).toBe("echo");
    expect(manager.getAgent("missing")).toBeUndefined();
    expect(manager.getAgentsByType("broken").map((a) => a.id)).toEqual(["b1"]);
    expect(() => manager.addAgent(new EchoAgent({ id: "e1" }))).toThrow(ConfigurationError);

    expect(manager.removeAgent("e1")).toBe(true);
    expect(manager.removeAgent("e1")).toBe(false);
    expect(manager.size).toBe(1);
  });

  it("detaches removed agents from the bus", () => {
    const bus = new EventBus();
    const manager = new AgentManager();
    const agent = new EchoAgent({ id: "e1", subscriptions: ["speech"] });
    agent.attachTo(bus);
    manager.addAgent(agent);
    manager.removeAgent("e1");
    bus.publish(createEvent({ kind: "speech" }));
    expect(agent.getState().heard).toBe(0);
  });
});
