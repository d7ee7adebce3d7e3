import type { EventBus, Unsubscribe } from "../events/event-bus.js";
import type { PayloadValue, SimulationEvent } from "../events/types.js";
import { type EventMemoryOptions, type MemoryItem, memoryFromEvent } from "../memory/memory-item.js";
import { MemoryStore } from "../memory/memory-store.js";

export type AgentState = Record<string, PayloadValue>;

export interface AgentConfig {
  id: string;
  name?: string;
  /** Mostly static traits; domain agents read them through typed accessors. */
  attributes?: Record<string, PayloadValue>;
  subscriptions?: string[];
  memory?: MemoryStore;
  /** Applied by `remember` when the caller gives no importance or decay rate. */
  memoryDefaults?: { importance: number; decayRate: number };
}

export type AgentRecord = {
  id: string;
  type: string;
  name: string;
  attributes: Record<string, PayloadValue>;
  state: AgentState;
  subscriptions: string[];
};

/**
 * An autonomous participant. Concrete agents differ in how they react to
 * events (`processEvent`) and what they do each tick (`generateAction`).
 */
export abstract class BaseAgent<TState extends AgentState = AgentState> {
  abstract readonly type: string;
  readonly id: string;
  readonly name: string;
  readonly memory: MemoryStore;
  protected readonly attributes: Record<string, PayloadValue>;
  protected state: TState;

  private readonly subscriptions = new Set<string>();
  private readonly busSubscriptions = new Map<string, Unsubscribe>();
  private bus: EventBus | undefined;
  private busPriority = 0;
  private eventHandler: ((event: SimulationEvent) => void | Promise<void>) | undefined;
  private lastActionAt: number | undefined;
  private readonly memoryDefaults: { importance: number; decayRate: number } | undefined;

  constructor(config: AgentConfig, initialState: TState) {
    this.id = config.id;
    this.name = config.name ?? config.id;
    this.attributes = { ...(config.attributes ?? {}) };
    this.state = initialState;
    this.memory = config.memory ?? new MemoryStore(config.id);
    this.memoryDefaults = config.memoryDefaults;
    for (const kind of config.subscriptions ?? []) this.subscriptions.add(kind);
  }

  abstract processEvent(event: SimulationEvent): void | Promise<void>;

  /** Called once per tick; at most one event. Agents pace themselves with `readyToAct`. */
  abstract generateAction(now: Date): SimulationEvent | undefined;

  getState(): TState {
    return { ...this.state };
  }

  updateState(patch: Partial<TState>): void {
    this.state = { ...this.state, ...patch };
  }

  getAttribute(key: string): PayloadValue | undefined {
    return this.attributes[key];
  }

  protected numberAttribute(key: string, fallback: number): number {
    const value = this.attributes[key];
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
  }

  protected stringAttribute(key: string, fallback: string): string {
    const value = this.attributes[key];
    return typeof value === "string" ? value : fallback;
  }

  subscribeToEvent(kind: string): void {
    this.subscriptions.add(kind);
    if (this.bus) this.listen(this.bus, kind, this.busPriority);
  }

  unsubscribeFromEvent(kind: string): void {
    this.subscriptions.delete(kind);
    this.busSubscriptions.get(kind)?.();
    this.busSubscriptions.delete(kind);
  }

  getSubscriptions(): string[] {
    return [...this.subscriptions];
  }

  /** Routes every subscribed kind on `bus` to `processEvent`. */
  attachTo(bus: EventBus, priority = 0): void {
    this.detach();
    this.bus = bus;
    this.busPriority = priority;
    for (const kind of this.subscriptions) this.listen(bus, kind, priority);
  }

  detach(): void {
    for (const unsubscribe of this.busSubscriptions.values()) unsubscribe();
    this.busSubscriptions.clear();
    this.bus = undefined;
  }

  /** True when no action was taken yet or `cooldownMs` has passed since the last one. */
  readyToAct(now: Date, cooldownMs: number): boolean {
    return this.lastActionAt === undefined || now.getTime() - this.lastActionAt >= cooldownMs;
  }

  protected markActed(now: Date): void {
    this.lastActionAt = now.getTime();
  }

  protected remember(event: SimulationEvent, opts: EventMemoryOptions = {}): MemoryItem {
    const item = memoryFromEvent(event, {
      ...opts,
      importance: opts.importance ?? this.memoryDefaults?.importance,
      decayRate: opts.decayRate ?? this.memoryDefaults?.decayRate,
    });
    this.memory.addMemory(item);
    return item;
  }

  toRecord(): AgentRecord {
    return {
      id: this.id,
      type: this.type,
      name: this.name,
      attributes: { ...this.attributes },
      state: { ...this.state },
      subscriptions: this.getSubscriptions(),
    };
  }

  private listen(bus: EventBus, kind: string, priority: number): void {
    if (this.busSubscriptions.has(kind)) return;
    this.busSubscriptions.set(kind, bus.subscribe(kind, this.handler(), priority));
  }

  private handler(): (event: SimulationEvent) => void | Promise<void> {
    if (!this.eventHandler) {
      const handler = (event: SimulationEvent): void | Promise<void> => this.processEvent(event);
      Object.defineProperty(handler, "name", { value: `agent:${this.id}` });
      this.eventHandler = handler;
    }
    return this.eventHandler;
  }
}
