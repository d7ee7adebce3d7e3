import { QueueOverflowError } from "../errors.js";
import type { OverflowPolicy } from "../config.js";
import { createLogger, describeError } from "../logging/logger.js";
import type { EventFilter, EventHandler, SimulationEvent } from "./types.js";

const log = createLogger("event-bus");

const SLOW_DISPATCH_MS = 100;

export interface EventBusOptions {
  /** Queue accepted events and dispatch them in batches off the publisher's call stack. */
  async?: boolean;
  batchSize?: number;
  maxQueueSize?: number;
  overflow?: OverflowPolicy;
  batchIntervalMs?: number;
  stopTimeoutMs?: number;
  monitorPerformance?: boolean;
}

export interface BusMetrics {
  eventsPublished: number;
  eventsFiltered: number;
  eventsQueued: number;
  eventsProcessed: number;
  eventsDropped: number;
  handlerCalls: number;
  handlerErrors: number;
  queueHighWaterMark: number;
  maxProcessingMs: number;
}

export interface HandlerMetrics {
  name: string;
  calls: number;
  errors: number;
  totalMs: number;
  avgMs: number;
}

interface Registration {
  priority: number;
  seq: number;
}

export type Unsubscribe = () => void;

export class EventBus {
  private readonly handlers = new Map<string, Map<EventHandler, Registration>>();
  private readonly wildcard = new Map<EventHandler, Registration>();
  private readonly filters: EventFilter[] = [];
  private readonly cache = new Map<string, readonly EventHandler[]>();
  private readonly handlerMetrics = new Map<EventHandler, HandlerMetrics>();
  private nextSeq = 0;

  private readonly queue: SimulationEvent[] = [];
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;
  private drainWaiters: (() => void)[] = [];

  private readonly asyncMode: boolean;
  private readonly batchSize: number;
  private readonly maxQueueSize: number;
  private readonly overflow: OverflowPolicy;
  private readonly batchIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly monitor: boolean;

  private readonly metrics: BusMetrics = {
    eventsPublished: 0,
    eventsFiltered: 0,
    eventsQueued: 0,
    eventsProcessed: 0,
    eventsDropped: 0,
    handlerCalls: 0,
    handlerErrors: 0,
    queueHighWaterMark: 0,
    maxProcessingMs: 0,
  };

  constructor(options: EventBusOptions = {}) {
    this.asyncMode = options.async ?? false;
    this.batchSize = Math.max(1, options.batchSize ?? 10);
    this.maxQueueSize = Math.max(1, options.maxQueueSize ?? 10_000);
    this.overflow = options.overflow ?? "drop-newest";
    this.batchIntervalMs = options.batchIntervalMs ?? 0;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 1_000;
    this.monitor = options.monitorPerformance ?? true;

    if (this.asyncMode) this.start();
    log.info("Initialized event bus", { async: this.asyncMode, batchSize: this.batchSize });
  }

  get isAsync(): boolean {
    return this.asyncMode;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  // ── Subscriptions ───────────────────────────────────────────────────────────

  subscribe(kind: string, handler: EventHandler, priority = 0): Unsubscribe {
    let registrations = this.handlers.get(kind);
    if (!registrations) {
      registrations = new Map();
      this.handlers.set(kind, registrations);
    }
    this.register(registrations, handler, priority);
    this.cache.delete(kind);
    return () => this.unsubscribe(kind, handler);
  }

  subscribeToAll(handler: EventHandler, priority = 0): Unsubscribe {
    this.register(this.wildcard, handler, priority);
    this.cache.clear();
    log.debug("Wildcard handler subscribed", { handler: handlerName(handler), priority });
    return () => this.unsubscribeFromAll(handler);
  }

  unsubscribe(kind: string, handler: EventHandler): void {
    const registrations = this.handlers.get(kind);
    if (!registrations?.delete(handler)) return;
    if (registrations.size === 0) this.handlers.delete(kind);
    this.cache.delete(kind);
    this.forgetMetricsIfUnused(handler);
  }

  unsubscribeFromAll(handler: EventHandler): void {
    if (this.wildcard.delete(handler)) {
      this.cache.clear();
    }
    for (const [kind, registrations] of [...this.handlers]) {
      if (!registrations.delete(handler)) continue;
      if (registrations.size === 0) this.handlers.delete(kind);
      this.cache.delete(kind);
    }
    this.handlerMetrics.delete(handler);
  }

  addFilter(filter: EventFilter): void {
    this.filters.push(filter);
  }

  removeFilter(filter: EventFilter): void {
    const idx = this.filters.indexOf(filter);
    if (idx >= 0) this.filters.splice(idx, 1);
  }

  /** Kind-specific plus wildcard handlers, highest priority first, ties in registration order. */
  getHandlers(kind: string): EventHandler[] {
    return [...this.handlersFor(kind)];
  }

  private handlersFor(kind: string): readonly EventHandler[] {
    const cached = this.cache.get(kind);
    if (cached) return cached;

    const entries: [EventHandler, Registration][] = [...this.wildcard];
    const specific = this.handlers.get(kind);
    if (specific) {
      for (const [handler, reg] of specific) {
        // A handler subscribed both ways is delivered once, at its higher priority.
        const existing = entries.findIndex(([h]) => h === handler);
        if (existing < 0) entries.push([handler, reg]);
        else if (reg.priority > entries[existing][1].priority) entries[existing] = [handler, reg];
      }
    }
    entries.sort(([, a], [, b]) => b.priority - a.priority || a.seq - b.seq);
    const sorted = entries.map(([handler]) => handler);
    this.cache.set(kind, sorted);
    return sorted;
  }

  // ── Publishing ──────────────────────────────────────────────────────────────

  /** Returns false when a filter rejected the event or a full queue dropped it. */
  publish(event: SimulationEvent): boolean {
    this.metrics.eventsPublished++;

    // Once stopped, nothing queues until an explicit start().
    if (!this.asyncMode || this.stopped) return this.dispatch(event);

    if (!this.passesFilters(event)) return false;
    if (!this.enqueue(event)) return false;
    this.schedule(0);
    return true;
  }

  private passesFilters(event: SimulationEvent): boolean {
    for (const filter of this.filters) {
      if (!filter(event)) {
        this.metrics.eventsFiltered++;
        log.debug("Event filtered", { kind: event.kind, id: event.id });
        return false;
      }
    }
    return true;
  }

  private enqueue(event: SimulationEvent): boolean {
    if (this.queue.length >= this.maxQueueSize) {
      switch (this.overflow) {
        case "reject":
          throw new QueueOverflowError(this.maxQueueSize);
        case "drop-oldest": {
          const evicted = this.queue.shift();
          this.metrics.eventsDropped++;
          log.warn("Event queue full, dropped oldest event", { kind: evicted?.kind, id: evicted?.id });
          break;
        }
        case "drop-newest":
          this.metrics.eventsDropped++;
          log.warn("Event queue full, dropped incoming event", { kind: event.kind, id: event.id });
          return false;
      }
    }
    this.queue.push(event);
    this.metrics.eventsQueued++;
    if (this.queue.length > this.metrics.queueHighWaterMark) {
      this.metrics.queueHighWaterMark = this.queue.length;
    }
    return true;
  }

  private dispatch(event: SimulationEvent): boolean {
    if (!this.passesFilters(event)) return false;
    this.deliver(event);
    return true;
  }

  /** Invokes every handler for the event; filters have already run. */
  private deliver(event: SimulationEvent): void {
    const started = performance.now();
    const handlers = this.handlersFor(event.kind);

    for (const handler of handlers) {
      const handlerStarted = this.monitor ? performance.now() : 0;
      let failed = false;
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          void result.catch((err: unknown) => this.recordHandlerError(handler, event, err));
        }
      } catch (err) {
        failed = true;
        this.recordHandlerError(handler, event, err);
      }
      this.metrics.handlerCalls++;
      if (this.monitor) this.recordHandlerCall(handler, performance.now() - handlerStarted, failed);
    }

    const elapsed = performance.now() - started;
    if (elapsed > this.metrics.maxProcessingMs) this.metrics.maxProcessingMs = elapsed;
    if (elapsed > SLOW_DISPATCH_MS) {
      log.warn("Slow event dispatch", { kind: event.kind, ms: Math.round(elapsed), handlers: handlers.length });
    }
  }

  private recordHandlerError(handler: EventHandler, event: SimulationEvent, err: unknown): void {
    this.metrics.handlerErrors++;
    const stats = this.handlerMetrics.get(handler);
    if (stats) stats.errors++;
    log.error("Event handler failed", {
      handler: handlerName(handler),
      kind: event.kind,
      eventId: event.id,
      error: describeError(err),
    });
  }

  private recordHandlerCall(handler: EventHandler, ms: number, failed: boolean): void {
    let stats = this.handlerMetrics.get(handler);
    if (!stats) {
      stats = { name: handlerName(handler), calls: 0, errors: failed ? 1 : 0, totalMs: 0, avgMs: 0 };
      this.handlerMetrics.set(handler, stats);
    }
    stats.calls++;
    stats.totalMs += ms;
    stats.avgMs = stats.totalMs / stats.calls;
  }

  // ── Async worker ────────────────────────────────────────────────────────────

  /** Starts the batch worker, or restarts it after `stop()`. */
  start(): void {
    if (!this.asyncMode || this.running) return;
    this.running = true;
    this.stopped = false;
    log.info("Event worker started");
    if (this.queue.length > 0) this.schedule(0);
  }

  private schedule(delayMs: number): void {
    if (this.timer !== null || !this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runBatch();
    }, delayMs);
  }

  private runBatch(): void {
    const batch = this.queue.splice(0, this.batchSize);
    for (const event of batch) {
      this.deliver(event);
      this.metrics.eventsProcessed++;
    }
    if (this.queue.length > 0) {
      this.schedule(this.batchIntervalMs);
    } else {
      this.notifyDrained();
    }
  }

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  /** Resolves once the worker has emptied the queue. */
  drain(): Promise<void> {
    if (this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
      this.schedule(0);
    });
  }

  /** Dispatches everything still queued on the caller's stack, leaving the worker running. */
  flush(): number {
    let processed = 0;
    while (this.queue.length > 0) {
      const event = this.queue.shift();
      if (!event) break;
      this.deliver(event);
      this.metrics.eventsProcessed++;
      processed++;
    }
    this.notifyDrained();
    return processed;
  }

  /**
   * Halts the worker, then dispatches any remaining events synchronously before
   * returning. Later publishes, including those made by handlers during this
   * final flush, are dispatched on the caller until `start()` is called again.
   */
  stop(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wasRunning = this.running;
    this.running = false;
    this.stopped = true;

    const remaining = this.queue.length;
    if (remaining > 0) {
      log.info("Processing remaining events before shutdown", { remaining });
      this.flush();
    }
    if (wasRunning) log.info("Event worker stopped", { ...this.metrics });
  }

  /**
   * Lets the worker drain on its own for up to `timeoutMs`, then stops,
   * finishing whatever is left synchronously.
   */
  async shutdown(timeoutMs = this.stopTimeoutMs): Promise<void> {
    if (this.running && this.queue.length > 0) {
      let timeout: NodeJS.Timeout | undefined;
      const timedOut = new Promise<void>((resolve) => {
        timeout = setTimeout(() => {
          log.warn("Event worker did not drain before timeout", { timeoutMs, remaining: this.queue.length });
          resolve();
        }, timeoutMs);
      });
      await Promise.race([this.drain(), timedOut]);
      clearTimeout(timeout);
    }
    this.stop();
  }

  // ── Introspection ───────────────────────────────────────────────────────────

  getMetrics(): BusMetrics {
    return { ...this.metrics };
  }

  getHandlerMetrics(): HandlerMetrics[] {
    return [...this.handlerMetrics.values()].map((m) => ({ ...m }));
  }

  /** Removes every subscription and filter and discards queued events. */
  clear(): void {
    this.handlers.clear();
    this.wildcard.clear();
    this.filters.length = 0;
    this.cache.clear();
    this.handlerMetrics.clear();
    this.queue.length = 0;
    this.notifyDrained();
  }

  private register(target: Map<EventHandler, Registration>, handler: EventHandler, priority: number): void {
    const existing = target.get(handler);
    if (existing) {
      existing.priority = priority;
      return;
    }
    target.set(handler, { priority, seq: this.nextSeq++ });
  }

  private forgetMetricsIfUnused(handler: EventHandler): void {
    if (this.wildcard.has(handler)) return;
    for (const registrations of this.handlers.values()) {
      if (registrations.has(handler)) return;
    }
    this.handlerMetrics.delete(handler);
  }
}

function handlerName(handler: EventHandler): string {
  return handler.name || "anonymous";
}
