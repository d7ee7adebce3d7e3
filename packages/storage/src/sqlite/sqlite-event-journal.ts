import Database from "better-sqlite3";
import { z } from "zod";
import {
  createLogger,
  describeError,
  eventFromRecord,
  eventToRecord,
  involvedAgents,
  type EventBus,
  type SimulationEvent,
  type Unsubscribe,
} from "@agora/core";

const log = createLogger("event-journal");

/** Runs after every other wildcard handler so the journal sees events last. */
export const JOURNAL_PRIORITY = -1_000;

export interface JournalEntry {
  seq: number;
  tick: number | null;
  event: SimulationEvent;
}

export interface TimeRange {
  from?: Date;
  to?: Date;
}

const rowSchema = z.object({
  seq: z.number(),
  id: z.string(),
  tick: z.number().nullable(),
  kind: z.string(),
  timestamp: z.number(),
  source: z.string().nullable(),
  target: z.string().nullable(),
  payload: z.string(),
});

/** Append-only log of published events, queryable by agent, pair, kind and time. */
export class SqliteEventJournal {
  private db: Database.Database;
  private currentTick: number | null = null;
  private detachFromBus: Unsubscribe | undefined;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        tick INTEGER,
        kind TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        source TEXT,
        target TEXT,
        payload TEXT NOT NULL DEFAULT '{}'
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS event_agents (
        event_seq INTEGER NOT NULL REFERENCES events(seq),
        agent_id TEXT NOT NULL,
        PRIMARY KEY (event_seq, agent_id)
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_kind ON events(kind)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(timestamp)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_event_agents_agent ON event_agents(agent_id)`);
  }

  /** Tags subsequently recorded events with the simulation tick. */
  setTick(tick: number | null): void {
    this.currentTick = tick;
  }

  /** False when the write failed (for example a duplicate event id). */
  record(event: SimulationEvent): boolean {
    return this.recordMany([event]);
  }

  recordMany(events: readonly SimulationEvent[]): boolean {
    const insertEvent = this.db.prepare(`
      INSERT INTO events (id, tick, kind, timestamp, source, target, payload)
      VALUES (@id, @tick, @kind, @timestamp, @source, @target, @payload)
    `);
    const insertAgent = this.db.prepare(`INSERT OR IGNORE INTO event_agents (event_seq, agent_id) VALUES (?, ?)`);

    const insertMany = this.db.transaction((evts: readonly SimulationEvent[]) => {
      for (const e of evts) {
        const record = eventToRecord(e);
        const result = insertEvent.run({
          id: record.id,
          tick: this.currentTick,
          kind: record.kind,
          timestamp: e.timestamp.getTime(),
          source: record.source,
          target: record.target,
          payload: JSON.stringify(record.payload),
        });
        for (const agentId of involvedAgents(e)) insertAgent.run(result.lastInsertRowid, agentId);
      }
    });

    try {
      insertMany(events);
      return true;
    } catch (err) {
      log.error("Failed to record events", { count: events.length, error: describeError(err) });
      return false;
    }
  }

  getByAgent(agentId: string, range: TimeRange = {}): JournalEntry[] {
    let sql = `SELECT e.* FROM events e JOIN event_agents a ON a.event_seq = e.seq WHERE a.agent_id = ?`;
    const params: (string | number)[] = [agentId];
    sql += this.rangeClause(range, params);
    sql += ` ORDER BY e.seq ASC`;
    return this.query(sql, params);
  }

  /** Events in which both agents took part, in either role. */
  getByPair(agentA: string, agentB: string, range: TimeRange = {}): JournalEntry[] {
    let sql = `SELECT e.* FROM events e
      WHERE EXISTS (SELECT 1 FROM event_agents a WHERE a.event_seq = e.seq AND a.agent_id = ?)
        AND EXISTS (SELECT 1 FROM event_agents b WHERE b.event_seq = e.seq AND b.agent_id = ?)`;
    const params: (string | number)[] = [agentA, agentB];
    sql += this.rangeClause(range, params);
    sql += ` ORDER BY e.seq ASC`;
    return this.query(sql, params);
  }

  getByKind(kind: string, limit?: number): JournalEntry[] {
    const params: (string | number)[] = [kind];
    let sql = `SELECT e.* FROM events e WHERE e.kind = ? ORDER BY e.seq ASC`;
    if (limit !== undefined) {
      sql += ` LIMIT ?`;
      params.push(limit);
    }
    return this.query(sql, params);
  }

  getByTimeRange(from: Date, to: Date): JournalEntry[] {
    return this.query(`SELECT e.* FROM events e WHERE e.timestamp >= ? AND e.timestamp <= ? ORDER BY e.seq ASC`, [
      from.getTime(),
      to.getTime(),
    ]);
  }

  getByTickRange(fromTick: number, toTick: number): JournalEntry[] {
    return this.query(`SELECT e.* FROM events e WHERE e.tick >= ? AND e.tick <= ? ORDER BY e.seq ASC`, [
      fromTick,
      toTick,
    ]);
  }

  /** The latest `limit` events, oldest of them first. */
  getRecent(limit: number): JournalEntry[] {
    return this.query(`SELECT * FROM (SELECT e.* FROM events e ORDER BY e.seq DESC LIMIT ?) ORDER BY seq ASC`, [
      limit,
    ]);
  }

  count(): number {
    const row: unknown = this.db.prepare(`SELECT COUNT(*) AS n FROM events`).get();
    return z.object({ n: z.number() }).parse(row).n;
  }

  /** Records every event published on `bus` until `detach`. */
  attachTo(bus: EventBus): void {
    this.detach();
    const eventJournal = (event: SimulationEvent): void => {
      this.record(event);
    };
    this.detachFromBus = bus.subscribeToAll(eventJournal, JOURNAL_PRIORITY);
  }

  detach(): void {
    this.detachFromBus?.();
    this.detachFromBus = undefined;
  }

  close(): void {
    this.detach();
    this.db.close();
  }

  private rangeClause(range: TimeRange, params: (string | number)[]): string {
    let sql = "";
    if (range.from !== undefined) {
      sql += ` AND e.timestamp >= ?`;
      params.push(range.from.getTime());
    }
    if (range.to !== undefined) {
      sql += ` AND e.timestamp <= ?`;
      params.push(range.to.getTime());
    }
    return sql;
  }

  private query(sql: string, params: (string | number)[]): JournalEntry[] {
    return this.db.prepare(sql).all(...params).map(rowToEntry);
  }
}

function rowToEntry(row: unknown): JournalEntry {
  const r = rowSchema.parse(row);
  const event = eventFromRecord({
    id: r.id,
    kind: r.kind,
    timestamp: new Date(r.timestamp).toISOString(),
    source: r.source,
    target: r.target,
    payload: JSON.parse(r.payload),
  });
  return { seq: r.seq, tick: r.tick, event };
}
