import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore } from "../memory/memory-store.js";
import { MemoryItem } from "../memory/memory-item.js";
import { InMemoryMemoryPersistence } from "../memory/persistence.js";

const T0 = new Date("2024-03-01T00:00:00.000Z");
const day = (n: number): Date => new Date(T0.getTime() + n * 86_400_000);

describe("MemoryStore", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore("merchant-1");
  });

  it("adds, reads and forgets memories", () => {
    const id = store.addMemory(new MemoryItem({ id: "m1", content: "hello" }));
    expect(id).toBe("m1");
    expect(store.getMemory("m1")?.content).toBe("hello");
    expect(store.forget("m1")).toBe(true);
    expect(store.forget("m1")).toBe(false);
    expect(store.getMemory("m1")).toBeUndefined();
  });

  it("updates importance, associations and content in place", () => {
    store.addMemory(new MemoryItem({ id: "m1", content: "old", importance: 0.3, associations: { a: 1 } }));
    expect(store.updateMemory("m1", { importance: 1.4, associations: { b: "two" }, content: "new" })).toBe(true);
    const m = store.getMemory("m1");
    expect(m?.importance).toBe(1);
    expect(m?.associations).toEqual({ a: 1, b: "two" });
    expect(m?.content).toBe("new");
    expect(store.updateMemory("missing", { importance: 0.5 })).toBe(false);
  });

  it("retrieves with the same filters as the index, newest first", () => {
    store.addMemory(new MemoryItem({ id: "old", timestamp: day(0), content: "Grain sold cheaply", importance: 0.9, tags: ["trade"] }));
    store.addMemory(new MemoryItem({ id: "mid", timestamp: day(1), content: "Grain price rose", importance: 0.3, tags: ["trade"] }));
    store.addMemory(new MemoryItem({ id: "new", timestamp: day(2), content: "Wine arrived", importance: 0.6, tags: ["trade"] }));

    expect(store.retrieveMemories({ tags: ["trade"] }).map((m) => m.id)).toEqual(["new", "mid", "old"]);
    expect(store.retrieveMemories({ text: "grain" }, 1).map((m) => m.id)).toEqual(["mid"]);
    expect(store.retrieveMemories({ text: "grain" }, undefined, 0.5).map((m) => m.id)).toEqual(["old"]);
    expect(store.retrieveMemories({ timestampMin: day(1) }).map((m) => m.id)).toEqual(["new", "mid"]);
    expect(store.retrieveMemories({ text: "grain wine" })).toEqual([]);
  });

  it("prunes exactly the memories below the threshold", () => {
    store.addMemory(new MemoryItem({ id: "faint", timestamp: T0, content: "x", importance: 0.05, decayRate: 0.1 }));
    store.addMemory(new MemoryItem({ id: "vivid", timestamp: T0, content: "y", importance: 0.5, decayRate: 0.1 }));
    expect(store.pruneWeakMemories(0.1, T0)).toBe(1);
    expect(store.getAllMemories().map((m) => m.id)).toEqual(["vivid"]);
  });

  it("reports that it cannot save without a backend", () => {
    expect(store.save()).toBe(false);
  });

  describe("with an index", () => {
    it("answers queries from the index and keeps it in step with every mutation", () => {
      const indexed = new MemoryStore("senator-1", { index: { cacheTtlMs: 60_000 } });
      expect(indexed.isIndexed).toBe(true);
      indexed.addMemory(new MemoryItem({ id: "old", timestamp: day(0), content: "Grain sold cheaply", importance: 0.9, tags: ["trade"] }));
      indexed.addMemory(new MemoryItem({ id: "mid", timestamp: day(1), content: "Grain price rose", importance: 0.3, tags: ["trade"] }));
      indexed.addMemory(new MemoryItem({ id: "new", timestamp: day(2), content: "Wine arrived", importance: 0.6, tags: ["trade"] }));

      expect(indexed.retrieveMemories({ text: "grain" }).map((m) => m.id)).toEqual(["mid", "old"]);
      expect(indexed.retrieveMemories({ text: "grain" }, undefined, 0.5).map((m) => m.id)).toEqual(["old"]);

      indexed.updateMemory("mid", { content: "Olive oil landed" });
      expect(indexed.retrieveMemories({ text: "grain" }).map((m) => m.id)).toEqual(["old"]);

      indexed.forget("old");
      expect(indexed.retrieveMemories({ text: "grain" })).toEqual([]);

      expect(indexed.pruneWeakMemories(0.5, day(2))).toBe(1);
      expect(indexed.retrieveMemories({ tags: ["trade"] }).map((m) => m.id)).toEqual(["new"]);

      indexed.clear();
      expect(indexed.retrieveMemories()).toEqual([]);
    });

    it("indexes memories loaded from the backend", () => {
      const persistence = new InMemoryMemoryPersistence();
      persistence.saveMemories("senator-2", [new MemoryItem({ id: "kept", content: "Treaty ratified", tags: ["vote"] })]);

      const loaded = new MemoryStore("senator-2", { persistence, index: true });
      expect(loaded.retrieveMemories({ text: "treaty" }).map((m) => m.id)).toEqual(["kept"]);
      expect(new MemoryStore("senator-3").isIndexed).toBe(false);
    });
  });

  describe("with persistence", () => {
    it("loads existing memories on construction", () => {
      const persistence = new InMemoryMemoryPersistence();
      persistence.saveMemories("merchant-1", [new MemoryItem({ id: "kept", content: "ledger" })]);

      const loaded = new MemoryStore("merchant-1", { persistence });
      expect(loaded.getMemory("kept")?.content).toBe("ledger");
    });

    it("saves after every mutation when auto-save is on", () => {
      const persistence = new InMemoryMemoryPersistence();
      const autoSaving = new MemoryStore("merchant-2", { persistence, autoSave: true });

      autoSaving.addMemory(new MemoryItem({ id: "a", content: "first" }));
      expect(persistence.loadMemories("merchant-2").map((m) => m.id)).toEqual(["a"]);

      autoSaving.forget("a");
      expect(persistence.loadMemories("merchant-2")).toEqual([]);
    });

    it("only saves on request when auto-save is off", () => {
      const persistence = new InMemoryMemoryPersistence();
      const manual = new MemoryStore("merchant-3", { persistence });
      manual.addMemory(new MemoryItem({ id: "a", content: "first" }));
      expect(persistence.listAgentIds()).toEqual([]);
      expect(manual.save()).toBe(true);
      expect(persistence.listAgentIds()).toEqual(["merchant-3"]);
    });
  });
});

describe("InMemoryMemoryPersistence", () => {
  it("backs up and deletes an agent's memories", () => {
    const persistence = new InMemoryMemoryPersistence();
    persistence.saveMemories("a", [new MemoryItem({ id: "m", content: "x" })]);
    expect(persistence.backupMemories("a", "before-reset")).toBe(true);
    expect(persistence.deleteMemories("a")).toBe(true);
    expect(persistence.listAgentIds()).toEqual(["a_before-reset"]);
    expect(persistence.loadMemories("a_before-reset").map((m) => m.id)).toEqual(["m"]);
    expect(persistence.backupMemories("a")).toBe(false);
  });
});
