import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CaptureSink, ConsoleSink, MemoryItem, MemoryStore, setLogSink } from "@agora/core";
import { JsonFileMemoryPersistence, migrateMemoryFile } from "../json/json-file-memory-persistence.js";

const T0 = new Date("2024-03-01T00:00:00.000Z");

describe("JsonFileMemoryPersistence", () => {
  let dir: string;
  let persistence: JsonFileMemoryPersistence;
  let sink: CaptureSink;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agora-memories-"));
    persistence = new JsonFileMemoryPersistence(dir);
    sink = new CaptureSink();
    setLogSink(sink);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    setLogSink(new ConsoleSink());
  });

  it("writes a versioned file per agent and reads it back", () => {
    const item = new MemoryItem({
      id: "m1",
      timestamp: T0,
      content: { text: "bought grain" },
      importance: 0.7,
      tags: ["trade"],
      associations: { counterpart: "b" },
    });
    expect(persistence.saveMemories("merchant-1", [item])).toBe(true);

    const file: unknown = JSON.parse(readFileSync(join(dir, "merchant-1_memories.json"), "utf-8"));
    expect(file).toMatchObject({ version: 1, agentId: "merchant-1" });

    const [loaded] = persistence.loadMemories("merchant-1");
    expect(loaded?.toRecord()).toEqual(item.toRecord());
  });

  it("returns nothing for an agent without a file", () => {
    expect(persistence.loadMemories("nobody")).toEqual([]);
  });

  it("migrates a legacy bare-array file", () => {
    writeFileSync(
      join(dir, "old_memories.json"),
      JSON.stringify([{ id: "legacy-1", timestamp: "2023-01-05T10:00:00Z", content: "old news", importance: 0.4 }]),
    );
    const [item] = persistence.loadMemories("old");
    expect(item?.id).toBe("legacy-1");
    expect(item?.importance).toBe(0.4);
    expect(item?.decayRate).toBe(0.1);
    expect(item?.kind).toBe("generic");
    expect(sink.byLevel("info").map((e) => e.message)).toContain("Migrating legacy memory file");
  });

  it("migrates an unversioned object with an events list", () => {
    const migrated = migrateMemoryFile({ events: [{ id: "e" }] }, "x");
    expect(migrated).toEqual({ version: 1, agentId: "x", memories: [{ id: "e" }] });
  });

  it("turns a corrupt file into an empty result and an error log", () => {
    writeFileSync(join(dir, "broken_memories.json"), "{ not json");
    expect(persistence.loadMemories("broken")).toEqual([]);
    expect(sink.byLevel("error").map((e) => e.message)).toEqual(["Failed to load memories"]);
  });

  it("rejects a file from a newer format version", () => {
    writeFileSync(join(dir, "future_memories.json"), JSON.stringify({ version: 2, agentId: "future", memories: [] }));
    expect(persistence.loadMemories("future")).toEqual([]);
    expect(sink.byLevel("error")).toHaveLength(1);
  });

  it("skips individual unreadable memories", () => {
    writeFileSync(
      join(dir, "mixed_memories.json"),
      JSON.stringify({
        version: 1,
        agentId: "mixed",
        memories: [{ id: "ok", timestamp: T0.toISOString(), content: "fine" }, { id: "bad" }],
      }),
    );
    expect(persistence.loadMemories("mixed").map((m) => m.id)).toEqual(["ok"]);
    expect(sink.byLevel("warn")).toHaveLength(1);
  });

  it("deletes, backs up and lists agent files", () => {
    persistence.saveMemories("a", []);
    persistence.saveMemories("b", []);
    expect(persistence.listAgentIds()).toEqual(["a", "b"]);

    expect(persistence.backupMemories("a", "snap")).toBe(true);
    expect(existsSync(join(dir, "a_memories.json.snap.bak"))).toBe(true);
    expect(persistence.listAgentIds()).toEqual(["a", "b"]);

    expect(persistence.deleteMemories("a")).toBe(true);
    expect(persistence.deleteMemories("a")).toBe(false);
    expect(persistence.backupMemories("a")).toBe(false);
    expect(readdirSync(dir).sort()).toEqual(["a_memories.json.snap.bak", "b_memories.json"]);
  });

  it("backs a memory store with auto-save", () => {
    const store = new MemoryStore("senator-1", { persistence, autoSave: true });
    store.addMemory(new MemoryItem({ id: "speech", timestamp: T0, content: "on the grain dole" }));

    const reopened = new MemoryStore("senator-1", { persistence });
    expect(reopened.getMemory("speech")?.content).toBe("on the grain dole");
  });

  it("reports a write failure as false", () => {
    const blocked = join(dir, "not-a-dir");
    writeFileSync(blocked, "file in the way");
    const failing = new JsonFileMemoryPersistence(blocked);
    expect(failing.saveMemories("a", [])).toBe(false);
    expect(sink.byLevel("error").map((e) => e.message)).toEqual(["Failed to save memories"]);
  });
});
