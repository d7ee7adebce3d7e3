import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  createLogger,
  describeError,
  type RelationshipRecord,
  type RelationshipSnapshotStore,
} from "@agora/core";

const log = createLogger("relationship-snapshot");

/** The full edge set as a JSON array in a single file. */
export class JsonRelationshipSnapshotFile implements RelationshipSnapshotStore {
  constructor(readonly path: string) {}

  saveSnapshot(records: readonly RelationshipRecord[]): boolean {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, JSON.stringify(records, null, 2), "utf-8");
      log.debug("Saved relationship snapshot", { path: this.path, count: records.length });
      return true;
    } catch (err) {
      log.error("Failed to save relationship snapshot", { path: this.path, error: describeError(err) });
      return false;
    }
  }

  loadSnapshot(): unknown[] | undefined {
    if (!existsSync(this.path)) {
      log.warn("No relationship snapshot found", { path: this.path });
      return undefined;
    }
    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      if (!Array.isArray(raw)) {
        log.error("Relationship snapshot is not a list", { path: this.path });
        return undefined;
      }
      return raw;
    } catch (err) {
      log.error("Failed to read relationship snapshot", { path: this.path, error: describeError(err) });
      return undefined;
    }
  }
}
