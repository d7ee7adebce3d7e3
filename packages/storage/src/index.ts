export { JsonFileMemoryPersistence, migrateMemoryFile, MEMORY_FILE_VERSION } from "./json/json-file-memory-persistence.js";
export { JsonRelationshipSnapshotFile } from "./json/json-relationship-snapshot.js";
export { SqliteEventJournal, JOURNAL_PRIORITY } from "./sqlite/sqlite-event-journal.js";
export type { JournalEntry, TimeRange } from "./sqlite/sqlite-event-journal.js";
