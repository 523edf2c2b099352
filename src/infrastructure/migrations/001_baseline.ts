import type Database from "better-sqlite3";
import type { Migration } from "./index.js";

/**
 * Baseline migration: the events table and its lookup indexes.
 */
export const migration_001: Migration = {
  version: 1,
  name: "baseline",
  up: (db: Database.Database) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        kind        TEXT    NOT NULL,
        run_id      TEXT,
        group_id    TEXT,
        payload     TEXT    NOT NULL,
        recorded_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_kind        ON events(kind);
      CREATE INDEX IF NOT EXISTS idx_events_run_id      ON events(run_id);
      CREATE INDEX IF NOT EXISTS idx_events_recorded_at ON events(recorded_at);
    `);
  },
};
