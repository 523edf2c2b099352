/**
 * SQLite telemetry store for review passes and syncs.
 */

import Database from "better-sqlite3";
import type { ITelemetry, TelemetryEvent } from "@doc-review/core";
import type { Logger } from "../types.js";
import { runMigrations } from "./migrations/index.js";

export interface StoredEvent {
  kind: string;
  runId: string | null;
  groupId: string | null;
  payload: string;
  recordedAt: number;
}

interface EventRow {
  kind: string;
  run_id: string | null;
  group_id: string | null;
  payload: string;
  recorded_at: number;
}

/**
 * Stores events in a local database for analysis and debugging.
 * Never throws; failures go to the logger and the store turns into a no-op.
 */
export class SqliteTelemetry implements ITelemetry {
  private db: Database.Database | undefined;
  private closed = false;

  /**
   * @param source Database file path (`:memory:` works) or an open database
   */
  constructor(
    source: string | Database.Database,
    private readonly logger: Logger
  ) {
    try {
      this.db = typeof source === "string" ? new Database(source) : source;
      runMigrations(this.db);
    } catch (error) {
      this.logger.warn(
        `Telemetry disabled: ${describe(error)}`,
        "SqliteTelemetry"
      );
      this.closed = true;
    }
  }

  /**
   * Emit a telemetry event. Never throws.
   */
  emit(event: TelemetryEvent): void {
    if (this.closed || !this.db) {
      return;
    }

    try {
      this.db
        .prepare<[string, string | null, string | null, string, number]>(
          `INSERT INTO events (kind, run_id, group_id, payload, recorded_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(
          event.kind,
          "runId" in event ? event.runId : null,
          "groupId" in event ? event.groupId : null,
          JSON.stringify(event),
          Date.now()
        );
    } catch (error) {
      this.logger.warn(
        `Failed to record ${event.kind}: ${describe(error)}`,
        "SqliteTelemetry.emit"
      );
    }
  }

  /**
   * Most recent events first.
   */
  recent(limit = 50): StoredEvent[] {
    if (this.closed || !this.db) {
      return [];
    }
    return this.db
      .prepare<[number], EventRow>(
        `SELECT kind, run_id, group_id, payload, recorded_at
         FROM events ORDER BY id DESC LIMIT ?`
      )
      .all(limit)
      .map((row) => ({
        kind: row.kind,
        runId: row.run_id,
        groupId: row.group_id,
        payload: row.payload,
        recordedAt: row.recorded_at,
      }));
  }

  /**
   * Dispose of the telemetry instance (close the database).
   */
  dispose(): void {
    if (!this.closed && this.db) {
      try {
        this.db.close();
      } catch (error) {
        this.logger.warn(
          `Error closing telemetry database: ${describe(error)}`,
          "SqliteTelemetry.dispose"
        );
      }
      this.closed = true;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
