import { mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";

import type { SnapshotJson } from "@imbalance-tracker/domain";
import {
  diffEntrySchema,
  snapshotJsonSchema,
  storedRowSchema,
  type DiffEntry,
  type StoredSnapshotPayload,
} from "./storage.schemas";

export const IN_MEMORY_DATABASE = ":memory:";

export interface SnapshotRecord {
  id: number;
  timestamp: string;
  payload: StoredSnapshotPayload;
}

export interface DiffRecord {
  id: number;
  timestamp: string;
  payload: DiffEntry;
}

@Injectable()
export class StorageService implements OnModuleDestroy {
  private readonly dbPath: string;
  private readonly db: Database;
  private readonly logger = new Logger(StorageService.name);

  constructor() {
    this.dbPath = resolveStoragePath(process.env.IMBALANCE_TRACKER_STORAGE_PATH);
    if (this.dbPath !== IN_MEMORY_DATABASE) {
      mkdirSync(dirname(this.dbPath), {recursive: true});
    }
    this.db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY_DATABASE) {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    this.logger.log(`Storage initialised at ${this.dbPath}`);
  }

  onModuleDestroy(): void {
    this.db.close();
    this.logger.verbose("Storage connection closed");
  }

  replaceSnapshot(payload: SnapshotJson): void {
    const timestamp = payload.publishedAt ?? new Date().toISOString();
    this.logger.log(`Replacing latest snapshot with publish time ${timestamp}`);
    const deleteStmt = this.db.prepare("DELETE FROM snapshots");
    const insertStmt = this.db.prepare("INSERT INTO snapshots (timestamp, payload) VALUES (?, ?)");
    const txn = this.db.transaction(() => {
      deleteStmt.run();
      insertStmt.run(timestamp, JSON.stringify(payload));
    });
    txn();
  }

  appendDiff(entry: DiffEntry): void {
    this.logger.verbose(`Appending diff for ${entry.label}`);
    this.db
      .prepare("INSERT INTO diffs (timestamp, payload) VALUES (?, ?)")
      .run(entry.recordedAt, JSON.stringify(entry));
  }

  getLatestSnapshot(): SnapshotRecord | null {
    this.logger.verbose("Fetching latest snapshot from storage");
    const row: unknown = this.db
      .prepare("SELECT id, timestamp, payload FROM snapshots ORDER BY timestamp DESC LIMIT 1")
      .get();
    if (row === undefined) {
      return null;
    }
    const parsed = storedRowSchema.parse(row);
    return {
      id: parsed.id,
      timestamp: parsed.timestamp,
      payload: snapshotJsonSchema.parse(JSON.parse(parsed.payload)),
    };
  }

  /** Most recent first. */
  listDiffs(limit = 20): DiffRecord[] {
    this.logger.verbose(`Listing diffs (limit=${limit})`);
    const rows: unknown[] = this.db
      .prepare("SELECT id, timestamp, payload FROM diffs ORDER BY id DESC LIMIT ?")
      .all(limit);
    return rows.map((row) => {
      const parsed = storedRowSchema.parse(row);
      return {
        id: parsed.id,
        timestamp: parsed.timestamp,
        payload: diffEntrySchema.parse(JSON.parse(parsed.payload)),
      };
    });
  }

  private migrate(): void {
    this.logger.verbose("Ensuring storage schema is up to date");
    this.db.exec(`
        CREATE TABLE IF NOT EXISTS snapshots
        (
            id        INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            payload   TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_snapshots_timestamp ON snapshots (timestamp DESC);
    `);

    this.db.exec(`
        CREATE TABLE IF NOT EXISTS diffs
        (
            id        INTEGER PRIMARY KEY AUTOINCREMENT,
            timestamp TEXT NOT NULL,
            payload   TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_diffs_timestamp ON diffs (timestamp DESC);
    `);
  }
}

export function resolveStoragePath(override: string | undefined, cwd: string = process.cwd()): string {
  const trimmed = override?.trim();
  if (trimmed === IN_MEMORY_DATABASE) {
    return IN_MEMORY_DATABASE;
  }
  return trimmed
    ? resolve(cwd, trimmed)
    : join(cwd, "..", "data", "db", "imbalance.sqlite");
}
