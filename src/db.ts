import Database from "better-sqlite3";
import { join, dirname } from "node:path";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";

export const DATA_DIR = join(process.env.HOME || homedir(), ".chartrecall");

/**
 * Open the ChartRecall database.
 * Priority: explicit dbPath arg > CHARTRECALL_DB env var > default ~/.chartrecall/chartrecall.db
 * Use CHARTRECALL_DB for isolated runs: CHARTRECALL_DB=/tmp/test.db npx tsx src/cli.ts ...
 */
export function openDb(dbPath?: string): Database.Database {
  const path = dbPath || process.env.CHARTRECALL_DB || join(DATA_DIR, "chartrecall.db");
  // Create parent dir for file-based DBs (skip for :memory:)
  if (!path.startsWith(":")) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");
  migrate(db);
  return db;
}

function migrate(db: Database.Database) {
  db.exec(`
    -- Records: one stored observation per row, scoped to exactly one owner
    CREATE TABLE IF NOT EXISTS records (
      id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL,
      content TEXT NOT NULL,
      category TEXT,                     -- e.g. 'symptom' | 'doctor_note' | 'prescription'
      tags TEXT NOT NULL DEFAULT '[]',   -- JSON array
      embedding BLOB NOT NULL,           -- Float32, fixed at ingestion
      created_at TEXT NOT NULL,          -- ISO-8601
      access_count INTEGER NOT NULL DEFAULT 0,
      memory_weight REAL NOT NULL DEFAULT 1.0,
      reinforcement_level INTEGER NOT NULL DEFAULT 0,
      last_accessed TEXT                 -- ISO-8601
    );

    -- Maintenance: as_of of the last applied decay pass, per owner
    CREATE TABLE IF NOT EXISTS maintenance (
      owner_id TEXT PRIMARY KEY,
      last_decay_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_records_owner ON records(owner_id);
    CREATE INDEX IF NOT EXISTS idx_records_owner_created ON records(owner_id, created_at);
  `);

  // weights must stay strictly positive
  db.exec(`
    CREATE TRIGGER IF NOT EXISTS records_weight_positive
    BEFORE UPDATE OF memory_weight ON records
    WHEN NEW.memory_weight <= 0
    BEGIN
      SELECT RAISE(ABORT, 'memory_weight must be positive');
    END;
  `);
}
