// apps/api/src/db/index.ts
import Database from "better-sqlite3";

export type Db = Database.Database;

/**
 * Opens (or creates) the SQLite file and makes sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string): Db {
  const db = new Database(path);
  initializeSchema(db);
  return db;
}

function initializeSchema(db: Db) {
  db.pragma("foreign_keys = ON");

  if (db.name !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS leagues (
      league_id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      created_by TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  // No FK to leagues: a membership may be granted before the league row exists.
  db.exec(`
    CREATE TABLE IF NOT EXISTS memberships (
      user_id TEXT NOT NULL,
      league_id TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT '',
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (user_id, league_id)
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS fields (
      league_id TEXT NOT NULL,
      park_code TEXT NOT NULL,
      field_code TEXT NOT NULL,
      park_name TEXT NOT NULL,
      field_name TEXT NOT NULL,
      display_name TEXT NOT NULL,
      address TEXT NOT NULL DEFAULT '',
      notes TEXT NOT NULL DEFAULT '',
      is_active INTEGER NOT NULL DEFAULT 1,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (league_id, park_code, field_code)
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS slots (
      slot_id TEXT PRIMARY KEY,
      league_id TEXT NOT NULL,
      division TEXT NOT NULL,
      offering_team_id TEXT NOT NULL,
      offering_email TEXT NOT NULL DEFAULT '',
      game_date TEXT NOT NULL,
      start_time TEXT NOT NULL,
      end_time TEXT NOT NULL,
      start_minutes INTEGER NOT NULL,
      end_minutes INTEGER NOT NULL,
      field_key TEXT NOT NULL,
      park_name TEXT NOT NULL DEFAULT '',
      field_name TEXT NOT NULL DEFAULT '',
      display_name TEXT NOT NULL DEFAULT '',
      game_type TEXT NOT NULL,
      status TEXT NOT NULL,        -- Open | Confirmed | Cancelled
      notes TEXT NOT NULL DEFAULT '',
      created_by TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_slots_field_date
      ON slots (league_id, field_key, game_date);
  `);
}
