import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { env } from "../config/env.js";

export type DatabaseHandle = Database.Database;

let db: DatabaseHandle | null = null;

function ensureDbPath(dbPath: string) {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/** Opens (and migrates) a database; pass ":memory:" for a throwaway one. */
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ":memory:") {
    ensureDbPath(dbPath);
  }
  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  initializeRoomDb(database);
  return database;
}

export function getDb(): DatabaseHandle {
  if (!db) {
    db = openDatabase(env.DB_PATH ?? path.join(process.cwd(), "data", "roomsync.sqlite"));
  }
  return db;
}

function initializeRoomDb(database: DatabaseHandle) {
  database.exec(`
    CREATE TABLE IF NOT EXISTS rooms (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      calendar_id TEXT,
      calendar_provider TEXT,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS calendar_tokens (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      provider TEXT UNIQUE NOT NULL,
      access_token TEXT NOT NULL,
      refresh_token TEXT,
      token_type TEXT DEFAULT 'Bearer',
      expires_at TEXT,
      scope TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS local_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      room_id INTEGER NOT NULL,
      title TEXT NOT NULL,
      start_time TEXT NOT NULL,
      end_time TEXT NOT NULL,
      organizer TEXT,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS local_events_room_start ON local_events (room_id, start_time);
  `);
}
