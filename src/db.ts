import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type Db = Database.Database;

export function openDatabase(dbPath: string): Db {
  // Ensure parent dir exists
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS regions (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  name       TEXT NOT NULL,
  polygon    TEXT NOT NULL, -- JSON array of [lng, lat] pairs
  created_at INTEGER NOT NULL
);
`);

  return db;
}
