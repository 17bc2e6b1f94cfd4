import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";

export const MEMORY_DATABASE = ":memory:";

const SCHEMA_PATH = path.resolve("state", "schema.sql");

export function openDatabase(dbPath: string): BetterSqlite3.Database {
  if (dbPath !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  const schema = fs.readFileSync(SCHEMA_PATH, "utf-8");
  db.exec(schema);

  return db;
}
