import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { OPERATIONS, type Operation, type RecordPayload } from "../contracts.js";

const IDENTIFIER = /^[A-Za-z0-9_][A-Za-z0-9_-]{0,62}$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Double-quotes a name already checked by {@link isValidIdentifier}. */
export function quoteIdentifier(name: string): string {
  return `"${name}"`;
}

export function isOperation(value: unknown): value is Operation {
  return typeof value === "string" && OPERATIONS.some((op) => op === value);
}

export function isRecordPayload(value: unknown): value is RecordPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePayload(text: string): RecordPayload {
  const value: unknown = JSON.parse(text);
  if (!isRecordPayload(value)) throw new Error("stored payload is not a JSON object");
  return value;
}

/**
 * Opens (or creates) a SQLite database in WAL mode. `:memory:` is accepted for
 * tests; any other path has its parent directory created first.
 */
export function openDatabase(file: string): Database.Database {
  if (file !== ":memory:") fs.mkdirSync(path.dirname(file), { recursive: true });

  const db = new Database(file, { timeout: 30_000 });
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  return db;
}

export function createRecordTable(db: Database.Database, table: string): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
}

export function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(table);
  return row !== undefined;
}
