import path from "node:path";
import type Database from "better-sqlite3";
import type { JsonValue, Operation, QueryRow, RecordPayload } from "../contracts.js";
import { LocalWriteError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import {
  createRecordTable,
  isValidIdentifier,
  openDatabase,
  parsePayload,
  quoteIdentifier,
  tableExists,
} from "./sqlite.js";
import { SyncQueue } from "./sync-queue.js";

const RESERVED_TABLES = new Set(["sync_queue", "sync_dead_letter"]);

export interface StoredRecord {
  id: string;
  payload: RecordPayload;
  createdAt: number;
  updatedAt: number;
}

type RecordRow = { id: string; data: string; created_at: number; updated_at: number };

export interface LocalStoreOptions {
  /** Database file, or `:memory:`. */
  file: string;
  logger?: Logger;
  now?: () => number;
}

/**
 * The node's own authoritative data: one generic table per logical table plus
 * the sync queue, all in a single SQLite file.
 */
export class LocalStore {
  readonly file: string;
  readonly syncQueue: SyncQueue;
  private readonly db: Database.Database;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly knownTables = new Set<string>();

  constructor(options: LocalStoreOptions) {
    this.file = options.file;
    this.log = options.logger ?? createLogger("local-store");
    this.now = options.now ?? Date.now;
    this.db = openDatabase(options.file);
    this.syncQueue = new SyncQueue(this.db, { now: this.now });
    this.log.info({ file: options.file }, "local store opened");
  }

  static forNode(
    dataDir: string,
    nodeId: string,
    options: Omit<LocalStoreOptions, "file"> = {}
  ): LocalStore {
    return new LocalStore({ ...options, file: path.join(dataDir, `${nodeId}.db`) });
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /** Applies one write synchronously; throws {@link LocalWriteError} when it does not land. */
  apply(table: string, id: string, operation: Operation, payload: RecordPayload): void {
    this.assertWritableTable(table);
    try {
      this.applyUnchecked(table, id, operation, payload);
    } catch (err) {
      throw new LocalWriteError(table, `local ${operation} on ${table} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Runs `fn` in one SQLite transaction; a throw rolls every write back. */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      // a rolled-back CREATE TABLE must not stay cached
      this.knownTables.clear();
      throw err;
    }
  }

  read(table: string, id: string): RecordPayload | undefined {
    return this.readRecord(table, id)?.payload;
  }

  readRecord(table: string, id: string): StoredRecord | undefined {
    if (!this.hasTable(table)) return undefined;
    const row = this.db
      .prepare<[string], RecordRow>(
        `SELECT id, data, created_at, updated_at FROM ${quoteIdentifier(table)} WHERE id = ?`
      )
      .get(id);
    return row ? toStoredRecord(row) : undefined;
  }

  list(table: string): StoredRecord[] {
    if (!this.hasTable(table)) return [];
    return this.db
      .prepare<[], RecordRow>(
        `SELECT id, data, created_at, updated_at FROM ${quoteIdentifier(table)} ORDER BY created_at ASC, id ASC`
      )
      .all()
      .map(toStoredRecord);
  }

  tables(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map((row) => row.name)
      .filter((name) => !RESERVED_TABLES.has(name));
  }

  /**
   * Runs a read-only statement against the local database. Failures are
   * logged and yield no rows.
   */
  queryLocal(sql: string, params: Record<string, JsonValue> = {}): QueryRow[] {
    try {
      const stmt = this.db.prepare<unknown[], QueryRow>(sql);
      if (!stmt.readonly) throw new Error("only read-only statements are allowed");
      return Object.keys(params).length > 0 ? stmt.all(params) : stmt.all();
    } catch (err) {
      this.log.error({ err, sql }, "local query failed");
      return [];
    }
  }

  /** True when the database answers a trivial query. */
  ping(): boolean {
    try {
      this.db.prepare("SELECT 1").get();
      return true;
    } catch (err) {
      this.log.error({ err }, "local store health check failed");
      return false;
    }
  }

  close(): void {
    if (!this.db.open) return;
    this.db.close();
    this.log.info({ file: this.file }, "local store closed");
  }

  private applyUnchecked(
    table: string,
    id: string,
    operation: Operation,
    payload: RecordPayload
  ): void {
    this.ensureTable(table);
    const quoted = quoteIdentifier(table);

    if (operation === "delete") {
      this.db.prepare(`DELETE FROM ${quoted} WHERE id = ?`).run(id);
      return;
    }

    const now = this.now();
    this.db
      .prepare(
        `INSERT INTO ${quoted} (id, data, created_at, updated_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at`
      )
      .run(id, JSON.stringify(payload), now, now);
  }

  private assertWritableTable(table: string): void {
    if (!isValidIdentifier(table) || RESERVED_TABLES.has(table) || table.startsWith("sqlite_")) {
      throw new LocalWriteError(table, `invalid table name "${table}"`);
    }
  }

  private ensureTable(table: string): void {
    if (this.knownTables.has(table)) return;
    createRecordTable(this.db, table);
    this.knownTables.add(table);
  }

  private hasTable(table: string): boolean {
    if (this.knownTables.has(table)) return true;
    if (!isValidIdentifier(table) || RESERVED_TABLES.has(table)) return false;
    if (!tableExists(this.db, table)) return false;
    this.knownTables.add(table);
    return true;
  }
}

function toStoredRecord(row: RecordRow): StoredRecord {
  return {
    id: row.id,
    payload: parsePayload(row.data),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
