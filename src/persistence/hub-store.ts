import type Database from "better-sqlite3";
import type {
  HubRow,
  JsonValue,
  Operation,
  QueryRow,
  RecordPayload,
} from "../contracts.js";
import { QueryError, errorMessage } from "../errors.js";
import {
  createRecordTable,
  isValidIdentifier,
  openDatabase,
  parsePayload,
  quoteIdentifier,
} from "./sqlite.js";

export interface HubApplyInput {
  sourceId: string;
  table: string;
  operation: Operation;
  payload: RecordPayload;
}

export interface HubTableRef {
  sourceId: string;
  table: string;
}

/**
 * Replication sink: one generic record table per (source, table) pair, keyed
 * by the payload's `id`. The payload itself is opaque to the Hub.
 */
export interface HubStore {
  /** Idempotent; concurrent first references to the same pair never fail. */
  ensureTable(sourceId: string, table: string): Promise<void>;
  /** insert/update upsert by id (last write wins), delete removes by id. */
  apply(input: HubApplyInput): Promise<void>;
  get(sourceId: string, table: string, id: string): Promise<HubRow | undefined>;
  list(sourceId: string, table: string): Promise<HubRow[]>;
  listTables(sourceId?: string): Promise<HubTableRef[]>;
  /**
   * Ad-hoc read for trusted cluster members. `sourceId` names the caller; the
   * statement may read every source's tables. Throws {@link QueryError}.
   */
  query(sourceId: string, query: string, params?: Record<string, JsonValue>): Promise<QueryRow[]>;
  close(): Promise<void>;
}

export function isValidSourceId(sourceId: string): boolean {
  return isValidIdentifier(sourceId) && !sourceId.includes("__");
}

/** Physical SQLite table holding `table` for `sourceId`. */
export function hubTableName(sourceId: string, table: string): string {
  return `${sourceId}__${table}`;
}

export function assertApplyInput(input: HubApplyInput): string {
  if (!isValidSourceId(input.sourceId)) throw new Error(`invalid source id "${input.sourceId}"`);
  if (!isValidIdentifier(input.table)) throw new Error(`invalid table name "${input.table}"`);
  const id = input.payload.id;
  if (typeof id !== "string" || id.length === 0) {
    throw new Error(`payload for ${input.sourceId}/${input.table} has no string id`);
  }
  return id;
}

type HubRowRecord = { id: string; data: string; created_at: number; updated_at: number };

function toHubRow(row: HubRowRecord): HubRow {
  return {
    id: row.id,
    payload: parsePayload(row.data),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteHubStore implements HubStore {
  private readonly db: Database.Database;
  private readonly now: () => number;
  private readonly provisioned = new Set<string>();

  constructor(fileOrDb: string | Database.Database, options: { now?: () => number } = {}) {
    this.db = typeof fileOrDb === "string" ? openDatabase(fileOrDb) : fileOrDb;
    this.now = options.now ?? Date.now;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS hub_tables (
        source_id TEXT NOT NULL,
        table_name TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (source_id, table_name)
      )
    `);
  }

  async ensureTable(sourceId: string, table: string): Promise<void> {
    this.provision(sourceId, table);
  }

  async apply(input: HubApplyInput): Promise<void> {
    const id = assertApplyInput(input);
    this.provision(input.sourceId, input.table);
    const quoted = quoteIdentifier(hubTableName(input.sourceId, input.table));

    if (input.operation === "delete") {
      this.db.prepare(`DELETE FROM ${quoted} WHERE id = ?`).run(id);
      return;
    }

    const now = this.now();
    this.db
      .prepare(
        `INSERT INTO ${quoted} (id, data, created_at, updated_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at`
      )
      .run(id, JSON.stringify(input.payload), now, now);
  }

  async get(sourceId: string, table: string, id: string): Promise<HubRow | undefined> {
    if (!this.isProvisioned(sourceId, table)) return undefined;
    const row = this.db
      .prepare<[string], HubRowRecord>(
        `SELECT id, data, created_at, updated_at FROM ${quoteIdentifier(hubTableName(sourceId, table))} WHERE id = ?`
      )
      .get(id);
    return row ? toHubRow(row) : undefined;
  }

  async list(sourceId: string, table: string): Promise<HubRow[]> {
    if (!this.isProvisioned(sourceId, table)) return [];
    return this.db
      .prepare<[], HubRowRecord>(
        `SELECT id, data, created_at, updated_at FROM ${quoteIdentifier(hubTableName(sourceId, table))}
         ORDER BY created_at ASC, id ASC`
      )
      .all()
      .map(toHubRow);
  }

  async listTables(sourceId?: string): Promise<HubTableRef[]> {
    const rows =
      sourceId === undefined
        ? this.db
            .prepare<[], { source_id: string; table_name: string }>(
              "SELECT source_id, table_name FROM hub_tables ORDER BY source_id, table_name"
            )
            .all()
        : this.db
            .prepare<[string], { source_id: string; table_name: string }>(
              "SELECT source_id, table_name FROM hub_tables WHERE source_id = ? ORDER BY table_name"
            )
            .all(sourceId);
    return rows.map((row) => ({ sourceId: row.source_id, table: row.table_name }));
  }

  async query(
    sourceId: string,
    query: string,
    params: Record<string, JsonValue> = {}
  ): Promise<QueryRow[]> {
    if (!isValidSourceId(sourceId)) throw new QueryError(`invalid source id "${sourceId}"`);
    try {
      const stmt = this.db.prepare<unknown[], QueryRow>(query);
      if (!stmt.readonly) throw new Error("only read-only statements are allowed");
      return Object.keys(params).length > 0 ? stmt.all(params) : stmt.all();
    } catch (err) {
      throw new QueryError(`query for ${sourceId} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private provision(sourceId: string, table: string): void {
    const key = hubTableName(sourceId, table);
    if (this.provisioned.has(key)) return;
    if (!isValidSourceId(sourceId)) throw new Error(`invalid source id "${sourceId}"`);
    if (!isValidIdentifier(table)) throw new Error(`invalid table name "${table}"`);

    try {
      createRecordTable(this.db, key);
    } catch (err) {
      // another writer on the same file may win the race between check and create
      if (!/already exists/i.test(errorMessage(err))) throw err;
    }
    this.db
      .prepare(
        "INSERT OR IGNORE INTO hub_tables (source_id, table_name, created_at) VALUES (?, ?, ?)"
      )
      .run(sourceId, table, this.now());
    this.provisioned.add(key);
  }

  private isProvisioned(sourceId: string, table: string): boolean {
    if (this.provisioned.has(hubTableName(sourceId, table))) return true;
    const row = this.db
      .prepare<[string, string], { source_id: string }>(
        "SELECT source_id FROM hub_tables WHERE source_id = ? AND table_name = ?"
      )
      .get(sourceId, table);
    if (!row) return false;
    this.provisioned.add(hubTableName(sourceId, table));
    return true;
  }
}
