import type Database from "better-sqlite3";
import type { DeadLetterEntry, Operation, RecordPayload, SyncQueueEntry } from "../contracts.js";
import { LocalWriteError, errorMessage } from "../errors.js";
import { isOperation, parsePayload } from "./sqlite.js";

type QueueRow = {
  sequence_id: number;
  table_name: string;
  record_id: string;
  operation: string;
  data: string;
  queued_at: number;
  retry_count: number;
  last_error: string | null;
  last_attempt_at: number | null;
};

type DeadLetterRow = QueueRow & { dead_lettered_at: number; reason: string };

export interface EnqueueInput {
  table: string;
  recordId: string;
  operation: Operation;
  payload: RecordPayload;
}

const ENTRY_COLUMNS =
  "sequence_id, table_name, record_id, operation, data, queued_at, retry_count, last_error, last_attempt_at";

function toEntry(row: QueueRow): SyncQueueEntry {
  if (!isOperation(row.operation)) {
    throw new Error(`sync queue entry ${row.sequence_id} has unknown operation "${row.operation}"`);
  }
  return {
    sequenceId: row.sequence_id,
    table: row.table_name,
    recordId: row.record_id,
    operation: row.operation,
    payload: parsePayload(row.data),
    queuedAt: row.queued_at,
    retryCount: row.retry_count,
    lastError: row.last_error ?? undefined,
    lastAttemptAt: row.last_attempt_at ?? undefined,
  };
}

/**
 * Durable FIFO of writes that have not reached the Hub yet. Lives in the same
 * SQLite database as the LocalStore tables it mirrors.
 */
export class SyncQueue {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(db: Database.Database, options: { now?: () => number } = {}) {
    this.db = db;
    this.now = options.now ?? Date.now;

    db.exec(`
      CREATE TABLE IF NOT EXISTS sync_queue (
        sequence_id INTEGER PRIMARY KEY AUTOINCREMENT,
        table_name TEXT NOT NULL,
        record_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        data TEXT NOT NULL,
        queued_at INTEGER NOT NULL,
        retry_count INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        last_attempt_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_sync_queue_queued_at ON sync_queue(queued_at, sequence_id);

      CREATE TABLE IF NOT EXISTS sync_dead_letter (
        sequence_id INTEGER PRIMARY KEY,
        table_name TEXT NOT NULL,
        record_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        data TEXT NOT NULL,
        queued_at INTEGER NOT NULL,
        retry_count INTEGER NOT NULL,
        last_error TEXT,
        last_attempt_at INTEGER,
        dead_lettered_at INTEGER NOT NULL,
        reason TEXT NOT NULL
      );
    `);
  }

  enqueue(input: EnqueueInput): SyncQueueEntry {
    try {
      return this.insert(input);
    } catch (err) {
      throw new LocalWriteError(
        input.table,
        `failed to queue ${input.operation} on ${input.table}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  /** Queues every input or none of them. */
  enqueueMany(inputs: EnqueueInput[]): SyncQueueEntry[] {
    try {
      return this.db.transaction((batch: EnqueueInput[]) => batch.map((i) => this.insert(i)))(
        inputs
      );
    } catch (err) {
      throw new LocalWriteError(
        inputs[0]?.table ?? "sync_queue",
        `failed to queue batch of ${inputs.length}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  /** Entries still under the retry cap, oldest first. */
  selectReplayable(limit: number, maxRetries: number): SyncQueueEntry[] {
    return this.db
      .prepare<[number, number], QueueRow>(
        `SELECT ${ENTRY_COLUMNS} FROM sync_queue
         WHERE retry_count < ?
         ORDER BY queued_at ASC, sequence_id ASC
         LIMIT ?`
      )
      .all(maxRetries, limit)
      .map(toEntry);
  }

  /** Entries at or above the retry cap, left in place by the `retain` policy. */
  stuck(maxRetries: number): SyncQueueEntry[] {
    return this.db
      .prepare<[number], QueueRow>(
        `SELECT ${ENTRY_COLUMNS} FROM sync_queue
         WHERE retry_count >= ?
         ORDER BY queued_at ASC, sequence_id ASC`
      )
      .all(maxRetries)
      .map(toEntry);
  }

  list(): SyncQueueEntry[] {
    return this.db
      .prepare<[], QueueRow>(
        `SELECT ${ENTRY_COLUMNS} FROM sync_queue ORDER BY queued_at ASC, sequence_id ASC`
      )
      .all()
      .map(toEntry);
  }

  get(sequenceId: number): SyncQueueEntry | undefined {
    const row = this.db
      .prepare<[number], QueueRow>(`SELECT ${ENTRY_COLUMNS} FROM sync_queue WHERE sequence_id = ?`)
      .get(sequenceId);
    return row ? toEntry(row) : undefined;
  }

  size(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM sync_queue")
      .get();
    return row?.count ?? 0;
  }

  remove(sequenceId: number): boolean {
    return this.db.prepare("DELETE FROM sync_queue WHERE sequence_id = ?").run(sequenceId).changes > 0;
  }

  /** Bumps the retry counter and returns the new value, or undefined for an unknown entry. */
  recordFailure(sequenceId: number, error: string): number | undefined {
    this.db
      .prepare(
        `UPDATE sync_queue
         SET retry_count = retry_count + 1, last_error = ?, last_attempt_at = ?
         WHERE sequence_id = ?`
      )
      .run(error, this.now(), sequenceId);
    return this.get(sequenceId)?.retryCount;
  }

  /** Puts capped entries back into rotation. Without an id, resets every entry. */
  resetRetries(sequenceId?: number): number {
    if (sequenceId === undefined) {
      return this.db.prepare("UPDATE sync_queue SET retry_count = 0 WHERE retry_count > 0").run()
        .changes;
    }
    return this.db
      .prepare("UPDATE sync_queue SET retry_count = 0 WHERE sequence_id = ?")
      .run(sequenceId).changes;
  }

  moveToDeadLetter(sequenceId: number, reason: string): boolean {
    const move = this.db.transaction((id: number) => {
      const copied = this.db
        .prepare(
          `INSERT INTO sync_dead_letter (${ENTRY_COLUMNS}, dead_lettered_at, reason)
           SELECT ${ENTRY_COLUMNS}, ?, ? FROM sync_queue WHERE sequence_id = ?`
        )
        .run(this.now(), reason, id);
      if (copied.changes === 0) return false;
      this.db.prepare("DELETE FROM sync_queue WHERE sequence_id = ?").run(id);
      return true;
    });
    return move(sequenceId);
  }

  listDeadLetters(): DeadLetterEntry[] {
    return this.db
      .prepare<[], DeadLetterRow>(
        `SELECT ${ENTRY_COLUMNS}, dead_lettered_at, reason FROM sync_dead_letter
         ORDER BY queued_at ASC, sequence_id ASC`
      )
      .all()
      .map((row) => ({ ...toEntry(row), deadLetteredAt: row.dead_lettered_at, reason: row.reason }));
  }

  /**
   * Moves a dead letter back into the queue with a fresh retry budget. The
   * original sequence id and queue time are kept, so it replays in its old slot.
   */
  requeueDeadLetter(sequenceId: number): SyncQueueEntry | undefined {
    const requeue = this.db.transaction((id: number) => {
      const copied = this.db
        .prepare(
          `INSERT INTO sync_queue (${ENTRY_COLUMNS})
           SELECT sequence_id, table_name, record_id, operation, data, queued_at, 0, last_error, last_attempt_at
           FROM sync_dead_letter WHERE sequence_id = ?`
        )
        .run(id);
      if (copied.changes === 0) return false;
      this.db.prepare("DELETE FROM sync_dead_letter WHERE sequence_id = ?").run(id);
      return true;
    });
    return requeue(sequenceId) ? this.get(sequenceId) : undefined;
  }

  private insert(input: EnqueueInput): SyncQueueEntry {
    const queuedAt = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO sync_queue (table_name, record_id, operation, data, queued_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(input.table, input.recordId, input.operation, JSON.stringify(input.payload), queuedAt);

    return {
      sequenceId: Number(result.lastInsertRowid),
      table: input.table,
      recordId: input.recordId,
      operation: input.operation,
      payload: input.payload,
      queuedAt,
      retryCount: 0,
    };
  }
}
