import { randomUUID } from "node:crypto";
import type {
  DeadLetterEntry,
  JsonValue,
  Operation,
  QueryRow,
  RecordPayload,
  ReplicationRecord,
  RetryCapPolicy,
  SyncQueueEntry,
} from "../contracts.js";
import { computeReplayDecision } from "../control/retry-policy.js";
import { LocalWriteError, ReplayError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { LocalStore, StoredRecord } from "../persistence/local-store.js";
import type { SyncQueue } from "../persistence/sync-queue.js";
import type { HubTransport } from "./hub-transport.js";

export interface WriteInput {
  table: string;
  /** Defaults to `payload.id` when it is a string, otherwise a fresh UUID. */
  id?: string;
  operation: Operation;
  payload: RecordPayload;
}

export type WriteResult =
  | { ok: true; id: string; outcome: "delivered" | "local" }
  | { ok: true; id: string; outcome: "queued"; sequenceId: number }
  | { ok: false; id: string; error: LocalWriteError };

export type BatchWriteResult =
  | {
      ok: true;
      count: number;
      ids: string[];
      outcome: "delivered" | "queued" | "local";
      sequenceIds: number[];
    }
  | { ok: false; error: LocalWriteError };

export interface ReplayReport {
  attempted: number;
  delivered: number;
  failed: number;
  /** Entries that reached the retry cap during this cycle. */
  capped: number;
  remaining: number;
}

export interface StorageHealth {
  sourceId: string;
  localDb: boolean;
  replicationEnabled: boolean;
  hubReachable: boolean | null;
  syncQueueSize: number;
  stuckEntries: number;
  deadLetters: number;
  timestamp: string;
}

export interface ReplicationClientOptions {
  /** Identifies this node's records at the Hub. */
  sourceId: string;
  store: LocalStore;
  /** Without a transport the client only writes locally. */
  transport?: HubTransport;
  maxRetries?: number;
  retryCapPolicy?: RetryCapPolicy;
  replayBatchSize?: number;
  logger?: Logger;
  now?: () => number;
}

function toLocalWriteError(err: unknown, table: string): LocalWriteError {
  if (err instanceof LocalWriteError) return err;
  return new LocalWriteError(table, errorMessage(err), { cause: err });
}

/**
 * Local-first dual write. The local commit decides success; Hub delivery is
 * best effort and falls back to the sync queue.
 */
export class ReplicationClient {
  readonly sourceId: string;
  readonly maxRetries: number;
  readonly retryCapPolicy: RetryCapPolicy;
  private readonly store: LocalStore;
  private readonly queue: SyncQueue;
  private readonly transport?: HubTransport;
  private readonly replayBatchSize: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private inFlightReplay: Promise<ReplayReport> | null = null;

  constructor(options: ReplicationClientOptions) {
    this.sourceId = options.sourceId;
    this.store = options.store;
    this.queue = options.store.syncQueue;
    this.transport = options.transport;
    this.maxRetries = options.maxRetries ?? 5;
    this.retryCapPolicy = options.retryCapPolicy ?? "retain";
    this.replayBatchSize = options.replayBatchSize ?? 100;
    this.log = options.logger ?? createLogger("replication");
    this.now = options.now ?? Date.now;
  }

  get replicationEnabled(): boolean {
    return this.transport !== undefined;
  }

  async write(input: WriteInput): Promise<WriteResult> {
    const record = this.toRecord(input);

    try {
      this.store.apply(record.table, record.id, record.operation, record.payload);
    } catch (err) {
      const error = toLocalWriteError(err, record.table);
      this.log.error({ err: error, table: record.table, id: record.id }, "local write failed");
      return { ok: false, id: record.id, error };
    }

    if (!this.transport) return { ok: true, id: record.id, outcome: "local" };

    try {
      await this.transport.replicate(record);
      this.log.debug({ table: record.table, id: record.id }, "hub write delivered");
      return { ok: true, id: record.id, outcome: "delivered" };
    } catch (err) {
      this.log.warn({ err, table: record.table, id: record.id }, "hub write failed, queueing");
    }

    try {
      const entry = this.queue.enqueue({
        table: record.table,
        recordId: record.id,
        operation: record.operation,
        payload: record.payload,
      });
      return { ok: true, id: record.id, outcome: "queued", sequenceId: entry.sequenceId };
    } catch (err) {
      const error = toLocalWriteError(err, record.table);
      this.log.error({ err: error, table: record.table, id: record.id }, "sync queue write failed");
      return { ok: false, id: record.id, error };
    }
  }

  /**
   * Commits every record locally in one transaction, then makes a single Hub
   * call for the batch. On failure each record is queued on its own.
   */
  async writeBatch(inputs: WriteInput[]): Promise<BatchWriteResult> {
    const records = inputs.map((input) => this.toRecord(input));
    const ids = records.map((r) => r.id);

    try {
      this.store.transaction(() => {
        for (const r of records) this.store.apply(r.table, r.id, r.operation, r.payload);
      });
    } catch (err) {
      const error = toLocalWriteError(err, records[0]?.table ?? "");
      this.log.error({ err: error, count: records.length }, "local batch write failed");
      return { ok: false, error };
    }

    if (!this.transport) {
      return { ok: true, count: records.length, ids, outcome: "local", sequenceIds: [] };
    }
    if (records.length === 0) {
      return { ok: true, count: 0, ids, outcome: "delivered", sequenceIds: [] };
    }

    try {
      await this.transport.replicateBatch(this.sourceId, records);
      this.log.info({ count: records.length }, "hub batch delivered");
      return { ok: true, count: records.length, ids, outcome: "delivered", sequenceIds: [] };
    } catch (err) {
      this.log.warn({ err, count: records.length }, "hub batch failed, queueing individually");
    }

    try {
      const entries = this.queue.enqueueMany(
        records.map((r) => ({
          table: r.table,
          recordId: r.id,
          operation: r.operation,
          payload: r.payload,
        }))
      );
      return {
        ok: true,
        count: records.length,
        ids,
        outcome: "queued",
        sequenceIds: entries.map((e) => e.sequenceId),
      };
    } catch (err) {
      const error = toLocalWriteError(err, records[0]?.table ?? "");
      this.log.error({ err: error, count: records.length }, "sync queue batch write failed");
      return { ok: false, error };
    }
  }

  read(table: string, id: string): RecordPayload | undefined {
    return this.store.read(table, id);
  }

  list(table: string): StoredRecord[] {
    return this.store.list(table);
  }

  queryLocal(sql: string, params?: Record<string, JsonValue>): QueryRow[] {
    return this.store.queryLocal(sql, params);
  }

  /** Network-wide read through the Hub. Failures are logged and yield no rows. */
  async queryNetwork(query: string, params?: Record<string, JsonValue>): Promise<QueryRow[]> {
    if (!this.transport) {
      this.log.warn("hub not configured, network query skipped");
      return [];
    }
    try {
      return await this.transport.query(this.sourceId, query, params);
    } catch (err) {
      this.log.error({ err, query }, "network query failed");
      return [];
    }
  }

  /**
   * Delivers up to `limit` queued writes, oldest first, one at a time. The
   * cycle stops at the first failure so later writes never overtake it.
   * Overlapping calls share the cycle already running.
   */
  replay(limit = this.replayBatchSize): Promise<ReplayReport> {
    if (this.inFlightReplay) return this.inFlightReplay;
    const cycle = this.runReplay(limit).finally(() => {
      this.inFlightReplay = null;
    });
    this.inFlightReplay = cycle;
    return cycle;
  }

  queueSize(): number {
    return this.queue.size();
  }

  queuedEntries(): SyncQueueEntry[] {
    return this.queue.list();
  }

  /** Entries held back by the `retain` cap policy. */
  stuckEntries(): SyncQueueEntry[] {
    return this.queue.stuck(this.maxRetries);
  }

  resetRetries(sequenceId?: number): number {
    const reset = this.queue.resetRetries(sequenceId);
    if (reset > 0) this.log.info({ reset, sequenceId }, "sync queue retries reset");
    return reset;
  }

  listDeadLetters(): DeadLetterEntry[] {
    return this.queue.listDeadLetters();
  }

  requeueDeadLetter(sequenceId: number): SyncQueueEntry | undefined {
    const entry = this.queue.requeueDeadLetter(sequenceId);
    if (entry) this.log.info({ sequenceId }, "dead letter requeued");
    return entry;
  }

  async health(): Promise<StorageHealth> {
    const localDb = this.store.ping();
    let syncQueueSize = 0;
    let stuckEntries = 0;
    let deadLetters = 0;
    if (localDb) {
      syncQueueSize = this.queue.size();
      stuckEntries = this.queue.stuck(this.maxRetries).length;
      deadLetters = this.queue.listDeadLetters().length;
    }

    return {
      sourceId: this.sourceId,
      localDb,
      replicationEnabled: this.replicationEnabled,
      hubReachable: this.transport ? await this.transport.health() : null,
      syncQueueSize,
      stuckEntries,
      deadLetters,
      timestamp: new Date(this.now()).toISOString(),
    };
  }

  private async runReplay(limit: number): Promise<ReplayReport> {
    const report: ReplayReport = { attempted: 0, delivered: 0, failed: 0, capped: 0, remaining: 0 };
    if (!this.transport) return report;

    const entries = this.queue.selectReplayable(limit, this.maxRetries);
    for (const entry of entries) {
      report.attempted += 1;
      try {
        await this.transport.replicate(this.toReplayRecord(entry));
        this.queue.remove(entry.sequenceId);
        report.delivered += 1;
      } catch (err) {
        report.failed += 1;
        this.recordReplayFailure(entry, err, report);
        break;
      }
    }

    report.remaining = this.queue.size();
    if (report.attempted > 0) {
      this.log.info(report, `replayed ${report.delivered}/${report.attempted} queued writes`);
    }
    return report;
  }

  private recordReplayFailure(entry: SyncQueueEntry, err: unknown, report: ReplayReport): void {
    const error = new ReplayError(
      entry.sequenceId,
      `replay of ${entry.table}/${entry.recordId} failed: ${errorMessage(err)}`,
      { cause: err }
    );
    const retryCount = this.queue.recordFailure(entry.sequenceId, error.message) ?? entry.retryCount + 1;
    const decision = computeReplayDecision({
      retryCount,
      maxRetries: this.maxRetries,
      policy: this.retryCapPolicy,
    });

    const context = { err: error, sequenceId: entry.sequenceId, table: entry.table, retryCount };
    switch (decision.action) {
      case "retry":
        this.log.warn({ ...context, remaining: decision.remaining }, "replay failed, will retry");
        return;
      case "retain":
        report.capped += 1;
        this.log.warn(context, "replay retry cap reached, entry retained in sync queue");
        return;
      case "dead-letter":
        report.capped += 1;
        this.queue.moveToDeadLetter(entry.sequenceId, "max_retries_exhausted");
        this.log.error(context, "replay retry cap reached, entry moved to dead letters");
        return;
    }
  }

  private toRecord(input: WriteInput): ReplicationRecord {
    const payloadId =
      typeof input.payload.id === "string" && input.payload.id.length > 0
        ? input.payload.id
        : undefined;
    const id = input.id ?? payloadId ?? randomUUID();
    return {
      sourceId: this.sourceId,
      table: input.table,
      id,
      operation: input.operation,
      payload: { ...input.payload, id },
      timestamp: this.now(),
    };
  }

  private toReplayRecord(entry: SyncQueueEntry): ReplicationRecord {
    return {
      sourceId: this.sourceId,
      table: entry.table,
      id: entry.recordId,
      operation: entry.operation,
      payload: entry.payload,
      timestamp: entry.queuedAt,
    };
  }
}
