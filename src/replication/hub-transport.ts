import type {
  BatchRecord,
  JsonValue,
  QueryRow,
  ReplicateBatchRequest,
  ReplicateQueryRequest,
  ReplicateSingleRequest,
  ReplicationRecord,
} from "../contracts.js";
import { QueryError, ReplicationTransientError, errorMessage } from "../errors.js";

/**
 * Client side of the Hub surface. Delivery methods throw
 * {@link ReplicationTransientError} for every failure; none of them retry.
 */
export interface HubTransport {
  replicate(record: ReplicationRecord): Promise<void>;
  replicateBatch(sourceId: string, records: ReplicationRecord[]): Promise<void>;
  query(sourceId: string, query: string, params?: Record<string, JsonValue>): Promise<QueryRow[]>;
  health(): Promise<boolean>;
}

export interface HttpHubTransportOptions {
  baseUrl: string;
  /** Deadline for single deliveries and health checks. */
  timeoutMs?: number;
  /** Deadline for batch deliveries and queries. */
  batchTimeoutMs?: number;
  fetch?: typeof fetch;
}

export function toSingleRequest(record: ReplicationRecord): ReplicateSingleRequest {
  return {
    source_id: record.sourceId,
    table: record.table,
    operation: record.operation,
    payload: record.payload,
    timestamp: record.timestamp,
  };
}

export function toBatchRecord(record: ReplicationRecord): BatchRecord {
  return { table: record.table, operation: record.operation, data: record.payload };
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export class HttpHubTransport implements HubTransport {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly batchTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpHubTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.batchTimeoutMs = options.batchTimeoutMs ?? 5_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async replicate(record: ReplicationRecord): Promise<void> {
    await this.post("/replicate/single", toSingleRequest(record), this.timeoutMs);
  }

  async replicateBatch(sourceId: string, records: ReplicationRecord[]): Promise<void> {
    const body: ReplicateBatchRequest = {
      source_id: sourceId,
      records: records.map(toBatchRecord),
      timestamp: Date.now(),
    };
    await this.post("/replicate/batch", body, this.batchTimeoutMs);
  }

  async query(
    sourceId: string,
    query: string,
    params?: Record<string, JsonValue>
  ): Promise<QueryRow[]> {
    const body: ReplicateQueryRequest = { source_id: sourceId, query, params };
    let result: unknown;
    try {
      result = await this.post("/replicate/query", body, this.batchTimeoutMs);
    } catch (err) {
      throw new QueryError(`hub query failed: ${errorMessage(err)}`, { cause: err });
    }

    const rows: unknown =
      typeof result === "object" && result !== null && "results" in result
        ? result.results
        : undefined;
    if (!Array.isArray(rows)) throw new QueryError("hub query response has no results array");
    return rows.filter(
      (row): row is QueryRow => typeof row === "object" && row !== null && !Array.isArray(row)
    );
  }

  async health(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  private async post(path: string, body: unknown, timeoutMs: number): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      const reason = isTimeout(err) ? `timed out after ${timeoutMs}ms` : errorMessage(err);
      throw new ReplicationTransientError(`POST ${path} ${reason}`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new ReplicationTransientError(`POST ${path} HTTP ${res.status}: ${text}`, {
        status: res.status,
      });
    }
    return res.json().catch(() => undefined);
  }
}
