import type { JsonValue, QueryRow } from "./contracts.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { HubApplyInput, HubStore } from "./persistence/hub-store.js";
import type { FleetEvent } from "./plugins/types.js";

export type HubRecordInput = Omit<HubApplyInput, "sourceId">;

/**
 * Applies accepted records in the background. Records of one source are
 * applied strictly in arrival order; sources do not wait on each other.
 */
export class HubService {
  readonly store: HubStore;
  private readonly log: Logger;
  private readonly emit: (event: FleetEvent) => void;
  private readonly chains = new Map<string, Promise<void>>();

  constructor(store: HubStore, options: { logger: Logger; emit: (event: FleetEvent) => void }) {
    this.store = store;
    this.log = options.logger;
    this.emit = options.emit;
  }

  /** Sources with applications still queued or running. */
  get pendingSources(): number {
    return this.chains.size;
  }

  accept(sourceId: string, records: HubRecordInput[]): void {
    const prev = this.chains.get(sourceId) ?? Promise.resolve();
    const next: Promise<void> = prev
      .then(() => this.applyAll(sourceId, records))
      .then(() => {
        if (this.chains.get(sourceId) === next) this.chains.delete(sourceId);
      });
    this.chains.set(sourceId, next);
  }

  /** Resolves once every accepted record has been applied or has failed. */
  async whenIdle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  query(sourceId: string, query: string, params?: Record<string, JsonValue>): Promise<QueryRow[]> {
    return this.store.query(sourceId, query, params);
  }

  private async applyAll(sourceId: string, records: HubRecordInput[]): Promise<void> {
    for (const record of records) {
      const recordId = typeof record.payload.id === "string" ? record.payload.id : undefined;
      try {
        await this.store.apply({ sourceId, ...record });
        this.emit({
          type: "record.applied",
          at: Date.now(),
          sourceId,
          detail: { table: record.table, id: recordId, operation: record.operation },
        });
      } catch (err) {
        this.log.error(
          { err, sourceId, table: record.table, id: recordId },
          "hub apply failed"
        );
        this.emit({
          type: "record.failed",
          at: Date.now(),
          sourceId,
          detail: { table: record.table, id: recordId, error: errorMessage(err) },
        });
      }
    }
  }
}
