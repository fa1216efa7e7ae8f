import { createLogger, type Logger } from "../logger.js";
import type { ReplicationClient } from "../replication/replication-client.js";
import { startPeriodicTask, type LoopHandle } from "./periodic.js";

/** Drains the sync queue against the Hub on an interval. Independent of the write path. */
export function startSyncReplay(
  client: ReplicationClient,
  options: { intervalMs?: number; batchSize?: number; logger?: Logger; signal?: AbortSignal } = {}
): LoopHandle {
  const log = options.logger ?? createLogger("sync-replay");
  const intervalMs = options.intervalMs ?? 10_000;

  log.info({ intervalMs, sourceId: client.sourceId }, "sync replay loop started");
  return startPeriodicTask(() => client.replay(options.batchSize), intervalMs, {
    signal: options.signal,
    onError: (err) => log.error({ err }, "sync replay cycle failed"),
  });
}
