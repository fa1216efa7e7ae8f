import os from "node:os";
import { loadEdgeNodeConfig, type EdgeNodeConfig } from "./config.js";
import { isComponentStatus, type ComponentStatus } from "./contracts.js";
import { startPeriodicTask, type LoopHandle } from "./control/periodic.js";
import { startSyncReplay } from "./control/sync-replay.js";
import { createLogger, type Logger } from "./logger.js";
import { LocalStore } from "./persistence/local-store.js";
import { HttpHubTransport, type HubTransport } from "./replication/hub-transport.js";
import { ReplicationClient } from "./replication/replication-client.js";

export interface EdgeNodeDeps {
  fetch?: typeof fetch;
  /** Replaces the HTTP transport built from `replication.hubUrl`. */
  transport?: HubTransport;
  store?: LocalStore;
  logger?: Logger;
}

export interface EdgeNodeHandle {
  readonly nodeId: string;
  readonly store: LocalStore;
  readonly client: ReplicationClient;
  /** Runs one heartbeat now instead of waiting for the interval. */
  beat(): Promise<void>;
  stop(): Promise<void>;
}

interface JsonResponse {
  status: number;
  body: unknown;
}

function readNodeStatus(body: unknown): ComponentStatus | undefined {
  if (typeof body !== "object" || body === null || !("node" in body)) return undefined;
  const node: unknown = body.node;
  if (typeof node !== "object" || node === null || !("status" in node)) return undefined;
  const status: unknown = node.status;
  return typeof status === "string" && isComponentStatus(status) ? status : undefined;
}

/**
 * Node process: keeps its registration alive on the control plane and drains
 * the sync queue towards the Hub. Writes go through `client`.
 */
export async function startEdgeNode(
  config: EdgeNodeConfig = loadEdgeNodeConfig(),
  deps: EdgeNodeDeps = {}
): Promise<EdgeNodeHandle> {
  const log = deps.logger ?? createLogger("edge-node", { nodeId: config.nodeId });
  const fetchImpl = deps.fetch ?? fetch;
  const baseUrl = config.controlPlaneUrl;
  const { replication } = config;

  const store = deps.store ?? LocalStore.forNode(config.dataDir, config.nodeId, { logger: log });
  const transport =
    deps.transport ??
    (replication.hubUrl
      ? new HttpHubTransport({
          baseUrl: replication.hubUrl,
          timeoutMs: replication.replicationTimeoutMs,
          batchTimeoutMs: replication.batchTimeoutMs,
          fetch: fetchImpl,
        })
      : undefined);
  const client = new ReplicationClient({
    sourceId: config.nodeId,
    store,
    transport,
    maxRetries: replication.maxRetries,
    retryCapPolicy: replication.retryCapPolicy,
    replayBatchSize: replication.replayBatchSize,
    logger: log,
  });
  if (!transport) log.warn("FLEET_HUB_URL not set, writes stay local");

  async function postJson(path: string, body: unknown): Promise<JsonResponse> {
    const res = await fetchImpl(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(replication.replicationTimeoutMs),
    });
    return { status: res.status, body: await res.json().catch(() => undefined) };
  }

  async function setStatus(status: ComponentStatus): Promise<void> {
    const res = await postJson(`/v1/nodes/${config.nodeId}/status`, { status });
    if (res.status !== 200) throw new Error(`status ${status} rejected with HTTP ${res.status}`);
  }

  async function announce(): Promise<void> {
    const res = await postJson("/v1/nodes/register", {
      nodeId: config.nodeId,
      hostname: config.hostname,
      port: config.port,
    });
    if (res.status !== 200) throw new Error(`registration rejected with HTTP ${res.status}`);
    const status = readNodeStatus(res.body);
    if (status === "offline" || status === "error" || status === "unknown") {
      await setStatus("starting");
    }
    if (status !== "ready" && status !== "busy") await setStatus("ready");
    log.info({ controlPlane: baseUrl }, "node registered");
  }

  let registered = false;
  async function beat(): Promise<void> {
    if (!registered) {
      await announce();
      registered = true;
      return;
    }

    const res = await postJson(`/v1/nodes/${config.nodeId}/heartbeat`, {
      metrics: { load: os.loadavg()[0] ?? 0, syncQueue: client.queueSize() },
    });
    if (res.status === 404) {
      // control plane restarted and lost its registry
      registered = false;
      log.warn("control plane does not know this node, re-registering");
      await announce();
      registered = true;
      return;
    }
    if (res.status !== 200) throw new Error(`heartbeat rejected with HTTP ${res.status}`);

    const status = readNodeStatus(res.body);
    if (status === "offline" || status === "error") {
      log.warn({ status }, "control plane reports node as stale, restarting status");
      await setStatus("starting");
      await setStatus("ready");
    }
  }

  try {
    await beat();
  } catch (err) {
    log.warn({ err }, "initial registration failed, retrying on next heartbeat");
  }

  const heartbeat: LoopHandle = startPeriodicTask(beat, config.heartbeatMs, {
    onError: (err) => log.warn({ err }, "heartbeat failed"),
  });
  const replay: LoopHandle | undefined = client.replicationEnabled
    ? startSyncReplay(client, {
        intervalMs: replication.replayIntervalMs,
        batchSize: replication.replayBatchSize,
        logger: log,
      })
    : undefined;

  let stopping: Promise<void> | undefined;
  const stop = (): Promise<void> => {
    if (stopping) return stopping;
    stopping = (async () => {
      await heartbeat.stop();
      await replay?.stop();
      if (registered) {
        try {
          await setStatus("offline");
        } catch (err) {
          log.warn({ err }, "could not report offline status");
        }
      }
      store.close();
      log.info("edge node stopped");
    })();
    return stopping;
  };

  return { nodeId: config.nodeId, store, client, beat, stop };
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startEdgeNode()
    .then((node) => {
      const shutdown = (signal: string) => {
        createLogger("edge-node").info({ signal, nodeId: node.nodeId }, "edge node shutting down");
        node.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error(err);
            process.exit(1);
          }
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
