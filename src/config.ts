import path from "node:path";
import type { RetryCapPolicy } from "./contracts.js";
import { ConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

export interface ReplicationConfig {
  hubUrl?: string;
  replicationTimeoutMs: number;
  batchTimeoutMs: number;
  replayIntervalMs: number;
  replayBatchSize: number;
  maxRetries: number;
  retryCapPolicy: RetryCapPolicy;
}

export interface EdgeNodeConfig {
  nodeId: string;
  hostname: string;
  port: number;
  dataDir: string;
  controlPlaneUrl: string;
  heartbeatMs: number;
  replication: ReplicationConfig;
}

export interface ControlPlaneConfig {
  host: string;
  port: number;
  sweepIntervalMs: number;
  heartbeatTimeoutMs: number;
  nodeScores: Record<string, number>;
  fallbackNodeId: string;
}

export interface HubConfig {
  host: string;
  port: number;
  store: "sqlite" | "redis";
  sqlitePath: string;
  redisUrl: string;
}

function intVar(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(name, `${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function strVar(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw === "" ? fallback : raw;
}

function retryCapPolicy(env: Env): RetryCapPolicy {
  const raw = strVar(env, "FLEET_RETRY_CAP_POLICY", "retain");
  if (raw !== "retain" && raw !== "dead-letter") {
    throw new ConfigError(
      "FLEET_RETRY_CAP_POLICY",
      `FLEET_RETRY_CAP_POLICY must be "retain" or "dead-letter", got "${raw}"`
    );
  }
  return raw;
}

/**
 * Parses `a=130,b=60` into a score table. Scores are static benchmark numbers
 * and may be fractional.
 */
export function parseNodeScores(raw: string | undefined): Record<string, number> {
  const scores: Record<string, number> = {};
  if (!raw) return scores;

  for (const part of raw.split(",")) {
    const entry = part.trim();
    if (!entry) continue;
    const eq = entry.indexOf("=");
    const nodeId = eq > 0 ? entry.slice(0, eq).trim() : "";
    const score = eq > 0 ? Number(entry.slice(eq + 1).trim()) : Number.NaN;
    if (!nodeId || !Number.isFinite(score)) {
      throw new ConfigError("FLEET_NODE_SCORES", `invalid node score entry "${entry}"`);
    }
    scores[nodeId] = score;
  }
  return scores;
}

export function loadReplicationConfig(env: Env = process.env): ReplicationConfig {
  const hubUrl = env.FLEET_HUB_URL?.trim();
  return {
    hubUrl: hubUrl ? hubUrl.replace(/\/+$/, "") : undefined,
    replicationTimeoutMs: intVar(env, "FLEET_REPLICATION_TIMEOUT_MS", 2_000, 1),
    batchTimeoutMs: intVar(env, "FLEET_BATCH_TIMEOUT_MS", 5_000, 1),
    replayIntervalMs: intVar(env, "FLEET_REPLAY_INTERVAL_MS", 10_000, 1),
    replayBatchSize: intVar(env, "FLEET_REPLAY_BATCH_SIZE", 100, 1),
    maxRetries: intVar(env, "FLEET_MAX_RETRIES", 5, 1),
    retryCapPolicy: retryCapPolicy(env),
  };
}

export function loadEdgeNodeConfig(env: Env = process.env): EdgeNodeConfig {
  return {
    nodeId: strVar(env, "FLEET_NODE_ID", "node-local"),
    hostname: strVar(env, "FLEET_NODE_HOST", "127.0.0.1"),
    port: intVar(env, "FLEET_NODE_PORT", 8000, 1),
    dataDir: path.resolve(strVar(env, "FLEET_DATA_DIR", "./data")),
    controlPlaneUrl: strVar(env, "FLEET_CONTROL_PLANE_URL", "http://127.0.0.1:8787").replace(
      /\/+$/,
      ""
    ),
    heartbeatMs: intVar(env, "FLEET_HEARTBEAT_MS", 5_000, 1),
    replication: loadReplicationConfig(env),
  };
}

export function loadControlPlaneConfig(env: Env = process.env): ControlPlaneConfig {
  return {
    host: strVar(env, "FLEET_HOST", "0.0.0.0"),
    port: intVar(env, "FLEET_PORT", 8787),
    sweepIntervalMs: intVar(env, "FLEET_SWEEP_INTERVAL_MS", 5_000, 1),
    heartbeatTimeoutMs: intVar(env, "FLEET_HEARTBEAT_TIMEOUT_MS", 30_000, 1),
    nodeScores: parseNodeScores(env.FLEET_NODE_SCORES),
    fallbackNodeId: strVar(env, "FLEET_FALLBACK_NODE_ID", "node-local"),
  };
}

export function loadHubConfig(env: Env = process.env): HubConfig {
  const store = strVar(env, "FLEET_HUB_STORE", "sqlite");
  if (store !== "sqlite" && store !== "redis") {
    throw new ConfigError("FLEET_HUB_STORE", `FLEET_HUB_STORE must be "sqlite" or "redis", got "${store}"`);
  }
  return {
    host: strVar(env, "FLEET_HUB_HOST", "0.0.0.0"),
    port: intVar(env, "FLEET_HUB_PORT", 8001),
    store,
    sqlitePath: path.resolve(strVar(env, "FLEET_HUB_DB", "./data/hub.db")),
    redisUrl: strVar(env, "FLEET_REDIS_URL", "redis://localhost:6379"),
  };
}
