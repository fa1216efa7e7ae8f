export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type RecordPayload = { [key: string]: JsonValue };

export type Operation = "insert" | "update" | "delete";

export const OPERATIONS: readonly Operation[] = ["insert", "update", "delete"];

export interface ReplicationRecord {
  sourceId: string;
  table: string;
  id: string;
  operation: Operation;
  payload: RecordPayload;
  timestamp: number;
}

export interface SyncQueueEntry {
  sequenceId: number;
  table: string;
  recordId: string;
  operation: Operation;
  payload: RecordPayload;
  queuedAt: number;
  retryCount: number;
  lastError?: string;
  lastAttemptAt?: number;
}

export interface DeadLetterEntry extends SyncQueueEntry {
  deadLetteredAt: number;
  reason: string;
}

/** What happens to a queued write once its retry count reaches the cap. */
export type RetryCapPolicy = "retain" | "dead-letter";

export type ComponentStatus = "unknown" | "starting" | "ready" | "busy" | "error" | "offline";

export const COMPONENT_STATUSES: readonly ComponentStatus[] = [
  "unknown",
  "starting",
  "ready",
  "busy",
  "error",
  "offline",
];

export function isComponentStatus(value: string): value is ComponentStatus {
  return COMPONENT_STATUSES.some((s) => s === value);
}

export type SystemStatus = "stopped" | "starting" | "running" | "degraded" | "stopping" | "error";

export interface NodeRecord {
  nodeId: string;
  hostname: string;
  port: number;
  status: ComponentStatus;
  /** Agent ids linked to this node. Lookup only; agents are not owned by the node. */
  registeredAgents: string[];
  lastHeartbeat: number;
  registrationTime: number;
  metrics: Record<string, number>;
}

export interface AgentRecord {
  agentId: string;
  nodeId: string;
  role: string;
  status: ComponentStatus;
  currentTaskId?: string;
  lastHeartbeat: number;
  metadata: RecordPayload;
}

export interface LivenessSnapshot {
  system: { status: SystemStatus; uptimeMs: number; timestamp: number };
  nodes: Record<string, NodeRecord>;
  agents: Record<string, AgentRecord>;
}

// ── Hub wire bodies ──────────────────────────────────────────────────────────

export interface ReplicateSingleRequest {
  source_id: string;
  table: string;
  operation: Operation;
  payload: RecordPayload;
  timestamp: number;
}

export interface BatchRecord {
  table: string;
  operation: Operation;
  data: RecordPayload;
}

export interface ReplicateBatchRequest {
  source_id: string;
  records: BatchRecord[];
  timestamp: number;
}

export interface ReplicateQueryRequest {
  source_id: string;
  query: string;
  params?: Record<string, JsonValue>;
}

export type QueryRow = Record<string, unknown>;

export interface HubRow {
  id: string;
  payload: RecordPayload;
  createdAt: number;
  updatedAt: number;
}
