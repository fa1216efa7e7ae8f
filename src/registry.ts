import type {
  AgentRecord,
  ComponentStatus,
  LivenessSnapshot,
  NodeRecord,
  RecordPayload,
  SystemStatus,
} from "./contracts.js";
import { createLogger, type Logger } from "./logger.js";

export type RegistryError = "unknown_node" | "unknown_agent" | "invalid_transition";

export type RegistryResult<T> = { ok: true; record: T } | { ok: false; error: RegistryError };

const TRANSITIONS: Record<ComponentStatus, readonly ComponentStatus[]> = {
  unknown: ["starting"],
  starting: ["ready"],
  ready: ["busy"],
  busy: ["ready"],
  error: ["starting"],
  offline: ["starting"],
};

/** `error` and `offline` are reachable from every state. */
export function canTransition(from: ComponentStatus, to: ComponentStatus): boolean {
  if (from === to || to === "error" || to === "offline") return true;
  return TRANSITIONS[from].includes(to);
}

function copyNode(node: NodeRecord): NodeRecord {
  return { ...node, registeredAgents: [...node.registeredAgents], metrics: { ...node.metrics } };
}

function copyAgent(agent: AgentRecord): AgentRecord {
  return { ...agent, metadata: structuredClone(agent.metadata) };
}

/**
 * Process-scoped liveness state for nodes and their agents. Every method runs
 * to completion without awaiting, so no caller observes a half-applied update.
 */
export class LivenessRegistry {
  private readonly nodes = new Map<string, NodeRecord>();
  private readonly agents = new Map<string, AgentRecord>();
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly startedAt: number;
  private systemStatus: SystemStatus = "starting";

  constructor(options: { now?: () => number; logger?: Logger } = {}) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger("registry");
    this.startedAt = this.now();
  }

  registerNode(nodeId: string, hostname: string, port: number): NodeRecord {
    const now = this.now();
    const existing = this.nodes.get(nodeId);
    if (existing) {
      existing.hostname = hostname;
      existing.port = port;
      existing.lastHeartbeat = now;
      return copyNode(existing);
    }

    const node: NodeRecord = {
      nodeId,
      hostname,
      port,
      status: "starting",
      registeredAgents: [],
      lastHeartbeat: now,
      registrationTime: now,
      metrics: { tps: 0, load: 0 },
    };
    // agents registered before their node are linked now
    for (const agent of this.agents.values()) {
      if (agent.nodeId === nodeId) node.registeredAgents.push(agent.agentId);
    }
    this.nodes.set(nodeId, node);
    this.log.info({ nodeId, hostname, port }, "node registered");
    return copyNode(node);
  }

  registerAgent(
    agentId: string,
    nodeId: string,
    role: string,
    metadata: RecordPayload = {}
  ): AgentRecord {
    const now = this.now();
    const existing = this.agents.get(agentId);
    if (existing) {
      if (existing.nodeId !== nodeId) {
        this.unlinkAgent(existing.nodeId, agentId);
        existing.nodeId = nodeId;
      }
      existing.role = role;
      existing.metadata = structuredClone(metadata);
      existing.lastHeartbeat = now;
      this.linkAgent(nodeId, agentId);
      return copyAgent(existing);
    }

    const agent: AgentRecord = {
      agentId,
      nodeId,
      role,
      status: "starting",
      lastHeartbeat: now,
      metadata: structuredClone(metadata),
    };
    this.agents.set(agentId, agent);
    this.linkAgent(nodeId, agentId);
    this.log.info({ agentId, nodeId, role }, "agent registered");
    return copyAgent(agent);
  }

  heartbeat(kind: "node" | "agent", id: string): boolean {
    const entry = kind === "node" ? this.nodes.get(id) : this.agents.get(id);
    if (!entry) return false;
    entry.lastHeartbeat = this.now();
    return true;
  }

  heartbeatNode(nodeId: string): boolean {
    return this.heartbeat("node", nodeId);
  }

  heartbeatAgent(agentId: string): boolean {
    return this.heartbeat("agent", agentId);
  }

  updateNodeStatus(nodeId: string, status: ComponentStatus): RegistryResult<NodeRecord> {
    const node = this.nodes.get(nodeId);
    if (!node) return { ok: false, error: "unknown_node" };
    if (!canTransition(node.status, status)) {
      this.log.warn({ nodeId, from: node.status, to: status }, "rejected node status transition");
      return { ok: false, error: "invalid_transition" };
    }
    if (node.status !== status) {
      this.log.info({ nodeId, from: node.status, to: status }, "node status changed");
      node.status = status;
    }
    node.lastHeartbeat = this.now();
    return { ok: true, record: copyNode(node) };
  }

  updateAgentStatus(
    agentId: string,
    status: ComponentStatus,
    currentTaskId?: string
  ): RegistryResult<AgentRecord> {
    const agent = this.agents.get(agentId);
    if (!agent) return { ok: false, error: "unknown_agent" };
    if (!canTransition(agent.status, status)) {
      this.log.warn({ agentId, from: agent.status, to: status }, "rejected agent status transition");
      return { ok: false, error: "invalid_transition" };
    }
    if (agent.status !== status) {
      this.log.info({ agentId, from: agent.status, to: status }, "agent status changed");
      agent.status = status;
    }
    if (currentTaskId !== undefined) agent.currentTaskId = currentTaskId;
    else if (status !== "busy") delete agent.currentTaskId;
    agent.lastHeartbeat = this.now();
    return { ok: true, record: copyAgent(agent) };
  }

  updateNodeMetrics(nodeId: string, metrics: Record<string, number>): RegistryResult<NodeRecord> {
    const node = this.nodes.get(nodeId);
    if (!node) return { ok: false, error: "unknown_node" };
    Object.assign(node.metrics, metrics);
    node.lastHeartbeat = this.now();
    return { ok: true, record: copyNode(node) };
  }

  updateAgentRole(agentId: string, role: string): RegistryResult<AgentRecord> {
    const agent = this.agents.get(agentId);
    if (!agent) return { ok: false, error: "unknown_agent" };
    agent.role = role;
    return { ok: true, record: copyAgent(agent) };
  }

  getNode(nodeId: string): NodeRecord | undefined {
    const node = this.nodes.get(nodeId);
    return node ? copyNode(node) : undefined;
  }

  getAgent(agentId: string): AgentRecord | undefined {
    const agent = this.agents.get(agentId);
    return agent ? copyAgent(agent) : undefined;
  }

  nodeStatus(nodeId: string): ComponentStatus {
    return this.nodes.get(nodeId)?.status ?? "unknown";
  }

  listNodes(filter: { status?: ComponentStatus } = {}): NodeRecord[] {
    return [...this.nodes.values()]
      .filter((n) => filter.status === undefined || n.status === filter.status)
      .map(copyNode);
  }

  listAgents(filter: { role?: string; nodeId?: string; status?: ComponentStatus } = {}): AgentRecord[] {
    return [...this.agents.values()]
      .filter(
        (a) =>
          (filter.role === undefined || a.role === filter.role) &&
          (filter.nodeId === undefined || a.nodeId === filter.nodeId) &&
          (filter.status === undefined || a.status === filter.status)
      )
      .map(copyAgent);
  }

  setSystemStatus(status: SystemStatus): void {
    if (status === this.systemStatus) return;
    this.log.info({ from: this.systemStatus, to: status }, "system status changed");
    this.systemStatus = status;
  }

  snapshot(): LivenessSnapshot {
    const now = this.now();
    const nodes: Record<string, NodeRecord> = {};
    const agents: Record<string, AgentRecord> = {};
    for (const [id, node] of this.nodes) nodes[id] = copyNode(node);
    for (const [id, agent] of this.agents) agents[id] = copyAgent(agent);
    return {
      system: { status: this.systemStatus, uptimeMs: now - this.startedAt, timestamp: now },
      nodes,
      agents,
    };
  }

  /**
   * Demotes every entry whose last heartbeat is older than `timeoutMs` to
   * `offline`. Returns the changed entries as `node:<id>` and `agent:<id>`.
   */
  sweep(timeoutMs: number): string[] {
    const now = this.now();
    const changed: string[] = [];

    for (const node of this.nodes.values()) {
      if (node.status !== "offline" && now - node.lastHeartbeat > timeoutMs) {
        node.status = "offline";
        changed.push(`node:${node.nodeId}`);
      }
    }
    for (const agent of this.agents.values()) {
      if (agent.status !== "offline" && now - agent.lastHeartbeat > timeoutMs) {
        agent.status = "offline";
        changed.push(`agent:${agent.agentId}`);
      }
    }

    if (changed.length > 0) this.log.warn({ changed, timeoutMs }, "stale entries marked offline");
    return changed;
  }

  private linkAgent(nodeId: string, agentId: string): void {
    const node = this.nodes.get(nodeId);
    if (node && !node.registeredAgents.includes(agentId)) node.registeredAgents.push(agentId);
  }

  private unlinkAgent(nodeId: string, agentId: string): void {
    const node = this.nodes.get(nodeId);
    if (node) node.registeredAgents = node.registeredAgents.filter((id) => id !== agentId);
  }
}
