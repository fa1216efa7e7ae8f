import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { loadControlPlaneConfig, type ControlPlaneConfig } from "./config.js";
import {
  COMPONENT_STATUSES,
  type ComponentStatus,
  type RecordPayload,
} from "./contracts.js";
import { startStalenessSweep } from "./control/staleness-sweep.js";
import {
  PROMETHEUS_CONTENT_TYPE,
  createTelemetryPlugin,
  renderPrometheus,
  type TelemetryPlugin,
} from "./plugins/telemetry-plugin.js";
import type { FleetEvent, FleetPlugin } from "./plugins/types.js";
import { LivenessRegistry, type RegistryError } from "./registry.js";
import { CapabilityRouter } from "./router.js";

declare module "fastify" {
  interface FastifyInstance {
    registry: LivenessRegistry;
    capabilityRouter: CapabilityRouter;
  }
}

const statusSchema = { type: "string", enum: [...COMPONENT_STATUSES] } as const;
const metricsSchema = {
  type: "object",
  additionalProperties: { type: "number" },
} as const;

function errorCode(error: RegistryError): number {
  return error === "invalid_transition" ? 409 : 404;
}

export interface ControlPlaneOptions {
  plugins?: FleetPlugin[];
  telemetry?: TelemetryPlugin;
  logger?: boolean;
  sweepIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  nodeScores?: Record<string, number>;
  fallbackNodeId?: string;
}

export function buildControlPlane(
  registry: LivenessRegistry = new LivenessRegistry(),
  options: ControlPlaneOptions = {}
): FastifyInstance {
  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : { name: "fleet-control-plane", level: process.env.FLEET_LOG_LEVEL ?? "info" },
  });

  const events: FleetEvent[] = [];
  const ctx = {
    emit(event: FleetEvent) {
      events.push(event);
      if (events.length > 2000) events.shift();
    },
  };

  const telemetry = options.telemetry ?? createTelemetryPlugin();
  for (const plugin of [telemetry, ...(options.plugins ?? [])]) {
    plugin.register(app, ctx);
  }

  const router = new CapabilityRouter(
    registry,
    options.nodeScores ?? {},
    options.fallbackNodeId ?? "node-local"
  );
  app.decorate("registry", registry);
  app.decorate("capabilityRouter", router);

  app.get("/health", async () => ({ ok: true }));

  app.get("/v1/snapshot", async () => ({ ok: true, snapshot: registry.snapshot() }));

  app.get("/metrics", async (_req, reply) => {
    const nodes = registry.listNodes();
    const agents = registry.listAgents();
    const count = (list: { status: ComponentStatus }[], status: ComponentStatus) =>
      list.filter((e) => e.status === status).length;

    const body = renderPrometheus([
      {
        name: "fleet_http_requests_total",
        help: "Total HTTP requests processed",
        type: "counter",
        value: telemetry.requestCount(),
      },
      {
        name: "fleet_nodes_registered_total",
        help: "Node registrations since startup",
        type: "counter",
        value: telemetry.count("node.registered"),
      },
      {
        name: "fleet_agents_registered_total",
        help: "Agent registrations since startup",
        type: "counter",
        value: telemetry.count("agent.registered"),
      },
      {
        name: "fleet_offline_transitions_total",
        help: "Entries demoted to offline by the staleness sweep",
        type: "counter",
        value: telemetry.count("node.offline") + telemetry.count("agent.offline"),
      },
      {
        name: "fleet_route_decisions_total",
        help: "Routing decisions made",
        type: "counter",
        value: telemetry.count("route.selected"),
      },
      {
        name: "fleet_route_fallbacks_total",
        help: "Routing decisions that used the fallback node",
        type: "counter",
        value: telemetry.count("route.fallback"),
      },
      { name: "fleet_nodes", help: "Registered nodes", type: "gauge", value: nodes.length },
      {
        name: "fleet_nodes_ready",
        help: "Nodes currently ready",
        type: "gauge",
        value: count(nodes, "ready"),
      },
      {
        name: "fleet_nodes_offline",
        help: "Nodes currently offline",
        type: "gauge",
        value: count(nodes, "offline"),
      },
      { name: "fleet_agents", help: "Registered agents", type: "gauge", value: agents.length },
      {
        name: "fleet_agents_busy",
        help: "Agents currently busy",
        type: "gauge",
        value: count(agents, "busy"),
      },
    ]);

    reply.header("content-type", PROMETHEUS_CONTENT_TYPE);
    return reply.send(body);
  });

  // ── Nodes ────────────────────────────────────────────────────────────────

  app.post<{ Body: { nodeId: string; hostname: string; port: number } }>(
    "/v1/nodes/register",
    {
      schema: {
        body: {
          type: "object",
          required: ["nodeId", "hostname", "port"],
          properties: {
            nodeId: { type: "string", minLength: 1 },
            hostname: { type: "string", minLength: 1 },
            port: { type: "integer", minimum: 0, maximum: 65535 },
          },
        },
      },
    },
    async (req) => {
      const { nodeId, hostname, port } = req.body;
      const known = registry.getNode(nodeId) !== undefined;
      const node = registry.registerNode(nodeId, hostname, port);
      if (!known) ctx.emit({ type: "node.registered", at: Date.now(), nodeId });
      return { ok: true, node };
    }
  );

  app.get<{ Querystring: { status?: ComponentStatus } }>(
    "/v1/nodes",
    { schema: { querystring: { type: "object", properties: { status: statusSchema } } } },
    async (req) => ({ ok: true, nodes: registry.listNodes({ status: req.query.status }) })
  );

  app.get<{ Params: { nodeId: string } }>("/v1/nodes/:nodeId", async (req, reply) => {
    const node = registry.getNode(req.params.nodeId);
    if (!node) return reply.code(404).send({ ok: false, error: "unknown_node" });
    return { ok: true, node };
  });

  app.post<{ Params: { nodeId: string }; Body: { metrics?: Record<string, number> } }>(
    "/v1/nodes/:nodeId/heartbeat",
    {
      // a bare POST is a plain heartbeat
      preValidation: async (req) => {
        if (req.body === undefined || req.body === null) req.body = {};
      },
      schema: {
        body: {
          type: "object",
          properties: { metrics: metricsSchema },
        },
      },
    },
    async (req, reply) => {
      const { nodeId } = req.params;
      const metrics = req.body.metrics;
      if (metrics && Object.keys(metrics).length > 0) {
        const result = registry.updateNodeMetrics(nodeId, metrics);
        if (!result.ok) return reply.code(errorCode(result.error)).send(result);
        return { ok: true, node: result.record };
      }
      if (!registry.heartbeatNode(nodeId)) {
        return reply.code(404).send({ ok: false, error: "unknown_node" });
      }
      return { ok: true, node: registry.getNode(nodeId) };
    }
  );

  app.post<{ Params: { nodeId: string }; Body: { status: ComponentStatus } }>(
    "/v1/nodes/:nodeId/status",
    {
      schema: {
        body: { type: "object", required: ["status"], properties: { status: statusSchema } },
      },
    },
    async (req, reply) => {
      const { nodeId } = req.params;
      const result = registry.updateNodeStatus(nodeId, req.body.status);
      if (!result.ok) return reply.code(errorCode(result.error)).send(result);
      ctx.emit({ type: "node.status", at: Date.now(), nodeId, detail: { status: req.body.status } });
      return { ok: true, node: result.record };
    }
  );

  // ── Agents ───────────────────────────────────────────────────────────────

  app.post<{ Body: { agentId: string; nodeId: string; role: string; metadata?: RecordPayload } }>(
    "/v1/agents/register",
    {
      schema: {
        body: {
          type: "object",
          required: ["agentId", "nodeId", "role"],
          properties: {
            agentId: { type: "string", minLength: 1 },
            nodeId: { type: "string", minLength: 1 },
            role: { type: "string", minLength: 1 },
            metadata: { type: "object" },
          },
        },
      },
    },
    async (req) => {
      const { agentId, nodeId, role, metadata } = req.body;
      const known = registry.getAgent(agentId) !== undefined;
      const agent = registry.registerAgent(agentId, nodeId, role, metadata);
      if (!known) ctx.emit({ type: "agent.registered", at: Date.now(), agentId, nodeId });
      return { ok: true, agent };
    }
  );

  app.get<{ Querystring: { role?: string; nodeId?: string; status?: ComponentStatus } }>(
    "/v1/agents",
    {
      schema: {
        querystring: {
          type: "object",
          properties: { role: { type: "string" }, nodeId: { type: "string" }, status: statusSchema },
        },
      },
    },
    async (req) => ({ ok: true, agents: registry.listAgents(req.query) })
  );

  app.get<{ Params: { agentId: string } }>("/v1/agents/:agentId", async (req, reply) => {
    const agent = registry.getAgent(req.params.agentId);
    if (!agent) return reply.code(404).send({ ok: false, error: "unknown_agent" });
    return { ok: true, agent };
  });

  app.post<{ Params: { agentId: string } }>("/v1/agents/:agentId/heartbeat", async (req, reply) => {
    if (!registry.heartbeatAgent(req.params.agentId)) {
      return reply.code(404).send({ ok: false, error: "unknown_agent" });
    }
    return { ok: true };
  });

  app.post<{
    Params: { agentId: string };
    Body: { status: ComponentStatus; currentTaskId?: string };
  }>(
    "/v1/agents/:agentId/status",
    {
      schema: {
        body: {
          type: "object",
          required: ["status"],
          properties: { status: statusSchema, currentTaskId: { type: "string" } },
        },
      },
    },
    async (req, reply) => {
      const { agentId } = req.params;
      const result = registry.updateAgentStatus(agentId, req.body.status, req.body.currentTaskId);
      if (!result.ok) return reply.code(errorCode(result.error)).send(result);
      ctx.emit({ type: "agent.status", at: Date.now(), agentId, detail: { status: req.body.status } });
      return { ok: true, agent: result.record };
    }
  );

  app.post<{ Params: { agentId: string }; Body: { role: string } }>(
    "/v1/agents/:agentId/role",
    {
      schema: {
        body: {
          type: "object",
          required: ["role"],
          properties: { role: { type: "string", minLength: 1 } },
        },
      },
    },
    async (req, reply) => {
      const result = registry.updateAgentRole(req.params.agentId, req.body.role);
      if (!result.ok) return reply.code(errorCode(result.error)).send(result);
      return { ok: true, agent: result.record };
    }
  );

  // ── Routing ──────────────────────────────────────────────────────────────

  app.post<{ Body: { candidates?: string[] } }>(
    "/v1/route",
    {
      preValidation: async (req) => {
        if (req.body === undefined || req.body === null) req.body = {};
      },
      schema: {
        body: {
          type: "object",
          properties: { candidates: { type: "array", items: { type: "string", minLength: 1 } } },
        },
      },
    },
    async (req) => {
      const decision = router.selectBest(req.body.candidates);
      const at = Date.now();
      ctx.emit({ type: "route.selected", at, nodeId: decision.nodeId, detail: { ...decision } });
      if (decision.fallback) ctx.emit({ type: "route.fallback", at, nodeId: decision.nodeId });
      return { ok: true, ...decision };
    }
  );

  const sweep = startStalenessSweep(registry, ctx, {
    intervalMs: options.sweepIntervalMs ?? 5_000,
    timeoutMs: options.heartbeatTimeoutMs ?? 30_000,
    logger: app.log,
  });

  app.addHook("onReady", async () => registry.setSystemStatus("running"));
  app.addHook("onClose", async () => {
    registry.setSystemStatus("stopping");
    await sweep.stop();
    registry.setSystemStatus("stopped");
  });

  return app;
}

export async function startControlPlane(config: ControlPlaneConfig = loadControlPlaneConfig()) {
  const app = buildControlPlane(new LivenessRegistry(), {
    sweepIntervalMs: config.sweepIntervalMs,
    heartbeatTimeoutMs: config.heartbeatTimeoutMs,
    nodeScores: config.nodeScores,
    fallbackNodeId: config.fallbackNodeId,
  });
  await app.listen({ host: config.host, port: config.port });
  app.log.info(`fleet control plane listening on http://${config.host}:${config.port}`);
  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startControlPlane()
    .then((app) => {
      const shutdown = (signal: string) => {
        app.log.info({ signal }, "control plane shutting down");
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error({ err }, "control plane shutdown failed");
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
