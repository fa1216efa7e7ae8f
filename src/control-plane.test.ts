import test from "node:test";
import assert from "node:assert/strict";
import { buildControlPlane } from "./control-plane.js";
import { silentLogger } from "./logger.js";
import { LivenessRegistry } from "./registry.js";

function makeControlPlane(options: { now?: () => number; sweepIntervalMs?: number } = {}) {
  const registry = new LivenessRegistry({ logger: silentLogger, now: options.now });
  const app = buildControlPlane(registry, {
    logger: false,
    sweepIntervalMs: options.sweepIntervalMs ?? 60_000,
    heartbeatTimeoutMs: 30_000,
    nodeScores: { "node-a": 130, "node-b": 60 },
    fallbackNodeId: "node-local",
  });
  return { app, registry };
}

type App = ReturnType<typeof buildControlPlane>;

async function register(app: App, nodeId: string) {
  const res = await app.inject({
    method: "POST",
    url: "/v1/nodes/register",
    payload: { nodeId, hostname: "127.0.0.1", port: 8000 },
  });
  assert.equal(res.statusCode, 200);
  return res;
}

async function setStatus(app: App, nodeId: string, status: string) {
  return app.inject({ method: "POST", url: `/v1/nodes/${nodeId}/status`, payload: { status } });
}

test("control plane: health", async () => {
  const { app } = makeControlPlane();
  const res = await app.inject({ method: "GET", url: "/health" });
  assert.deepEqual(res.json(), { ok: true });
  await app.close();
});

test("control plane: node registration is idempotent", async () => {
  const { app } = makeControlPlane({ now: () => 1_000 });

  const first = await register(app, "node-a");
  assert.deepEqual(first.json(), {
    ok: true,
    node: {
      nodeId: "node-a",
      hostname: "127.0.0.1",
      port: 8000,
      status: "starting",
      registeredAgents: [],
      lastHeartbeat: 1_000,
      registrationTime: 1_000,
      metrics: { tps: 0, load: 0 },
    },
  });

  await setStatus(app, "node-a", "ready");
  const second = await register(app, "node-a");
  assert.equal(second.json().node.status, "ready");

  const list = await app.inject({ method: "GET", url: "/v1/nodes" });
  assert.equal(list.json().nodes.length, 1);
  await app.close();
});

test("control plane: registration body is validated", async () => {
  const { app } = makeControlPlane();
  const res = await app.inject({
    method: "POST",
    url: "/v1/nodes/register",
    payload: { nodeId: "node-a", hostname: "h", port: 70_000 },
  });
  assert.equal(res.statusCode, 400);

  const badStatus = await app.inject({
    method: "POST",
    url: "/v1/nodes/node-a/status",
    payload: { status: "sleeping" },
  });
  assert.equal(badStatus.statusCode, 400);
  await app.close();
});

test("control plane: status transitions map to 200, 409 and 404", async () => {
  const { app } = makeControlPlane();
  await register(app, "node-a");

  const ok = await setStatus(app, "node-a", "ready");
  assert.equal(ok.statusCode, 200);
  assert.equal(ok.json().node.status, "ready");

  const invalid = await setStatus(app, "node-a", "starting");
  assert.equal(invalid.statusCode, 409);
  assert.deepEqual(invalid.json(), { ok: false, error: "invalid_transition" });

  const unknown = await setStatus(app, "node-x", "ready");
  assert.equal(unknown.statusCode, 404);
  assert.deepEqual(unknown.json(), { ok: false, error: "unknown_node" });
  await app.close();
});

test("control plane: heartbeats refresh the node and merge metrics", async () => {
  let clock = 1_000;
  const { app } = makeControlPlane({ now: () => clock });
  await register(app, "node-a");
  clock = 2_000;

  const plain = await app.inject({ method: "POST", url: "/v1/nodes/node-a/heartbeat", payload: {} });
  assert.equal(plain.statusCode, 200);
  assert.equal(plain.json().node.lastHeartbeat, 2_000);

  clock = 2_500;
  const bare = await app.inject({ method: "POST", url: "/v1/nodes/node-a/heartbeat" });
  assert.equal(bare.statusCode, 200);
  assert.equal(bare.json().node.lastHeartbeat, 2_500);

  clock = 3_000;
  const withMetrics = await app.inject({
    method: "POST",
    url: "/v1/nodes/node-a/heartbeat",
    payload: { metrics: { load: 0.5, syncQueue: 3 } },
  });
  assert.deepEqual(withMetrics.json().node.metrics, { tps: 0, load: 0.5, syncQueue: 3 });
  assert.equal(withMetrics.json().node.lastHeartbeat, 3_000);

  const unknown = await app.inject({ method: "POST", url: "/v1/nodes/node-x/heartbeat", payload: {} });
  assert.equal(unknown.statusCode, 404);
  await app.close();
});

test("control plane: agents register, report status and change role", async () => {
  const { app } = makeControlPlane();
  await register(app, "node-a");

  const reg = await app.inject({
    method: "POST",
    url: "/v1/agents/register",
    payload: { agentId: "agent-1", nodeId: "node-a", role: "coder", metadata: { model: "small" } },
  });
  assert.equal(reg.statusCode, 200);
  assert.equal(reg.json().agent.status, "starting");

  const node = await app.inject({ method: "GET", url: "/v1/nodes/node-a" });
  assert.deepEqual(node.json().node.registeredAgents, ["agent-1"]);

  await app.inject({ method: "POST", url: "/v1/agents/agent-1/status", payload: { status: "ready" } });
  const busy = await app.inject({
    method: "POST",
    url: "/v1/agents/agent-1/status",
    payload: { status: "busy", currentTaskId: "task-1" },
  });
  assert.equal(busy.json().agent.currentTaskId, "task-1");

  const role = await app.inject({
    method: "POST",
    url: "/v1/agents/agent-1/role",
    payload: { role: "reviewer" },
  });
  assert.equal(role.json().agent.role, "reviewer");

  const filtered = await app.inject({ method: "GET", url: "/v1/agents?role=reviewer&status=busy" });
  assert.deepEqual(
    filtered.json().agents.map((a: { agentId: string }) => a.agentId),
    ["agent-1"]
  );
  const none = await app.inject({ method: "GET", url: "/v1/agents?role=coder" });
  assert.deepEqual(none.json().agents, []);

  const hb = await app.inject({ method: "POST", url: "/v1/agents/agent-1/heartbeat" });
  assert.equal(hb.statusCode, 200);
  const missing = await app.inject({ method: "GET", url: "/v1/agents/agent-x" });
  assert.equal(missing.statusCode, 404);
  await app.close();
});

test("control plane: routing follows readiness and scores", async () => {
  const { app } = makeControlPlane();
  for (const id of ["node-a", "node-b"]) {
    await register(app, id);
    await setStatus(app, id, "ready");
  }

  const route = () => app.inject({ method: "POST", url: "/v1/route", payload: {} });
  assert.deepEqual((await route()).json(), { ok: true, nodeId: "node-a", score: 130, fallback: false });
  const bare = await app.inject({ method: "POST", url: "/v1/route" });
  assert.deepEqual(bare.json(), { ok: true, nodeId: "node-a", score: 130, fallback: false });

  await setStatus(app, "node-a", "busy");
  assert.equal((await route()).json().nodeId, "node-b");

  await setStatus(app, "node-b", "error");
  assert.deepEqual((await route()).json(), {
    ok: true,
    nodeId: "node-local",
    score: null,
    fallback: true,
  });

  const explicit = await app.inject({
    method: "POST",
    url: "/v1/route",
    payload: { candidates: ["node-b"] },
  });
  assert.equal(explicit.json().fallback, true);
  await app.close();
});

test("control plane: snapshot reports running while serving and the app decorations", async () => {
  const { app, registry } = makeControlPlane();
  await app.ready();
  await register(app, "node-a");

  const res = await app.inject({ method: "GET", url: "/v1/snapshot" });
  const snap = res.json().snapshot;
  assert.equal(snap.system.status, "running");
  assert.deepEqual(Object.keys(snap.nodes), ["node-a"]);
  assert.equal(app.registry, registry);
  assert.equal(app.capabilityRouter.fallbackNodeId, "node-local");

  await app.close();
  assert.equal(registry.snapshot().system.status, "stopped");
});

test("control plane: the sweep loop demotes silent nodes", async () => {
  let clock = 0;
  const { app, registry } = makeControlPlane({ now: () => clock, sweepIntervalMs: 10 });
  await register(app, "node-a");
  await setStatus(app, "node-a", "ready");

  clock = 31_000;
  for (let i = 0; i < 200 && registry.nodeStatus("node-a") !== "offline"; i++) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  assert.equal(registry.nodeStatus("node-a"), "offline");

  const telemetry = await app.inject({ method: "GET", url: "/v1/plugins/telemetry" });
  assert.equal(telemetry.json().events["node.offline"], 1);
  await app.close();
});
