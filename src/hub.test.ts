import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { LightMyRequestResponse } from "fastify";
import { buildHub } from "./hub.js";
import { silentLogger } from "./logger.js";
import { LocalStore } from "./persistence/local-store.js";
import { SqliteHubStore, type HubApplyInput } from "./persistence/hub-store.js";
import { createTelemetryPlugin } from "./plugins/telemetry-plugin.js";
import { HttpHubTransport } from "./replication/hub-transport.js";
import { ReplicationClient } from "./replication/replication-client.js";

function makeHub(now: () => number = () => 1_000) {
  const store = new SqliteHubStore(":memory:", { now });
  const telemetry = createTelemetryPlugin();
  const app = buildHub(store, { logger: false, telemetry });
  return { app, store, telemetry };
}

function single(source: string, table: string, operation: string, payload: Record<string, unknown>) {
  return {
    method: "POST" as const,
    url: "/replicate/single",
    payload: { source_id: source, table, operation, payload, timestamp: 1_700_000_000_000 },
  };
}

test("hub: health", async () => {
  const { app } = makeHub();
  const res = await app.inject({ method: "GET", url: "/health" });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { status: "ok" });
  await app.close();
});

test("hub: single write is accepted, then applied in the background", async () => {
  const { app } = makeHub();

  const res = await app.inject(single("node-a", "orders", "insert", { id: "o-1", qty: 3 }));
  assert.equal(res.statusCode, 202);
  assert.deepEqual(res.json(), { status: "accepted", source_id: "node-a" });

  await app.hub.whenIdle();
  const row = await app.inject({ method: "GET", url: "/replicate/records/node-a/orders/o-1" });
  assert.equal(row.statusCode, 200);
  assert.deepEqual(row.json(), {
    status: "ok",
    record: { id: "o-1", payload: { id: "o-1", qty: 3 }, created_at: 1_000, updated_at: 1_000 },
  });
  await app.close();
});

test("hub: update is last-write-wins and keeps created_at; delete removes", async () => {
  let clock = 1_000;
  const { app, store } = makeHub(() => clock);

  await app.inject(single("node-a", "orders", "insert", { id: "o-1", qty: 1 }));
  await app.hub.whenIdle();
  clock = 2_000;
  await app.inject(single("node-a", "orders", "update", { id: "o-1", qty: 2 }));
  await app.hub.whenIdle();

  assert.deepEqual(await store.get("node-a", "orders", "o-1"), {
    id: "o-1",
    payload: { id: "o-1", qty: 2 },
    createdAt: 1_000,
    updatedAt: 2_000,
  });

  await app.inject(single("node-a", "orders", "delete", { id: "o-1" }));
  await app.hub.whenIdle();
  assert.equal(await store.get("node-a", "orders", "o-1"), undefined);

  const missing = await app.inject({ method: "GET", url: "/replicate/records/node-a/orders/o-1" });
  assert.equal(missing.statusCode, 404);
  assert.deepEqual(missing.json(), { status: "error", error: "record_not_found" });
  await app.close();
});

test("hub: batch records are applied in order", async () => {
  const { app, store } = makeHub();

  const res = await app.inject({
    method: "POST",
    url: "/replicate/batch",
    payload: {
      source_id: "node-a",
      timestamp: 1_700_000_000_000,
      records: [
        { table: "orders", operation: "insert", data: { id: "o-1", qty: 1 } },
        { table: "orders", operation: "update", data: { id: "o-1", qty: 2 } },
        { table: "items", operation: "insert", data: { id: "i-1" } },
      ],
    },
  });
  assert.equal(res.statusCode, 202);
  assert.deepEqual(res.json(), { status: "accepted", count: 3 });

  await app.close();
  assert.deepEqual((await store.get("node-a", "orders", "o-1"))?.payload, { id: "o-1", qty: 2 });
  assert.deepEqual((await store.get("node-a", "items", "i-1"))?.payload, { id: "i-1" });
});

test("hub: malformed bodies are rejected with 400", async () => {
  const { app } = makeHub();

  const noId = await app.inject(single("node-a", "orders", "insert", { qty: 1 }));
  assert.equal(noId.statusCode, 400);

  const badOp = await app.inject(single("node-a", "orders", "upsert", { id: "o-1" }));
  assert.equal(badOp.statusCode, 400);

  const badTable = await app.inject(single("node-a", "orders; drop", "insert", { id: "o-1" }));
  assert.equal(badTable.statusCode, 400);

  const ambiguous = await app.inject(single("node__a", "orders", "insert", { id: "o-1" }));
  assert.equal(ambiguous.statusCode, 400);
  assert.deepEqual(ambiguous.json(), { status: "error", error: "invalid_source_id" });

  const batchNoData = await app.inject({
    method: "POST",
    url: "/replicate/batch",
    payload: { source_id: "node-a", records: [{ table: "orders", operation: "insert" }] },
  });
  assert.equal(batchNoData.statusCode, 400);

  await app.hub.whenIdle();
  const tables = await app.inject({ method: "GET", url: "/replicate/tables" });
  assert.deepEqual(tables.json(), { status: "ok", tables: [] });
  await app.close();
});

test("hub: query runs reads against a source's tables", async () => {
  const { app } = makeHub();
  await app.inject(single("node-a", "orders", "insert", { id: "o-1", qty: 3 }));
  await app.inject(single("node-a", "orders", "insert", { id: "o-2", qty: 9 }));
  await app.hub.whenIdle();

  const res = await app.inject({
    method: "POST",
    url: "/replicate/query",
    payload: {
      source_id: "node-a",
      query: `SELECT id FROM "node-a__orders" WHERE json_extract(data, '$.qty') > :min`,
      params: { min: 5 },
    },
  });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { status: "success", results: [{ id: "o-2" }] });
  await app.close();
});

test("hub: failing and write queries answer 500", async () => {
  const { app } = makeHub();

  const unknown = await app.inject({
    method: "POST",
    url: "/replicate/query",
    payload: { source_id: "node-a", query: "SELECT * FROM nowhere" },
  });
  assert.equal(unknown.statusCode, 500);
  assert.equal(unknown.json().status, "error");

  const write = await app.inject({
    method: "POST",
    url: "/replicate/query",
    payload: { source_id: "node-a", query: "DROP TABLE hub_tables" },
  });
  assert.equal(write.statusCode, 500);
  assert.deepEqual(write.json(), {
    status: "error",
    error: "query for node-a failed: only read-only statements are allowed",
  });
  await app.close();
});

test("hub: statements that write and return rows are refused", async () => {
  const { app } = makeHub();
  await app.inject(single("node-a", "orders", "insert", { id: "o-1" }));
  await app.hub.whenIdle();

  const res = await app.inject({
    method: "POST",
    url: "/replicate/query",
    payload: { source_id: "node-b", query: `DELETE FROM "node-a__orders" RETURNING id` },
  });
  assert.equal(res.statusCode, 500);
  assert.deepEqual(res.json(), {
    status: "error",
    error: "query for node-b failed: only read-only statements are allowed",
  });

  const row = await app.inject({ method: "GET", url: "/replicate/records/node-a/orders/o-1" });
  assert.equal(row.statusCode, 200);
  await app.close();
});

test("hub: a source may read other sources' tables", async () => {
  const { app } = makeHub();
  await app.inject(single("node-a", "orders", "insert", { id: "o-1" }));
  await app.hub.whenIdle();

  const res = await app.inject({
    method: "POST",
    url: "/replicate/query",
    payload: { source_id: "node-b", query: `SELECT id FROM "node-a__orders"` },
  });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { status: "success", results: [{ id: "o-1" }] });
  await app.close();
});

test("hub: tables are listed per source", async () => {
  const { app } = makeHub();
  await app.inject(single("node-b", "orders", "insert", { id: "1" }));
  await app.inject(single("node-a", "orders", "insert", { id: "1" }));
  await app.inject(single("node-a", "items", "insert", { id: "1" }));
  await app.hub.whenIdle();

  const all = await app.inject({ method: "GET", url: "/replicate/tables" });
  assert.deepEqual(all.json().tables, [
    { source_id: "node-a", table: "items" },
    { source_id: "node-a", table: "orders" },
    { source_id: "node-b", table: "orders" },
  ]);

  const one = await app.inject({ method: "GET", url: "/replicate/tables?source_id=node-b" });
  assert.deepEqual(one.json().tables, [{ source_id: "node-b", table: "orders" }]);
  await app.close();
});

test("hub: concurrent first writes to new tables never fail", async () => {
  const { app, store, telemetry } = makeHub();

  const requests: Promise<LightMyRequestResponse>[] = [];
  for (let s = 0; s < 4; s++) {
    for (let t = 0; t < 5; t++) {
      requests.push(app.inject(single(`node-${s}`, `table_${t}`, "insert", { id: `r-${s}-${t}` })));
    }
  }
  const responses = await Promise.all(requests);
  assert.ok(responses.every((r) => r.statusCode === 202));
  await app.hub.whenIdle();

  assert.equal(telemetry.count("record.applied"), 20);
  assert.equal(telemetry.count("record.failed"), 0);
  assert.equal((await store.listTables()).length, 20);
  await app.close();
});

test("hub: two stores on one file provisioning the same table both succeed", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fleet-hub-"));
  const file = path.join(dir, "hub.db");
  const first = new SqliteHubStore(file);
  const second = new SqliteHubStore(file);
  try {
    const input = (id: string): HubApplyInput => ({
      sourceId: "node-a",
      table: "orders",
      operation: "insert",
      payload: { id },
    });
    await Promise.all([
      first.apply(input("from-first")),
      second.apply(input("from-second")),
      second.ensureTable("node-a", "orders"),
    ]);

    assert.deepEqual(
      (await first.list("node-a", "orders")).map((r) => r.id).sort(),
      ["from-first", "from-second"]
    );
    assert.deepEqual(await second.listTables(), [{ sourceId: "node-a", table: "orders" }]);
  } finally {
    await first.close();
    await second.close();
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("hub: apply failures are logged and counted, never returned", async () => {
  class BrokenStore extends SqliteHubStore {
    override async apply(input: HubApplyInput): Promise<void> {
      if (input.table === "broken") throw new Error("disk I/O error");
      return super.apply(input);
    }
  }
  const store = new BrokenStore(":memory:");
  const telemetry = createTelemetryPlugin();
  const app = buildHub(store, { logger: false, telemetry });

  const res = await app.inject(single("node-a", "broken", "insert", { id: "x" }));
  assert.equal(res.statusCode, 202);
  await app.inject(single("node-a", "orders", "insert", { id: "o-1" }));
  await app.hub.whenIdle();

  const { events, recent } = telemetry.snapshot();
  assert.equal(events["record.failed"], 1);
  assert.equal(events["record.applied"], 1);
  const failed = recent.find((e) => e.type === "record.failed");
  assert.deepEqual(failed?.detail, { table: "broken", id: "x", error: "disk I/O error" });
  await app.close();
});

test("hub: end to end with a replication client over HTTP", async () => {
  const store = new SqliteHubStore(":memory:");
  const app = buildHub(store, { logger: false });
  const hubUrl = await app.listen({ port: 0, host: "127.0.0.1" });
  const local = new LocalStore({ file: ":memory:", logger: silentLogger });

  try {
    // hub unreachable: the write lands locally and is queued
    const offline = new ReplicationClient({
      sourceId: "node-a",
      store: local,
      transport: new HttpHubTransport({ baseUrl: "http://127.0.0.1:1", timeoutMs: 500 }),
      logger: silentLogger,
    });
    const queued = await offline.write({
      table: "orders",
      operation: "insert",
      payload: { id: "o-1", qty: 3 },
    });
    assert.equal(queued.ok && queued.outcome, "queued");

    // hub reachable: new writes go straight through and replay drains the backlog
    const online = new ReplicationClient({
      sourceId: "node-a",
      store: local,
      transport: new HttpHubTransport({ baseUrl: hubUrl }),
      logger: silentLogger,
    });
    const delivered = await online.write({
      table: "orders",
      operation: "insert",
      payload: { id: "o-2", qty: 4 },
    });
    assert.equal(delivered.ok && delivered.outcome, "delivered");
    assert.equal((await online.replay()).delivered, 1);
    assert.equal(online.queueSize(), 0);

    await app.hub.whenIdle();
    assert.deepEqual((await store.get("node-a", "orders", "o-1"))?.payload, { id: "o-1", qty: 3 });
    assert.deepEqual((await store.get("node-a", "orders", "o-2"))?.payload, { id: "o-2", qty: 4 });

    assert.deepEqual(
      await online.queryNetwork(`SELECT id FROM "node-a__orders" ORDER BY id`),
      [{ id: "o-1" }, { id: "o-2" }]
    );
    assert.equal(await online.health().then((h) => h.hubReachable), true);
  } finally {
    local.close();
    await app.close();
  }
});
