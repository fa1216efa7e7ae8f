import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { loadHubConfig, type HubConfig } from "./config.js";
import {
  OPERATIONS,
  type ReplicateBatchRequest,
  type ReplicateQueryRequest,
  type ReplicateSingleRequest,
} from "./contracts.js";
import { errorMessage } from "./errors.js";
import { HubService } from "./hub-service.js";
import { SqliteHubStore, isValidSourceId, type HubStore } from "./persistence/hub-store.js";
import { RedisHubStore } from "./persistence/redis-adapter.js";
import {
  PROMETHEUS_CONTENT_TYPE,
  createTelemetryPlugin,
  renderPrometheus,
  type TelemetryPlugin,
} from "./plugins/telemetry-plugin.js";
import type { FleetEvent, FleetPlugin } from "./plugins/types.js";

declare module "fastify" {
  interface FastifyInstance {
    hub: HubService;
  }
}

const IDENTIFIER_PATTERN = "^[A-Za-z0-9_][A-Za-z0-9_-]{0,62}$";

const sourceIdSchema = { type: "string", pattern: IDENTIFIER_PATTERN } as const;
const tableSchema = { type: "string", pattern: IDENTIFIER_PATTERN } as const;
const operationSchema = { type: "string", enum: [...OPERATIONS] } as const;
const payloadSchema = {
  type: "object",
  required: ["id"],
  properties: { id: { type: "string", minLength: 1 } },
} as const;

export function createHubStore(config: HubConfig = loadHubConfig()): HubStore {
  return config.store === "redis"
    ? new RedisHubStore(config.redisUrl)
    : new SqliteHubStore(config.sqlitePath);
}

/**
 * Replication sink. Writes are acknowledged with 202 before they are applied;
 * closing the app waits for every pending application.
 */
export function buildHub(
  store?: HubStore,
  options: {
    plugins?: FleetPlugin[];
    telemetry?: TelemetryPlugin;
    logger?: boolean;
    config?: HubConfig;
  } = {}
): FastifyInstance {
  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : { name: "fleet-hub", level: process.env.FLEET_LOG_LEVEL ?? "info" },
  });

  const hubStore = store ?? createHubStore(options.config);
  const ctx = {
    emit(_event: FleetEvent) {},
  };

  const telemetry = options.telemetry ?? createTelemetryPlugin();
  for (const plugin of [telemetry, ...(options.plugins ?? [])]) {
    plugin.register(app, ctx);
  }

  const service = new HubService(hubStore, {
    logger: app.log,
    emit: (event) => ctx.emit(event),
  });
  app.decorate("hub", service);

  app.get("/health", async () => ({ status: "ok" }));

  app.post<{ Body: ReplicateSingleRequest }>(
    "/replicate/single",
    {
      schema: {
        body: {
          type: "object",
          required: ["source_id", "table", "operation", "payload"],
          properties: {
            source_id: sourceIdSchema,
            table: tableSchema,
            operation: operationSchema,
            payload: payloadSchema,
            timestamp: { type: "number" },
          },
        },
      },
    },
    async (req, reply) => {
      const { source_id, table, operation, payload } = req.body;
      if (!isValidSourceId(source_id)) {
        return reply.code(400).send({ status: "error", error: "invalid_source_id" });
      }
      service.accept(source_id, [{ table, operation, payload }]);
      ctx.emit({ type: "replicate.single", at: Date.now(), sourceId: source_id });
      return reply.code(202).send({ status: "accepted", source_id });
    }
  );

  app.post<{ Body: ReplicateBatchRequest }>(
    "/replicate/batch",
    {
      schema: {
        body: {
          type: "object",
          required: ["source_id", "records"],
          properties: {
            source_id: sourceIdSchema,
            records: {
              type: "array",
              items: {
                type: "object",
                required: ["table", "operation", "data"],
                properties: {
                  table: tableSchema,
                  operation: operationSchema,
                  data: payloadSchema,
                },
              },
            },
            timestamp: { type: "number" },
          },
        },
      },
    },
    async (req, reply) => {
      const { source_id, records } = req.body;
      if (!isValidSourceId(source_id)) {
        return reply.code(400).send({ status: "error", error: "invalid_source_id" });
      }
      service.accept(
        source_id,
        records.map((r) => ({ table: r.table, operation: r.operation, payload: r.data }))
      );
      ctx.emit({
        type: "replicate.batch",
        at: Date.now(),
        sourceId: source_id,
        detail: { count: records.length },
      });
      return reply.code(202).send({ status: "accepted", count: records.length });
    }
  );

  app.post<{ Body: ReplicateQueryRequest }>(
    "/replicate/query",
    {
      schema: {
        body: {
          type: "object",
          required: ["source_id", "query"],
          properties: {
            source_id: { type: "string", minLength: 1 },
            query: { type: "string", minLength: 1 },
            params: { type: "object" },
          },
        },
      },
    },
    async (req, reply) => {
      const { source_id, query, params } = req.body;
      try {
        const results = await service.query(source_id, query, params);
        return { status: "success", results };
      } catch (err) {
        req.log.error({ err, sourceId: source_id }, "hub query failed");
        return reply.code(500).send({ status: "error", error: errorMessage(err) });
      }
    }
  );

  app.get<{ Querystring: { source_id?: string } }>(
    "/replicate/tables",
    {
      schema: {
        querystring: {
          type: "object",
          properties: { source_id: { type: "string", minLength: 1 } },
        },
      },
    },
    async (req) => {
      const tables = await hubStore.listTables(req.query.source_id);
      return {
        status: "ok",
        tables: tables.map((t) => ({ source_id: t.sourceId, table: t.table })),
      };
    }
  );

  app.get<{ Params: { sourceId: string; table: string; id: string } }>(
    "/replicate/records/:sourceId/:table/:id",
    async (req, reply) => {
      const { sourceId, table, id } = req.params;
      const row = await hubStore.get(sourceId, table, id);
      if (!row) return reply.code(404).send({ status: "error", error: "record_not_found" });
      return {
        status: "ok",
        record: {
          id: row.id,
          payload: row.payload,
          created_at: row.createdAt,
          updated_at: row.updatedAt,
        },
      };
    }
  );

  app.get("/metrics", async (_req, reply) => {
    const body = renderPrometheus([
      {
        name: "fleet_hub_http_requests_total",
        help: "Total HTTP requests processed",
        type: "counter",
        value: telemetry.requestCount(),
      },
      {
        name: "fleet_hub_single_requests_total",
        help: "Single-record replication requests accepted",
        type: "counter",
        value: telemetry.count("replicate.single"),
      },
      {
        name: "fleet_hub_batch_requests_total",
        help: "Batch replication requests accepted",
        type: "counter",
        value: telemetry.count("replicate.batch"),
      },
      {
        name: "fleet_hub_records_applied_total",
        help: "Records applied to the store",
        type: "counter",
        value: telemetry.count("record.applied"),
      },
      {
        name: "fleet_hub_records_failed_total",
        help: "Records whose application failed",
        type: "counter",
        value: telemetry.count("record.failed"),
      },
      {
        name: "fleet_hub_pending_sources",
        help: "Sources with records waiting to be applied",
        type: "gauge",
        value: service.pendingSources,
      },
    ]);
    reply.header("content-type", PROMETHEUS_CONTENT_TYPE);
    return reply.send(body);
  });

  app.addHook("onClose", async () => {
    await service.whenIdle();
    if (!store) await hubStore.close();
  });

  return app;
}

export async function startHub(config: HubConfig = loadHubConfig()) {
  const app = buildHub(undefined, { config });
  await app.listen({ host: config.host, port: config.port });
  app.log.info(`fleet hub (${config.store}) listening on http://${config.host}:${config.port}`);
  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startHub()
    .then((app) => {
      const shutdown = (signal: string) => {
        app.log.info({ signal }, "hub shutting down");
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error({ err }, "hub shutdown failed");
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
