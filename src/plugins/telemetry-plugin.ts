import type { FastifyInstance } from "fastify";
import {
  FLEET_EVENT_TYPES,
  type FleetEvent,
  type FleetEventType,
  type FleetPlugin,
  type FleetPluginContext,
} from "./types.js";

export interface TelemetrySnapshot {
  requests: { total: number; byStatusClass: Record<string, number> };
  /** Every known event type, zero until first seen. */
  events: Record<string, number>;
  /** Event counts keyed `node:<id>`, `agent:<id>` or `source:<id>`. */
  subjects: Record<string, number>;
  recent: FleetEvent[];
}

export interface TelemetryPlugin extends FleetPlugin {
  count(type: FleetEventType): number;
  requestCount(): number;
  snapshot(): TelemetrySnapshot;
}

export interface MetricSample {
  name: string;
  help: string;
  type: "counter" | "gauge";
  value: number;
}

/** Prometheus text exposition (format 0.0.4). */
export function renderPrometheus(samples: MetricSample[]): string {
  const lines: string[] = [];
  for (const s of samples) {
    lines.push(`# HELP ${s.name} ${s.help}`, `# TYPE ${s.name} ${s.type}`, `${s.name} ${s.value}`);
  }
  lines.push("");
  return lines.join("\n");
}

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

function subjectsOf(event: FleetEvent): string[] {
  const keys: string[] = [];
  if (event.nodeId !== undefined) keys.push(`node:${event.nodeId}`);
  if (event.agentId !== undefined) keys.push(`agent:${event.agentId}`);
  if (event.sourceId !== undefined) keys.push(`source:${event.sourceId}`);
  return keys;
}

function bump(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

/**
 * Counts requests and fleet events for `/metrics`. Registered first so its
 * `ctx.emit` wrapper sees every event the other plugins and routes emit.
 */
export function createTelemetryPlugin(options: { maxEvents?: number } = {}): TelemetryPlugin {
  const maxEvents = options.maxEvents ?? 200;
  const eventCounts = new Map<FleetEventType, number>(FLEET_EVENT_TYPES.map((t): [FleetEventType, number] => [t, 0]));
  const subjects = new Map<string, number>();
  const statusClasses = new Map<string, number>();
  const recent: FleetEvent[] = [];
  let requests = 0;

  const record = (event: FleetEvent) => {
    eventCounts.set(event.type, (eventCounts.get(event.type) ?? 0) + 1);
    for (const key of subjectsOf(event)) bump(subjects, key);
    recent.push(event);
    if (recent.length > maxEvents) recent.shift();
  };

  const snapshot = (): TelemetrySnapshot => ({
    requests: { total: requests, byStatusClass: Object.fromEntries(statusClasses) },
    events: Object.fromEntries(eventCounts),
    subjects: Object.fromEntries(subjects),
    recent: [...recent],
  });

  return {
    name: "telemetry",
    count: (type) => eventCounts.get(type) ?? 0,
    requestCount: () => requests,
    snapshot,
    register(app: FastifyInstance, ctx: FleetPluginContext) {
      app.addHook("onResponse", async (_req, reply) => {
        requests += 1;
        bump(statusClasses, `${Math.floor(reply.statusCode / 100)}xx`);
      });

      const forward = ctx.emit;
      ctx.emit = (event) => {
        record(event);
        forward(event);
      };

      app.get("/v1/plugins/telemetry", async () => ({ ok: true, plugin: "telemetry", ...snapshot() }));
    },
  };
}
