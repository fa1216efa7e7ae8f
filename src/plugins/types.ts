import type { FastifyInstance } from "fastify";

export const FLEET_EVENT_TYPES = [
  "replicate.single",
  "replicate.batch",
  "record.applied",
  "record.failed",
  "node.registered",
  "node.status",
  "node.offline",
  "agent.registered",
  "agent.status",
  "agent.offline",
  "route.selected",
  "route.fallback",
] as const;

export type FleetEventType = (typeof FLEET_EVENT_TYPES)[number];

export interface FleetEvent {
  type: FleetEventType;
  at: number;
  nodeId?: string;
  agentId?: string;
  sourceId?: string;
  detail?: Record<string, unknown>;
}

export interface FleetPluginContext {
  emit(event: FleetEvent): void;
}

export interface FleetPlugin {
  name: string;
  /** Runs synchronously while the app is built, before any route is served. */
  register(app: FastifyInstance, ctx: FleetPluginContext): void;
}
