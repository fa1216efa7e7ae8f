import { pino, type BaseLogger } from "pino";

/** The level methods shared by pino loggers and Fastify's `app.log`. */
export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

const root = pino({
  name: "fleet-relay",
  level: process.env.FLEET_LOG_LEVEL ?? "info",
});

export function createLogger(module: string, bindings: Record<string, unknown> = {}): Logger {
  return root.child({ module, ...bindings });
}

export const silentLogger: Logger = pino({ level: "silent" });
