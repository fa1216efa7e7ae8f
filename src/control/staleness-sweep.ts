import { StalenessSweepError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { FleetPluginContext } from "../plugins/types.js";
import type { LivenessRegistry } from "../registry.js";
import { startPeriodicTask, type LoopHandle } from "./periodic.js";

export function startStalenessSweep(
  registry: LivenessRegistry,
  ctx: FleetPluginContext,
  options: { intervalMs?: number; timeoutMs?: number; logger?: Logger; signal?: AbortSignal } = {}
): LoopHandle {
  const log = options.logger ?? createLogger("staleness-sweep");
  const intervalMs = options.intervalMs ?? 5_000;
  const timeoutMs = options.timeoutMs ?? 30_000;

  return startPeriodicTask(
    () => {
      const at = Date.now();
      for (const changed of registry.sweep(timeoutMs)) {
        const sep = changed.indexOf(":");
        const kind = changed.slice(0, sep);
        const id = changed.slice(sep + 1);
        ctx.emit(
          kind === "node"
            ? { type: "node.offline", at, nodeId: id, detail: { reason: "heartbeat_timeout" } }
            : { type: "agent.offline", at, agentId: id, detail: { reason: "heartbeat_timeout" } }
        );
      }
    },
    intervalMs,
    {
      signal: options.signal,
      onError: (err) =>
        log.error(
          { err: new StalenessSweepError(`sweep tick failed: ${errorMessage(err)}`, { cause: err }) },
          "staleness sweep failed, resuming on next tick"
        ),
    }
  );
}
