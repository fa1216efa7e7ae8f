export type FleetErrorCode =
  | "local_write_failed"
  | "replication_transient"
  | "replay_failed"
  | "query_failed"
  | "sweep_failed"
  | "config_invalid";

export class FleetError extends Error {
  readonly code: FleetErrorCode;

  constructor(code: FleetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The local write did not land; the caller must not assume durability. */
export class LocalWriteError extends FleetError {
  readonly table: string;

  constructor(table: string, message: string, options?: { cause?: unknown }) {
    super("local_write_failed", message, options);
    this.table = table;
  }
}

export class ReplicationTransientError extends FleetError {
  /** HTTP status when the Hub answered, undefined for timeouts and network errors. */
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("replication_transient", message, options);
    this.status = options?.status;
  }
}

export class ReplayError extends FleetError {
  readonly sequenceId: number;

  constructor(sequenceId: number, message: string, options?: { cause?: unknown }) {
    super("replay_failed", message, options);
    this.sequenceId = sequenceId;
  }
}

export class QueryError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("query_failed", message, options);
  }
}

export class StalenessSweepError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("sweep_failed", message, options);
  }
}

export class ConfigError extends FleetError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super("config_invalid", message);
    this.variable = variable;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
