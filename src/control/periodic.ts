export interface LoopHandle {
  readonly running: boolean;
  /** Stops scheduling new ticks and waits for the one in flight, if any. */
  stop(): Promise<void>;
}

/**
 * Runs `task` every `intervalMs`. A tick is skipped while the previous one is
 * still running, and a throwing tick is reported to `onError` without ending
 * the loop.
 */
export function startPeriodicTask(
  task: () => Promise<unknown> | unknown,
  intervalMs: number,
  options: { onError: (err: unknown) => void; signal?: AbortSignal }
): LoopHandle {
  let inFlight: Promise<void> | null = null;
  let stopped = false;

  const tick = () => {
    if (stopped || inFlight) return;
    inFlight = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => options.onError(err)
      )
      .finally(() => {
        inFlight = null;
      });
  };

  const timer = setInterval(tick, intervalMs);

  const handle: LoopHandle = {
    get running() {
      return !stopped;
    },
    async stop() {
      stopped = true;
      clearInterval(timer);
      if (inFlight) await inFlight;
    },
  };

  if (options.signal) {
    if (options.signal.aborted) void handle.stop();
    else options.signal.addEventListener("abort", () => void handle.stop(), { once: true });
  }

  return handle;
}
