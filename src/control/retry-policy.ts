import type { RetryCapPolicy } from "../contracts.js";

export type ReplayDecision =
  | { action: "retry"; remaining: number }
  | { action: "retain"; remaining: 0 }
  | { action: "dead-letter"; remaining: 0 };

/**
 * What to do with a queued write after a failed replay attempt. `retryCount`
 * is the count after the failure has been recorded.
 */
export function computeReplayDecision(input: {
  retryCount: number;
  maxRetries: number;
  policy: RetryCapPolicy;
}): ReplayDecision {
  const maxRetries = Math.max(1, input.maxRetries);

  if (input.retryCount < maxRetries) {
    return { action: "retry", remaining: maxRetries - input.retryCount };
  }

  return input.policy === "dead-letter"
    ? { action: "dead-letter", remaining: 0 }
    : { action: "retain", remaining: 0 };
}
