import type { ComponentStatus } from "./contracts.js";
import type { LivenessRegistry } from "./registry.js";

export interface NodeCandidate {
  nodeId: string;
  score: number;
}

export interface RouteDecision {
  nodeId: string;
  /** Score of the chosen node, null when the fallback was used. */
  score: number | null;
  fallback: boolean;
}

/**
 * Highest-scoring READY candidate, ties broken by node id ascending. With no
 * READY candidate the fallback id is returned as is.
 */
export function selectBestNode(
  candidates: NodeCandidate[],
  statusOf: (nodeId: string) => ComponentStatus,
  fallbackNodeId: string
): RouteDecision {
  let best: NodeCandidate | undefined;
  for (const c of candidates) {
    if (statusOf(c.nodeId) !== "ready") continue;
    if (!best || c.score > best.score || (c.score === best.score && c.nodeId < best.nodeId)) {
      best = c;
    }
  }
  return best
    ? { nodeId: best.nodeId, score: best.score, fallback: false }
    : { nodeId: fallbackNodeId, score: null, fallback: true };
}

/** Joins static capability scores with live registry status at decision time. */
export class CapabilityRouter {
  private readonly registry: LivenessRegistry;
  private readonly scores: Record<string, number>;
  readonly fallbackNodeId: string;

  constructor(registry: LivenessRegistry, scores: Record<string, number>, fallbackNodeId: string) {
    this.registry = registry;
    this.scores = { ...scores };
    this.fallbackNodeId = fallbackNodeId;
  }

  /**
   * Without explicit candidates every scored or registered node competes.
   * Nodes with no configured score count as 0.
   */
  selectBest(candidates?: string[]): RouteDecision {
    const ids =
      candidates ??
      [...new Set([...Object.keys(this.scores), ...this.registry.listNodes().map((n) => n.nodeId)])];
    return selectBestNode(
      ids.map((nodeId) => ({ nodeId, score: this.scores[nodeId] ?? 0 })),
      (nodeId) => this.registry.nodeStatus(nodeId),
      this.fallbackNodeId
    );
  }

  scoreOf(nodeId: string): number | undefined {
    return this.scores[nodeId];
  }
}
