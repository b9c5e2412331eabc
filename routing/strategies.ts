import type { AgentStats } from "../agents/types.js";
import { InvalidRequestError } from "../shared/errors.js";
import type { CapabilityTag } from "./capabilityClassifier.js";

export type RoutingStrategy =
  | "capability_match"
  | "performance_based"
  | "cost_optimized"
  | "round_robin"
  | "sticky_session";

export const ROUTING_STRATEGIES: readonly RoutingStrategy[] = [
  "capability_match",
  "performance_based",
  "cost_optimized",
  "round_robin",
  "sticky_session",
];

export const DEFAULT_STRATEGY: RoutingStrategy = "capability_match";

export interface RoutingCandidate {
  readonly id: string;
  readonly capabilities: ReadonlySet<CapabilityTag>;
  readonly stats: AgentStats;
}

type CandidateComparator = (a: RoutingCandidate, b: RoutingCandidate) => number;

const MIN_LATENCY_MS = 1;

export function parseRoutingStrategy(value: unknown): RoutingStrategy {
  if (value === undefined || value === null) {
    return DEFAULT_STRATEGY;
  }
  const strategy = ROUTING_STRATEGIES.find((s) => s === value);
  if (strategy === undefined) {
    throw new InvalidRequestError(
      `strategy must be one of: ${ROUTING_STRATEGIES.join(", ")}. Got: "${String(value)}"`,
    );
  }
  return strategy;
}

const byId: CandidateComparator = (a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const bySuccessRateDesc: CandidateComparator = (a, b) => b.stats.successRate - a.stats.successRate;

/** Tightest capability fit first, then success rate, then id. */
export const tightestFit: CandidateComparator = (a, b) =>
  a.capabilities.size - b.capabilities.size || bySuccessRateDesc(a, b) || byId(a, b);

export function performanceScore(candidate: RoutingCandidate): number {
  return candidate.stats.successRate / Math.max(candidate.stats.meanLatencyMs, MIN_LATENCY_MS);
}

export const bestPerformance: CandidateComparator = (a, b) =>
  performanceScore(b) - performanceScore(a) || byId(a, b);

export const lowestCost: CandidateComparator = (a, b) =>
  a.stats.costPerCall - b.stats.costPerCall || bySuccessRateDesc(a, b) || byId(a, b);

export function pickBest(
  candidates: readonly RoutingCandidate[],
  comparator: CandidateComparator,
): RoutingCandidate | undefined {
  return [...candidates].sort(comparator)[0];
}

/** Next candidate after `lastId` in id order, wrapping to the first. */
export function nextInRotation(
  candidates: readonly RoutingCandidate[],
  lastId: string | undefined,
): RoutingCandidate | undefined {
  const ordered = [...candidates].sort(byId);
  if (lastId === undefined) return ordered[0];
  return ordered.find((c) => c.id > lastId) ?? ordered[0];
}
