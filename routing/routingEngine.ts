import { componentLogger } from "../config/logger.js";
import { InvalidRequestError, NoEligibleAgentError } from "../shared/errors.js";
import { capabilityKey, isSubset, type CapabilityTag } from "./capabilityClassifier.js";
import type { AgentHealthTracker } from "./healthTracker.js";
import {
  bestPerformance,
  lowestCost,
  nextInRotation,
  pickBest,
  tightestFit,
  type RoutingCandidate,
  type RoutingStrategy,
} from "./strategies.js";

const log = componentLogger("routing");

export interface SelectionRequest {
  readonly capabilities: readonly CapabilityTag[];
  readonly strategy: RoutingStrategy;
  readonly candidates: readonly RoutingCandidate[];
  readonly sessionId?: string;
  readonly exclude?: ReadonlySet<string>;
}

/**
 * Picks one agent per task. Selection is synchronous, so the rotation
 * cursors and session map are read and written without interleaving.
 */
export class RoutingEngine {
  private readonly rotation = new Map<string, string>();
  private readonly sessions = new Map<string, string>();

  constructor(private readonly health: AgentHealthTracker) {}

  eligible(request: Omit<SelectionRequest, "strategy">): readonly RoutingCandidate[] {
    return request.candidates.filter(
      (candidate) =>
        !(request.exclude?.has(candidate.id) ?? false) &&
        isSubset(request.capabilities, candidate.capabilities) &&
        this.health.isSelectable(candidate.id),
    );
  }

  select(request: SelectionRequest): string {
    if (request.strategy === "sticky_session" && !request.sessionId) {
      throw new InvalidRequestError("sticky_session routing requires a session id");
    }

    const eligible = this.eligible(request);
    if (eligible.length === 0) {
      log.warn(
        { capabilities: request.capabilities, candidates: request.candidates.length },
        "No eligible agent",
      );
      throw new NoEligibleAgentError(request.capabilities);
    }

    const chosen = this.apply(request, eligible);
    log.debug({ strategy: request.strategy, agentId: chosen.id }, "Agent selected");
    return chosen.id;
  }

  private apply(request: SelectionRequest, eligible: readonly RoutingCandidate[]): RoutingCandidate {
    const fallback = eligible[0];
    if (fallback === undefined) {
      throw new NoEligibleAgentError(request.capabilities);
    }

    switch (request.strategy) {
      case "capability_match":
        return pickBest(eligible, tightestFit) ?? fallback;
      case "performance_based":
        return pickBest(eligible, bestPerformance) ?? fallback;
      case "cost_optimized":
        return pickBest(eligible, lowestCost) ?? fallback;
      case "round_robin": {
        const key = capabilityKey(request.capabilities);
        const chosen = nextInRotation(eligible, this.rotation.get(key)) ?? fallback;
        this.rotation.set(key, chosen.id);
        return chosen;
      }
      case "sticky_session": {
        const sessionId = request.sessionId ?? "";
        const previous = this.sessions.get(sessionId);
        const reused = eligible.find((c) => c.id === previous);
        if (reused) return reused;

        const chosen = pickBest(eligible, tightestFit) ?? fallback;
        this.sessions.set(sessionId, chosen.id);
        if (previous !== undefined) {
          log.info({ sessionId, previous, next: chosen.id }, "Session moved to a new agent");
        }
        return chosen;
      }
    }
  }
}
