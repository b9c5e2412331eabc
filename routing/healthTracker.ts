import type { CircuitBreakerConfig } from "../config/routerConfig.js";
import { componentLogger } from "../config/logger.js";

const log = componentLogger("health-tracker");

export type CircuitState = "closed" | "open" | "half_open";
export type AgentHealth = "healthy" | "degraded" | "circuit_open";

export interface AgentHealthSnapshot {
  readonly agentId: string;
  readonly state: CircuitState;
  readonly health: AgentHealth;
  readonly consecutiveFailures: number;
  readonly reopensAt: number | null;
}

interface Circuit {
  state: CircuitState;
  failures: number[];
  openedAt: number;
  probeInFlight: boolean;
}

/**
 * Per-agent circuit breaker.
 *
 * closed -> open after `failureThreshold` consecutive failures inside the
 * sliding window; open -> half_open once the cool-down elapses (checked on
 * read); half_open admits a single probe and closes on its success or
 * reopens on its failure.
 */
export class AgentHealthTracker {
  private readonly circuits = new Map<string, Circuit>();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number = Date.now,
  ) {}

  getState(agentId: string): CircuitState {
    const circuit = this.circuits.get(agentId);
    if (!circuit) return "closed";

    this.advance(agentId, circuit);
    return circuit.state;
  }

  getHealth(agentId: string): AgentHealth {
    return toHealth(this.getState(agentId));
  }

  isSelectable(agentId: string): boolean {
    const state = this.getState(agentId);
    if (state === "open") return false;
    if (state === "half_open") return !this.circuit(agentId).probeInFlight;
    return true;
  }

  /**
   * Reserves the right to dispatch. In half_open only one caller gets it
   * until the probe reports back or is released.
   */
  tryAcquire(agentId: string): boolean {
    const state = this.getState(agentId);
    if (state === "closed") return true;
    if (state === "open") return false;

    const circuit = this.circuit(agentId);
    if (circuit.probeInFlight) return false;
    circuit.probeInFlight = true;
    return true;
  }

  /** Frees a half_open probe slot without recording an outcome. */
  release(agentId: string): void {
    const circuit = this.circuits.get(agentId);
    if (circuit) circuit.probeInFlight = false;
  }

  recordSuccess(agentId: string): void {
    const circuit = this.circuits.get(agentId);
    if (!circuit) return;

    this.advance(agentId, circuit);
    if (circuit.state === "half_open") {
      log.info({ agentId }, "Circuit closed after successful probe");
    }
    circuit.state = "closed";
    circuit.failures = [];
    circuit.probeInFlight = false;
  }

  recordFailure(agentId: string): void {
    const circuit = this.circuit(agentId);
    const now = this.now();
    this.advance(agentId, circuit);

    if (circuit.state === "half_open") {
      this.open(agentId, circuit, now);
      log.warn({ agentId }, "Probe failed, circuit reopened");
      return;
    }
    if (circuit.state === "open") return;

    const windowStart = now - this.config.failureWindowMs;
    circuit.failures = [...circuit.failures.filter((t) => t > windowStart), now];

    if (circuit.failures.length >= this.config.failureThreshold) {
      this.open(agentId, circuit, now);
      log.warn(
        { agentId, failures: this.config.failureThreshold, cooldownMs: this.config.cooldownMs },
        "Circuit opened",
      );
    }
  }

  snapshot(agentIds?: readonly string[]): readonly AgentHealthSnapshot[] {
    const ids = agentIds ?? [...this.circuits.keys()].sort();

    return ids.map((agentId) => {
      const state = this.getState(agentId);
      const circuit = this.circuits.get(agentId);
      return {
        agentId,
        state,
        health: toHealth(state),
        consecutiveFailures: circuit?.failures.length ?? 0,
        reopensAt: state === "open" && circuit ? circuit.openedAt + this.config.cooldownMs : null,
      };
    });
  }

  reset(agentId?: string): void {
    if (agentId === undefined) {
      this.circuits.clear();
    } else {
      this.circuits.delete(agentId);
    }
  }

  private circuit(agentId: string): Circuit {
    let circuit = this.circuits.get(agentId);
    if (!circuit) {
      circuit = { state: "closed", failures: [], openedAt: 0, probeInFlight: false };
      this.circuits.set(agentId, circuit);
    }
    return circuit;
  }

  private open(agentId: string, circuit: Circuit, now: number): void {
    circuit.state = "open";
    circuit.openedAt = now;
    circuit.probeInFlight = false;
    circuit.failures = [];
    log.debug({ agentId, openedAt: now }, "Circuit state set to open");
  }

  private advance(agentId: string, circuit: Circuit): void {
    if (circuit.state === "open" && this.now() - circuit.openedAt >= this.config.cooldownMs) {
      circuit.state = "half_open";
      circuit.probeInFlight = false;
      log.info({ agentId }, "Circuit half-open, next dispatch is a probe");
    }
  }
}

function toHealth(state: CircuitState): AgentHealth {
  if (state === "open") return "circuit_open";
  if (state === "half_open") return "degraded";
  return "healthy";
}
