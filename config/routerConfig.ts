import { InvalidRequestError } from "../shared/errors.js";

export interface CircuitBreakerConfig {
  readonly failureThreshold: number;
  readonly failureWindowMs: number;
  readonly cooldownMs: number;
}

export interface DispatchConfig {
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface RouterConfig {
  readonly dbPath: string;
  readonly agentsFile: string;
  readonly circuitBreaker: CircuitBreakerConfig;
  readonly dispatch: DispatchConfig;
  readonly evaluationBatchMax: number;
  readonly experimentAutoComplete: boolean;
  readonly rateLimitPerMinute: number;
  readonly agentStatsTtlMs: number;
}

type Env = Readonly<Record<string, string | undefined>>;

export function loadRouterConfig(env: Env = process.env): RouterConfig {
  return {
    dbPath: env.ROUTER_DB_PATH ?? "state/local.db",
    agentsFile: env.ROUTER_AGENTS_FILE ?? "agents.yaml",
    circuitBreaker: {
      failureThreshold: readInt(env, "CIRCUIT_FAILURE_THRESHOLD", 5, 1),
      failureWindowMs: readInt(env, "CIRCUIT_FAILURE_WINDOW_MS", 60_000, 1),
      cooldownMs: readInt(env, "CIRCUIT_COOLDOWN_MS", 30_000, 0),
    },
    dispatch: {
      timeoutMs: readInt(env, "DISPATCH_TIMEOUT_MS", 30_000, 1),
      maxRetries: readInt(env, "DISPATCH_MAX_RETRIES", 2, 0),
    },
    evaluationBatchMax: readInt(env, "EVALUATION_BATCH_MAX", 50, 1),
    experimentAutoComplete: readBoolean(env, "EXPERIMENT_AUTO_COMPLETE", false),
    rateLimitPerMinute: readInt(env, "RATE_LIMIT_PER_MINUTE", 120, 1),
    agentStatsTtlMs: readInt(env, "AGENT_STATS_TTL_MS", 60_000, 0),
  };
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidRequestError(`${name} must be an integer >= ${min}, got: "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;

  throw new InvalidRequestError(`${name} must be "true" or "false", got: "${raw}"`);
}
