import { InvalidRequestError } from "../shared/errors.js";
import { normalizeCapabilities } from "../routing/capabilityClassifier.js";
import type { AgentDescriptor, DirectoryStatus } from "./types.js";

const AGENT_ID_REGEX = /^[a-z0-9][a-z0-9._-]*$/;
const MAX_AGENT_ID_LENGTH = 64;
const VALID_STATUSES: readonly DirectoryStatus[] = ["active", "inactive"];

export interface AgentRegistryValidation {
  readonly agents: readonly AgentDescriptor[];
  readonly rejected: ReadonlyArray<{ readonly index: number; readonly reason: string }>;
}

/**
 * Validates the `agents:` list of an agent registry file. Bad entries are
 * reported in `rejected` instead of failing the whole file; duplicate ids
 * keep the first occurrence.
 */
export function validateAgentRegistry(raw: unknown): AgentRegistryValidation {
  if (raw === null || typeof raw !== "object") {
    throw new InvalidRequestError("Agent registry must be a non-null object");
  }

  const entries = (raw as Record<string, unknown>)["agents"];
  if (!Array.isArray(entries)) {
    throw new InvalidRequestError("Agent registry must contain an 'agents' list");
  }

  const agents: AgentDescriptor[] = [];
  const rejected: Array<{ index: number; reason: string }> = [];
  const seen = new Set<string>();

  entries.forEach((entry: unknown, index) => {
    try {
      const agent = validateAgentEntry(entry);
      if (seen.has(agent.id)) {
        throw new InvalidRequestError(`duplicate agent id "${agent.id}"`);
      }
      seen.add(agent.id);
      agents.push(agent);
    } catch (error) {
      if (!(error instanceof InvalidRequestError)) throw error;
      rejected.push({ index, reason: error.message });
    }
  });

  return { agents, rejected };
}

export function validateAgentEntry(value: unknown): AgentDescriptor {
  if (value === null || typeof value !== "object") {
    throw new InvalidRequestError("agent entry must be an object");
  }

  const record = value as Record<string, unknown>;

  return {
    id: validateAgentId(record["id"]),
    capabilities: validateCapabilities(record["capabilities"]),
    status: validateStatus(record["status"]),
    endpoint: validateEndpoint(record["endpoint"]),
    costPerCall: validateCost(record["cost_per_call"] ?? record["costPerCall"]),
  };
}

function validateAgentId(value: unknown): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidRequestError("id must be a non-empty string");
  }

  const id = value.trim();
  if (id.length > MAX_AGENT_ID_LENGTH || !AGENT_ID_REGEX.test(id)) {
    throw new InvalidRequestError(`id must be lowercase alphanumeric with . _ -: "${id}"`);
  }
  return id;
}

function validateCapabilities(value: unknown): readonly string[] {
  if (!Array.isArray(value) || !value.every((c): c is string => typeof c === "string")) {
    throw new InvalidRequestError("capabilities must be a list of strings");
  }
  return normalizeCapabilities(value);
}

function validateStatus(value: unknown): DirectoryStatus {
  if (value === undefined || value === null) {
    return "active";
  }
  const status = VALID_STATUSES.find((s) => s === value);
  if (status === undefined) {
    throw new InvalidRequestError(
      `status must be one of: ${VALID_STATUSES.join(", ")}. Got: "${String(value)}"`,
    );
  }
  return status;
}

function validateEndpoint(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidRequestError(`endpoint must be a URL string. Got: "${String(value)}"`);
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidRequestError(`endpoint is not a valid URL: "${value}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidRequestError(`endpoint must use http or https: "${value}"`);
  }
  return url.toString();
}

function validateCost(value: unknown): number {
  if (value === undefined || value === null) return 0;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num) || num < 0) {
    throw new InvalidRequestError(`cost_per_call must be a non-negative number. Got: "${String(value)}"`);
  }
  return num;
}
