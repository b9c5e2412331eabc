import fs from "node:fs";
import path from "node:path";
import type BetterSqlite3 from "better-sqlite3";
import { parse as parseYaml } from "yaml";
import { logger } from "../config/logger.js";
import { InvalidRequestError, NotFoundError } from "../shared/errors.js";
import { isSubset } from "../routing/capabilityClassifier.js";
import { getAgentPerformance } from "../state/agentOutcomes.js";
import { validateAgentRegistry } from "./registry.schema.js";
import type { AgentDescriptor, AgentDirectory, AgentFilter, AgentStats } from "./types.js";

const STATS_WINDOW_DAYS = 7;
const DEFAULT_SUCCESS_RATE = 1;
const DEFAULT_LATENCY_MS = 1000;

export function loadAgentRegistry(filePath: string): readonly AgentDescriptor[] {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new InvalidRequestError(`Agent registry not found at ${resolved}`);
  }

  const parsed: unknown = parseYaml(fs.readFileSync(resolved, "utf-8"));
  const { agents, rejected } = validateAgentRegistry(parsed);

  for (const entry of rejected) {
    logger.warn({ file: resolved, index: entry.index, reason: entry.reason }, "Agent entry rejected, skipping");
  }
  logger.info({ file: resolved, agents: agents.length }, "Agent registry loaded");

  return agents;
}

/**
 * Agent directory backed by the registry file for metadata and the
 * agent_outcomes table for rolling performance.
 */
export class FileAgentDirectory implements AgentDirectory {
  private readonly agents: ReadonlyMap<string, AgentDescriptor>;

  constructor(
    private readonly db: BetterSqlite3.Database,
    agents: readonly AgentDescriptor[],
  ) {
    this.agents = new Map(agents.map((agent) => [agent.id, agent]));
  }

  static fromFile(db: BetterSqlite3.Database, filePath: string): FileAgentDirectory {
    return new FileAgentDirectory(db, loadAgentRegistry(filePath));
  }

  async listAgents(filter: AgentFilter = {}): Promise<readonly AgentDescriptor[]> {
    const required = filter.capabilities ?? [];

    return [...this.agents.values()].filter(
      (agent) =>
        (filter.status === undefined || agent.status === filter.status) &&
        isSubset(required, new Set(agent.capabilities)),
    );
  }

  async getAgentStats(agentId: string): Promise<AgentStats> {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new NotFoundError("Agent", agentId);
    }

    const performance = getAgentPerformance(this.db, agentId, STATS_WINDOW_DAYS);
    if (performance.total === 0) {
      return {
        successRate: DEFAULT_SUCCESS_RATE,
        meanLatencyMs: DEFAULT_LATENCY_MS,
        costPerCall: agent.costPerCall,
      };
    }

    return {
      successRate: performance.successRate,
      meanLatencyMs: performance.meanLatencyMs > 0 ? performance.meanLatencyMs : DEFAULT_LATENCY_MS,
      costPerCall: agent.costPerCall,
    };
  }
}
