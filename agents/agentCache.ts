import { componentLogger } from "../config/logger.js";
import { KeyedLock } from "../shared/keyedLock.js";
import { describeError } from "../shared/errors.js";
import type { CapabilityTag } from "../routing/capabilityClassifier.js";
import type { RoutingCandidate } from "../routing/strategies.js";
import type { AgentDescriptor, AgentDirectory, AgentStats } from "./types.js";

const log = componentLogger("agent-cache");

const ALL_AGENTS_KEY = "__all__";

interface Entry<T> {
  readonly value: T;
  readonly expiresAt: number;
}

/**
 * Read-mostly TTL cache in front of the agent directory. Concurrent misses
 * on the same key share one directory call.
 */
export class AgentCache {
  private descriptors: Entry<ReadonlyMap<string, AgentDescriptor>> | null = null;
  private readonly stats = new Map<string, Entry<AgentStats>>();
  private readonly lock = new KeyedLock();

  constructor(
    private readonly directory: AgentDirectory,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async describe(agentId: string): Promise<AgentDescriptor | undefined> {
    const all = await this.allDescriptors();
    return all.get(agentId);
  }

  /**
   * Active agents offering every required capability, as routing candidates.
   * An agent whose stats cannot be read is left out of this selection.
   */
  async candidates(required: readonly CapabilityTag[]): Promise<readonly RoutingCandidate[]> {
    const all = await this.allDescriptors();
    const active = [...all.values()].filter(
      (agent) => agent.status === "active" && required.every((tag) => agent.capabilities.includes(tag)),
    );

    const settled = await Promise.allSettled(
      active.map(async (agent): Promise<RoutingCandidate> => ({
        id: agent.id,
        capabilities: new Set(agent.capabilities),
        stats: await this.statsFor(agent.id),
      })),
    );

    const candidates: RoutingCandidate[] = [];
    for (const [index, outcome] of settled.entries()) {
      if (outcome.status === "fulfilled") {
        candidates.push(outcome.value);
      } else {
        log.warn(
          { agentId: active[index]?.id, err: describeError(outcome.reason) },
          "Agent stats unavailable, skipping candidate",
        );
      }
    }
    return candidates;
  }

  async agentIds(): Promise<readonly string[]> {
    const all = await this.allDescriptors();
    return [...all.keys()].sort();
  }

  invalidate(agentId?: string): void {
    if (agentId === undefined) {
      this.descriptors = null;
      this.stats.clear();
      return;
    }
    this.stats.delete(agentId);
  }

  private async allDescriptors(): Promise<ReadonlyMap<string, AgentDescriptor>> {
    return this.lock.run(ALL_AGENTS_KEY, async () => {
      if (this.descriptors && this.descriptors.expiresAt > this.now()) {
        return this.descriptors.value;
      }

      const agents = await this.directory.listAgents();
      const value = new Map(agents.map((agent) => [agent.id, agent]));
      this.descriptors = { value, expiresAt: this.now() + this.ttlMs };
      return value;
    });
  }

  private async statsFor(agentId: string): Promise<AgentStats> {
    return this.lock.run(agentId, async () => {
      const cached = this.stats.get(agentId);
      if (cached && cached.expiresAt > this.now()) {
        return cached.value;
      }

      const value = await this.directory.getAgentStats(agentId);
      this.stats.set(agentId, { value, expiresAt: this.now() + this.ttlMs });
      return value;
    });
  }
}
