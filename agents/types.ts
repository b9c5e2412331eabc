import type { CapabilityTag } from "../routing/capabilityClassifier.js";

export type DirectoryStatus = "active" | "inactive";

export interface AgentDescriptor {
  readonly id: string;
  readonly capabilities: readonly CapabilityTag[];
  readonly status: DirectoryStatus;
  readonly endpoint?: string;
  readonly costPerCall: number;
}

export interface AgentStats {
  readonly successRate: number;
  readonly meanLatencyMs: number;
  readonly costPerCall: number;
}

export interface AgentFilter {
  readonly capabilities?: readonly CapabilityTag[];
  readonly status?: DirectoryStatus;
}

/** Authoritative source of agent metadata. */
export interface AgentDirectory {
  listAgents(filter?: AgentFilter): Promise<readonly AgentDescriptor[]>;
  getAgentStats(agentId: string): Promise<AgentStats>;
}

export interface TaskPayload {
  readonly taskId: string;
  readonly description: string;
  readonly capabilities: readonly CapabilityTag[];
  readonly sessionId?: string;
  readonly attempt: number;
}

export interface AgentResponse {
  readonly output: unknown;
}

/** One synchronous call to an agent endpoint, bounded by the caller's signal. */
export interface AgentInvoker {
  invoke(agent: AgentDescriptor, payload: TaskPayload, signal: AbortSignal): Promise<AgentResponse>;
}
