import crypto from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";

export interface AgentOutcomeEntry {
  readonly agentId: string;
  readonly taskId: string;
  readonly success: boolean;
  readonly latencyMs: number;
  readonly errorCode?: string;
}

export interface AgentPerformance {
  readonly total: number;
  readonly successRate: number;
  readonly meanLatencyMs: number;
}

export function saveAgentOutcome(db: BetterSqlite3.Database, entry: AgentOutcomeEntry): void {
  db.prepare(
    "INSERT INTO agent_outcomes (id, agent_id, task_id, success, latency_ms, error_code) VALUES (?, ?, ?, ?, ?, ?)",
  ).run(
    crypto.randomUUID(),
    entry.agentId,
    entry.taskId,
    entry.success ? 1 : 0,
    Math.max(0, Math.round(entry.latencyMs)),
    entry.errorCode ?? null,
  );
}

/** Rolling success rate and mean latency of successful calls over the last `days`. */
export function getAgentPerformance(
  db: BetterSqlite3.Database,
  agentId: string,
  days: number,
): AgentPerformance {
  const row = db
    .prepare(
      `SELECT COUNT(*) AS total,
              COALESCE(SUM(success), 0) AS successes,
              AVG(CASE WHEN success = 1 THEN latency_ms END) AS mean_latency
       FROM agent_outcomes
       WHERE agent_id = ? AND created_at >= datetime('now', ?)`,
    )
    .get(agentId, `-${days} days`) as { total: number; successes: number; mean_latency: number | null };

  return {
    total: row.total,
    successRate: row.total > 0 ? row.successes / row.total : 0,
    meanLatencyMs: row.mean_latency ?? 0,
  };
}
