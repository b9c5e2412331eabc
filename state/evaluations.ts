import type BetterSqlite3 from "better-sqlite3";
import type { EvaluationRecord } from "../evaluation/types.js";
import { parseJsonColumn } from "./db.js";

interface EvaluationRow {
  readonly id: string;
  readonly agent_id: string;
  readonly task_id: string;
  readonly template: string;
  readonly scores: string;
  readonly aggregate_score: number;
  readonly passed: number;
  readonly feedback: string;
  readonly created_at: string;
}

export interface EvaluationSummary {
  readonly total: number;
  readonly passed: number;
  readonly passRate: number;
  readonly meanScore: number;
}

export function insertEvaluation(db: BetterSqlite3.Database, record: EvaluationRecord): void {
  db.prepare(
    `INSERT INTO evaluations (id, agent_id, task_id, template, scores, aggregate_score, passed, feedback, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    record.id,
    record.agentId,
    record.taskId,
    record.template,
    JSON.stringify(record.scores),
    record.aggregateScore,
    record.passed ? 1 : 0,
    record.feedback,
    record.createdAt,
  );
}

export function listEvaluationsByAgent(
  db: BetterSqlite3.Database,
  agentId: string,
  limit: number = 50,
): readonly EvaluationRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM evaluations
       WHERE agent_id = ?
       ORDER BY created_at DESC, rowid DESC
       LIMIT ?`,
    )
    .all(agentId, limit) as EvaluationRow[];
  return rows.map(toEvaluationRecord);
}

export function getEvaluationSummary(
  db: BetterSqlite3.Database,
  agentId: string,
  since: string,
): EvaluationSummary {
  const row = db
    .prepare(
      `SELECT COUNT(*) AS total,
              COALESCE(SUM(passed), 0) AS passed,
              COALESCE(AVG(aggregate_score), 0) AS mean_score
       FROM evaluations
       WHERE agent_id = ? AND created_at >= ?`,
    )
    .get(agentId, since) as { total: number; passed: number; mean_score: number };

  return {
    total: row.total,
    passed: row.passed,
    passRate: row.total > 0 ? row.passed / row.total : 0,
    meanScore: row.mean_score,
  };
}

function toEvaluationRecord(row: EvaluationRow): EvaluationRecord {
  return {
    id: row.id,
    agentId: row.agent_id,
    taskId: row.task_id,
    template: row.template,
    scores: parseJsonColumn<Record<string, number>>(row.scores, {}),
    aggregateScore: row.aggregate_score,
    passed: row.passed === 1,
    feedback: row.feedback,
    createdAt: row.created_at,
  };
}
