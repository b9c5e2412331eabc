import type BetterSqlite3 from "better-sqlite3";
import type { FlowTrace } from "../evaluation/flowAdherence.js";
import { parseJsonColumn } from "./db.js";

interface FlowTraceRow {
  readonly task_id: string;
  readonly expected_flow: string;
  readonly actual_flow: string;
  readonly adherence_score: number;
  readonly missed_steps: string;
  readonly extra_steps: string;
  readonly deviations: number;
  readonly sequence_correct: number;
  readonly created_at: string;
}

/** Returns false when a trace already exists for the task. */
export function insertFlowTrace(db: BetterSqlite3.Database, trace: FlowTrace): boolean {
  const result = db
    .prepare(
      `INSERT OR IGNORE INTO flow_traces (task_id, expected_flow, actual_flow, adherence_score, missed_steps,
         extra_steps, deviations, sequence_correct, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      trace.taskId,
      JSON.stringify(trace.expectedFlow),
      JSON.stringify(trace.actualFlow),
      trace.adherenceScore,
      JSON.stringify(trace.missedSteps),
      JSON.stringify(trace.extraSteps),
      trace.deviations,
      trace.sequenceCorrect ? 1 : 0,
      trace.createdAt,
    );

  return result.changes > 0;
}

export function getFlowTrace(db: BetterSqlite3.Database, taskId: string): FlowTrace | null {
  const row = db.prepare("SELECT * FROM flow_traces WHERE task_id = ?").get(taskId) as
    | FlowTraceRow
    | undefined;
  if (!row) return null;

  return {
    taskId: row.task_id,
    expectedFlow: parseJsonColumn<string[]>(row.expected_flow, []),
    actualFlow: parseJsonColumn<string[]>(row.actual_flow, []),
    adherenceScore: row.adherence_score,
    missedSteps: parseJsonColumn<string[]>(row.missed_steps, []),
    extraSteps: parseJsonColumn<string[]>(row.extra_steps, []),
    deviations: row.deviations,
    sequenceCorrect: row.sequence_correct === 1,
    createdAt: row.created_at,
  };
}
