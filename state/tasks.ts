import type BetterSqlite3 from "better-sqlite3";
import type { RoutingStrategy } from "../routing/strategies.js";
import type { Variant } from "../experiments/types.js";
import { parseJsonColumn } from "./db.js";

export type TaskState = "submitted" | "assigned" | "running" | "completed" | "failed" | "cancelled";

export const TERMINAL_TASK_STATES: readonly TaskState[] = ["completed", "failed", "cancelled"];

export interface TaskError {
  readonly code: string;
  readonly message: string;
}

export interface TaskRecord {
  readonly id: string;
  readonly tenantId: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  readonly strategy: RoutingStrategy;
  readonly experimentId: string | null;
  readonly variant: Variant | null;
  readonly sessionId: string | null;
  readonly state: TaskState;
  readonly agentId: string | null;
  readonly attempts: number;
  readonly result: unknown;
  readonly error: TaskError | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface NewTask {
  readonly id: string;
  readonly tenantId: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  readonly strategy: RoutingStrategy;
  readonly experimentId?: string;
  readonly variant?: Variant;
  readonly agentId?: string;
  readonly sessionId?: string;
  readonly createdAt: string;
}

export interface TaskUpdate {
  readonly state: TaskState;
  readonly agentId?: string;
  readonly attempts?: number;
  readonly result?: unknown;
  readonly error?: TaskError;
  readonly updatedAt: string;
}

interface TaskRow {
  readonly id: string;
  readonly tenant_id: string;
  readonly description: string;
  readonly capabilities: string;
  readonly strategy: RoutingStrategy;
  readonly experiment_id: string | null;
  readonly variant: Variant | null;
  readonly session_id: string | null;
  readonly state: TaskState;
  readonly agent_id: string | null;
  readonly attempts: number;
  readonly result: string | null;
  readonly error_code: string | null;
  readonly error_message: string | null;
  readonly created_at: string;
  readonly updated_at: string;
}

export function insertTask(db: BetterSqlite3.Database, task: NewTask): void {
  db.prepare(
    `INSERT INTO tasks (id, tenant_id, description, capabilities, strategy, experiment_id, variant,
       session_id, state, agent_id, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'submitted', ?, ?, ?)`,
  ).run(
    task.id,
    task.tenantId,
    task.description,
    JSON.stringify(task.capabilities),
    task.strategy,
    task.experimentId ?? null,
    task.variant ?? null,
    task.sessionId ?? null,
    task.agentId ?? null,
    task.createdAt,
    task.createdAt,
  );
}

export function taskExists(db: BetterSqlite3.Database, taskId: string): boolean {
  return db.prepare("SELECT 1 FROM tasks WHERE id = ?").get(taskId) !== undefined;
}

export function getTask(db: BetterSqlite3.Database, taskId: string): TaskRecord | null {
  const row = db.prepare("SELECT * FROM tasks WHERE id = ?").get(taskId) as TaskRow | undefined;
  return row ? toTaskRecord(row) : null;
}

/**
 * Applies a state transition unless the task already reached a terminal
 * state. Returns false when the row was left untouched.
 */
export function updateTask(db: BetterSqlite3.Database, taskId: string, update: TaskUpdate): boolean {
  const result = db
    .prepare(
      `UPDATE tasks SET
         state = ?,
         agent_id = COALESCE(?, agent_id),
         attempts = COALESCE(?, attempts),
         result = COALESCE(?, result),
         error_code = COALESCE(?, error_code),
         error_message = COALESCE(?, error_message),
         updated_at = ?
       WHERE id = ? AND state NOT IN ('completed', 'failed', 'cancelled')`,
    )
    .run(
      update.state,
      update.agentId ?? null,
      update.attempts ?? null,
      update.result === undefined ? null : JSON.stringify(update.result),
      update.error?.code ?? null,
      update.error?.message ?? null,
      update.updatedAt,
      taskId,
    );

  return result.changes > 0;
}

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}

function toTaskRecord(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    description: row.description,
    capabilities: parseJsonColumn<string[]>(row.capabilities, []),
    strategy: row.strategy,
    experimentId: row.experiment_id,
    variant: row.variant,
    sessionId: row.session_id,
    state: row.state,
    agentId: row.agent_id,
    attempts: row.attempts,
    result: parseJsonColumn<unknown>(row.result, null),
    error:
      row.error_code !== null
        ? { code: row.error_code, message: row.error_message ?? "" }
        : null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
