import type BetterSqlite3 from "better-sqlite3";
import type {
  Experiment,
  ExperimentAggregates,
  ExperimentMetric,
  ExperimentStatus,
  Variant,
  VariantAssignment,
} from "../experiments/types.js";
import { parseJsonColumn } from "./db.js";

interface ExperimentRow {
  readonly id: string;
  readonly name: string;
  readonly variant_a: string;
  readonly variant_b: string;
  readonly traffic_split: number;
  readonly min_samples: number;
  readonly confidence_level: number;
  readonly metrics: string;
  readonly status: ExperimentStatus;
  readonly aggregates: string;
  readonly winner: Variant | null;
  readonly created_at: string;
  readonly stopped_at: string | null;
  readonly updated_at: string;
}

interface AssignmentRow {
  readonly experiment_id: string;
  readonly task_id: string;
  readonly variant: Variant;
  readonly agent_id: string;
}

const EMPTY_AGGREGATES: ExperimentAggregates = { A: {}, B: {} };

export function insertExperiment(db: BetterSqlite3.Database, experiment: Experiment): void {
  db.prepare(
    `INSERT INTO experiments (id, name, variant_a, variant_b, traffic_split, min_samples, confidence_level,
       metrics, status, aggregates, winner, created_at, stopped_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    experiment.id,
    experiment.name,
    experiment.variantA,
    experiment.variantB,
    experiment.trafficSplit,
    experiment.minSamples,
    experiment.confidenceLevel,
    JSON.stringify(experiment.metrics),
    experiment.status,
    JSON.stringify(experiment.aggregates),
    experiment.winner,
    experiment.createdAt,
    experiment.stoppedAt,
    experiment.updatedAt,
  );
}

export function getExperiment(db: BetterSqlite3.Database, id: string): Experiment | null {
  const row = db.prepare("SELECT * FROM experiments WHERE id = ?").get(id) as ExperimentRow | undefined;
  return row ? toExperiment(row) : null;
}

export function listExperiments(
  db: BetterSqlite3.Database,
  status?: ExperimentStatus,
): readonly Experiment[] {
  const rows = status
    ? (db
        .prepare("SELECT * FROM experiments WHERE status = ? ORDER BY created_at DESC")
        .all(status) as ExperimentRow[])
    : (db.prepare("SELECT * FROM experiments ORDER BY created_at DESC").all() as ExperimentRow[]);
  return rows.map(toExperiment);
}

export function saveAggregates(
  db: BetterSqlite3.Database,
  id: string,
  aggregates: ExperimentAggregates,
  updatedAt: string,
): void {
  db.prepare(
    "UPDATE experiments SET aggregates = ?, updated_at = ? WHERE id = ? AND status = 'active'",
  ).run(JSON.stringify(aggregates), updatedAt, id);
}

/**
 * Moves an experiment between statuses only when it is currently in one of
 * `from`. Returns false when another caller got there first.
 */
export function transitionExperiment(
  db: BetterSqlite3.Database,
  id: string,
  from: readonly ExperimentStatus[],
  to: ExperimentStatus,
  fields: { readonly winner?: Variant | null; readonly stoppedAt?: string; readonly updatedAt: string },
): boolean {
  const placeholders = from.map(() => "?").join(", ");
  const result = db
    .prepare(
      `UPDATE experiments SET
         status = ?,
         winner = COALESCE(?, winner),
         stopped_at = COALESCE(?, stopped_at),
         updated_at = ?
       WHERE id = ? AND status IN (${placeholders})`,
    )
    .run(to, fields.winner ?? null, fields.stoppedAt ?? null, fields.updatedAt, id, ...from);

  return result.changes > 0;
}

export function recordAssignment(
  db: BetterSqlite3.Database,
  assignment: VariantAssignment,
  createdAt: string,
): void {
  db.prepare(
    `INSERT OR IGNORE INTO experiment_assignments (experiment_id, task_id, variant, agent_id, created_at)
     VALUES (?, ?, ?, ?, ?)`,
  ).run(assignment.experimentId, assignment.taskId, assignment.variant, assignment.agentId, createdAt);
}

export function getAssignmentsForTask(
  db: BetterSqlite3.Database,
  taskId: string,
): readonly VariantAssignment[] {
  const rows = db
    .prepare(
      "SELECT experiment_id, task_id, variant, agent_id FROM experiment_assignments WHERE task_id = ?",
    )
    .all(taskId) as AssignmentRow[];

  return rows.map((row) => ({
    experimentId: row.experiment_id,
    taskId: row.task_id,
    variant: row.variant,
    agentId: row.agent_id,
  }));
}

function toExperiment(row: ExperimentRow): Experiment {
  return {
    id: row.id,
    name: row.name,
    variantA: row.variant_a,
    variantB: row.variant_b,
    trafficSplit: row.traffic_split,
    minSamples: row.min_samples,
    confidenceLevel: row.confidence_level,
    metrics: parseJsonColumn<ExperimentMetric[]>(row.metrics, []),
    status: row.status,
    aggregates: parseJsonColumn<ExperimentAggregates>(row.aggregates, EMPTY_AGGREGATES),
    winner: row.winner,
    createdAt: row.created_at,
    stoppedAt: row.stopped_at,
    updatedAt: row.updated_at,
  };
}
