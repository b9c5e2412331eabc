import crypto from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";
import { componentLogger } from "../config/logger.js";
import { ExperimentNotActiveError, InvalidRequestError, NotFoundError } from "../shared/errors.js";
import { validateName } from "../evaluation/metricRegistry.js";
import type { EvaluationRecord } from "../evaluation/types.js";
import {
  getAssignmentsForTask,
  getExperiment,
  insertExperiment,
  listExperiments,
  recordAssignment,
  saveAggregates,
  transitionExperiment,
} from "../state/experiments.js";
import { getTask } from "../state/tasks.js";
import { EMPTY_STAT, cohensD, describeStat, updateStat, welchTTest } from "./statistics.js";
import { assignVariant } from "./variantAssignment.js";
import type {
  Experiment,
  ExperimentAggregates,
  ExperimentMetric,
  ExperimentResults,
  ExperimentStatus,
  MetricComparison,
  RunningStat,
  Variant,
  VariantAggregates,
  VariantAssignment,
  VariantMetricStats,
  VariantSummary,
} from "./types.js";

const log = componentLogger("experiments");

const DEFAULT_TRAFFIC_SPLIT = 0.5;
const DEFAULT_MIN_SAMPLES = 30;
const DEFAULT_CONFIDENCE_LEVEL = 0.95;
const AGGREGATE_METRIC_NAMES: ReadonlySet<string> = new Set(["aggregate", "score"]);

export interface CreateExperimentInput {
  readonly id?: string;
  readonly name: string;
  readonly variantA: string;
  readonly variantB: string;
  readonly trafficSplit?: number;
  readonly minSamples?: number;
  readonly confidenceLevel?: number;
  readonly metrics?: ReadonlyArray<{ readonly name: string; readonly weight?: number }>;
}

export interface ExperimentEngineOptions {
  /** Complete an active experiment as soon as results report a winner. */
  readonly autoComplete: boolean;
  readonly now?: () => Date;
}

export class ExperimentEngine {
  private readonly autoComplete: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly db: BetterSqlite3.Database,
    options: ExperimentEngineOptions,
  ) {
    this.autoComplete = options.autoComplete;
    this.now = options.now ?? (() => new Date());
  }

  create(input: CreateExperimentInput): Experiment {
    const name = input.name.trim();
    if (name.length === 0) {
      throw new InvalidRequestError("Experiment name is required");
    }
    const variantA = input.variantA.trim();
    const variantB = input.variantB.trim();
    if (variantA.length === 0 || variantB.length === 0) {
      throw new InvalidRequestError("Both variant agent ids are required");
    }
    if (variantA === variantB) {
      throw new InvalidRequestError("Variants A and B must reference different agents");
    }

    const trafficSplit = input.trafficSplit ?? DEFAULT_TRAFFIC_SPLIT;
    if (!Number.isFinite(trafficSplit) || trafficSplit <= 0 || trafficSplit >= 1) {
      throw new InvalidRequestError(`trafficSplit must be within (0, 1), got ${trafficSplit}`);
    }
    const minSamples = input.minSamples ?? DEFAULT_MIN_SAMPLES;
    if (!Number.isInteger(minSamples) || minSamples < 2) {
      throw new InvalidRequestError(`minSamples must be an integer >= 2, got ${minSamples}`);
    }
    const confidenceLevel = input.confidenceLevel ?? DEFAULT_CONFIDENCE_LEVEL;
    if (!Number.isFinite(confidenceLevel) || confidenceLevel <= 0 || confidenceLevel >= 1) {
      throw new InvalidRequestError(`confidenceLevel must be within (0, 1), got ${confidenceLevel}`);
    }

    const metrics = normalizeMetrics(input.metrics ?? [{ name: "aggregate" }]);
    const timestamp = this.now().toISOString();
    const experiment: Experiment = {
      id: input.id ?? crypto.randomUUID(),
      name,
      variantA,
      variantB,
      trafficSplit,
      minSamples,
      confidenceLevel,
      metrics,
      status: "active",
      aggregates: { A: {}, B: {} },
      winner: null,
      createdAt: timestamp,
      stoppedAt: null,
      updatedAt: timestamp,
    };

    if (getExperiment(this.db, experiment.id)) {
      throw new InvalidRequestError(`Experiment ${experiment.id} already exists`);
    }
    insertExperiment(this.db, experiment);
    log.info({ experimentId: experiment.id, variantA, variantB, trafficSplit }, "Experiment created");
    return experiment;
  }

  get(experimentId: string): Experiment {
    const experiment = getExperiment(this.db, experimentId);
    if (!experiment) {
      throw new NotFoundError("Experiment", experimentId);
    }
    return experiment;
  }

  list(status?: ExperimentStatus): readonly Experiment[] {
    return listExperiments(this.db, status);
  }

  assign(experimentId: string, taskId: string): VariantAssignment {
    if (taskId.trim().length === 0) {
      throw new InvalidRequestError("taskId is required");
    }
    const experiment = this.get(experimentId);
    if (experiment.status !== "active") {
      throw new ExperimentNotActiveError(experimentId, experiment.status);
    }

    const variant = assignVariant(experimentId, taskId, experiment.trafficSplit);
    const assignment: VariantAssignment = {
      experimentId,
      taskId,
      variant,
      agentId: variant === "A" ? experiment.variantA : experiment.variantB,
    };
    recordAssignment(this.db, assignment, this.now().toISOString());
    return assignment;
  }

  /**
   * Folds a persisted evaluation into the aggregates of every active
   * experiment the task was assigned in. Returns the ids it updated.
   *
   * A task dispatched here must have completed; one assigned through
   * `assign` alone has no task row and is taken as dispatched elsewhere.
   * Either way only evaluations of the assigned variant agent count.
   */
  recordEvaluation(record: EvaluationRecord): readonly string[] {
    const updated: string[] = [];
    const assignments = getAssignmentsForTask(this.db, record.taskId);
    if (assignments.length === 0) return updated;

    const task = getTask(this.db, record.taskId);
    if (task && task.state !== "completed") {
      log.info(
        { taskId: record.taskId, evaluationId: record.id, state: task.state },
        "Skipping experiment update for a task that did not complete",
      );
      return updated;
    }

    for (const assignment of assignments) {
      if (record.agentId !== assignment.agentId) {
        log.warn(
          {
            taskId: record.taskId,
            experimentId: assignment.experimentId,
            evaluatedAgent: record.agentId,
            variantAgent: assignment.agentId,
          },
          "Skipping experiment update for an evaluation of another agent",
        );
        continue;
      }

      const applied = this.db.transaction(() => {
        const experiment = getExperiment(this.db, assignment.experimentId);
        if (!experiment || experiment.status !== "active") return false;

        const aggregates = foldRecord(experiment, assignment.variant, record);
        saveAggregates(this.db, experiment.id, aggregates, this.now().toISOString());
        return true;
      })();

      if (applied) updated.push(assignment.experimentId);
    }

    if (updated.length > 0) {
      log.debug({ taskId: record.taskId, experiments: updated }, "Experiment aggregates updated");
    }
    return updated;
  }

  results(experimentId: string): ExperimentResults {
    const experiment = this.get(experimentId);
    const results = computeResults(experiment);

    if (experiment.status === "active" && results.winner && this.autoComplete) {
      const completed = transitionExperiment(this.db, experimentId, ["active"], "completed", {
        winner: results.winner,
        stoppedAt: this.now().toISOString(),
        updatedAt: this.now().toISOString(),
      });
      if (completed) {
        log.info(
          { experimentId, winner: results.winner, pValue: results.pValue },
          "Experiment completed with a winner",
        );
        return { ...results, status: "completed" };
      }
      return computeResults(this.get(experimentId));
    }

    return results;
  }

  stop(experimentId: string): ExperimentResults {
    const experiment = this.get(experimentId);
    const timestamp = this.now().toISOString();
    const stopped = transitionExperiment(this.db, experimentId, ["active"], "stopped", {
      stoppedAt: timestamp,
      updatedAt: timestamp,
    });
    if (!stopped) {
      throw new ExperimentNotActiveError(experimentId, experiment.status);
    }

    log.info({ experimentId }, "Experiment stopped");
    return computeResults(this.get(experimentId));
  }

  archive(experimentId: string): Experiment {
    const experiment = this.get(experimentId);
    const archived = transitionExperiment(this.db, experimentId, ["completed", "stopped"], "archived", {
      updatedAt: this.now().toISOString(),
    });
    if (!archived) {
      throw new InvalidRequestError(
        `Experiment ${experimentId} must be completed or stopped before archiving (status: ${experiment.status})`,
      );
    }

    log.info({ experimentId }, "Experiment archived");
    return this.get(experimentId);
  }
}

function normalizeMetrics(
  metrics: ReadonlyArray<{ readonly name: string; readonly weight?: number }>,
): readonly ExperimentMetric[] {
  if (metrics.length === 0) {
    throw new InvalidRequestError("Experiment must track at least one metric");
  }

  const seen = new Set<string>();
  return metrics.map(({ name, weight }) => {
    const metric = validateName(name.trim(), "Metric");
    if (seen.has(metric)) {
      throw new InvalidRequestError(`Metric "${metric}" is listed twice`);
    }
    seen.add(metric);

    const value = weight ?? 1;
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidRequestError(`Metric "${metric}" weight must be non-negative`);
    }
    return { name: metric, weight: value };
  });
}

function metricValue(record: EvaluationRecord, metric: string): number | undefined {
  if (AGGREGATE_METRIC_NAMES.has(metric)) return record.aggregateScore;
  return record.scores[metric];
}

function foldRecord(experiment: Experiment, variant: Variant, record: EvaluationRecord): ExperimentAggregates {
  const current: VariantAggregates = experiment.aggregates[variant];
  const next: Record<string, RunningStat> = { ...current };

  for (const { name } of experiment.metrics) {
    const value = metricValue(record, name);
    if (value === undefined) continue;
    next[name] = updateStat(current[name] ?? EMPTY_STAT, value);
  }

  return variant === "A" ? { A: next, B: experiment.aggregates.B } : { A: experiment.aggregates.A, B: next };
}

function compareMetric(experiment: Experiment, metric: ExperimentMetric): MetricComparison {
  const a = experiment.aggregates.A[metric.name] ?? EMPTY_STAT;
  const b = experiment.aggregates.B[metric.name] ?? EMPTY_STAT;
  const test = welchTTest(a, b);

  return {
    metric: metric.name,
    weight: metric.weight,
    variantA: describeStat(a),
    variantB: describeStat(b),
    tStatistic: test.tStatistic,
    degreesOfFreedom: test.degreesOfFreedom,
    pValue: test.pValue,
    effectSize: cohensD(a, b),
    significant: test.pValue < 1 - experiment.confidenceLevel,
  };
}

function summarize(
  experiment: Experiment,
  variant: Variant,
  comparisons: readonly MetricComparison[],
): VariantSummary {
  const metrics: Record<string, VariantMetricStats> = {};
  let weighted = 0;
  let totalWeight = 0;

  for (const comparison of comparisons) {
    const stats = variant === "A" ? comparison.variantA : comparison.variantB;
    metrics[comparison.metric] = stats;
    weighted += stats.mean * comparison.weight;
    totalWeight += comparison.weight;
  }

  const primary = comparisons[0];
  const primaryStats = primary ? (variant === "A" ? primary.variantA : primary.variantB) : undefined;

  return {
    agentId: variant === "A" ? experiment.variantA : experiment.variantB,
    sampleCount: primaryStats?.count ?? 0,
    weightedScore: totalWeight > 0 ? weighted / totalWeight : 0,
    metrics,
  };
}

function computeResults(experiment: Experiment): ExperimentResults {
  const comparisons = experiment.metrics.map((metric) => compareMetric(experiment, metric));
  const primary = comparisons[0];
  const variantA = summarize(experiment, "A", comparisons);
  const variantB = summarize(experiment, "B", comparisons);

  const minSamplesReached =
    variantA.sampleCount >= experiment.minSamples && variantB.sampleCount >= experiment.minSamples;
  const significant = primary?.significant ?? false;

  let winner: Variant | null = experiment.winner;
  if (winner === null && significant && minSamplesReached && primary) {
    winner = primary.variantB.mean > primary.variantA.mean ? "B" : "A";
  }

  return {
    experimentId: experiment.id,
    name: experiment.name,
    status: experiment.status,
    winner,
    winnerAgentId: winner === null ? null : winner === "A" ? experiment.variantA : experiment.variantB,
    confidenceLevel: experiment.confidenceLevel,
    statisticalSignificance: significant,
    minSamplesReached,
    pValue: primary?.pValue ?? 1,
    effectSize: primary?.effectSize ?? 0,
    primaryMetric: primary?.metric ?? "aggregate",
    variantA,
    variantB,
    comparisons,
  };
}
