import type BetterSqlite3 from "better-sqlite3";
import { AgentCache } from "../agents/agentCache.js";
import type { AgentDirectory, AgentInvoker } from "../agents/types.js";
import { componentLogger } from "../config/logger.js";
import type { RouterConfig } from "../config/routerConfig.js";
import { EvaluationEngine } from "../evaluation/evaluationEngine.js";
import { EvaluationService } from "../evaluation/evaluationService.js";
import { checkFlowAdherence, type FlowTrace } from "../evaluation/flowAdherence.js";
import { createDefaultMetricRegistry, type MetricRegistry } from "../evaluation/metricRegistry.js";
import type {
  BatchEvaluationResult,
  EvaluationRecord,
  EvaluationRequest,
  EvaluationTemplate,
  MetricScorer,
} from "../evaluation/types.js";
import { ExperimentEngine, type CreateExperimentInput } from "../experiments/experimentEngine.js";
import type {
  Experiment,
  ExperimentResults,
  ExperimentStatus,
  VariantAssignment,
} from "../experiments/types.js";
import { TaskCoordinator } from "../orchestration/taskCoordinator.js";
import type { SubmitTaskInput, SubmittedTask } from "../orchestration/types.js";
import { AgentHealthTracker, type AgentHealthSnapshot } from "../routing/healthTracker.js";
import { RoutingEngine } from "../routing/routingEngine.js";
import { InvalidRequestError, NotFoundError } from "../shared/errors.js";
import { getFlowTrace, insertFlowTrace } from "../state/flowTraces.js";
import type { TaskRecord } from "../state/tasks.js";
import { RateLimiter } from "./rateLimiter.js";

const log = componentLogger("router-service");

export interface RouterServiceDeps {
  readonly db: BetterSqlite3.Database;
  readonly cache: AgentCache;
  readonly health: AgentHealthTracker;
  readonly registry: MetricRegistry;
  readonly coordinator: TaskCoordinator;
  readonly evaluations: EvaluationService;
  readonly experiments: ExperimentEngine;
  readonly rateLimiter: RateLimiter;
  readonly now?: () => Date;
}

/** Boundary operations exposed to transports and admin tooling. */
export class RouterService {
  private readonly now: () => Date;

  constructor(private readonly deps: RouterServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  submitTask(input: SubmitTaskInput): SubmittedTask {
    if (typeof input.tenantId !== "string" || input.tenantId.trim().length === 0) {
      throw new InvalidRequestError("tenantId is required");
    }
    this.deps.rateLimiter.consume(input.tenantId.trim());
    return this.deps.coordinator.submit(input);
  }

  getTaskStatus(taskId: string): TaskRecord {
    return this.deps.coordinator.getStatus(taskId);
  }

  cancelTask(taskId: string): TaskRecord {
    return this.deps.coordinator.cancel(taskId);
  }

  waitForTask(taskId: string): Promise<TaskRecord> {
    return this.deps.coordinator.waitFor(taskId);
  }

  runEvaluation(request: EvaluationRequest): Promise<EvaluationRecord> {
    return this.deps.evaluations.run(request);
  }

  runBatchEvaluation(requests: readonly EvaluationRequest[]): Promise<BatchEvaluationResult> {
    return this.deps.evaluations.runBatch(requests);
  }

  listEvaluations(agentId: string, limit?: number): readonly EvaluationRecord[] {
    return this.deps.evaluations.listByAgent(agentId, limit);
  }

  registerMetric(scorer: MetricScorer): void {
    this.deps.registry.registerMetric(scorer);
  }

  registerTemplate(template: EvaluationTemplate): void {
    this.deps.registry.registerTemplate(template);
  }

  createExperiment(input: CreateExperimentInput): Experiment {
    return this.deps.experiments.create(input);
  }

  assignVariant(experimentId: string, taskId: string): VariantAssignment {
    return this.deps.experiments.assign(experimentId, taskId);
  }

  getExperimentResults(experimentId: string): ExperimentResults {
    return this.deps.experiments.results(experimentId);
  }

  stopExperiment(experimentId: string): ExperimentResults {
    return this.deps.experiments.stop(experimentId);
  }

  archiveExperiment(experimentId: string): Experiment {
    return this.deps.experiments.archive(experimentId);
  }

  listExperiments(status?: ExperimentStatus): readonly Experiment[] {
    return this.deps.experiments.list(status);
  }

  /** Computes and stores the adherence record of a task. Each task is checked once. */
  checkFlowAdherence(taskId: string, expectedFlow: readonly string[], actualFlow: readonly string[]): FlowTrace {
    if (typeof taskId !== "string" || taskId.trim().length === 0) {
      throw new InvalidRequestError("taskId is required");
    }
    assertSteps(expectedFlow, "expectedFlow");
    assertSteps(actualFlow, "actualFlow");

    const trace: FlowTrace = {
      taskId,
      ...checkFlowAdherence(expectedFlow, actualFlow),
      createdAt: this.now().toISOString(),
    };
    if (!insertFlowTrace(this.deps.db, trace)) {
      throw new InvalidRequestError(`Flow adherence for task ${taskId} was already recorded`);
    }

    log.info(
      { taskId, adherenceScore: trace.adherenceScore, deviations: trace.deviations },
      "Flow adherence recorded",
    );
    return trace;
  }

  getFlowTrace(taskId: string): FlowTrace {
    const trace = getFlowTrace(this.deps.db, taskId);
    if (!trace) {
      throw new NotFoundError("Flow trace", taskId);
    }
    return trace;
  }

  /** Circuit snapshots for the given agents, or for every agent in the directory. */
  async getAgentHealth(agentIds?: readonly string[]): Promise<readonly AgentHealthSnapshot[]> {
    const ids = agentIds ?? (await this.deps.cache.agentIds());
    return this.deps.health.snapshot(ids);
  }

  shutdown(): Promise<void> {
    return this.deps.coordinator.shutdown();
  }
}

export interface CreateRouterServiceOptions {
  readonly config: RouterConfig;
  readonly db: BetterSqlite3.Database;
  readonly directory: AgentDirectory;
  readonly invoker: AgentInvoker;
  readonly registry?: MetricRegistry;
  readonly clock?: () => number;
}

export function createRouterService(options: CreateRouterServiceOptions): RouterService {
  const { config, db } = options;
  const clock = options.clock ?? Date.now;
  const now = (): Date => new Date(clock());

  const health = new AgentHealthTracker(config.circuitBreaker, clock);
  const cache = new AgentCache(options.directory, config.agentStatsTtlMs, clock);
  const registry = options.registry ?? createDefaultMetricRegistry();
  const experiments = new ExperimentEngine(db, { autoComplete: config.experimentAutoComplete, now });
  const evaluations = new EvaluationService(db, new EvaluationEngine(registry), experiments, {
    batchMax: config.evaluationBatchMax,
    now,
  });
  const coordinator = new TaskCoordinator({
    db,
    cache,
    router: new RoutingEngine(health),
    health,
    invoker: options.invoker,
    experiments,
    dispatch: config.dispatch,
    clock,
  });

  return new RouterService({
    db,
    cache,
    health,
    registry,
    coordinator,
    evaluations,
    experiments,
    rateLimiter: new RateLimiter(config.rateLimitPerMinute, clock),
    now,
  });
}

function assertSteps(steps: unknown, field: string): void {
  if (!Array.isArray(steps) || !steps.every((step) => typeof step === "string")) {
    throw new InvalidRequestError(`${field} must be a list of step names`);
  }
}
