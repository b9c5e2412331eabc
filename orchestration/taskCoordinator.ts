import crypto from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";
import type { AgentCache } from "../agents/agentCache.js";
import type { AgentDescriptor, AgentInvoker, AgentResponse, TaskPayload } from "../agents/types.js";
import { componentLogger } from "../config/logger.js";
import type { DispatchConfig } from "../config/routerConfig.js";
import type { ExperimentEngine } from "../experiments/experimentEngine.js";
import { inferCapabilities, normalizeCapabilities } from "../routing/capabilityClassifier.js";
import type { AgentHealthTracker } from "../routing/healthTracker.js";
import type { RoutingEngine } from "../routing/routingEngine.js";
import { parseRoutingStrategy } from "../routing/strategies.js";
import {
  DispatchFailureError,
  DispatchTimeoutError,
  InvalidRequestError,
  NoEligibleAgentError,
  NotFoundError,
  RouterError,
  TaskCancelledError,
  TaskFailedError,
  describeError,
  errorCode,
  isRetryableDispatchError,
} from "../shared/errors.js";
import { saveAgentOutcome } from "../state/agentOutcomes.js";
import { getTask, insertTask, isTerminalState, taskExists, updateTask, type TaskRecord } from "../state/tasks.js";
import type { AttemptResult, SubmitTaskInput, SubmittedTask } from "./types.js";

const log = componentLogger("coordinator");

export interface TaskCoordinatorDeps {
  readonly db: BetterSqlite3.Database;
  readonly cache: AgentCache;
  readonly router: RoutingEngine;
  readonly health: AgentHealthTracker;
  readonly invoker: AgentInvoker;
  readonly experiments: ExperimentEngine;
  readonly dispatch: DispatchConfig;
  readonly clock?: () => number;
}

interface InFlight {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

/**
 * Owns the task lifecycle: submitted -> assigned -> running -> completed,
 * failed or cancelled. Each task dispatches in its own async flow with a
 * per-attempt timeout and a cancel signal.
 */
export class TaskCoordinator {
  private readonly inFlight = new Map<string, InFlight>();
  private readonly clock: () => number;

  constructor(private readonly deps: TaskCoordinatorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  submit(input: SubmitTaskInput): SubmittedTask {
    const tenantId = requireText(input.tenantId, "tenantId");
    const description = requireText(input.description, "description");
    const capabilities =
      input.capabilities === undefined ? inferCapabilities(description) : normalizeCapabilities(input.capabilities);
    const strategy = parseRoutingStrategy(input.strategy);
    if (strategy === "sticky_session" && !input.sessionId) {
      throw new InvalidRequestError("sticky_session routing requires a sessionId");
    }

    const taskId = input.taskId === undefined ? crypto.randomUUID() : requireText(input.taskId, "taskId");
    if (taskExists(this.deps.db, taskId)) {
      throw new InvalidRequestError(`Task ${taskId} already exists`);
    }

    const assignment =
      input.experimentId === undefined ? undefined : this.deps.experiments.assign(input.experimentId, taskId);

    insertTask(this.deps.db, {
      id: taskId,
      tenantId,
      description,
      capabilities,
      strategy,
      experimentId: assignment?.experimentId,
      variant: assignment?.variant,
      agentId: assignment?.agentId,
      sessionId: input.sessionId,
      createdAt: this.timestamp(),
    });
    log.info(
      { taskId, tenantId, capabilities, strategy, experimentId: assignment?.experimentId, variant: assignment?.variant },
      "Task submitted",
    );

    const controller = new AbortController();
    const done = this.run(taskId, controller.signal)
      .catch((error: unknown) => this.failUnexpectedly(taskId, error))
      .finally(() => this.inFlight.delete(taskId));
    this.inFlight.set(taskId, { controller, done });

    return {
      taskId,
      capabilities,
      variant: assignment?.variant ?? null,
      agentId: assignment?.agentId ?? null,
    };
  }

  getStatus(taskId: string): TaskRecord {
    const task = getTask(this.deps.db, taskId);
    if (!task) {
      throw new NotFoundError("Task", taskId);
    }
    return task;
  }

  /** Cancels a pending or running task. Terminal tasks are returned unchanged. */
  cancel(taskId: string): TaskRecord {
    const task = this.getStatus(taskId);
    if (isTerminalState(task.state)) {
      return task;
    }

    const reason = new TaskCancelledError(taskId);
    updateTask(this.deps.db, taskId, {
      state: "cancelled",
      error: { code: reason.code, message: reason.message },
      updatedAt: this.timestamp(),
    });
    this.inFlight.get(taskId)?.controller.abort(reason);
    log.info({ taskId }, "Task cancelled");

    return this.getStatus(taskId);
  }

  /** Resolves with the task once it reaches a terminal state. */
  async waitFor(taskId: string): Promise<TaskRecord> {
    const running = this.inFlight.get(taskId);
    if (running) {
      await running.done;
    }
    return this.getStatus(taskId);
  }

  async shutdown(): Promise<void> {
    const pending = [...this.inFlight.entries()];
    for (const [taskId] of pending) {
      this.cancel(taskId);
    }
    await Promise.all(pending.map(([, flight]) => flight.done));
    log.info({ cancelled: pending.length }, "Coordinator shut down");
  }

  private async run(taskId: string, signal: AbortSignal): Promise<void> {
    const task = this.getStatus(taskId);
    const maxAttempts = this.deps.dispatch.maxRetries + 1;
    const tried = new Set<string>();
    let dispatched = 0;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal.aborted) return;

      let agent: AgentDescriptor;
      try {
        agent = await this.chooseAgent(task, tried);
      } catch (error) {
        if (signal.aborted) return;
        this.finishFailed(taskId, lastError ?? toSelectionError(taskId, error), dispatched);
        return;
      }
      if (signal.aborted) return;
      tried.add(agent.id);

      if (!this.deps.health.tryAcquire(agent.id)) {
        lastError = new DispatchFailureError(agent.id, "circuit open");
        log.warn({ taskId, agentId: agent.id, attempt }, "Agent circuit not accepting dispatches");
        continue;
      }

      dispatched++;
      updateTask(this.deps.db, taskId, {
        state: "assigned",
        agentId: agent.id,
        attempts: dispatched,
        updatedAt: this.timestamp(),
      });
      updateTask(this.deps.db, taskId, { state: "running", updatedAt: this.timestamp() });
      log.info({ taskId, agentId: agent.id, attempt }, "Dispatching task");

      const result = await this.attempt(task, agent, dispatched, signal);

      if (result.kind === "cancelled") {
        this.deps.health.release(agent.id);
        log.info({ taskId, agentId: agent.id }, "Dispatch aborted by cancellation");
        return;
      }

      this.recordOutcome(taskId, agent.id, result);

      if (result.kind === "success") {
        updateTask(this.deps.db, taskId, {
          state: "completed",
          result: result.output ?? null,
          updatedAt: this.timestamp(),
        });
        log.info({ taskId, agentId: agent.id, attempt, latencyMs: result.latencyMs }, "Task completed");
        return;
      }

      lastError = result.error;
      log.warn(
        { taskId, agentId: agent.id, attempt, maxAttempts, error: result.error.message },
        "Dispatch attempt failed",
      );
      if (!isRetryableDispatchError(result.error)) break;
    }

    this.finishFailed(taskId, lastError ?? new TaskFailedError(taskId, "no dispatch attempted"), dispatched);
  }

  /**
   * Experiment tasks stay on their variant agent; other tasks re-run
   * selection without the agents already tried.
   */
  private async chooseAgent(task: TaskRecord, tried: ReadonlySet<string>): Promise<AgentDescriptor> {
    if (task.experimentId !== null && task.agentId !== null) {
      const agent = await this.deps.cache.describe(task.agentId);
      if (!agent || agent.status !== "active") {
        throw new NoEligibleAgentError(task.capabilities);
      }
      return agent;
    }

    const candidates = await this.deps.cache.candidates(task.capabilities);
    const agentId = this.deps.router.select({
      capabilities: task.capabilities,
      strategy: task.strategy,
      candidates,
      sessionId: task.sessionId ?? undefined,
      exclude: tried,
    });

    const agent = await this.deps.cache.describe(agentId);
    if (!agent) {
      throw new NoEligibleAgentError(task.capabilities);
    }
    return agent;
  }

  private async attempt(
    task: TaskRecord,
    agent: AgentDescriptor,
    attempt: number,
    taskSignal: AbortSignal,
  ): Promise<AttemptResult> {
    const { timeoutMs } = this.deps.dispatch;
    const controller = new AbortController();
    const onCancel = (): void => controller.abort(taskSignal.reason);
    taskSignal.addEventListener("abort", onCancel, { once: true });
    const timer = setTimeout(() => controller.abort(new DispatchTimeoutError(agent.id, timeoutMs)), timeoutMs);

    const payload: TaskPayload = {
      taskId: task.id,
      description: task.description,
      capabilities: task.capabilities,
      sessionId: task.sessionId ?? undefined,
      attempt,
    };
    const startedAt = this.clock();

    try {
      const response = await invokeUntilAborted(this.deps.invoker, agent, payload, controller.signal);
      return { kind: "success", output: response.output, latencyMs: this.clock() - startedAt };
    } catch (error) {
      if (taskSignal.aborted) {
        return { kind: "cancelled" };
      }
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      return { kind: "failure", error: toDispatchError(agent.id, reason), latencyMs: this.clock() - startedAt };
    } finally {
      clearTimeout(timer);
      taskSignal.removeEventListener("abort", onCancel);
    }
  }

  private recordOutcome(taskId: string, agentId: string, result: Exclude<AttemptResult, { kind: "cancelled" }>): void {
    const success = result.kind === "success";
    if (success) {
      this.deps.health.recordSuccess(agentId);
    } else {
      this.deps.health.recordFailure(agentId);
    }

    saveAgentOutcome(this.deps.db, {
      agentId,
      taskId,
      success,
      latencyMs: result.latencyMs,
      errorCode: result.kind === "failure" ? errorCode(result.error) : undefined,
    });
    this.deps.cache.invalidate(agentId);
  }

  private finishFailed(taskId: string, error: Error, attempts: number): void {
    updateTask(this.deps.db, taskId, {
      state: "failed",
      attempts: attempts > 0 ? attempts : undefined,
      error: { code: errorCode(error), message: error.message },
      updatedAt: this.timestamp(),
    });
    log.warn({ taskId, code: errorCode(error), error: error.message }, "Task failed");
  }

  private failUnexpectedly(taskId: string, error: unknown): void {
    const failure = new TaskFailedError(taskId, error);
    log.error({ taskId, err: describeError(error) }, "Task aborted by an unexpected error");
    updateTask(this.deps.db, taskId, {
      state: "failed",
      error: { code: failure.code, message: failure.message },
      updatedAt: this.timestamp(),
    });
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}

/** Settles on the invoker's result or on the signal, whichever comes first. */
function invokeUntilAborted(
  invoker: AgentInvoker,
  agent: AgentDescriptor,
  payload: TaskPayload,
  signal: AbortSignal,
): Promise<AgentResponse> {
  return new Promise<AgentResponse>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });

    void invoker.invoke(agent, payload, signal).then(
      (response) => {
        signal.removeEventListener("abort", onAbort);
        resolve(response);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function toDispatchError(agentId: string, error: unknown): Error {
  if (error instanceof RouterError) {
    return error;
  }
  return new DispatchFailureError(agentId, describeError(error), { cause: error });
}

function toSelectionError(taskId: string, error: unknown): RouterError {
  return error instanceof RouterError ? error : new TaskFailedError(taskId, error);
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidRequestError(`${field} is required`);
  }
  return value.trim();
}
