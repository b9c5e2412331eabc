import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { AgentCache } from "../agents/agentCache.js";
import type { AgentDescriptor, AgentDirectory, AgentInvoker, AgentResponse, AgentStats, TaskPayload } from "../agents/types.js";
import type { CircuitBreakerConfig, DispatchConfig } from "../config/routerConfig.js";
import { ExperimentEngine } from "../experiments/experimentEngine.js";
import { AgentHealthTracker } from "../routing/healthTracker.js";
import { RoutingEngine } from "../routing/routingEngine.js";
import { ExperimentNotActiveError, InvalidRequestError, NotFoundError } from "../shared/errors.js";
import { getAgentPerformance } from "../state/agentOutcomes.js";
import { openDatabase } from "../state/db.js";
import { taskExists } from "../state/tasks.js";
import { TaskCoordinator } from "./taskCoordinator.js";

type Behaviour = (payload: TaskPayload, signal: AbortSignal) => Promise<AgentResponse>;

class StaticDirectory implements AgentDirectory {
  constructor(private readonly agents: readonly AgentDescriptor[]) {}

  async listAgents(): Promise<readonly AgentDescriptor[]> {
    return this.agents;
  }

  async getAgentStats(): Promise<AgentStats> {
    return { successRate: 1, meanLatencyMs: 100, costPerCall: 0 };
  }
}

class ScriptedInvoker implements AgentInvoker {
  readonly calls: string[] = [];

  constructor(private readonly behaviours: Readonly<Record<string, Behaviour>>) {}

  async invoke(agent: AgentDescriptor, payload: TaskPayload, signal: AbortSignal): Promise<AgentResponse> {
    this.calls.push(agent.id);
    const behaviour = this.behaviours[agent.id];
    if (!behaviour) {
      throw new Error(`no behaviour for ${agent.id}`);
    }
    return behaviour(payload, signal);
  }
}

const succeed =
  (output: unknown): Behaviour =>
  async () => ({ output });

const fail =
  (message: string): Behaviour =>
  async () => {
    throw new Error(message);
  };

const hang: Behaviour = (_payload, signal) =>
  new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

function failThenSucceed(output: unknown): Behaviour {
  let calls = 0;
  return async () => {
    calls++;
    if (calls === 1) throw new Error("transient");
    return { output };
  };
}

const agent = (id: string, capabilities: readonly string[] = ["text_generation"]): AgentDescriptor => ({
  id,
  capabilities,
  status: "active",
  costPerCall: 0,
});

interface Harness {
  readonly db: BetterSqlite3.Database;
  readonly coordinator: TaskCoordinator;
  readonly invoker: ScriptedInvoker;
  readonly health: AgentHealthTracker;
  readonly experiments: ExperimentEngine;
}

describe("TaskCoordinator", () => {
  let harness: Harness | undefined;

  function build(
    agents: readonly AgentDescriptor[],
    behaviours: Readonly<Record<string, Behaviour>>,
    dispatch: DispatchConfig = { timeoutMs: 1_000, maxRetries: 2 },
    options: { readonly directory?: AgentDirectory; readonly circuit?: CircuitBreakerConfig } = {},
  ): Harness {
    const db = openDatabase(":memory:");
    const health = new AgentHealthTracker(
      options.circuit ?? { failureThreshold: 5, failureWindowMs: 60_000, cooldownMs: 30_000 },
    );
    const invoker = new ScriptedInvoker(behaviours);
    const experiments = new ExperimentEngine(db, { autoComplete: false });
    const coordinator = new TaskCoordinator({
      db,
      cache: new AgentCache(options.directory ?? new StaticDirectory(agents), 60_000),
      router: new RoutingEngine(health),
      health,
      invoker,
      experiments,
      dispatch,
    });
    harness = { db, coordinator, invoker, health, experiments };
    return harness;
  }

  afterEach(async () => {
    if (harness) {
      await harness.coordinator.shutdown();
      harness.db.close();
      harness = undefined;
    }
  });

  it("should infer capabilities and complete on the matching agent", async () => {
    const { coordinator } = build([agent("coder-1", ["code_generation", "text_generation"]), agent("writer-1")], {
      "coder-1": succeed({ text: "done" }),
    });

    const submitted = coordinator.submit({
      tenantId: "tenant-1",
      description: "Write a python function that reverses a string",
    });
    const task = await coordinator.waitFor(submitted.taskId);

    assert.deepEqual(submitted.capabilities, ["code_generation"]);
    assert.equal(task.state, "completed");
    assert.equal(task.agentId, "coder-1");
    assert.equal(task.attempts, 1);
    assert.deepEqual(task.result, { text: "done" });
  });

  it("should retry on a different agent after a failure", async () => {
    const { coordinator, invoker, health, db } = build([agent("alpha"), agent("beta")], {
      alpha: fail("boom-alpha"),
      beta: succeed("ok"),
    });

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "completed");
    assert.equal(task.agentId, "beta");
    assert.equal(task.attempts, 2);
    assert.deepEqual(invoker.calls, ["alpha", "beta"]);
    assert.equal(health.snapshot(["alpha"])[0]?.consecutiveFailures, 1);
    assert.deepEqual(getAgentPerformance(db, "alpha", 7), { total: 1, successRate: 0, meanLatencyMs: 0 });
  });

  it("should fail with the last error once the retry budget is spent", async () => {
    const { coordinator } = build(
      [agent("alpha"), agent("beta")],
      { alpha: fail("boom-alpha"), beta: fail("boom-beta") },
      { timeoutMs: 1_000, maxRetries: 1 },
    );

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "failed");
    assert.equal(task.attempts, 2);
    assert.deepEqual(task.error, { code: "DISPATCH_FAILURE", message: "Dispatch to agent beta failed: boom-beta" });
  });

  it("should stop retrying when no other agent is eligible", async () => {
    const { coordinator, invoker } = build([agent("alpha")], { alpha: fail("boom-alpha") });

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "failed");
    assert.equal(task.attempts, 1);
    assert.equal(task.error?.code, "DISPATCH_FAILURE");
    assert.deepEqual(invoker.calls, ["alpha"]);
  });

  it("should fail without dispatching when no agent offers the capabilities", async () => {
    const { coordinator, invoker } = build([agent("alpha")], { alpha: succeed("ok") });

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "draw", capabilities: ["image_generation"] });
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "failed");
    assert.equal(task.attempts, 0);
    assert.deepEqual(task.error, {
      code: "NO_ELIGIBLE_AGENT",
      message: "No suitable agents found for capabilities [image_generation]",
    });
    assert.deepEqual(invoker.calls, []);
  });

  it("should count a timeout as an agent failure", async () => {
    const { coordinator, health } = build([agent("alpha")], { alpha: hang }, { timeoutMs: 20, maxRetries: 0 });

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "failed");
    assert.deepEqual(task.error, { code: "DISPATCH_TIMEOUT", message: "Dispatch to agent alpha timed out after 20ms" });
    assert.equal(health.snapshot(["alpha"])[0]?.consecutiveFailures, 1);
  });

  it("should keep experiment tasks on their variant agent", async () => {
    const { coordinator, invoker, experiments } = build([agent("alpha"), agent("beta")], {
      alpha: failThenSucceed("from-alpha"),
      beta: failThenSucceed("from-beta"),
    });
    const experiment = experiments.create({ name: "exp", variantA: "alpha", variantB: "beta" });

    const submitted = coordinator.submit({
      taskId: "exp-task-1",
      tenantId: "tenant-1",
      description: "hello",
      capabilities: ["text_generation"],
      experimentId: experiment.id,
    });
    const task = await coordinator.waitFor(submitted.taskId);

    assert.equal(task.state, "completed");
    assert.equal(task.agentId, submitted.agentId);
    assert.equal(task.variant, submitted.variant);
    assert.equal(task.attempts, 2);
    assert.equal(invoker.calls.length, 2);
    assert.ok(invoker.calls.every((id) => id === submitted.agentId));
  });

  it("should reject submissions to an inactive experiment", () => {
    const { coordinator, experiments, db } = build([agent("alpha"), agent("beta")], {});
    const experiment = experiments.create({ name: "exp", variantA: "alpha", variantB: "beta" });
    experiments.stop(experiment.id);

    assert.throws(
      () =>
        coordinator.submit({
          taskId: "late-task",
          tenantId: "tenant-1",
          description: "hello",
          experimentId: experiment.id,
        }),
      ExperimentNotActiveError,
    );
    assert.equal(taskExists(db, "late-task"), false);
  });

  it("should cancel a running task without touching agent health", async () => {
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const { coordinator, health, db } = build([agent("alpha")], {
      alpha: (payload, signal) => {
        markStarted();
        return hang(payload, signal);
      },
    });

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    await started;

    assert.equal(coordinator.cancel(taskId).state, "cancelled");
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "cancelled");
    assert.equal(task.error?.code, "TASK_CANCELLED");
    assert.deepEqual(health.snapshot(["alpha"]), [
      { agentId: "alpha", state: "closed", health: "healthy", consecutiveFailures: 0, reopensAt: null },
    ]);
    assert.equal(getAgentPerformance(db, "alpha", 7).total, 0);
  });

  it("should keep a cancelled experiment task out of the experiment's aggregates", async () => {
    const { coordinator, experiments } = build([agent("alpha"), agent("beta")], { alpha: hang, beta: hang });
    const experiment = experiments.create({ name: "exp", variantA: "alpha", variantB: "beta" });

    const submitted = coordinator.submit({
      tenantId: "tenant-1",
      description: "hello",
      capabilities: ["text_generation"],
      experimentId: experiment.id,
    });
    coordinator.cancel(submitted.taskId);
    const task = await coordinator.waitFor(submitted.taskId);
    assert.equal(task.state, "cancelled");

    const updated = experiments.recordEvaluation({
      id: "eval-1",
      agentId: task.agentId ?? "",
      taskId: task.id,
      template: "accuracy",
      scores: { accuracy: 1 },
      aggregateScore: 1,
      passed: true,
      feedback: "PASS 1.00 >= 0.70",
      createdAt: "2026-03-01T10:00:00.000Z",
    });

    assert.deepEqual(updated, []);
    assert.deepEqual(experiments.get(experiment.id).aggregates, { A: {}, B: {} });
  });

  it("should leave terminal tasks untouched on cancel", async () => {
    const { coordinator } = build([agent("alpha")], { alpha: succeed("ok") });

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    await coordinator.waitFor(taskId);

    assert.equal(coordinator.cancel(taskId).state, "completed");
  });

  it("should cancel in-flight tasks on shutdown", async () => {
    const { coordinator } = build([agent("alpha")], { alpha: hang });

    const first = coordinator.submit({ tenantId: "tenant-1", description: "one", capabilities: ["text_generation"] });
    const second = coordinator.submit({ tenantId: "tenant-1", description: "two", capabilities: ["text_generation"] });
    await coordinator.shutdown();

    assert.equal(coordinator.getStatus(first.taskId).state, "cancelled");
    assert.equal(coordinator.getStatus(second.taskId).state, "cancelled");
  });

  it("should route around an agent whose stats cannot be read", async () => {
    const agents = [agent("flaky-stats"), agent("good")];
    const directory: AgentDirectory = {
      listAgents: async () => agents,
      async getAgentStats(agentId) {
        if (agentId === "flaky-stats") throw new Error("stats backend unavailable");
        return { successRate: 1, meanLatencyMs: 100, costPerCall: 0 };
      },
    };
    const { coordinator, invoker } = build(
      agents,
      { "flaky-stats": succeed("wrong"), good: succeed("ok") },
      undefined,
      { directory },
    );

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    const task = await coordinator.waitFor(taskId);

    assert.equal(task.state, "completed");
    assert.equal(task.agentId, "good");
    assert.deepEqual(invoker.calls, ["good"]);
  });

  it("should report unexpected selection errors as task failures", async () => {
    const directory: AgentDirectory = {
      listAgents: async () => {
        throw new Error("directory offline");
      },
      getAgentStats: async () => ({ successRate: 1, meanLatencyMs: 100, costPerCall: 0 }),
    };
    const { coordinator, invoker } = build([], {}, undefined, { directory });

    coordinator.submit({ taskId: "t-1", tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    const task = await coordinator.waitFor("t-1");

    assert.equal(task.state, "failed");
    assert.deepEqual(task.error, { code: "TASK_FAILED", message: "Task t-1 failed: directory offline" });
    assert.deepEqual(invoker.calls, []);
  });

  it("should not dispatch when the half-open probe slot is taken", async () => {
    const { coordinator, invoker, health, experiments } = build(
      [agent("alpha"), agent("beta")],
      { alpha: succeed("ok"), beta: succeed("ok") },
      undefined,
      { circuit: { failureThreshold: 1, failureWindowMs: 60_000, cooldownMs: 0 } },
    );
    for (const id of ["alpha", "beta"]) {
      health.recordFailure(id);
      assert.equal(health.tryAcquire(id), true);
    }
    const experiment = experiments.create({ name: "exp", variantA: "alpha", variantB: "beta" });

    const submitted = coordinator.submit({
      tenantId: "tenant-1",
      description: "hello",
      capabilities: ["text_generation"],
      experimentId: experiment.id,
    });
    const task = await coordinator.waitFor(submitted.taskId);

    assert.equal(task.state, "failed");
    assert.equal(task.attempts, 0);
    assert.deepEqual(task.error, {
      code: "DISPATCH_FAILURE",
      message: `Dispatch to agent ${submitted.agentId} failed: circuit open`,
    });
    assert.deepEqual(invoker.calls, []);
  });

  it("should free the half-open probe slot when the probe is cancelled", async () => {
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const { coordinator, health } = build(
      [agent("alpha")],
      {
        alpha: (payload, signal) => {
          markStarted();
          return hang(payload, signal);
        },
      },
      undefined,
      { circuit: { failureThreshold: 1, failureWindowMs: 60_000, cooldownMs: 0 } },
    );
    health.recordFailure("alpha");
    assert.equal(health.getState("alpha"), "half_open");

    const { taskId } = coordinator.submit({ tenantId: "tenant-1", description: "hello", capabilities: ["text_generation"] });
    await started;
    assert.equal(health.isSelectable("alpha"), false);

    coordinator.cancel(taskId);
    await coordinator.waitFor(taskId);

    assert.equal(health.getState("alpha"), "half_open");
    assert.equal(health.isSelectable("alpha"), true);
  });

  it("should validate submissions", () => {
    const { coordinator } = build([agent("alpha")], { alpha: succeed("ok") });

    assert.throws(() => coordinator.submit({ tenantId: "tenant-1", description: "  " }), InvalidRequestError);
    assert.throws(() => coordinator.submit({ tenantId: "", description: "hello" }), InvalidRequestError);
    assert.throws(
      () => coordinator.submit({ tenantId: "tenant-1", description: "hello", strategy: "fastest" }),
      InvalidRequestError,
    );
    assert.throws(
      () => coordinator.submit({ tenantId: "tenant-1", description: "hello", strategy: "sticky_session" }),
      /requires a sessionId/,
    );
    assert.throws(() => coordinator.getStatus("missing"), NotFoundError);
  });
});
