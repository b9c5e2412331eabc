import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { openDatabase } from "../state/db.js";
import { EvaluationEngine } from "./evaluationEngine.js";
import { EvaluationService } from "./evaluationService.js";
import { createDefaultMetricRegistry } from "./metricRegistry.js";
import { ExperimentEngine } from "../experiments/experimentEngine.js";
import { InvalidRequestError } from "../shared/errors.js";
import { insertTask, updateTask, type TaskState } from "../state/tasks.js";
import type { EvaluationRequest } from "./types.js";

const request = (overrides: Partial<EvaluationRequest> = {}): EvaluationRequest => ({
  agentId: "writer-1",
  taskId: "task-1",
  prompt: "What is the capital of France?",
  response: "The capital of France is Paris.",
  expectedOutput: "Paris",
  template: "accuracy",
  ...overrides,
});

describe("EvaluationService", () => {
  let db: BetterSqlite3.Database;
  let experiments: ExperimentEngine;
  let service: EvaluationService;

  beforeEach(() => {
    db = openDatabase(":memory:");
    experiments = new ExperimentEngine(db, { autoComplete: false });
    service = new EvaluationService(
      db,
      new EvaluationEngine(createDefaultMetricRegistry()),
      experiments,
      { batchMax: 3, now: () => new Date("2026-03-01T10:00:00.000Z") },
    );
  });

  afterEach(() => {
    db.close();
  });

  it("should persist the scored record", async () => {
    const record = await service.run(request());

    assert.equal(record.aggregateScore, 1);
    assert.equal(record.passed, true);
    assert.equal(record.createdAt, "2026-03-01T10:00:00.000Z");
    assert.deepEqual(
      service.listByAgent("writer-1").map((r) => r.id),
      [record.id],
    );
  });

  it("should reject missing required fields", async () => {
    await assert.rejects(service.run(request({ agentId: "" })), /agentId is required/);
    await assert.rejects(service.run(request({ prompt: "  " })), /prompt is required/);
    assert.deepEqual(service.listByAgent("writer-1"), []);
  });

  it("should feed the experiment the task was assigned in", async () => {
    const experiment = experiments.create({ name: "exp", variantA: "writer-1", variantB: "writer-2" });
    const assignment = experiments.assign(experiment.id, "task-1");

    await service.run(request({ agentId: assignment.agentId }));

    const stat = experiments.get(experiment.id).aggregates[assignment.variant]["aggregate"];
    assert.deepEqual(stat, { count: 1, mean: 1, m2: 0 });
  });

  function dispatchedTask(taskId: string, experimentId: string, state: TaskState): string {
    const assignment = experiments.assign(experimentId, taskId);
    insertTask(db, {
      id: taskId,
      tenantId: "tenant-1",
      description: "What is the capital of France?",
      capabilities: ["question_answering"],
      strategy: "capability_match",
      experimentId,
      variant: assignment.variant,
      agentId: assignment.agentId,
      createdAt: "2026-03-01T09:00:00.000Z",
    });
    updateTask(db, taskId, { state, updatedAt: "2026-03-01T09:30:00.000Z" });
    return assignment.agentId;
  }

  it("should count evaluations of completed experiment tasks", async () => {
    const experiment = experiments.create({ name: "exp", variantA: "writer-1", variantB: "writer-2" });
    const agentId = dispatchedTask("task-1", experiment.id, "completed");

    await service.run(request({ agentId }));

    const { A, B } = experiments.get(experiment.id).aggregates;
    assert.equal((A["aggregate"]?.count ?? 0) + (B["aggregate"]?.count ?? 0), 1);
  });

  it("should keep cancelled tasks out of experiment aggregates", async () => {
    const experiment = experiments.create({ name: "exp", variantA: "writer-1", variantB: "writer-2" });
    const agentId = dispatchedTask("task-1", experiment.id, "cancelled");

    const record = await service.run(request({ agentId }));

    assert.equal(record.aggregateScore, 1);
    assert.deepEqual(experiments.get(experiment.id).aggregates, { A: {}, B: {} });
  });

  it("should ignore evaluations of an agent other than the assigned variant", async () => {
    const experiment = experiments.create({ name: "exp", variantA: "writer-1", variantB: "writer-2" });
    const agentId = dispatchedTask("task-1", experiment.id, "completed");
    const other = agentId === "writer-1" ? "writer-2" : "writer-1";

    await service.run(request({ agentId: other }));

    assert.deepEqual(experiments.get(experiment.id).aggregates, { A: {}, B: {} });
  });

  it("should not touch aggregates when scoring fails", async () => {
    const experiment = experiments.create({ name: "exp", variantA: "writer-1", variantB: "writer-2" });
    experiments.assign(experiment.id, "task-1");

    await assert.rejects(service.run(request({ template: "nope" })), InvalidRequestError);

    assert.deepEqual(experiments.get(experiment.id).aggregates, { A: {}, B: {} });
  });

  it("should report partial success in batches", async () => {
    const result = await service.runBatch([
      request({ taskId: "task-1" }),
      request({ taskId: "task-2", expectedOutput: undefined }),
      request({ taskId: "task-3", template: "coherence" }),
    ]);

    assert.equal(result.total, 3);
    assert.equal(result.successful, 2);
    assert.equal(result.failed, 1);
    assert.deepEqual(result.results[1], {
      index: 1,
      success: false,
      error: { code: "INVALID_REQUEST", message: "accuracy scoring requires expected_output" },
    });
    assert.equal(result.results[2]?.record?.template, "coherence");
  });

  it("should cap batch size", async () => {
    const oversized = Array.from({ length: 4 }, (_, i) => request({ taskId: `task-${i}` }));
    await assert.rejects(service.runBatch(oversized), /exceeds the maximum of 3/);
  });

  it("should validate list limits", () => {
    assert.throws(() => service.listByAgent("writer-1", 0), InvalidRequestError);
  });
});
