import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { openDatabase } from "./db.js";
import { getTask, insertTask, isTerminalState, taskExists, updateTask } from "./tasks.js";

const CREATED_AT = "2026-02-01T08:00:00.000Z";

describe("tasks", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
    insertTask(db, {
      id: "task-1",
      tenantId: "tenant-1",
      description: "Summarize the report",
      capabilities: ["summarization"],
      strategy: "capability_match",
      createdAt: CREATED_AT,
    });
  });

  afterEach(() => {
    db.close();
  });

  it("should insert tasks in the submitted state", () => {
    const task = getTask(db, "task-1");

    assert.ok(task);
    assert.equal(task.state, "submitted");
    assert.deepEqual(task.capabilities, ["summarization"]);
    assert.equal(task.attempts, 0);
    assert.equal(task.agentId, null);
    assert.equal(task.result, null);
    assert.equal(task.error, null);
    assert.equal(taskExists(db, "task-1"), true);
    assert.equal(taskExists(db, "task-2"), false);
  });

  it("should keep earlier fields when an update omits them", () => {
    updateTask(db, "task-1", { state: "assigned", agentId: "writer-1", attempts: 1, updatedAt: CREATED_AT });
    updateTask(db, "task-1", { state: "running", updatedAt: CREATED_AT });

    const task = getTask(db, "task-1");
    assert.equal(task?.state, "running");
    assert.equal(task?.agentId, "writer-1");
    assert.equal(task?.attempts, 1);
  });

  it("should refuse transitions out of a terminal state", () => {
    assert.equal(
      updateTask(db, "task-1", { state: "completed", result: { summary: "short" }, updatedAt: CREATED_AT }),
      true,
    );
    assert.equal(
      updateTask(db, "task-1", {
        state: "failed",
        error: { code: "DISPATCH_FAILURE", message: "late" },
        updatedAt: CREATED_AT,
      }),
      false,
    );

    const task = getTask(db, "task-1");
    assert.equal(task?.state, "completed");
    assert.deepEqual(task?.result, { summary: "short" });
    assert.equal(task?.error, null);
  });

  it("should classify terminal states", () => {
    assert.equal(isTerminalState("cancelled"), true);
    assert.equal(isTerminalState("running"), false);
  });
});
