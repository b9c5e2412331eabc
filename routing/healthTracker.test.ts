import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { AgentHealthTracker } from "./healthTracker.js";

const CONFIG = { failureThreshold: 5, failureWindowMs: 60_000, cooldownMs: 30_000 };

describe("AgentHealthTracker", () => {
  let clock: number;
  let tracker: AgentHealthTracker;

  beforeEach(() => {
    clock = 1_000_000;
    tracker = new AgentHealthTracker(CONFIG, () => clock);
  });

  function fail(agentId: string, times: number): void {
    for (let i = 0; i < times; i++) {
      tracker.recordFailure(agentId);
      clock += 100;
    }
  }

  it("should start closed and healthy for unknown agents", () => {
    assert.equal(tracker.getState("agent-a"), "closed");
    assert.equal(tracker.getHealth("agent-a"), "healthy");
    assert.equal(tracker.isSelectable("agent-a"), true);
  });

  it("should stay closed below the failure threshold", () => {
    fail("agent-a", 4);
    assert.equal(tracker.getState("agent-a"), "closed");
  });

  it("should open after five consecutive failures", () => {
    fail("agent-a", 5);

    assert.equal(tracker.getState("agent-a"), "open");
    assert.equal(tracker.getHealth("agent-a"), "circuit_open");
    assert.equal(tracker.isSelectable("agent-a"), false);
    assert.equal(tracker.tryAcquire("agent-a"), false);
  });

  it("should reset the streak on success", () => {
    fail("agent-a", 4);
    tracker.recordSuccess("agent-a");
    fail("agent-a", 4);

    assert.equal(tracker.getState("agent-a"), "closed");
  });

  it("should ignore failures that fell out of the sliding window", () => {
    fail("agent-a", 4);
    clock += 61_000;
    fail("agent-a", 1);

    assert.equal(tracker.getState("agent-a"), "closed");
  });

  it("should move to half_open after the cool-down", () => {
    fail("agent-a", 5);
    clock += 29_000;
    assert.equal(tracker.getState("agent-a"), "open");

    clock += 1_000;
    assert.equal(tracker.getState("agent-a"), "half_open");
    assert.equal(tracker.getHealth("agent-a"), "degraded");
  });

  it("should admit a single probe while half_open", () => {
    fail("agent-a", 5);
    clock += 30_000;

    assert.equal(tracker.tryAcquire("agent-a"), true);
    assert.equal(tracker.tryAcquire("agent-a"), false);
    assert.equal(tracker.isSelectable("agent-a"), false);

    tracker.release("agent-a");
    assert.equal(tracker.tryAcquire("agent-a"), true);
  });

  it("should close after a successful probe", () => {
    fail("agent-a", 5);
    clock += 30_000;
    tracker.tryAcquire("agent-a");
    tracker.recordSuccess("agent-a");

    assert.equal(tracker.getState("agent-a"), "closed");
    assert.equal(tracker.tryAcquire("agent-a"), true);
  });

  it("should reopen after a failed probe and restart the cool-down", () => {
    fail("agent-a", 5);
    clock += 30_000;
    tracker.tryAcquire("agent-a");
    tracker.recordFailure("agent-a");

    assert.equal(tracker.getState("agent-a"), "open");
    clock += 29_999;
    assert.equal(tracker.getState("agent-a"), "open");
    clock += 1;
    assert.equal(tracker.getState("agent-a"), "half_open");
  });

  it("should keep agents independent", () => {
    fail("agent-a", 5);

    assert.equal(tracker.getState("agent-a"), "open");
    assert.equal(tracker.getState("agent-b"), "closed");
  });

  it("should report a snapshot with the reopen time", () => {
    fail("agent-a", 5);
    const openedAt = clock - 100;

    const [snapshot] = tracker.snapshot(["agent-a"]);
    assert.deepEqual(snapshot, {
      agentId: "agent-a",
      state: "open",
      health: "circuit_open",
      consecutiveFailures: 0,
      reopensAt: openedAt + 30_000,
    });
  });
});
