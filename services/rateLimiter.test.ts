import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RateLimiter } from "./rateLimiter.js";
import { InvalidRequestError, RateLimitExceededError } from "../shared/errors.js";

describe("RateLimiter", () => {
  it("should allow a burst up to the per-minute limit", () => {
    const limiter = new RateLimiter(3, () => 0);

    limiter.consume("tenant-1");
    limiter.consume("tenant-1");
    limiter.consume("tenant-1");

    assert.throws(() => limiter.consume("tenant-1"), RateLimitExceededError);
  });

  it("should report when the next token becomes available", () => {
    const limiter = new RateLimiter(2, () => 0);
    limiter.consume("tenant-1");
    limiter.consume("tenant-1");

    assert.throws(
      () => limiter.consume("tenant-1"),
      (error: unknown) => error instanceof RateLimitExceededError && error.retryAfterMs === 30_000,
    );
  });

  it("should refill over time", () => {
    let now = 0;
    const limiter = new RateLimiter(60, () => now);
    for (let i = 0; i < 60; i++) limiter.consume("tenant-1");

    now = 1_000;
    limiter.consume("tenant-1");
    assert.equal(limiter.remaining("tenant-1"), 0);

    now = 61_000;
    assert.equal(limiter.remaining("tenant-1"), 60);
  });

  it("should keep tenants independent", () => {
    const limiter = new RateLimiter(1, () => 0);
    limiter.consume("tenant-1");

    assert.doesNotThrow(() => limiter.consume("tenant-2"));
    assert.throws(() => limiter.consume("tenant-1"), RateLimitExceededError);
  });

  it("should drop buckets once they have refilled", () => {
    let now = 0;
    const limiter = new RateLimiter(60, () => now);
    limiter.consume("tenant-1");

    now = 50_000;
    for (let i = 0; i < 60; i++) limiter.consume("tenant-2");
    assert.equal(limiter.trackedKeys, 2);

    now = 60_000;
    limiter.consume("tenant-3");

    assert.equal(limiter.trackedKeys, 2);
    assert.equal(limiter.remaining("tenant-1"), 60);
    assert.equal(limiter.remaining("tenant-2"), 10);
    assert.equal(limiter.trackedKeys, 2);
  });

  it("should reject a non-positive limit", () => {
    assert.throws(() => new RateLimiter(0), InvalidRequestError);
  });
});
