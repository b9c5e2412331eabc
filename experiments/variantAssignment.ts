import crypto from "node:crypto";
import type { Variant } from "./types.js";

const HASH_BYTES = 6;
const HASH_RANGE = 2 ** (HASH_BYTES * 8);

/**
 * Maps (experimentId, taskId) to [0, 1) using the first 48 bits of a
 * SHA-256 digest. Same inputs always give the same value.
 */
export function hashToUnit(experimentId: string, taskId: string): number {
  const digest = crypto.createHash("sha256").update(`${experimentId}:${taskId}`, "utf-8").digest();
  return digest.readUIntBE(0, HASH_BYTES) / HASH_RANGE;
}

/** Values below the traffic split go to B. */
export function pickVariant(unit: number, trafficSplit: number): Variant {
  return unit < trafficSplit ? "B" : "A";
}

export function assignVariant(experimentId: string, taskId: string, trafficSplit: number): Variant {
  return pickVariant(hashToUnit(experimentId, taskId), trafficSplit);
}
