import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidRequestError } from "../shared/errors.js";
import { normalizeText } from "../shared/text.js";

export type CapabilityTag = string;

export const DEFAULT_CAPABILITY: CapabilityTag = "text_generation";

export interface CapabilityPattern {
  readonly capability: CapabilityTag;
  readonly triggers: readonly string[];
}

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PATTERNS_PATH = path.join(__dirname, "capabilityPatterns.json");
const CAPABILITY_TAG_REGEX = /^[a-z][a-z0-9_]*$/;

let cachedPatterns: readonly CapabilityPattern[] | null = null;

export function loadCapabilityPatterns(filePath: string = PATTERNS_PATH): readonly CapabilityPattern[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new InvalidRequestError(`Capability patterns at ${filePath} must be an array`);
  }

  return parsed.map((entry: unknown, index) => {
    if (entry === null || typeof entry !== "object") {
      throw new InvalidRequestError(`Capability pattern #${index} must be an object`);
    }
    const record = entry as Record<string, unknown>;
    const capability = record["capability"];
    const triggers = record["triggers"];

    if (typeof capability !== "string" || !CAPABILITY_TAG_REGEX.test(capability)) {
      throw new InvalidRequestError(`Capability pattern #${index} has an invalid capability tag`);
    }
    if (!Array.isArray(triggers) || !triggers.every((t): t is string => typeof t === "string")) {
      throw new InvalidRequestError(`Capability pattern "${capability}" must list string triggers`);
    }

    return { capability, triggers: triggers.map(normalizeText) };
  });
}

function defaultPatterns(): readonly CapabilityPattern[] {
  cachedPatterns ??= loadCapabilityPatterns();
  return cachedPatterns;
}

/**
 * Maps a task description to capability tags in table order. Never throws:
 * anything unmatched, empty or non-textual falls back to text_generation.
 */
export function inferCapabilities(
  text: unknown,
  patterns: readonly CapabilityPattern[] = defaultPatterns(),
): readonly CapabilityTag[] {
  if (typeof text !== "string" || text.trim().length === 0) {
    return [DEFAULT_CAPABILITY];
  }

  const haystack = normalizeText(text);
  const matched: CapabilityTag[] = [];

  for (const pattern of patterns) {
    if (matched.includes(pattern.capability)) continue;
    if (pattern.triggers.some((trigger) => trigger.length > 0 && haystack.includes(trigger))) {
      matched.push(pattern.capability);
    }
  }

  return matched.length > 0 ? matched : [DEFAULT_CAPABILITY];
}

export function normalizeCapabilities(capabilities: readonly string[]): readonly CapabilityTag[] {
  const tags = [
    ...new Set(capabilities.map((c) => c.trim().toLowerCase()).filter((c) => c.length > 0)),
  ];

  if (tags.length === 0) {
    throw new InvalidRequestError("capabilities must contain at least one tag");
  }
  const invalid = tags.find((tag) => !CAPABILITY_TAG_REGEX.test(tag));
  if (invalid !== undefined) {
    throw new InvalidRequestError(`Invalid capability tag: "${invalid}"`);
  }

  return tags;
}

export function isSubset(required: readonly CapabilityTag[], offered: ReadonlySet<CapabilityTag>): boolean {
  return required.every((tag) => offered.has(tag));
}

export function capabilityKey(capabilities: readonly CapabilityTag[]): string {
  return [...capabilities].sort().join("+");
}
