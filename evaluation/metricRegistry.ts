import { logger } from "../config/logger.js";
import { DispatchFailureError, InvalidRequestError, describeError } from "../shared/errors.js";
import { BUILTIN_SCORERS } from "./scorers.js";
import type { EvaluationContext, EvaluationTemplate, MetricScore, MetricScorer } from "./types.js";

const NAME_REGEX = /^[a-z][a-z0-9_]*$/;
const MAX_NAME_LENGTH = 64;
const DEFAULT_REMOTE_TIMEOUT_MS = 10_000;

export const BUILTIN_TEMPLATES: readonly EvaluationTemplate[] = [
  { name: "accuracy", metrics: [{ metric: "accuracy", weight: 1 }], threshold: 0.7 },
  { name: "relevance", metrics: [{ metric: "relevance", weight: 1 }], threshold: 0.6 },
  { name: "coherence", metrics: [{ metric: "coherence", weight: 1 }], threshold: 0.6 },
  { name: "hallucination", metrics: [{ metric: "groundedness", weight: 1 }], threshold: 0.7 },
  {
    name: "comprehensive",
    metrics: [
      { metric: "accuracy", weight: 0.4 },
      { metric: "relevance", weight: 0.3 },
      { metric: "coherence", weight: 0.3 },
    ],
    threshold: 0.7,
  },
];

export function validateName(value: string, kind: string): string {
  if (value.length === 0 || value.length > MAX_NAME_LENGTH || !NAME_REGEX.test(value)) {
    throw new InvalidRequestError(`${kind} name must be snake_case (a-z, 0-9, _): "${value}"`);
  }
  return value;
}

/**
 * Registry of scoring metrics and the templates built from them. Custom
 * metrics are objects implementing MetricScorer; logic supplied from
 * outside the process goes through createRemoteMetricScorer.
 */
export class MetricRegistry {
  private readonly scorers = new Map<string, MetricScorer>();
  private readonly templates = new Map<string, EvaluationTemplate>();

  registerMetric(scorer: MetricScorer): void {
    const name = validateName(scorer.name, "Metric");
    if (this.scorers.has(name)) {
      throw new InvalidRequestError(`Metric "${name}" is already registered`);
    }
    if (typeof scorer.score !== "function") {
      throw new InvalidRequestError(`Metric "${name}" must implement score()`);
    }
    this.scorers.set(name, scorer);
    logger.info({ metric: name }, "Metric registered");
  }

  registerTemplate(template: EvaluationTemplate): void {
    const name = validateName(template.name, "Template");
    if (this.templates.has(name)) {
      throw new InvalidRequestError(`Template "${name}" is already registered`);
    }
    if (template.metrics.length === 0) {
      throw new InvalidRequestError(`Template "${name}" must reference at least one metric`);
    }
    if (!Number.isFinite(template.threshold) || template.threshold < 0 || template.threshold > 1) {
      throw new InvalidRequestError(`Template "${name}" threshold must be within [0, 1]`);
    }
    for (const { metric, weight } of template.metrics) {
      if (!this.scorers.has(metric)) {
        throw new InvalidRequestError(`Template "${name}" references unknown metric "${metric}"`);
      }
      if (!Number.isFinite(weight) || weight <= 0) {
        throw new InvalidRequestError(`Template "${name}" weight for "${metric}" must be positive`);
      }
    }

    this.templates.set(name, { name, metrics: [...template.metrics], threshold: template.threshold });
  }

  getMetric(name: string): MetricScorer {
    const scorer = this.scorers.get(name);
    if (!scorer) {
      throw new InvalidRequestError(`Unknown metric "${name}". Available: ${this.metricNames().join(", ")}`);
    }
    return scorer;
  }

  getTemplate(name: string): EvaluationTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new InvalidRequestError(
        `Unknown template "${name}". Available: ${this.templateNames().join(", ")}`,
      );
    }
    return template;
  }

  metricNames(): readonly string[] {
    return [...this.scorers.keys()];
  }

  templateNames(): readonly string[] {
    return [...this.templates.keys()];
  }
}

export function createDefaultMetricRegistry(): MetricRegistry {
  const registry = new MetricRegistry();
  for (const scorer of BUILTIN_SCORERS) {
    registry.registerMetric(scorer);
  }
  for (const template of BUILTIN_TEMPLATES) {
    registry.registerTemplate(template);
  }
  return registry;
}

export interface RemoteMetricOptions {
  readonly name: string;
  readonly url: string;
  readonly timeoutMs?: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly fetchFn?: (input: string, init: RequestInit) => Promise<Response>;
}

/**
 * Metric computed by an out-of-process scoring service. The service
 * receives the evaluation inputs as JSON and answers `{ score, feedback? }`.
 */
export function createRemoteMetricScorer(options: RemoteMetricOptions): MetricScorer {
  const name = validateName(options.name, "Metric");
  const url = new URL(options.url);
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidRequestError(`Remote metric "${name}" must use http or https`);
  }
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;

  return {
    name,
    async score(input: EvaluationContext, signal?: AbortSignal): Promise<MetricScore> {
      let response: Response;
      try {
        response = await fetchFn(url.toString(), {
          method: "POST",
          headers: { "Content-Type": "application/json", ...options.headers },
          body: JSON.stringify({
            metric: name,
            prompt: input.prompt,
            response: input.response,
            expected_output: input.expectedOutput,
            context: input.context,
            grounding_docs: input.groundingDocs,
          }),
          signal: signal ?? AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new DispatchFailureError(`metric:${name}`, describeError(error), { cause: error });
      }

      if (!response.ok) {
        throw new DispatchFailureError(`metric:${name}`, `HTTP ${response.status}`);
      }

      return parseRemoteScore(name, await response.json());
    },
  };
}

function parseRemoteScore(name: string, body: unknown): MetricScore {
  if (body === null || typeof body !== "object") {
    throw new InvalidRequestError(`Remote metric "${name}" returned a non-object body`);
  }
  const score = "score" in body ? body.score : undefined;
  const feedback = "feedback" in body ? body.feedback : undefined;

  if (typeof score !== "number" || !Number.isFinite(score) || score < 0 || score > 1) {
    throw new InvalidRequestError(`Remote metric "${name}" returned an invalid score: ${String(score)}`);
  }
  return typeof feedback === "string" ? { score, feedback } : { score };
}
