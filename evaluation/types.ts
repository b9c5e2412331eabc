export interface EvaluationContext {
  readonly prompt: string;
  readonly response: string;
  readonly expectedOutput?: string;
  readonly context?: string;
  readonly groundingDocs?: readonly string[];
}

export interface MetricScore {
  readonly score: number;
  readonly feedback?: string;
}

/** Scoring contract every metric satisfies; scores are clamped to [0, 1]. */
export interface MetricScorer {
  readonly name: string;
  score(input: EvaluationContext, signal?: AbortSignal): Promise<MetricScore> | MetricScore;
}

export interface TemplateMetric {
  readonly metric: string;
  readonly weight: number;
}

export interface EvaluationTemplate {
  readonly name: string;
  readonly metrics: readonly TemplateMetric[];
  readonly threshold: number;
}

export interface EvaluationOutcome {
  readonly template: string;
  readonly scores: Readonly<Record<string, number>>;
  readonly aggregateScore: number;
  readonly threshold: number;
  readonly passed: boolean;
  readonly feedback: string;
}

export interface EvaluationRecord {
  readonly id: string;
  readonly agentId: string;
  readonly taskId: string;
  readonly template: string;
  readonly scores: Readonly<Record<string, number>>;
  readonly aggregateScore: number;
  readonly passed: boolean;
  readonly feedback: string;
  readonly createdAt: string;
}

export interface EvaluationRequest {
  readonly agentId: string;
  readonly taskId: string;
  readonly prompt: string;
  readonly response: string;
  readonly template: string;
  readonly expectedOutput?: string;
  readonly context?: string;
  readonly groundingDocs?: readonly string[];
}

export interface BatchItemResult {
  readonly index: number;
  readonly success: boolean;
  readonly record?: EvaluationRecord;
  readonly error?: { readonly code: string; readonly message: string };
}

export interface BatchEvaluationResult {
  readonly total: number;
  readonly successful: number;
  readonly failed: number;
  readonly results: readonly BatchItemResult[];
}
