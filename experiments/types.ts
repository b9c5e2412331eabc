export type Variant = "A" | "B";

export type ExperimentStatus = "active" | "completed" | "stopped" | "archived";

export interface ExperimentMetric {
  readonly name: string;
  readonly weight: number;
}

/** Welford running state for one metric of one variant. */
export interface RunningStat {
  readonly count: number;
  readonly mean: number;
  readonly m2: number;
}

export type VariantAggregates = Readonly<Record<string, RunningStat>>;

export interface ExperimentAggregates {
  readonly A: VariantAggregates;
  readonly B: VariantAggregates;
}

export interface Experiment {
  readonly id: string;
  readonly name: string;
  readonly variantA: string;
  readonly variantB: string;
  readonly trafficSplit: number;
  readonly minSamples: number;
  readonly confidenceLevel: number;
  readonly metrics: readonly ExperimentMetric[];
  readonly status: ExperimentStatus;
  readonly aggregates: ExperimentAggregates;
  readonly winner: Variant | null;
  readonly createdAt: string;
  readonly stoppedAt: string | null;
  readonly updatedAt: string;
}

export interface VariantAssignment {
  readonly experimentId: string;
  readonly taskId: string;
  readonly variant: Variant;
  readonly agentId: string;
}

export interface MetricComparison {
  readonly metric: string;
  readonly weight: number;
  readonly variantA: VariantMetricStats;
  readonly variantB: VariantMetricStats;
  readonly tStatistic: number;
  readonly degreesOfFreedom: number;
  readonly pValue: number;
  readonly effectSize: number;
  readonly significant: boolean;
}

export interface VariantMetricStats {
  readonly count: number;
  readonly mean: number;
  readonly variance: number;
  readonly stdDev: number;
}

export interface VariantSummary {
  readonly agentId: string;
  readonly sampleCount: number;
  readonly weightedScore: number;
  readonly metrics: Readonly<Record<string, VariantMetricStats>>;
}

export interface ExperimentResults {
  readonly experimentId: string;
  readonly name: string;
  readonly status: ExperimentStatus;
  readonly winner: Variant | null;
  readonly winnerAgentId: string | null;
  readonly confidenceLevel: number;
  readonly statisticalSignificance: boolean;
  readonly minSamplesReached: boolean;
  readonly pValue: number;
  readonly effectSize: number;
  readonly primaryMetric: string;
  readonly variantA: VariantSummary;
  readonly variantB: VariantSummary;
  readonly comparisons: readonly MetricComparison[];
}
