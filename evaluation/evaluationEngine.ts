import { roundScore } from "../shared/text.js";
import type { MetricRegistry } from "./metricRegistry.js";
import type { EvaluationContext, EvaluationOutcome } from "./types.js";

export class EvaluationEngine {
  constructor(private readonly registry: MetricRegistry) {}

  /**
   * Scores a response against a template. Metrics run in template order;
   * the aggregate is their weighted mean and `passed` compares it with the
   * template threshold.
   */
  async evaluate(templateName: string, input: EvaluationContext): Promise<EvaluationOutcome> {
    const template = this.registry.getTemplate(templateName);
    const scores: Record<string, number> = {};
    const notes: string[] = [];

    let weighted = 0;
    let totalWeight = 0;

    for (const { metric, weight } of template.metrics) {
      const result = await this.registry.getMetric(metric).score(input);
      const score = roundScore(result.score);

      scores[metric] = score;
      weighted += score * weight;
      totalWeight += weight;
      if (result.feedback) {
        notes.push(`${metric}: ${result.feedback}`);
      }
    }

    const aggregateScore = roundScore(totalWeight > 0 ? weighted / totalWeight : 0);
    const passed = aggregateScore >= template.threshold;
    const verdict = `${passed ? "PASS" : "FAIL"} ${aggregateScore.toFixed(2)} ${passed ? ">=" : "<"} ${template.threshold.toFixed(2)}`;

    return {
      template: template.name,
      scores,
      aggregateScore,
      threshold: template.threshold,
      passed,
      feedback: [verdict, ...notes].join("; "),
    };
  }
}
