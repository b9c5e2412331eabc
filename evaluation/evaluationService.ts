import crypto from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";
import { componentLogger } from "../config/logger.js";
import type { ExperimentEngine } from "../experiments/experimentEngine.js";
import { InvalidRequestError, describeError, errorCode } from "../shared/errors.js";
import { insertEvaluation, listEvaluationsByAgent } from "../state/evaluations.js";
import type { EvaluationEngine } from "./evaluationEngine.js";
import type {
  BatchEvaluationResult,
  BatchItemResult,
  EvaluationRecord,
  EvaluationRequest,
} from "./types.js";

const log = componentLogger("evaluation");

const MAX_LIST_LIMIT = 500;
const REQUIRED_FIELDS = ["agentId", "taskId", "prompt", "response", "template"] as const;

export interface EvaluationServiceOptions {
  readonly batchMax: number;
  readonly now?: () => Date;
}

export class EvaluationService {
  private readonly now: () => Date;

  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly engine: EvaluationEngine,
    private readonly experiments: ExperimentEngine,
    private readonly options: EvaluationServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scores and persists one evaluation. Experiment aggregates are fed only
   * after the record has been written.
   */
  async run(request: EvaluationRequest): Promise<EvaluationRecord> {
    for (const field of REQUIRED_FIELDS) {
      const value: unknown = request[field];
      if (typeof value !== "string" || value.trim().length === 0) {
        throw new InvalidRequestError(`${field} is required`);
      }
    }

    const outcome = await this.engine.evaluate(request.template, {
      prompt: request.prompt,
      response: request.response,
      expectedOutput: request.expectedOutput,
      context: request.context,
      groundingDocs: request.groundingDocs,
    });

    const record: EvaluationRecord = {
      id: crypto.randomUUID(),
      agentId: request.agentId,
      taskId: request.taskId,
      template: outcome.template,
      scores: outcome.scores,
      aggregateScore: outcome.aggregateScore,
      passed: outcome.passed,
      feedback: outcome.feedback,
      createdAt: this.now().toISOString(),
    };

    insertEvaluation(this.db, record);
    log.info(
      { evaluationId: record.id, agentId: record.agentId, taskId: record.taskId, score: record.aggregateScore },
      "Evaluation recorded",
    );

    try {
      this.experiments.recordEvaluation(record);
    } catch (error) {
      log.error(
        { evaluationId: record.id, taskId: record.taskId, err: describeError(error) },
        "Failed to update experiment aggregates",
      );
    }

    return record;
  }

  async runBatch(requests: readonly EvaluationRequest[]): Promise<BatchEvaluationResult> {
    if (requests.length > this.options.batchMax) {
      throw new InvalidRequestError(
        `Batch of ${requests.length} exceeds the maximum of ${this.options.batchMax} evaluations`,
      );
    }

    const results: BatchItemResult[] = [];
    for (const [index, request] of requests.entries()) {
      try {
        results.push({ index, success: true, record: await this.run(request) });
      } catch (error) {
        results.push({
          index,
          success: false,
          error: { code: errorCode(error), message: describeError(error) },
        });
      }
    }

    const successful = results.filter((r) => r.success).length;
    return { total: requests.length, successful, failed: requests.length - successful, results };
  }

  listByAgent(agentId: string, limit = 50): readonly EvaluationRecord[] {
    if (agentId.trim().length === 0) {
      throw new InvalidRequestError("agentId is required");
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new InvalidRequestError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
    }
    return listEvaluationsByAgent(this.db, agentId, limit);
  }
}
