import { FileAgentDirectory } from "../agents/fileAgentDirectory.js";
import { HttpAgentInvoker } from "../agents/httpAgentInvoker.js";
import { logger } from "../config/logger.js";
import { loadRouterConfig } from "../config/routerConfig.js";
import { createRouterService } from "../services/routerService.js";
import { openDatabase } from "../state/db.js";
import { getEvaluationSummary } from "../state/evaluations.js";

const SUMMARY_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

logger.info("task-router initializing...");

const config = loadRouterConfig();
const db = openDatabase(config.dbPath);
try {
  const directory = FileAgentDirectory.fromFile(db, config.agentsFile);
  const service = createRouterService({ config, db, directory, invoker: new HttpAgentInvoker() });
  logger.info(
    {
      agentsFile: config.agentsFile,
      dispatchTimeoutMs: config.dispatch.timeoutMs,
      maxRetries: config.dispatch.maxRetries,
      autoComplete: config.experimentAutoComplete,
    },
    "Router ready",
  );

  const since = new Date(Date.now() - SUMMARY_WINDOW_MS).toISOString();
  for (const snapshot of await service.getAgentHealth()) {
    const summary = getEvaluationSummary(db, snapshot.agentId, since);
    logger.info(
      {
        agentId: snapshot.agentId,
        health: snapshot.health,
        evaluations: summary.total,
        passRate: summary.passRate,
        meanScore: summary.meanScore,
      },
      "Agent report",
    );
  }

  for (const experiment of service.listExperiments("active")) {
    const results = service.getExperimentResults(experiment.id);
    logger.info(
      {
        experimentId: experiment.id,
        name: experiment.name,
        status: results.status,
        samplesA: results.variantA.sampleCount,
        samplesB: results.variantB.sampleCount,
        pValue: results.pValue,
        effectSize: results.effectSize,
        winner: results.winnerAgentId,
      },
      "Experiment report",
    );
  }

  await service.shutdown();
} finally {
  db.close();
}
