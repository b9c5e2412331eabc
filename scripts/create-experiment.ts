import { logger } from "../config/logger.js";
import { loadRouterConfig } from "../config/routerConfig.js";
import { ExperimentEngine } from "../experiments/experimentEngine.js";
import { describeError } from "../shared/errors.js";
import { openDatabase } from "../state/db.js";

interface CliOptions {
  split?: string;
  minSamples?: string;
  confidence?: string;
  metrics: string[];
}

const VALUE_FLAGS = new Set(["--split", "--min-samples", "--confidence", "--metric"]);

function usage(): never {
  logger.error("Usage: npm run experiment:create -- <name> <variant-a-agent> <variant-b-agent> [options]");
  logger.error("Options: --split 0.5 --min-samples 30 --confidence 0.95 --metric accuracy:0.7 --metric aggregate");
  process.exit(1);
}

const positionals: string[] = [];
const options: CliOptions = { metrics: [] };
const args = process.argv.slice(2);

for (let i = 0; i < args.length; i++) {
  const arg = args[i] ?? "";
  if (!arg.startsWith("--")) {
    positionals.push(arg);
    continue;
  }

  const value = args[i + 1];
  if (!VALUE_FLAGS.has(arg) || value === undefined) {
    logger.error({ flag: arg }, "Unknown option or missing value");
    usage();
  }
  i++;

  if (arg === "--split") options.split = value;
  else if (arg === "--min-samples") options.minSamples = value;
  else if (arg === "--confidence") options.confidence = value;
  else options.metrics.push(value);
}

const [name, variantA, variantB] = positionals;

if (!name || !variantA || !variantB) {
  usage();
}

function optionalNumber(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : Number(raw);
}

function parseMetric(raw: string): { name: string; weight?: number } {
  const [metric = "", weight] = raw.split(":");
  return weight === undefined ? { name: metric } : { name: metric, weight: Number(weight) };
}

const config = loadRouterConfig();
const db = openDatabase(config.dbPath);
try {
  const engine = new ExperimentEngine(db, { autoComplete: config.experimentAutoComplete });
  const experiment = engine.create({
    name,
    variantA,
    variantB,
    trafficSplit: optionalNumber(options.split),
    minSamples: optionalNumber(options.minSamples),
    confidenceLevel: optionalNumber(options.confidence),
    metrics: options.metrics.length > 0 ? options.metrics.map(parseMetric) : undefined,
  });

  logger.info(
    {
      experimentId: experiment.id,
      variantA: experiment.variantA,
      variantB: experiment.variantB,
      trafficSplit: experiment.trafficSplit,
      metrics: experiment.metrics,
    },
    "Experiment created",
  );
} catch (error) {
  logger.error({ error: describeError(error) }, "Failed to create experiment");
  process.exitCode = 1;
} finally {
  db.close();
}
