import { loadAnalysisConfig, DEFAULT_CONFIG_PATH } from "../config/analysisConfig.js";
import { logger } from "../config/logger.js";
import { loadCampaignDataset } from "../data/campaignDataset.js";
import { runAnalysis } from "../orchestration/runAnalysis.js";
import { loadAnalysisPlan } from "../plans/planLoader.js";
import { describeError } from "../shared/outcome.js";
import { openDatabase } from "../state/db.js";

const USAGE = "Usage: tsx src/main.ts <plan.yaml> [--config <file>] [--query <text>]";

const args = process.argv.slice(2);

function flagValue(flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index !== -1 && index + 1 < args.length ? args[index + 1] : undefined;
}

const flagValueIndexes = new Set(
  ["--config", "--query"].map((flag) => args.indexOf(flag)).filter((i) => i !== -1).map((i) => i + 1),
);
const planPath = args.find((arg, idx) => !arg.startsWith("--") && !flagValueIndexes.has(idx));

if (!planPath) {
  logger.error(USAGE);
  process.exit(1);
}

function loadInputs(plan: string) {
  try {
    const config = loadAnalysisConfig(flagValue("--config") ?? DEFAULT_CONFIG_PATH);
    return { config, plan: loadAnalysisPlan(plan), dataset: loadCampaignDataset(config.paths.data) };
  } catch (error) {
    logger.error({ error: describeError(error) }, "Failed to load analysis inputs");
    return process.exit(1);
  }
}

const loaded = loadInputs(planPath);

logger.info({ planPath, tasks: loaded.plan.tasks.length }, "campaign-insights starting");

const db = openDatabase(loaded.config.paths.database);
try {
  const result = await runAnalysis({ ...loaded, db, query: flagValue("--query") });
  logger.info(
    {
      runId: result.runId,
      insights: result.insightCount,
      creatives: result.creativeCount,
      errors: result.errorCount,
      report: result.artifacts.report,
    },
    "Analysis complete",
  );
} finally {
  db.close();
}
