import type BetterSqlite3 from "better-sqlite3";
import type { AnalysisConfig } from "../config/analysisConfig.js";
import type { CampaignDataset } from "../data/campaignDataset.js";
import { StatisticalEvaluator } from "../evaluation/hypothesisEvaluator.js";
import { PlanHypothesisGenerator } from "../generators/planHypothesisGenerator.js";
import {
  SampleCreativeGenerator,
  type CreativeIdFactory,
} from "../generators/sampleCreativeGenerator.js";
import type { AnalysisPlan } from "../plans/plan.schema.js";
import { formatRunId, writeRunArtifacts, type ArtifactPaths } from "../reporting/reportWriter.js";
import { saveAnalysisRun, saveInsights } from "../state/analysisRuns.js";
import { PipelineExecutor } from "./pipelineExecutor.js";
import { RunEventEmitter } from "./runEventEmitter.js";

const COMPONENT = "run";

export interface RunAnalysisOptions {
  readonly config: AnalysisConfig;
  readonly plan: AnalysisPlan;
  readonly dataset: CampaignDataset;
  readonly db: BetterSqlite3.Database;
  readonly outDir?: string;
  readonly runId?: string;
  readonly query?: string;
  readonly now?: () => Date;
  readonly creativeIdFactory?: CreativeIdFactory;
}

export interface RunAnalysisResult {
  readonly runId: string;
  readonly artifacts: ArtifactPaths;
  readonly insightCount: number;
  readonly creativeCount: number;
  readonly errorCount: number;
}

export async function runAnalysis(options: RunAnalysisOptions): Promise<RunAnalysisResult> {
  const { config, plan, dataset, db } = options;
  const now = options.now ?? (() => new Date());
  const started = now();
  const runId = options.runId ?? formatRunId(started);
  const query = options.query ?? plan.query;

  const events = new RunEventEmitter(db, runId);
  events.info(COMPONENT, "run:start", "Analysis run started", {
    query,
    tasks: plan.tasks.length,
  });

  const datasetSummary = dataset.summary();
  events.info(COMPONENT, "dataset:summary", "Dataset summarised", {
    rows: datasetSummary.n_rows,
    campaigns: datasetSummary.campaign_count,
    dateMin: datasetSummary.date_min,
    dateMax: datasetSummary.date_max,
  });

  const executor = new PipelineExecutor({
    hypothesisGenerator: new PlanHypothesisGenerator(plan),
    evaluator: new StatisticalEvaluator(config.thresholds, events),
    timeSeries: dataset,
    creativeSamples: dataset,
    creativeGenerator: new SampleCreativeGenerator(options.creativeIdFactory, events),
    creative: config.creative,
    diagnostics: events,
  });

  const { results, creatives, ledger } = await executor.run(plan.tasks);
  const finishedAt = now().toISOString();
  const startedAt = started.toISOString();

  db.transaction(() => {
    saveAnalysisRun(db, {
      runId,
      query,
      startedAt,
      finishedAt,
      insightCount: results.length,
      creativeCount: creatives.length,
      ledger,
    });
    saveInsights(db, runId, results);
  })();

  const artifacts = writeRunArtifacts(options.outDir ?? config.paths.outDir, {
    runId,
    query,
    startedAt,
    finishedAt,
    insights: results,
    creatives,
    ledger,
    datasetSummary,
  });

  events.info(COMPONENT, "run:complete", "Analysis run finished", {
    insights: results.length,
    creatives: creatives.length,
    errors: ledger.errors.length,
    report: artifacts.report,
  });

  return {
    runId,
    artifacts,
    insightCount: results.length,
    creativeCount: creatives.length,
    errorCount: ledger.errors.length,
  };
}
