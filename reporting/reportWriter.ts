import fs from "node:fs";
import path from "node:path";
import type { DatasetSummary } from "../data/campaignDataset.js";
import {
  isStatisticalValidation,
  type ChangePointEstimate,
  type CreativeRecord,
  type InsightRecord,
  type RunLedgerSnapshot,
  type ValidationStatus,
} from "../orchestration/types.js";

export interface ArtifactPaths {
  readonly insights: string;
  readonly creatives: string;
  readonly report: string;
  readonly metadata: string;
}

export interface RunReport {
  readonly runId: string;
  readonly query: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly insights: readonly InsightRecord[];
  readonly creatives: readonly CreativeRecord[];
  readonly ledger: RunLedgerSnapshot;
  readonly datasetSummary?: DatasetSummary;
}

const NOT_AVAILABLE = "N/A";

/** `20260301T120000Z` style id for a run started at `date`. */
export function formatRunId(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

export function artifactPaths(outDir: string, runId: string): ArtifactPaths {
  return {
    insights: path.join(outDir, `insights_${runId}.json`),
    creatives: path.join(outDir, `creatives_${runId}.json`),
    report: path.join(outDir, `report_${runId}.md`),
    metadata: path.join(outDir, `run_metadata_${runId}.json`),
  };
}

function formatNumber(value: number | null | undefined, digits = 4): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return NOT_AVAILABLE;
  return String(Number(value.toFixed(digits)));
}

function formatChangePoint(changePoint: ChangePointEstimate): string {
  if (changePoint.index === null) return `none (${changePoint.note})`;
  const flag = changePoint.significant ? ", significant" : "";
  return `index ${String(changePoint.index)}, relative change ${formatNumber(changePoint.relative_change)}${flag}`;
}

function renderInsight(insight: InsightRecord): string {
  const lines = [
    `### Hypothesis \`${insight.hypothesis_id}\` (task \`${insight.task_id}\`)`,
    "",
    `> ${insight.hypothesis_text}`,
    "",
    `- Driver: ${insight.driver}`,
    `- Status: **${insight.status}**`,
    `- Confidence: ${insight.confidence_final.toFixed(2)}`,
    `- Impact: ${insight.impact}`,
  ];

  const validation = insight.validation;
  if (isStatisticalValidation(validation)) {
    lines.push(
      "",
      `**Evaluator metrics** (${validation.method}, n=${String(validation.n_baseline)}+${String(validation.n_test)})`,
      `- Baseline mean: ${formatNumber(validation.baseline_mean)}`,
      `- Test mean: ${formatNumber(validation.test_mean)}`,
      `- Relative change (%): ${formatNumber(validation.relative_change_pct, 2)}`,
      `- p-value: ${formatNumber(validation.p_value, 6)}`,
      `- Effect size: ${formatNumber(validation.effect_size, 3)}`,
      `- Change-point: ${formatChangePoint(validation.change_point)}`,
    );
  } else {
    lines.push(`- Error: ${validation.error}`);
  }

  if (insight.evidence) {
    lines.push(
      "",
      "**Evidence**",
      `- Baseline CTR: ${formatNumber(insight.evidence.baseline_ctr)}`,
      `- Current CTR: ${formatNumber(insight.evidence.current_ctr)}`,
      `- CTR delta (%): ${formatNumber(insight.evidence.ctr_delta_pct, 2)}`,
    );
  }

  if (insight.supporting_data_points.length > 0) {
    lines.push("", "**Supporting data points**", ...insight.supporting_data_points.map((p) => `- ${p}`));
  }

  lines.push("", `Notes: ${insight.notes}`, "", "---", "");
  return lines.join("\n");
}

function renderCreative(creative: CreativeRecord): string {
  return [
    `### Creative \`${creative.creative_id}\` for ${creative.campaign}`,
    "",
    `- Type: ${creative.creative_type}`,
    `- Headline: ${creative.headline}`,
    `- Body: ${creative.body}`,
    `- CTA: ${creative.cta}`,
    `- Rationale: ${creative.rationale}`,
    "",
    "---",
    "",
  ].join("\n");
}

function renderSection(
  title: string,
  insights: readonly InsightRecord[],
  status: ValidationStatus,
  emptyText: string,
): string {
  const matching = insights.filter((i) => i.status === status);
  const body = matching.length > 0 ? matching.map(renderInsight).join("\n") : `*${emptyText}*\n`;
  return `## ${title}\n\n${body}\n`;
}

export function renderMarkdownReport(report: RunReport, paths?: Pick<ArtifactPaths, "insights" | "creatives">): string {
  const count = (status: ValidationStatus): number =>
    report.insights.filter((i) => i.status === status).length;

  const parts = [
    "# Campaign Insight Report\n",
    `- Run ID: \`${report.runId}\``,
    `- Query: ${report.query.length > 0 ? report.query : NOT_AVAILABLE}`,
    `- Started: ${report.startedAt}`,
    `- Finished: ${report.finishedAt}\n`,
    "## Executive Summary\n",
    `- Tasks executed: **${String(report.ledger.tasks_executed.length)}**`,
    `- Validated insights: **${String(count("VALIDATED"))}**`,
    `- Inconclusive insights: **${String(count("INCONCLUSIVE"))}**`,
    `- Refuted insights: **${String(count("REFUTED"))}**`,
    `- Creatives proposed: **${String(report.creatives.length)}**\n`,
  ];

  const summary = report.datasetSummary;
  if (summary) {
    parts.push(
      "## Dataset\n",
      `- Rows: ${String(summary.n_rows)}`,
      `- Date range: ${summary.date_min ?? NOT_AVAILABLE} to ${summary.date_max ?? NOT_AVAILABLE}`,
      `- Campaigns: ${String(summary.campaign_count)}`,
      ...summary.top_campaigns_by_spend.map((c) => `- Spend, ${c.campaign_name}: ${formatNumber(c.spend, 2)}`),
      "",
    );
  }

  parts.push(
    renderSection("Validated Insights", report.insights, "VALIDATED", "No validated insights found."),
    renderSection("Inconclusive Insights", report.insights, "INCONCLUSIVE", "None."),
    renderSection("Refuted Insights", report.insights, "REFUTED", "None."),
    "## Creative Recommendations\n",
    report.creatives.length > 0
      ? report.creatives.map(renderCreative).join("\n")
      : "*No creatives generated.*\n",
  );

  if (report.ledger.errors.length > 0) {
    parts.push(
      "## Run Errors\n",
      ...report.ledger.errors.map((e) => {
        const where = [e.task_id && `task ${e.task_id}`, e.hypothesis_id && `hypothesis ${e.hypothesis_id}`]
          .filter(Boolean)
          .join(", ");
        return `- [${e.stage}]${where ? ` (${where})` : ""} ${e.error}`;
      }),
      "",
    );
  }

  if (paths) {
    parts.push("## Appendix\n", `- Insights JSON: \`${paths.insights}\``, `- Creatives JSON: \`${paths.creatives}\``, "");
  }

  return parts.join("\n");
}

function writeJson(filePath: string, data: unknown): void {
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

/** Writes the insights, creatives, markdown report and run metadata of one run. */
export function writeRunArtifacts(outDir: string, report: RunReport): ArtifactPaths {
  fs.mkdirSync(outDir, { recursive: true });
  const paths = artifactPaths(outDir, report.runId);

  writeJson(paths.insights, report.insights);
  writeJson(paths.creatives, report.creatives);
  fs.writeFileSync(paths.report, renderMarkdownReport(report, paths), "utf-8");
  writeJson(paths.metadata, {
    run_id: report.runId,
    query: report.query,
    started_at: report.startedAt,
    finished_at: report.finishedAt,
    errors: report.ledger.errors,
    tasks_executed: report.ledger.tasks_executed,
    dataset_summary: report.datasetSummary ?? null,
    artifacts: {
      insights: paths.insights,
      creatives: paths.creatives,
      report: paths.report,
    },
  });

  return paths;
}
