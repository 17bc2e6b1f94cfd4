import type BetterSqlite3 from "better-sqlite3";
import type { InsightRecord, RunLedgerSnapshot } from "../orchestration/types.js";

export interface AnalysisRunInput {
  readonly runId: string;
  readonly query: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly insightCount: number;
  readonly creativeCount: number;
  readonly ledger: RunLedgerSnapshot;
}

export interface AnalysisRun {
  readonly run_id: string;
  readonly query: string;
  readonly started_at: string;
  readonly finished_at: string;
  readonly task_count: number;
  readonly insight_count: number;
  readonly creative_count: number;
  readonly error_count: number;
  readonly ledger: RunLedgerSnapshot;
}

interface AnalysisRunRow extends Omit<AnalysisRun, "ledger"> {
  readonly ledger: string;
}

export function saveAnalysisRun(db: BetterSqlite3.Database, run: AnalysisRunInput): void {
  db.prepare(
    `INSERT OR REPLACE INTO analysis_runs
       (run_id, query, started_at, finished_at, task_count, insight_count, creative_count, error_count, ledger)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    run.runId,
    run.query,
    run.startedAt,
    run.finishedAt,
    run.ledger.tasks_executed.length,
    run.insightCount,
    run.creativeCount,
    run.ledger.errors.length,
    JSON.stringify(run.ledger),
  );
}

export function loadAnalysisRun(db: BetterSqlite3.Database, runId: string): AnalysisRun | null {
  const row = db
    .prepare(
      `SELECT run_id, query, started_at, finished_at, task_count, insight_count, creative_count, error_count, ledger
       FROM analysis_runs WHERE run_id = ?`,
    )
    .get(runId) as AnalysisRunRow | undefined;

  if (!row) return null;
  return { ...row, ledger: JSON.parse(row.ledger) as RunLedgerSnapshot };
}

/** Replaces the stored insights of a run; `ordinal` keeps emission order. */
export function saveInsights(
  db: BetterSqlite3.Database,
  runId: string,
  insights: readonly InsightRecord[],
): void {
  const remove = db.prepare("DELETE FROM validation_results WHERE run_id = ?");
  const insert = db.prepare(
    `INSERT INTO validation_results
       (run_id, ordinal, task_id, hypothesis_id, driver, status, impact, confidence_final, payload)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );

  db.transaction(() => {
    remove.run(runId);
    insights.forEach((insight, ordinal) => {
      insert.run(
        runId,
        ordinal,
        insight.task_id,
        insight.hypothesis_id,
        insight.driver,
        insight.status,
        insight.impact,
        insight.confidence_final,
        JSON.stringify(insight),
      );
    });
  })();
}

export function loadInsights(db: BetterSqlite3.Database, runId: string): readonly InsightRecord[] {
  const rows = db
    .prepare("SELECT payload FROM validation_results WHERE run_id = ? ORDER BY ordinal ASC")
    .all(runId) as Array<{ payload: string }>;

  return rows.map((row) => JSON.parse(row.payload) as InsightRecord);
}
