import type { Outcome } from "../shared/outcome.js";

export const ALL_CAMPAIGNS_SCOPE = "all";
export const ALL_CAMPAIGNS_ALIAS = "all_campaigns";

export function normalizeScope(scope: string): string {
  return scope === ALL_CAMPAIGNS_ALIAS ? ALL_CAMPAIGNS_SCOPE : scope;
}

export interface Task {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly target: string;
  readonly scope: string;
  readonly priority: number;
  readonly depends_on: readonly string[];
}

export interface Hypothesis {
  readonly id: string;
  readonly hypothesis: string;
  readonly driver: string;
  readonly initial_confidence: number;
  readonly supporting_data_points: readonly string[];
  readonly required_checks: readonly string[];
}

export type ValidationStatus = "VALIDATED" | "REFUTED" | "INCONCLUSIVE";
export type ImpactLevel = "low" | "medium" | "high";
export type TestMethod = "t-test" | "bootstrap";

export interface ChangePointEstimate {
  readonly index: number | null;
  readonly relative_change: number;
  readonly significant: boolean;
  readonly note: string;
}

export interface StatisticalValidation {
  readonly metric: string;
  readonly method: TestMethod;
  readonly baseline_mean: number;
  readonly test_mean: number;
  readonly relative_change_pct: number;
  readonly p_value: number;
  readonly effect_size: number;
  readonly n_baseline: number;
  readonly n_test: number;
  readonly change_point: ChangePointEstimate;
}

export interface ValidationFailure {
  readonly error: string;
}

export type ValidationDetail = StatisticalValidation | ValidationFailure;

export interface ValidationEvidence {
  readonly baseline_ctr: number;
  readonly current_ctr: number;
  readonly ctr_delta_pct: number | null;
  readonly effect_size: number;
  readonly p_value: number;
  readonly n_baseline: number;
  readonly n_test: number;
  readonly change_point: ChangePointEstimate;
}

export interface ValidationResult {
  readonly hypothesis_id: string;
  readonly driver: string;
  readonly validation: ValidationDetail;
  readonly evidence: ValidationEvidence | null;
  readonly impact: ImpactLevel;
  readonly confidence_final: number;
  readonly status: ValidationStatus;
  readonly notes: string;
}

export interface InsightRecord extends ValidationResult {
  readonly task_id: string;
  readonly hypothesis_text: string;
  readonly supporting_data_points: readonly string[];
}

export interface CreativeSampleItem {
  readonly campaign_name: string;
  readonly adset_name: string;
  readonly creative_type: string;
  readonly creative_message: string;
  readonly ctr: number;
}

export interface CreativeRecord {
  readonly campaign: string;
  readonly creative_id: string;
  readonly creative_type: string;
  readonly headline: string;
  readonly body: string;
  readonly cta: string;
  readonly rationale: string;
  readonly inspiration_refs: readonly string[];
}

export type LedgerStage = "insight" | "evaluation" | "creative";

export interface LedgerError {
  readonly stage: LedgerStage;
  readonly task_id?: string;
  readonly hypothesis_id?: string;
  readonly error: string;
}

export interface ExecutedTask {
  readonly task_id: string;
  readonly name: string;
  readonly scope: string;
  readonly priority: number;
}

export interface RunLedgerSnapshot {
  readonly errors: readonly LedgerError[];
  readonly tasks_executed: readonly ExecutedTask[];
}

export type SeriesUnavailableReason = "missing" | "empty" | "metric_not_found";

export type SeriesOutcome =
  | { readonly ok: true; readonly values: readonly number[] }
  | { readonly ok: false; readonly reason: SeriesUnavailableReason };

export interface TimeSeriesProvider {
  getSeries(scope: string, metric: string): Promise<SeriesOutcome>;
}

export interface HypothesisGenerator {
  generate(task: Task): Promise<Outcome<readonly Hypothesis[]>>;
}

export interface CreativeGenerator {
  generateForCampaign(
    scope: string,
    sampleItems: readonly CreativeSampleItem[],
    n: number,
  ): Promise<Outcome<readonly CreativeRecord[]>>;
}

export interface CreativeSampleSource {
  getCreativeSample(n: number): Promise<Outcome<readonly CreativeSampleItem[]>>;
}

export interface HypothesisEvaluator {
  validate(
    hypothesis: Hypothesis,
    provider: TimeSeriesProvider,
    scope?: string,
  ): Promise<ValidationResult>;
}

export function isStatisticalValidation(detail: ValidationDetail): detail is StatisticalValidation {
  return !("error" in detail);
}
