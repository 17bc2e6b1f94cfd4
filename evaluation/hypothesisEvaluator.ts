import { DEFAULT_THRESHOLDS, type EvaluatorThresholds } from "../config/thresholds.js";
import { silentDiagnostics, type DiagnosticsSink } from "../orchestration/diagnostics.js";
import {
  ALL_CAMPAIGNS_SCOPE,
  type ChangePointEstimate,
  type Hypothesis,
  type HypothesisEvaluator,
  type StatisticalValidation,
  type TestMethod,
  type TimeSeriesProvider,
  type ValidationEvidence,
  type ValidationResult,
} from "../orchestration/types.js";
import { describeError } from "../shared/outcome.js";
import {
  bootstrapPValue,
  cohensD,
  detectChangePoint,
  mean,
  relativeChangePct,
  splitBaselineTest,
  welchTTest,
} from "./statistics.js";
import { calibrateConfidence, classifyImpact, decideStatus } from "./verdict.js";

export const EVALUATED_METRIC = "ctr";

const COMPONENT = "evaluator";
const DATA_UNAVAILABLE_CONFIDENCE = 0.2;
const COMPUTATION_FAILURE_CONFIDENCE = 0.1;
const MIN_SERIES_LENGTH = 2;

type SeriesFetch =
  | { readonly ok: true; readonly values: readonly number[] }
  | { readonly ok: false; readonly reason: string };

/**
 * Turns a hypothesis into a verdict by testing the most recent 30% of the CTR
 * series against the 70% before it. Every path resolves; nothing is thrown.
 */
export class StatisticalEvaluator implements HypothesisEvaluator {
  constructor(
    private readonly thresholds: EvaluatorThresholds = DEFAULT_THRESHOLDS,
    private readonly diagnostics: DiagnosticsSink = silentDiagnostics,
  ) {}

  async validate(
    hypothesis: Hypothesis,
    provider: TimeSeriesProvider,
    scope: string = ALL_CAMPAIGNS_SCOPE,
  ): Promise<ValidationResult> {
    this.diagnostics.info(COMPONENT, "hypothesis:start", "Validating hypothesis", {
      hypothesisId: hypothesis.id,
      driver: hypothesis.driver,
      scope,
    });

    const series = await this.fetchSeries(provider, scope);

    if (!series.ok || series.values.length < MIN_SERIES_LENGTH) {
      const reason = series.ok ? "too few samples" : series.reason;
      this.diagnostics.warn(COMPONENT, "hypothesis:insufficient_data", "Insufficient data for evaluation", {
        hypothesisId: hypothesis.id,
        reason,
      });
      return {
        hypothesis_id: hypothesis.id,
        driver: hypothesis.driver,
        validation: { error: reason },
        evidence: null,
        impact: "low",
        confidence_final: DATA_UNAVAILABLE_CONFIDENCE,
        status: "INCONCLUSIVE",
        notes: `Insufficient data for evaluation (driver=${hypothesis.driver}): ${reason}`,
      };
    }

    try {
      return this.evaluateSeries(hypothesis, series.values);
    } catch (error) {
      const message = describeError(error);
      this.diagnostics.error(COMPONENT, "hypothesis:failed", "Exception during evaluation", {
        hypothesisId: hypothesis.id,
        error: message,
      });
      return {
        hypothesis_id: hypothesis.id,
        driver: hypothesis.driver,
        validation: { error: message },
        evidence: null,
        impact: "low",
        confidence_final: COMPUTATION_FAILURE_CONFIDENCE,
        status: "INCONCLUSIVE",
        notes: `Exception during evaluation: ${message}`,
      };
    }
  }

  private async fetchSeries(provider: TimeSeriesProvider, scope: string): Promise<SeriesFetch> {
    try {
      const outcome = await provider.getSeries(scope, EVALUATED_METRIC);
      if (!outcome.ok) return outcome;
      return { ok: true, values: outcome.values };
    } catch (error) {
      return { ok: false, reason: `error_preparing_series: ${describeError(error)}` };
    }
  }

  private evaluateSeries(hypothesis: Hypothesis, values: readonly number[]): ValidationResult {
    const { baseline, test } = splitBaselineTest(values);
    const sampleCount = baseline.length + test.length;

    const useTTest =
      baseline.length >= this.thresholds.minSamplesForTTest &&
      test.length >= this.thresholds.minSamplesForTTest;
    const method: TestMethod = useTTest ? "t-test" : "bootstrap";
    const pValue = useTTest
      ? welchTTest(baseline, test)
      : bootstrapPValue(baseline, test, this.thresholds.bootstrapIters);

    const baselineMean = mean(baseline);
    const testMean = mean(test);
    const changePct = relativeChangePct(baselineMean, testMean);
    const effectSize = cohensD(baseline, test);
    const changePoint = this.estimateChangePoint(values);

    for (const [name, value] of [
      ["p_value", pValue],
      ["baseline_mean", baselineMean],
      ["test_mean", testMean],
      ["relative_change_pct", changePct],
      ["effect_size", effectSize],
    ] as const) {
      if (!Number.isFinite(value)) {
        throw new RangeError(`${name} is not a finite number`);
      }
    }

    this.diagnostics.debug(COMPONENT, "hypothesis:stats", "Statistics computed", {
      hypothesisId: hypothesis.id,
      method,
      pValue,
      relativeChangePct: changePct,
      effectSize,
      baselineMean,
      testMean,
      changePoint,
    });

    const verdictInput = { pValue, relativeChangePct: changePct, effectSize, sampleCount };
    const status = decideStatus(verdictInput, this.thresholds);
    const confidence = calibrateConfidence(hypothesis.initial_confidence, verdictInput);

    const validation: StatisticalValidation = {
      metric: EVALUATED_METRIC,
      method,
      baseline_mean: baselineMean,
      test_mean: testMean,
      relative_change_pct: changePct,
      p_value: pValue,
      effect_size: effectSize,
      n_baseline: baseline.length,
      n_test: test.length,
      change_point: changePoint,
    };
    const evidence = buildEvidence(validation);
    const impact = classifyImpact(evidence.ctr_delta_pct, evidence.effect_size, evidence.p_value);

    this.diagnostics.info(COMPONENT, "hypothesis:complete", "Hypothesis evaluated", {
      hypothesisId: hypothesis.id,
      status,
      confidence,
      impact,
    });

    return {
      hypothesis_id: hypothesis.id,
      driver: hypothesis.driver,
      validation,
      evidence,
      impact,
      confidence_final: confidence,
      status,
      notes: `Evaluated driver=${hypothesis.driver} using ${method}`,
    };
  }

  private estimateChangePoint(values: readonly number[]): ChangePointEstimate {
    const estimate = detectChangePoint(values, this.thresholds.rollingWindowDays);
    return {
      index: estimate.index,
      relative_change: estimate.relativeChange,
      significant:
        estimate.index !== null &&
        Math.abs(estimate.relativeChange) >= this.thresholds.changePointRelativeThreshold,
      note: estimate.note,
    };
  }
}

function buildEvidence(validation: StatisticalValidation): ValidationEvidence {
  const { baseline_mean: baselineMean, test_mean: testMean } = validation;
  const deltaPct = baselineMean === 0 ? null : ((testMean - baselineMean) / baselineMean) * 100;

  return {
    baseline_ctr: baselineMean,
    current_ctr: testMean,
    ctr_delta_pct: deltaPct,
    effect_size: validation.effect_size,
    p_value: validation.p_value,
    n_baseline: validation.n_baseline,
    n_test: validation.n_test,
    change_point: validation.change_point,
  };
}
