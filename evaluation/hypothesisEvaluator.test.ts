import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_THRESHOLDS } from "../config/thresholds.js";
import { createMemoryDiagnostics } from "../orchestration/diagnostics.js";
import {
  isStatisticalValidation,
  type Hypothesis,
  type SeriesOutcome,
  type TimeSeriesProvider,
} from "../orchestration/types.js";
import { EVALUATED_METRIC, StatisticalEvaluator } from "./hypothesisEvaluator.js";

function assertClose(actual: number, expected: number, tolerance = 1e-6): void {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${String(actual)} ≈ ${String(expected)}`);
}

function repeat(value: number, count: number): number[] {
  return Array.from({ length: count }, () => value);
}

function makeHypothesis(overrides: Partial<Hypothesis> = {}): Hypothesis {
  return {
    id: "h1",
    hypothesis: "Creative fatigue is dragging CTR down",
    driver: "creative_fatigue",
    initial_confidence: 0.5,
    supporting_data_points: [],
    required_checks: [],
    ...overrides,
  };
}

interface RecordingProvider extends TimeSeriesProvider {
  readonly calls: Array<{ scope: string; metric: string }>;
}

function seriesProvider(outcome: SeriesOutcome): RecordingProvider {
  const calls: Array<{ scope: string; metric: string }> = [];
  return {
    calls,
    getSeries(scope, metric) {
      calls.push({ scope, metric });
      return Promise.resolve(outcome);
    },
  };
}

function valuesProvider(values: readonly number[]): RecordingProvider {
  return seriesProvider({ ok: true, values });
}

describe("StatisticalEvaluator", () => {
  describe("sustained CTR drop", () => {
    const series = [...repeat(0.1, 20), ...repeat(0.04, 20)];

    it("should validate the drop with a t-test", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(makeHypothesis({ initial_confidence: 0.6 }), valuesProvider(series));

      assert.equal(result.status, "VALIDATED");
      assert.equal(result.impact, "high");
      assert.equal(result.confidence_final, 1);
      assert.equal(result.notes, "Evaluated driver=creative_fatigue using t-test");

      assert.ok(isStatisticalValidation(result.validation));
      const validation = result.validation;
      assert.equal(validation.method, "t-test");
      assert.equal(validation.metric, "ctr");
      assert.equal(validation.n_baseline, 28);
      assert.equal(validation.n_test, 12);
      assert.ok(validation.p_value < 1e-6);
      assertClose(validation.baseline_mean, 0.0828571, 1e-6);
      assertClose(validation.test_mean, 0.04);
      assertClose(validation.relative_change_pct, -51.7241, 1e-3);
      assertClose(validation.effect_size, -1.84197, 1e-4);
    });

    it("should report the change-point at the step", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(makeHypothesis(), valuesProvider(series));

      assert.notEqual(result.evidence, null);
      const changePoint = result.evidence?.change_point;
      assert.equal(changePoint?.index, 20);
      assertClose(changePoint?.relative_change ?? 0, -0.6);
      assert.equal(changePoint?.significant, true);
      assert.equal(changePoint?.note, "rolling-window(7) heuristic");
    });

    it("should fill CTR evidence from the segment means", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(makeHypothesis(), valuesProvider(series));

      const evidence = result.evidence;
      assert.ok(evidence);
      assertClose(evidence.baseline_ctr, 0.0828571, 1e-6);
      assertClose(evidence.current_ctr, 0.04);
      assertClose(evidence.ctr_delta_pct ?? 0, -51.7241, 1e-3);
      assert.equal(evidence.n_baseline, 28);
      assert.equal(evidence.n_test, 12);
    });
  });

  describe("flat CTR", () => {
    it("should refute a hypothesis when nothing changed", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(makeHypothesis(), valuesProvider(repeat(0.1, 40)));

      assert.equal(result.status, "REFUTED");
      assert.equal(result.impact, "low");
      assertClose(result.confidence_final, 0.38);
      assert.ok(isStatisticalValidation(result.validation));
      assert.equal(result.validation.p_value, 1);
      assert.equal(result.validation.effect_size, 0);
      assertClose(result.validation.relative_change_pct, 0, 1e-9);
      assert.equal(result.validation.change_point.index, null);
      assert.equal(result.validation.change_point.significant, false);
    });
  });

  describe("short series", () => {
    const noisy = [0.05, 0.06, 0.055, 0.052, 0.058, 0.061, 0.049, 0.05, 0.057, 0.054];

    it("should fall back to the bootstrap below the t-test sample minimum", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(makeHypothesis(), valuesProvider(noisy));

      assert.ok(isStatisticalValidation(result.validation));
      assert.equal(result.validation.method, "bootstrap");
      assert.equal(result.validation.n_baseline, 7);
      assert.equal(result.validation.n_test, 3);
      assert.ok(result.validation.p_value > 0.05);
      assert.equal(result.status, "REFUTED");
      assertClose(result.confidence_final, 0.23);
    });

    it("should give identical results on repeated runs", async () => {
      const evaluator = new StatisticalEvaluator();
      const first = await evaluator.validate(makeHypothesis(), valuesProvider(noisy));
      const second = await evaluator.validate(makeHypothesis(), valuesProvider(noisy));

      assert.deepEqual(first, second);
    });

    it("should use the bootstrap when the sample minimum is raised", async () => {
      const evaluator = new StatisticalEvaluator({ ...DEFAULT_THRESHOLDS, minSamplesForTTest: 50, bootstrapIters: 500 });
      const result = await evaluator.validate(
        makeHypothesis(),
        valuesProvider([...repeat(0.1, 20), ...repeat(0.04, 20)]),
      );

      assert.ok(isStatisticalValidation(result.validation));
      assert.equal(result.validation.method, "bootstrap");
      assert.ok(result.validation.p_value < 0.05);
      assert.equal(result.status, "VALIDATED");
    });
  });

  describe("data unavailable", () => {
    it("should be inconclusive with a single data point", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(makeHypothesis(), valuesProvider([0.05]));

      assert.equal(result.status, "INCONCLUSIVE");
      assert.equal(result.confidence_final, 0.2);
      assert.equal(result.impact, "low");
      assert.equal(result.evidence, null);
      assert.deepEqual(result.validation, { error: "too few samples" });
      assert.equal(
        result.notes,
        "Insufficient data for evaluation (driver=creative_fatigue): too few samples",
      );
    });

    it("should carry the provider's failure reason", async () => {
      const evaluator = new StatisticalEvaluator();
      const result = await evaluator.validate(
        makeHypothesis(),
        seriesProvider({ ok: false, reason: "metric_not_found" }),
      );

      assert.equal(result.status, "INCONCLUSIVE");
      assert.equal(result.confidence_final, 0.2);
      assert.deepEqual(result.validation, { error: "metric_not_found" });
    });

    it("should resolve when the provider throws", async () => {
      const evaluator = new StatisticalEvaluator();
      const provider: TimeSeriesProvider = {
        getSeries: () => Promise.reject(new Error("boom")),
      };

      const result = await evaluator.validate(makeHypothesis(), provider);

      assert.equal(result.status, "INCONCLUSIVE");
      assert.equal(result.confidence_final, 0.2);
      assert.deepEqual(result.validation, { error: "error_preparing_series: boom" });
    });
  });

  describe("computation failure", () => {
    it("should be inconclusive with confidence 0.1 when a statistic is not finite", async () => {
      const diagnostics = createMemoryDiagnostics();
      const evaluator = new StatisticalEvaluator(DEFAULT_THRESHOLDS, diagnostics);
      const values = [Number.NaN, 0.05, 0.06, 0.055, 0.052, 0.058, 0.061, 0.049, 0.05, 0.057];

      const result = await evaluator.validate(makeHypothesis(), valuesProvider(values));

      assert.equal(result.status, "INCONCLUSIVE");
      assert.equal(result.confidence_final, 0.1);
      assert.equal(result.evidence, null);
      assert.deepEqual(result.validation, { error: "baseline_mean is not a finite number" });
      assert.equal(result.notes, "Exception during evaluation: baseline_mean is not a finite number");
      assert.equal(diagnostics.eventsOfType("hypothesis:failed").length, 1);
    });
  });

  it("should request the CTR series for the given scope", async () => {
    const provider = valuesProvider(repeat(0.1, 12));
    const evaluator = new StatisticalEvaluator();

    await evaluator.validate(makeHypothesis(), provider, "Campaign A");
    await evaluator.validate(makeHypothesis(), provider);

    assert.deepEqual(provider.calls, [
      { scope: "Campaign A", metric: EVALUATED_METRIC },
      { scope: "all", metric: EVALUATED_METRIC },
    ]);
  });

  it("should keep confidence within [0, 1] across initial confidences", async () => {
    const evaluator = new StatisticalEvaluator();
    const provider = valuesProvider([...repeat(0.1, 20), ...repeat(0.04, 20)]);

    for (const initial of [0, 0.25, 0.5, 0.75, 1]) {
      const result = await evaluator.validate(makeHypothesis({ initial_confidence: initial }), provider);
      assert.ok(result.confidence_final >= 0 && result.confidence_final <= 1);
    }
  });

  it("should record start and completion diagnostics", async () => {
    const diagnostics = createMemoryDiagnostics();
    const evaluator = new StatisticalEvaluator(DEFAULT_THRESHOLDS, diagnostics);

    await evaluator.validate(makeHypothesis({ id: "h-diag" }), valuesProvider(repeat(0.1, 12)));

    const complete = diagnostics.eventsOfType("hypothesis:complete");
    assert.equal(diagnostics.eventsOfType("hypothesis:start").length, 1);
    assert.equal(complete.length, 1);
    assert.equal(complete[0]?.metadata?.["hypothesisId"], "h-diag");
    assert.equal(complete[0]?.component, "evaluator");
  });
});
