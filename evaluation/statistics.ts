const NEGLIGIBLE_RATIO = 1e-12;
const BETA_MAX_ITERATIONS = 300;
const BETA_EPSILON = 3e-14;
const BETA_FLOOR = 1e-300;

const LANCZOS_COEFFICIENTS = [
  76.18009172947146, -86.50532032941677, 24.01409824083091, -1.231739572450155,
  0.1208650973866179e-2, -0.5395239384953e-5,
];

export interface SegmentSplit {
  readonly baseline: readonly number[];
  readonly test: readonly number[];
}

export interface ChangePoint {
  readonly index: number | null;
  readonly relativeChange: number;
  readonly note: string;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - m) ** 2;
  return squares / (values.length - 1);
}

function magnitude(...values: readonly number[]): number {
  return Math.max(1, ...values.map((v) => Math.abs(v)));
}

function isNegligible(value: number, scale: number): boolean {
  return Math.abs(value) <= NEGLIGIBLE_RATIO * scale;
}

/** Baseline takes the first 70% of the series (at least one point), test the rest. */
export function splitBaselineTest(values: readonly number[], baselineShare = 0.7): SegmentSplit {
  const cut = Math.max(1, Math.floor(values.length * baselineShare));
  return { baseline: values.slice(0, cut), test: values.slice(cut) };
}

export function cohensD(baseline: readonly number[], test: readonly number[]): number {
  const nb = baseline.length;
  const nt = test.length;
  if (nb + nt - 2 <= 0) return 0;

  const pooledVariance =
    ((nb - 1) * sampleVariance(baseline) + (nt - 1) * sampleVariance(test)) / (nb + nt - 2);
  const pooledSd = Math.sqrt(pooledVariance);
  const baselineMean = mean(baseline);
  const testMean = mean(test);

  if (!Number.isFinite(pooledSd) || isNegligible(pooledSd, magnitude(baselineMean, testMean))) {
    return 0;
  }

  return (testMean - baselineMean) / pooledSd;
}

export function relativeChangePct(baselineMean: number, testMean: number, epsilon = 1e-9): number {
  return ((testMean - baselineMean) / Math.max(epsilon, baselineMean)) * 100;
}

function logGamma(x: number): number {
  let y = x;
  const shifted = x + 5.5;
  const correction = shifted - (x + 0.5) * Math.log(shifted);
  let series = 1.000000000190015;
  for (const coefficient of LANCZOS_COEFFICIENTS) {
    y += 1;
    series += coefficient / y;
  }
  return -correction + Math.log((2.5066282746310005 * series) / x);
}

function clampTiny(value: number): number {
  return Math.abs(value) < BETA_FLOOR ? BETA_FLOOR : value;
}

function betaContinuedFraction(a: number, b: number, x: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 / clampTiny(1 - (qab * x) / qap);
  let h = d;

  for (let m = 1; m <= BETA_MAX_ITERATIONS; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 / clampTiny(1 + aa * d);
    c = clampTiny(1 + aa / c);
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 / clampTiny(1 + aa * d);
    c = clampTiny(1 + aa / c);
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < BETA_EPSILON) break;
  }

  return h;
}

export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x),
  );

  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/** Two-sided p-value of Student's t statistic with `df` degrees of freedom. */
export function studentTTwoSidedPValue(t: number, df: number): number {
  if (!Number.isFinite(t)) return 0;
  return regularizedIncompleteBeta(df / (df + t * t), df / 2, 0.5);
}

/** Welch's unequal-variance two-sample t-test. Returns the two-sided p-value. */
export function welchTTest(baseline: readonly number[], test: readonly number[]): number {
  const nb = baseline.length;
  const nt = test.length;
  const baselineMean = mean(baseline);
  const testMean = mean(test);
  const diff = testMean - baselineMean;
  const scale = magnitude(baselineMean, testMean);

  const baselineTerm = sampleVariance(baseline) / nb;
  const testTerm = sampleVariance(test) / nt;
  const standardError = Math.sqrt(baselineTerm + testTerm);

  if (isNegligible(standardError, scale)) {
    return isNegligible(diff, scale) ? 1 : 0;
  }

  const dfDenominator =
    (nb > 1 ? baselineTerm ** 2 / (nb - 1) : 0) + (nt > 1 ? testTerm ** 2 / (nt - 1) : 0);
  const df = (baselineTerm + testTerm) ** 2 / dfDenominator;

  return clampProbability(studentTTwoSidedPValue(diff / standardError, df));
}

/** mulberry32: small seeded PRNG yielding floats in [0, 1). */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const DEFAULT_BOOTSTRAP_SEED = 42;

/**
 * Resamples the pooled segments with replacement, splits each resample at the
 * baseline size and counts how often |test - baseline| reaches the observed gap.
 */
export function bootstrapPValue(
  baseline: readonly number[],
  test: readonly number[],
  iterations: number,
  seed = DEFAULT_BOOTSTRAP_SEED,
): number {
  const pooled = [...baseline, ...test];
  const nb = baseline.length;
  const nt = test.length;
  if (nb === 0 || nt === 0 || iterations <= 0) return 1;

  const random = createSeededRandom(seed);
  const observed = Math.abs(mean(test) - mean(baseline));
  let extreme = 0;

  for (let i = 0; i < iterations; i++) {
    let baselineSum = 0;
    let testSum = 0;
    for (let j = 0; j < pooled.length; j++) {
      const drawn = pooled[Math.floor(random() * pooled.length)];
      if (j < nb) baselineSum += drawn;
      else testSum += drawn;
    }
    if (Math.abs(testSum / nt - baselineSum / nb) >= observed) {
      extreme++;
    }
  }

  return extreme / iterations;
}

export function detectChangePoint(values: readonly number[], window: number): ChangePoint {
  if (window <= 0 || values.length < 2 * window) {
    return {
      index: null,
      relativeChange: 0,
      note: "timeseries too short for change-point heuristic",
    };
  }

  let bestIndex: number | null = null;
  let bestRelative = 0;

  for (let idx = window; idx < values.length - window; idx++) {
    const leftMean = mean(values.slice(idx - window, idx));
    const rightMean = mean(values.slice(idx, idx + window));

    if (!Number.isFinite(leftMean) || leftMean === 0) continue;

    const relative = (rightMean - leftMean) / leftMean;
    if (Math.abs(relative) > Math.abs(bestRelative)) {
      bestRelative = relative;
      bestIndex = idx;
    }
  }

  return {
    index: bestIndex,
    relativeChange: bestRelative,
    note: `rolling-window(${String(window)}) heuristic`,
  };
}

export function clampProbability(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(1, Math.max(0, value));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
