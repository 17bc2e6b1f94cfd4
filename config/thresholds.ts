export interface EvaluatorThresholds {
  readonly pValueThreshold: number;
  readonly ctrDropPctThreshold: number;
  readonly minSamplesForTTest: number;
  readonly bootstrapIters: number;
  readonly rollingWindowDays: number;
  readonly changePointRelativeThreshold: number;
}

export const DEFAULT_THRESHOLDS: EvaluatorThresholds = {
  pValueThreshold: 0.05,
  ctrDropPctThreshold: 20,
  minSamplesForTTest: 10,
  bootstrapIters: 2000,
  rollingWindowDays: 7,
  changePointRelativeThreshold: 0.15,
};

const ENV_OVERRIDES: ReadonlyArray<readonly [keyof EvaluatorThresholds, string]> = [
  ["pValueThreshold", "ANALYSIS_P_VALUE_THRESHOLD"],
  ["ctrDropPctThreshold", "ANALYSIS_CTR_DROP_PCT"],
  ["minSamplesForTTest", "ANALYSIS_MIN_SAMPLES_TTEST"],
  ["bootstrapIters", "ANALYSIS_BOOTSTRAP_ITERS"],
  ["rollingWindowDays", "ANALYSIS_ROLLING_WINDOW_DAYS"],
];

export function applyThresholdEnvOverrides(
  thresholds: EvaluatorThresholds,
  env: NodeJS.ProcessEnv = process.env,
): EvaluatorThresholds {
  const overridden: Record<keyof EvaluatorThresholds, number> = { ...thresholds };

  for (const [key, variable] of ENV_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined || raw.trim().length === 0) continue;
    overridden[key] = Number(raw);
  }

  return overridden;
}
