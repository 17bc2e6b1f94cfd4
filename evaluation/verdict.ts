import type { EvaluatorThresholds } from "../config/thresholds.js";
import type { ImpactLevel, ValidationStatus } from "../orchestration/types.js";
import { clamp } from "./statistics.js";

const STRONG_P_VALUE = 0.01;
const STRONG_EFFECT_SIZE = 0.5;
const STRONG_MIN_SAMPLES = 30;

const CONFIDENCE_P_STRONG_BONUS = 0.25;
const CONFIDENCE_P_SIGNIFICANT_BONUS = 0.12;
const CONFIDENCE_P_MISS_PENALTY = 0.12;
const CONFIDENCE_LARGE_EFFECT_BONUS = 0.2;
const CONFIDENCE_MEDIUM_EFFECT_BONUS = 0.1;
const CONFIDENCE_SMALL_SAMPLE_PENALTY = 0.15;

export interface VerdictInput {
  readonly pValue: number;
  readonly relativeChangePct: number;
  readonly effectSize: number;
  readonly sampleCount: number;
}

export function decideStatus(
  input: VerdictInput,
  thresholds: Pick<EvaluatorThresholds, "pValueThreshold" | "ctrDropPctThreshold">,
): ValidationStatus {
  const { pValue, relativeChangePct, effectSize, sampleCount } = input;

  if (
    pValue < STRONG_P_VALUE &&
    Math.abs(effectSize) >= STRONG_EFFECT_SIZE &&
    sampleCount >= STRONG_MIN_SAMPLES
  ) {
    return "VALIDATED";
  }

  if (
    pValue < thresholds.pValueThreshold &&
    Math.abs(relativeChangePct) >= thresholds.ctrDropPctThreshold
  ) {
    return "VALIDATED";
  }

  if (pValue < thresholds.pValueThreshold) {
    return "INCONCLUSIVE";
  }

  return "REFUTED";
}

export function calibrateConfidence(
  initialConfidence: number,
  input: Omit<VerdictInput, "relativeChangePct">,
): number {
  const { pValue, effectSize, sampleCount } = input;
  let confidence = initialConfidence;

  if (pValue < 0.01) {
    confidence += CONFIDENCE_P_STRONG_BONUS;
  } else if (pValue < 0.05) {
    confidence += CONFIDENCE_P_SIGNIFICANT_BONUS;
  } else {
    confidence -= CONFIDENCE_P_MISS_PENALTY;
  }

  const absEffect = Math.abs(effectSize);
  if (absEffect >= 0.8) {
    confidence += CONFIDENCE_LARGE_EFFECT_BONUS;
  } else if (absEffect >= 0.5) {
    confidence += CONFIDENCE_MEDIUM_EFFECT_BONUS;
  }

  if (sampleCount < STRONG_MIN_SAMPLES) {
    confidence -= CONFIDENCE_SMALL_SAMPLE_PENALTY;
  }

  return Number.isFinite(confidence) ? clamp(confidence, 0, 1) : 0;
}

export function classifyImpact(
  deltaPct: number | null,
  effectSize: number,
  pValue: number,
): ImpactLevel {
  if (deltaPct === null || !Number.isFinite(deltaPct)) {
    return "medium";
  }

  const delta = Math.abs(deltaPct);
  const effect = Math.abs(effectSize);

  if (delta > 25 && effect > 0.5 && pValue < 0.05) {
    return "high";
  }

  if (delta > 10 && effect > 0.3) {
    return "medium";
  }

  return "low";
}
