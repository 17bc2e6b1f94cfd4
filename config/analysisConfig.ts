import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import {
  DEFAULT_CREATIVE_SETTINGS,
  type CreativeSettings,
} from "../orchestration/pipelineExecutor.js";
import { isRecord, readKey, type UnknownRecord } from "../shared/records.js";
import { logger } from "./logger.js";
import {
  applyThresholdEnvOverrides,
  DEFAULT_THRESHOLDS,
  type EvaluatorThresholds,
} from "./thresholds.js";

export const DEFAULT_CONFIG_PATH = path.resolve("config", "analysis.yaml");

export interface AnalysisPaths {
  readonly data: string;
  readonly outDir: string;
  readonly database: string;
}

export interface AnalysisConfig {
  readonly paths: AnalysisPaths;
  readonly thresholds: EvaluatorThresholds;
  readonly creative: CreativeSettings;
}

export const DEFAULT_PATHS: AnalysisPaths = {
  data: "data/sample_campaigns.csv",
  outDir: "reports",
  database: "state/local.db",
};

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export function validateAnalysisConfig(raw: unknown): AnalysisConfig {
  if (raw === null || raw === undefined) {
    return { paths: DEFAULT_PATHS, thresholds: DEFAULT_THRESHOLDS, creative: DEFAULT_CREATIVE_SETTINGS };
  }
  if (!isRecord(raw)) {
    throw new ConfigValidationError("Config must be a mapping");
  }

  return {
    paths: validatePaths(optionalSection(raw, "paths")),
    thresholds: validateThresholds(optionalSection(raw, "thresholds")),
    creative: validateCreative(optionalSection(raw, "creative")),
  };
}

/** Reads the YAML config (defaults when the file is absent) and applies env overrides. */
export function loadAnalysisConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): AnalysisConfig {
  let config: AnalysisConfig;

  if (fs.existsSync(configPath)) {
    const parsed: unknown = parseYaml(fs.readFileSync(configPath, "utf-8"));
    config = validateAnalysisConfig(parsed);
    logger.debug({ configPath }, "Analysis config loaded");
  } else {
    logger.info({ configPath }, "No analysis config found, using defaults");
    config = validateAnalysisConfig(null);
  }

  const thresholds = applyThresholdEnvOverrides(config.thresholds, env);
  assertThresholds(thresholds);
  return { ...config, thresholds };
}

function optionalSection(raw: UnknownRecord, key: string): UnknownRecord {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${key} must be a mapping`);
  }
  return value;
}

function validatePaths(section: UnknownRecord): AnalysisPaths {
  return {
    data: optionalString(section["data"], "paths.data") ?? DEFAULT_PATHS.data,
    outDir: optionalString(readKey(section, "out_dir", "outDir"), "paths.out_dir") ?? DEFAULT_PATHS.outDir,
    database: optionalString(section["database"], "paths.database") ?? DEFAULT_PATHS.database,
  };
}

function validateThresholds(section: UnknownRecord): EvaluatorThresholds {
  const pick = (key: keyof EvaluatorThresholds, ...aliases: string[]): number => {
    const raw = [key, ...aliases].map((k) => section[k]).find((v) => v !== undefined && v !== null);
    return raw === undefined ? DEFAULT_THRESHOLDS[key] : toNumber(raw, `thresholds.${aliases[0] ?? key}`);
  };

  const thresholds: EvaluatorThresholds = {
    pValueThreshold: pick("pValueThreshold", "p_value_threshold"),
    ctrDropPctThreshold: pick("ctrDropPctThreshold", "ctr_drop_pct_threshold", "ctr_drop_pct"),
    minSamplesForTTest: pick("minSamplesForTTest", "min_samples_for_ttest"),
    bootstrapIters: pick("bootstrapIters", "bootstrap_iters"),
    rollingWindowDays: pick("rollingWindowDays", "rolling_window_days"),
    changePointRelativeThreshold: pick("changePointRelativeThreshold", "change_point_relative_threshold"),
  };

  assertThresholds(thresholds);
  return thresholds;
}

export function assertThresholds(thresholds: EvaluatorThresholds): void {
  const { pValueThreshold, ctrDropPctThreshold, changePointRelativeThreshold } = thresholds;

  if (!Number.isFinite(pValueThreshold) || pValueThreshold <= 0 || pValueThreshold > 1) {
    throw new ConfigValidationError(
      `p_value_threshold must be in (0, 1]. Got: ${String(pValueThreshold)}`,
    );
  }
  if (!Number.isFinite(ctrDropPctThreshold) || ctrDropPctThreshold < 0) {
    throw new ConfigValidationError(
      `ctr_drop_pct_threshold must be a non-negative number. Got: ${String(ctrDropPctThreshold)}`,
    );
  }
  if (!Number.isFinite(changePointRelativeThreshold) || changePointRelativeThreshold < 0) {
    throw new ConfigValidationError(
      `change_point_relative_threshold must be a non-negative number. Got: ${String(changePointRelativeThreshold)}`,
    );
  }

  assertPositiveInteger(thresholds.minSamplesForTTest, "min_samples_for_ttest");
  assertPositiveInteger(thresholds.bootstrapIters, "bootstrap_iters");
  assertPositiveInteger(thresholds.rollingWindowDays, "rolling_window_days");
}

function validateCreative(section: UnknownRecord): CreativeSettings {
  const drivers = readKey(section, "eligible_drivers", "eligibleDrivers");
  let eligibleDrivers = DEFAULT_CREATIVE_SETTINGS.eligibleDrivers;
  if (drivers !== undefined && drivers !== null) {
    if (!Array.isArray(drivers) || !drivers.every((d): d is string => typeof d === "string")) {
      throw new ConfigValidationError("creative.eligible_drivers must be a list of strings");
    }
    eligibleDrivers = drivers;
  }

  const sampleSize = optionalCount(readKey(section, "sample_size", "sampleSize"), "creative.sample_size");
  const variations = optionalCount(section["variations"], "creative.variations");

  return {
    eligibleDrivers,
    sampleSize: sampleSize ?? DEFAULT_CREATIVE_SETTINGS.sampleSize,
    variations: variations ?? DEFAULT_CREATIVE_SETTINGS.variations,
  };
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigValidationError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

function optionalCount(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  const num = toNumber(value, field);
  assertPositiveInteger(num, field);
  return num;
}

function toNumber(value: unknown, field: string): number {
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num)) {
    throw new ConfigValidationError(`${field} must be a number. Got: "${String(value)}"`);
  }
  return num;
}

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`${field} must be a positive integer. Got: ${String(value)}`);
  }
}
