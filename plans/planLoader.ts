import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { logger } from "../config/logger.js";
import { PlanValidationError, validateAnalysisPlan, type AnalysisPlan } from "./plan.schema.js";

export function loadAnalysisPlan(planPath: string): AnalysisPlan {
  if (!fs.existsSync(planPath)) {
    throw new PlanValidationError(`Plan not found at ${planPath}`);
  }

  const raw = fs.readFileSync(planPath, "utf-8");
  const parsed: unknown = parseYaml(raw);
  const plan = validateAnalysisPlan(parsed);

  logger.info({ planPath, tasks: plan.tasks.length }, "Analysis plan loaded");
  return plan;
}
