import {
  ALL_CAMPAIGNS_SCOPE,
  normalizeScope,
  type Hypothesis,
  type Task,
} from "../orchestration/types.js";
import { isRecord, readKey, type UnknownRecord } from "../shared/records.js";

export interface AnalysisPlan {
  readonly query: string;
  readonly tasks: readonly Task[];
  readonly hypothesesByTask: ReadonlyMap<string, readonly Hypothesis[]>;
}

const DEFAULT_TASK_TYPE = "metric_check";
const DEFAULT_TARGET = "ctr";
const DEFAULT_PRIORITY = 5;
const DEFAULT_DRIVER = "other";
const DEFAULT_INITIAL_CONFIDENCE = 0.5;

export class PlanValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanValidationError";
  }
}

export function validateAnalysisPlan(raw: unknown): AnalysisPlan {
  if (!isRecord(raw)) {
    throw new PlanValidationError("Plan must be a non-null mapping");
  }

  const query = optionalString(raw["query"], "query") ?? "";
  const rawTasks = raw["tasks"];
  if (!Array.isArray(rawTasks) || rawTasks.length === 0) {
    throw new PlanValidationError("tasks must be a non-empty list");
  }

  const tasks: Task[] = [];
  const hypothesesByTask = new Map<string, readonly Hypothesis[]>();
  const seenHypothesisIds = new Set<string>();

  rawTasks.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new PlanValidationError(`tasks[${String(index)}] must be a mapping`);
    }

    const task = validateTask(entry, index);
    if (hypothesesByTask.has(task.id)) {
      throw new PlanValidationError(`Duplicate task id: "${task.id}"`);
    }

    const hypotheses = validateHypotheses(entry["hypotheses"], task.id);
    for (const hypothesis of hypotheses) {
      if (seenHypothesisIds.has(hypothesis.id)) {
        throw new PlanValidationError(`Duplicate hypothesis id: "${hypothesis.id}"`);
      }
      seenHypothesisIds.add(hypothesis.id);
    }

    tasks.push(task);
    hypothesesByTask.set(task.id, hypotheses);
  });

  return { query, tasks, hypothesesByTask };
}

function validateTask(record: UnknownRecord, index: number): Task {
  const id = requiredString(record["id"], `tasks[${String(index)}].id`);
  const field = (name: string): string => `task "${id}" ${name}`;

  return {
    id,
    name: optionalString(record["name"], field("name")) ?? id,
    type: optionalString(record["type"], field("type")) ?? DEFAULT_TASK_TYPE,
    target: optionalString(record["target"], field("target")) ?? DEFAULT_TARGET,
    scope: normalizeScope(optionalString(record["scope"], field("scope")) ?? ALL_CAMPAIGNS_SCOPE),
    priority: validatePriority(record["priority"], field("priority")),
    depends_on: optionalStringList(readKey(record, "depends_on", "dependsOn"), field("depends_on")),
  };
}

function validatePriority(value: unknown, field: string): number {
  if (value === undefined || value === null) return DEFAULT_PRIORITY;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isInteger(num)) {
    throw new PlanValidationError(`${field} must be an integer. Got: "${String(value)}"`);
  }
  return num;
}

function validateHypotheses(value: unknown, taskId: string): readonly Hypothesis[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new PlanValidationError(`task "${taskId}" hypotheses must be a list`);
  }

  return value.map((entry: unknown, index): Hypothesis => {
    const label = `task "${taskId}" hypotheses[${String(index)}]`;
    if (!isRecord(entry)) {
      throw new PlanValidationError(`${label} must be a mapping`);
    }

    return {
      id: optionalString(entry["id"], `${label}.id`) ?? `${taskId}-h${String(index + 1)}`,
      hypothesis: requiredString(entry["hypothesis"], `${label}.hypothesis`),
      driver: optionalString(entry["driver"], `${label}.driver`) ?? DEFAULT_DRIVER,
      initial_confidence: validateConfidence(
        readKey(entry, "initial_confidence", "initialConfidence"),
        `${label}.initial_confidence`,
      ),
      supporting_data_points: optionalStringList(
        readKey(entry, "supporting_data_points", "supportingDataPoints"),
        `${label}.supporting_data_points`,
      ),
      required_checks: optionalStringList(
        readKey(entry, "required_checks", "requiredChecks"),
        `${label}.required_checks`,
      ),
    };
  });
}

function validateConfidence(value: unknown, field: string): number {
  if (value === undefined || value === null) return DEFAULT_INITIAL_CONFIDENCE;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num) || num < 0 || num > 1) {
    throw new PlanValidationError(`${field} must be a number in [0, 1]. Got: "${String(value)}"`);
  }
  return num;
}

function requiredString(value: unknown, field: string): string {
  const result = optionalString(value, field);
  if (result === undefined) {
    throw new PlanValidationError(`${field} must be a non-empty string`);
  }
  return result;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new PlanValidationError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

function optionalStringList(value: unknown, field: string): readonly string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new PlanValidationError(`${field} must be a list`);
  }
  return value.map((item: unknown) => {
    if (typeof item === "number") return String(item);
    if (typeof item !== "string") {
      throw new PlanValidationError(`${field} must contain only strings`);
    }
    return item;
  });
}
