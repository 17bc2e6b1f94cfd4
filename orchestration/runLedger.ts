import type {
  ExecutedTask,
  LedgerError,
  LedgerStage,
  RunLedgerSnapshot,
  Task,
} from "./types.js";

export interface LedgerErrorContext {
  readonly taskId?: string;
  readonly hypothesisId?: string;
}

/** Per-run record of executed tasks and isolated collaborator failures. */
export class RunLedger {
  private readonly errors: LedgerError[] = [];
  private readonly tasksExecuted: ExecutedTask[] = [];

  recordTaskExecuted(task: Task): void {
    this.tasksExecuted.push({
      task_id: task.id,
      name: task.name,
      scope: task.scope,
      priority: task.priority,
    });
  }

  recordError(stage: LedgerStage, error: string, context: LedgerErrorContext = {}): void {
    this.errors.push({
      stage,
      ...(context.taskId !== undefined && { task_id: context.taskId }),
      ...(context.hypothesisId !== undefined && { hypothesis_id: context.hypothesisId }),
      error,
    });
  }

  get errorCount(): number {
    return this.errors.length;
  }

  snapshot(): RunLedgerSnapshot {
    return {
      errors: this.errors.map((e) => ({ ...e })),
      tasks_executed: this.tasksExecuted.map((t) => ({ ...t })),
    };
  }
}
