import { silentDiagnostics, type DiagnosticsSink } from "./diagnostics.js";
import type { Task } from "./types.js";

const COMPONENT = "scheduler";

export function compareTasks(a: Task, b: Task): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Depth-first topological order over `depends_on`, roots and siblings taken in
 * ascending (priority, id). Unknown dependency ids are ignored and an edge that
 * closes a cycle is dropped, so the result is always a permutation of `tasks`.
 */
export function orderTasks(
  tasks: readonly Task[],
  diagnostics: DiagnosticsSink = silentDiagnostics,
): Task[] {
  const byId = new Map<string, Task>();
  const duplicates: Task[] = [];

  for (const task of tasks) {
    if (byId.has(task.id)) {
      diagnostics.warn(COMPONENT, "duplicate_task_id", "Duplicate task id, appending after ordered tasks", {
        taskId: task.id,
      });
      duplicates.push(task);
      continue;
    }
    byId.set(task.id, task);
  }

  const ordered: Task[] = [];
  const visited = new Set<string>();
  const inProgress = new Set<string>();

  const resolveDependencies = (task: Task): Task[] => {
    const resolved: Task[] = [];
    for (const depId of new Set(task.depends_on)) {
      const dependency = byId.get(depId);
      if (!dependency) {
        diagnostics.warn(COMPONENT, "dangling_dependency", "Dependency not found, edge ignored", {
          taskId: task.id,
          dependsOn: depId,
        });
        continue;
      }
      resolved.push(dependency);
    }
    return resolved.sort(compareTasks);
  };

  const visit = (task: Task): void => {
    if (visited.has(task.id)) return;

    inProgress.add(task.id);

    for (const dependency of resolveDependencies(task)) {
      if (inProgress.has(dependency.id)) {
        diagnostics.warn(COMPONENT, "cycle_detected", "Dependency cycle detected, edge dropped", {
          taskId: task.id,
          dependsOn: dependency.id,
        });
        continue;
      }
      visit(dependency);
    }

    inProgress.delete(task.id);
    visited.add(task.id);
    ordered.push(task);
  };

  for (const task of [...byId.values()].sort(compareTasks)) {
    visit(task);
  }

  diagnostics.debug(COMPONENT, "tasks_ordered", "Task order resolved", {
    order: ordered.map((t) => t.id),
  });

  return [...ordered, ...duplicates];
}
