import type { AnalysisPlan } from "../plans/plan.schema.js";
import type { Hypothesis, HypothesisGenerator, Task } from "../orchestration/types.js";
import { succeed, type Outcome } from "../shared/outcome.js";

/** Serves the hypotheses a loaded plan lists for each task. */
export class PlanHypothesisGenerator implements HypothesisGenerator {
  constructor(private readonly plan: Pick<AnalysisPlan, "hypothesesByTask">) {}

  generate(task: Task): Promise<Outcome<readonly Hypothesis[]>> {
    return Promise.resolve(succeed(this.plan.hypothesesByTask.get(task.id) ?? []));
  }
}
