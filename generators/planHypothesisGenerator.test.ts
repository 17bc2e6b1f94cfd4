import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { validateAnalysisPlan } from "../plans/plan.schema.js";
import { PlanHypothesisGenerator } from "./planHypothesisGenerator.js";

describe("PlanHypothesisGenerator", () => {
  const plan = validateAnalysisPlan({
    tasks: [
      { id: "t1", hypotheses: [{ id: "h1", hypothesis: "Creative fatigue", driver: "creative_fatigue" }] },
      { id: "t2" },
    ],
  });
  const generator = new PlanHypothesisGenerator(plan);

  it("should return the hypotheses listed for the task", async () => {
    const outcome = await generator.generate(plan.tasks[0] ?? assert.fail("missing task"));

    assert.ok(outcome.ok);
    assert.deepEqual(
      outcome.value.map((h) => h.id),
      ["h1"],
    );
  });

  it("should return an empty list for a task without hypotheses", async () => {
    const outcome = await generator.generate(plan.tasks[1] ?? assert.fail("missing task"));

    assert.deepEqual(outcome, { ok: true, value: [] });
  });

  it("should return an empty list for a task unknown to the plan", async () => {
    const outcome = await generator.generate({
      id: "other",
      name: "other",
      type: "metric_check",
      target: "ctr",
      scope: "all",
      priority: 1,
      depends_on: [],
    });

    assert.deepEqual(outcome, { ok: true, value: [] });
  });
});
