import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadAnalysisPlan } from "./planLoader.js";
import { PlanValidationError } from "./plan.schema.js";

const EXAMPLE_PLAN = path.resolve(import.meta.dirname, "example-plan.yaml");

describe("loadAnalysisPlan", () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "analysis-plan-"));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should load the bundled example plan", () => {
    const plan = loadAnalysisPlan(EXAMPLE_PLAN);

    assert.equal(plan.query, "Why did CTR drop over the last two weeks?");
    assert.deepEqual(
      plan.tasks.map((t) => [t.id, t.scope, t.priority]),
      [
        ["ctr_trend", "all", 1],
        ["spring_sale_ctr", "Spring Sale", 2],
        ["evergreen_ctr", "Evergreen Brand", 3],
      ],
    );
    assert.deepEqual(
      plan.hypothesesByTask.get("spring_sale_ctr")?.map((h) => h.id),
      ["spring_sale_ctr-h1", "spring_sale_ctr-h2"],
    );
  });

  it("should throw when the file does not exist", () => {
    assert.throws(() => loadAnalysisPlan(path.join(dir, "missing.yaml")), PlanValidationError);
  });

  it("should surface validation errors from the file", () => {
    const file = path.join(dir, "bad.yaml");
    fs.writeFileSync(file, "tasks:\n  - id: a\n  - id: a\n");

    assert.throws(() => loadAnalysisPlan(file), /Duplicate task id/);
  });
});
