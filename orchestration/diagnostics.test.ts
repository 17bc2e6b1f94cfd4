import { describe, it } from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import { createLoggerDiagnostics, createMemoryDiagnostics, silentDiagnostics } from "./diagnostics.js";

describe("createLoggerDiagnostics", () => {
  it("should forward events to the logger with component and event type", () => {
    const lines: string[] = [];
    const log = pino({ level: "debug" }, { write: (line: string) => { lines.push(line); } });

    createLoggerDiagnostics(log).warn("scheduler", "cycle_detected", "Dependency cycle", { taskId: "B" });

    assert.equal(lines.length, 1);
    const entry: unknown = JSON.parse(lines[0] ?? "{}");
    assert.ok(entry !== null && typeof entry === "object");
    assert.equal(Reflect.get(entry, "level"), 40);
    assert.equal(Reflect.get(entry, "component"), "scheduler");
    assert.equal(Reflect.get(entry, "eventType"), "cycle_detected");
    assert.equal(Reflect.get(entry, "taskId"), "B");
    assert.equal(Reflect.get(entry, "msg"), "Dependency cycle");
  });
});

describe("createMemoryDiagnostics", () => {
  it("should keep events in order and filter by type", () => {
    const diagnostics = createMemoryDiagnostics();

    diagnostics.info("executor", "run:start", "start");
    diagnostics.error("evaluator", "hypothesis:failed", "boom", { hypothesisId: "h1" });
    diagnostics.info("executor", "run:start", "again");

    assert.equal(diagnostics.events.length, 3);
    assert.deepEqual(diagnostics.eventsOfType("hypothesis:failed"), [
      {
        level: "error",
        component: "evaluator",
        eventType: "hypothesis:failed",
        message: "boom",
        metadata: { hypothesisId: "h1" },
      },
    ]);
    assert.equal(diagnostics.eventsOfType("run:start").length, 2);
  });
});

describe("silentDiagnostics", () => {
  it("should accept events without side effects", () => {
    assert.doesNotThrow(() => silentDiagnostics.error("x", "y", "z"));
  });
});
