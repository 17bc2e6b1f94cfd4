import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { MEMORY_DATABASE, openDatabase } from "./db.js";
import { cleanupOldRunEvents, emitRunEvent, getRunEvents } from "./runEvents.js";

describe("runEvents", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(MEMORY_DATABASE);
  });

  afterEach(() => {
    db.close();
  });

  describe("emitRunEvent", () => {
    it("should insert an event and return the id", () => {
      const id = emitRunEvent(db, {
        traceId: "run-001",
        component: "executor",
        eventType: "run:start",
        message: "Pipeline started",
      });

      assert.equal(typeof id, "number");
      assert.ok(id > 0);
    });

    it("should store all fields correctly", () => {
      emitRunEvent(db, {
        traceId: "run-002",
        component: "scheduler",
        eventType: "cycle_detected",
        message: "Dependency cycle",
        metadata: { taskId: "B", dependsOn: "A" },
        level: "warn",
      });

      const [row] = getRunEvents(db, "run-002");
      assert.ok(row);
      assert.equal(row.component, "scheduler");
      assert.equal(row.event_type, "cycle_detected");
      assert.equal(row.message, "Dependency cycle");
      assert.equal(row.level, "warn");
      assert.deepEqual(JSON.parse(row.metadata ?? "null"), { taskId: "B", dependsOn: "A" });
    });

    it("should default level to info and metadata to null", () => {
      emitRunEvent(db, { traceId: "run-003", component: "evaluator", eventType: "x", message: "y" });

      const [row] = getRunEvents(db, "run-003");
      assert.equal(row?.level, "info");
      assert.equal(row?.metadata, null);
    });
  });

  describe("getRunEvents", () => {
    it("should return only the trace's events in insertion order", () => {
      emitRunEvent(db, { traceId: "a", component: "c", eventType: "first", message: "1" });
      emitRunEvent(db, { traceId: "b", component: "c", eventType: "other", message: "2" });
      emitRunEvent(db, { traceId: "a", component: "c", eventType: "second", message: "3" });

      assert.deepEqual(
        getRunEvents(db, "a").map((e) => e.event_type),
        ["first", "second"],
      );
    });

    it("should filter by minimum level", () => {
      emitRunEvent(db, { traceId: "a", component: "c", eventType: "d", message: "1", level: "debug" });
      emitRunEvent(db, { traceId: "a", component: "c", eventType: "i", message: "2", level: "info" });
      emitRunEvent(db, { traceId: "a", component: "c", eventType: "w", message: "3", level: "warn" });
      emitRunEvent(db, { traceId: "a", component: "c", eventType: "e", message: "4", level: "error" });

      assert.deepEqual(
        getRunEvents(db, "a", { minLevel: "warn" }).map((e) => e.event_type),
        ["w", "e"],
      );
    });
  });

  describe("cleanupOldRunEvents", () => {
    it("should delete events older than the retention window", () => {
      emitRunEvent(db, { traceId: "old", component: "c", eventType: "e", message: "m" });
      emitRunEvent(db, { traceId: "new", component: "c", eventType: "e", message: "m" });
      db.prepare("UPDATE run_events SET created_at = '2000-01-01T00:00:00.000Z' WHERE trace_id = 'old'").run();

      const removed = cleanupOldRunEvents(db, 30);

      assert.equal(removed, 1);
      assert.equal(getRunEvents(db, "old").length, 0);
      assert.equal(getRunEvents(db, "new").length, 1);
    });
  });
});
