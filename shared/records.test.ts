import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { isRecord, readKey } from "./records.js";

describe("isRecord", () => {
  it("should accept plain objects only", () => {
    assert.equal(isRecord({ a: 1 }), true);
    assert.equal(isRecord([]), false);
    assert.equal(isRecord(null), false);
    assert.equal(isRecord("text"), false);
  });
});

describe("readKey", () => {
  it("should prefer the snake_case key and fall back to camelCase", () => {
    assert.equal(readKey({ out_dir: "a", outDir: "b" }, "out_dir", "outDir"), "a");
    assert.equal(readKey({ outDir: "b" }, "out_dir", "outDir"), "b");
    assert.equal(readKey({}, "out_dir", "outDir"), undefined);
    assert.equal(readKey({ outDir: "b" }, "out_dir"), undefined);
  });
});
