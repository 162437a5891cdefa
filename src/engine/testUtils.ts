import assert from "node:assert/strict";

export function assertClose(actual: number, expected: number, tolerance: number, label = "value") {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `${label}: expected ${expected} ± ${tolerance}, got ${actual}`
  );
}
