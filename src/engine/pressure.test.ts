import assert from "node:assert/strict";
import { test } from "node:test";
import { pressureFromAltitude, standardAtmosphericPressure } from "./pressure.js";
import { assertClose } from "./testUtils.js";

test("sea level is the standard reference pressure", () => {
  const result = pressureFromAltitude(0);
  assert.equal(result.ok, true);
  if (result.ok) assertClose(result.value, 101325, 1, "pressure at 0 m");
});

test("pressure falls with altitude", () => {
  // ASHRAE Fundamentals table 1 lists 84.556 kPa at 1500 m.
  assertClose(standardAtmosphericPressure(1500), 84556, 5, "pressure at 1500 m");
  assert.ok(standardAtmosphericPressure(-500) > 101325);
  assert.ok(standardAtmosphericPressure(11000) < standardAtmosphericPressure(10000));
});

test("range limits are inclusive", () => {
  assert.equal(pressureFromAltitude(-5000).ok, true);
  assert.equal(pressureFromAltitude(11000).ok, true);
});

test("altitudes outside the standard atmosphere are rejected", () => {
  for (const altitude of [-5000.5, 11000.5, 20000, -1e6]) {
    const result = pressureFromAltitude(altitude);
    assert.equal(result.ok, false, `altitude ${altitude}`);
    if (!result.ok) {
      assert.equal(result.error.kind, "AltitudeOutOfRange");
      assert.equal(result.error.field, "altitude_m");
    }
  }
});

test("non-finite altitude is invalid input", () => {
  const result = pressureFromAltitude(Number.NaN);
  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.kind, "InvalidInput");
});
