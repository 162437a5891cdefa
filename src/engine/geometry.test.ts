import assert from "node:assert/strict";
import { test } from "node:test";
import { ProcessGeometry } from "../types.js";
import { EngineError } from "./errors.js";
import { deriveGeometry } from "./geometry.js";
import { assertClose } from "./testUtils.js";

const baseGeometry: ProcessGeometry = {
  altitude_m: 0,
  airflow_lps: 50,
  resin_diameter_mm: 1,
  resin_mass_kg: 1,
  resin_density_kgm3: 1000,
  chamber_diameter_mm: 100
};

test("resin volume and bead count follow the uniform-sphere estimate", () => {
  const derived = deriveGeometry(baseGeometry);
  const beadVolume = (4 / 3) * Math.PI * Math.pow(0.0005, 3);

  assertClose(derived.resin_volume_m3, 0.001, 1e-15, "resin volume");
  assertClose(derived.bead_volume_m3, beadVolume, 1e-20, "bead volume");
  assertClose(derived.estimated_bead_count, 0.001 / beadVolume, 1e-6, "bead count");
  assertClose(derived.bead_surface_area_m2, Math.PI * 1e-6, 1e-18, "bead surface");
  // count × π d² = 6 V / d for spheres
  assertClose(derived.total_surface_area_m2, 6, 1e-9, "total surface");
});

test("chamber area and gas velocity use SI units", () => {
  const derived = deriveGeometry(baseGeometry);
  assert.equal(derived.airflow_m3_s, 0.05);
  assertClose(derived.chamber_area_m2, Math.PI * 0.0025, 1e-15, "chamber area");
  assertClose(derived.gas_velocity_m_s, 6.3662, 1e-4, "gas velocity");
});

test("non-positive geometry is rejected with the field name", () => {
  const cases: [keyof ProcessGeometry, number][] = [
    ["resin_density_kgm3", 0],
    ["resin_mass_kg", -1],
    ["resin_diameter_mm", 0],
    ["chamber_diameter_mm", -20],
    ["airflow_lps", 0],
    ["resin_mass_kg", Number.NaN]
  ];
  for (const [field, value] of cases) {
    assert.throws(
      () => deriveGeometry({ ...baseGeometry, [field]: value }),
      (e: unknown) => e instanceof EngineError && e.kind === "InvalidInput" && e.field === field,
      `${field} = ${value}`
    );
  }
});
