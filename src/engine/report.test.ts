import assert from "node:assert/strict";
import { test } from "node:test";
import { ProcessGeometry, StationReading } from "../types.js";
import { buildReport } from "./report.js";
import { resolveSolverOptions } from "./options.js";
import { assertClose } from "./testUtils.js";

const geometry: ProcessGeometry = {
  altitude_m: 0,
  airflow_lps: 50,
  resin_diameter_mm: 1,
  resin_mass_kg: 1,
  resin_density_kgm3: 1000,
  chamber_diameter_mm: 100
};
const inlet: StationReading = { dry_bulb_c: 25, relative_humidity_pct: 50, co2_ppm: 400 };
const outlet: StationReading = { dry_bulb_c: 22, relative_humidity_pct: 60, co2_ppm: 380 };

test("a full report is assembled from two readings and the geometry", () => {
  const result = buildReport(inlet, outlet, geometry);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  const report = result.value;

  assert.equal(report.pressure_pa, 101325);
  assert.deepEqual(report.process, geometry);
  assert.deepEqual(report.inlet.reading, inlet);

  assertClose(report.inlet.state.wet_bulb_c, 17.889, 0.001, "inlet wet bulb");
  assertClose(report.outlet.state.wet_bulb_c, 16.874, 0.001, "outlet wet bulb");
  assertClose(report.outlet.state.density_kg_m3, 1.18891, 1e-5, "outlet density");

  assertClose(report.balance.mass_flow_kg_s, 0.0594456, 1e-6, "mass flow");
  assertClose(report.balance.energy_flux_inlet_w, 2991.42, 0.05, "inlet energy flux");
  assertClose(report.balance.energy_flux_outlet_w, 2810.89, 0.05, "outlet energy flux");
  assert.equal(report.balance.co2_flow_inlet, 20_000);
  assert.equal(report.balance.co2_flow_outlet, 19_000);
  assert.equal(report.balance.co2_change, -1000);
  assert.equal(report.balance.co2_classification, "Capture");

  assertClose(report.geometry.gas_velocity_m_s, 6.3662, 1e-4, "gas velocity");
});

test("deltas are outlet minus inlet for every state field", () => {
  const result = buildReport(inlet, outlet, geometry);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  const { deltas, inlet: i, outlet: o } = result.value;

  assert.equal(deltas.dry_bulb_c, -3);
  assert.equal(deltas.pressure_pa, 0);
  assert.equal(deltas.co2_ppm, -20);
  assert.equal(deltas.measured_relative_humidity_pct, 10);
  assert.equal(deltas.humidity_ratio, o.state.humidity_ratio - i.state.humidity_ratio);
  assert.equal(deltas.wet_bulb_c, o.state.wet_bulb_c - i.state.wet_bulb_c);
  assert.equal(deltas.dew_point_c, o.state.dew_point_c - i.state.dew_point_c);
  assert.equal(deltas.relative_humidity_pct, o.state.relative_humidity_pct - i.state.relative_humidity_pct);
  assert.equal(deltas.vapor_pressure_pa, o.state.vapor_pressure_pa - i.state.vapor_pressure_pa);
  assert.equal(deltas.enthalpy_j_per_kg, o.state.enthalpy_j_per_kg - i.state.enthalpy_j_per_kg);
  assert.equal(deltas.dry_air_enthalpy_j_per_kg, o.state.dry_air_enthalpy_j_per_kg - i.state.dry_air_enthalpy_j_per_kg);
  assert.equal(deltas.specific_volume_m3_per_kg, o.state.specific_volume_m3_per_kg - i.state.specific_volume_m3_per_kg);
  assert.equal(deltas.density_kg_m3, o.state.density_kg_m3 - i.state.density_kg_m3);
  assert.equal(deltas.degree_of_saturation, o.state.degree_of_saturation - i.state.degree_of_saturation);
});

test("altitude drives the shared station pressure", () => {
  const result = buildReport(inlet, outlet, { ...geometry, altitude_m: 1500 });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assertClose(result.value.pressure_pa, 84555.9, 0.1, "pressure");
  assert.equal(result.value.inlet.state.pressure_pa, result.value.pressure_pa);
  assert.equal(result.value.outlet.state.pressure_pa, result.value.pressure_pa);
});

test("errors name the section and field they came from", () => {
  const cases: [Parameters<typeof buildReport>, string, string][] = [
    [[inlet, outlet, { ...geometry, altitude_m: 12_000 }], "AltitudeOutOfRange", "geometry.altitude_m"],
    [[inlet, outlet, { ...geometry, resin_density_kgm3: 0 }], "InvalidInput", "geometry.resin_density_kgm3"],
    [[{ ...inlet, relative_humidity_pct: 120 }, outlet, geometry], "InvalidInput", "inlet.relative_humidity_pct"],
    [[inlet, { ...outlet, dry_bulb_c: 250 }, geometry], "TemperatureOutOfRange", "outlet.dry_bulb_c"],
    [[inlet, { ...outlet, co2_ppm: -1 }, geometry], "InvalidInput", "outlet.co2_ppm"],
    [[{ ...inlet, dry_bulb_c: -90, relative_humidity_pct: 10 }, outlet, geometry], "TemperatureOutOfRange", "inlet.dew_point_c"]
  ];

  for (const [args, kind, field] of cases) {
    const result = buildReport(...args);
    assert.equal(result.ok, false, field);
    if (result.ok) continue;
    assert.equal(result.error.kind, kind, field);
    assert.equal(result.error.field, field);
  }
});

test("the first failing section wins", () => {
  const result = buildReport({ ...inlet, relative_humidity_pct: -1 }, { ...outlet, relative_humidity_pct: 101 }, geometry);
  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.field, "inlet.relative_humidity_pct");
});

test("solver failures surface as convergence failures, not partial reports", () => {
  const result = buildReport(inlet, outlet, geometry, resolveSolverOptions({ maxIterations: 2 }));
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error.kind, "ConvergenceFailure");
  assert.equal(result.error.field, "inlet.wet_bulb_c");
});

test("the report is immutable", () => {
  const result = buildReport(inlet, outlet, geometry);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.ok(Object.isFrozen(result.value));
  assert.ok(Object.isFrozen(result.value.inlet.state));
  assert.ok(Object.isFrozen(result.value.balance));
  assert.ok(Object.isFrozen(result.value.deltas));
});
