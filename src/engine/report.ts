import {
  ComparisonReport,
  MoistAirState,
  ProcessGeometry,
  StateDeltas,
  StationReading,
  StationSnapshot
} from "../types.js";
import { computeBalance, requireCo2Concentration } from "./balance.js";
import { EngineResult, captureEngineError, withFieldPrefix } from "./errors.js";
import { deriveGeometry } from "./geometry.js";
import { moistAirStateFromReading } from "./moistAir.js";
import { DEFAULT_SOLVER_OPTIONS, SolverOptions } from "./options.js";
import { standardAtmosphericPressure } from "./pressure.js";

function snapshotStation(reading: StationReading, pressurePa: number, options: SolverOptions): StationSnapshot {
  requireCo2Concentration(reading.co2_ppm);
  const state = moistAirStateFromReading(reading.dry_bulb_c, reading.relative_humidity_pct, pressurePa, options);
  return Object.freeze({ reading: Object.freeze({ ...reading }), state });
}

function stateDeltas(inlet: StationSnapshot, outlet: StationSnapshot): StateDeltas {
  const delta = (key: keyof MoistAirState) => outlet.state[key] - inlet.state[key];
  return Object.freeze({
    dry_bulb_c: delta("dry_bulb_c"),
    pressure_pa: delta("pressure_pa"),
    humidity_ratio: delta("humidity_ratio"),
    wet_bulb_c: delta("wet_bulb_c"),
    dew_point_c: delta("dew_point_c"),
    relative_humidity_pct: delta("relative_humidity_pct"),
    vapor_pressure_pa: delta("vapor_pressure_pa"),
    enthalpy_j_per_kg: delta("enthalpy_j_per_kg"),
    dry_air_enthalpy_j_per_kg: delta("dry_air_enthalpy_j_per_kg"),
    specific_volume_m3_per_kg: delta("specific_volume_m3_per_kg"),
    density_kg_m3: delta("density_kg_m3"),
    degree_of_saturation: delta("degree_of_saturation"),
    measured_relative_humidity_pct: outlet.reading.relative_humidity_pct - inlet.reading.relative_humidity_pct,
    co2_ppm: outlet.reading.co2_ppm - inlet.reading.co2_ppm
  });
}

/**
 * Inlet/outlet comparison for one process snapshot. The first failing step
 * aborts the whole report; its error field is qualified with the section
 * (`geometry.`, `inlet.`, `outlet.`) it came from.
 */
export function buildReport(
  inlet: StationReading,
  outlet: StationReading,
  geometry: ProcessGeometry,
  options: SolverOptions = DEFAULT_SOLVER_OPTIONS
): EngineResult<ComparisonReport> {
  return captureEngineError(() => {
    const pressurePa = withFieldPrefix("geometry", () => standardAtmosphericPressure(geometry.altitude_m));
    const derived = withFieldPrefix("geometry", () => deriveGeometry(geometry));

    const inletSnapshot = withFieldPrefix("inlet", () => snapshotStation(inlet, pressurePa, options));
    const outletSnapshot = withFieldPrefix("outlet", () => snapshotStation(outlet, pressurePa, options));

    const balance = computeBalance({
      inlet: { state: inletSnapshot.state, co2_ppm: inlet.co2_ppm },
      outlet: { state: outletSnapshot.state, co2_ppm: outlet.co2_ppm },
      airflowLps: geometry.airflow_lps
    });

    return Object.freeze({
      pressure_pa: pressurePa,
      process: Object.freeze({ ...geometry }),
      inlet: inletSnapshot,
      outlet: outletSnapshot,
      geometry: derived,
      balance,
      deltas: stateDeltas(inletSnapshot, outletSnapshot)
    });
  });
}
