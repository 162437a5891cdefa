import { MoistAirState } from "../types.js";
import { EngineError, requireFinite } from "./errors.js";
import { dewPointTemperature } from "./dewPoint.js";
import {
  humidityRatioFloor,
  humidityRatioFromVaporPressure,
  humidityRatioFromWetBulb,
  saturationBelowBoiling,
  vaporPressureFromHumidityRatio
} from "./humidity.js";
import { DEFAULT_SOLVER_OPTIONS, SolverOptions } from "./options.js";
import { wetBulbTemperature } from "./wetBulb.js";

const DRY_AIR_GAS_CONSTANT = 287.042; // J/(kg·K)
const ZERO_CELSIUS_K = 273.15;

/** Moist-air enthalpy, J per kg of dry air. */
export function moistAirEnthalpy(dryBulbC: number, humidityRatio: number): number {
  return (1.006 * dryBulbC + humidityRatio * (2501 + 1.86 * dryBulbC)) * 1000;
}

export function dryAirEnthalpy(dryBulbC: number): number {
  return 1006 * dryBulbC;
}

/** Moist-air specific volume, m³ per kg of dry air. */
export function moistAirVolume(dryBulbC: number, humidityRatio: number, pressurePa: number): number {
  return (DRY_AIR_GAS_CONSTANT * (dryBulbC + ZERO_CELSIUS_K) * (1 + 1.607858 * humidityRatio)) / pressurePa;
}

/**
 * Full moist-air state from a dry-bulb / wet-bulb pair. Every value is
 * derived from the single humidity ratio the wet bulb implies.
 */
export function moistAirProperties(
  dryBulbC: number,
  wetBulbC: number,
  pressurePa: number,
  options: SolverOptions = DEFAULT_SOLVER_OPTIONS
): MoistAirState {
  requireFinite(wetBulbC, "wet_bulb_c");
  const pws = saturationBelowBoiling(dryBulbC, pressurePa);
  if (wetBulbC > dryBulbC) {
    throw new EngineError(
      "InvalidInput",
      `wet bulb ${wetBulbC} °C is above dry bulb ${dryBulbC} °C`,
      "wet_bulb_c"
    );
  }

  const saturationRatio = humidityRatioFromVaporPressure(pws, pressurePa);
  const humidityRatio = Math.max(
    humidityRatioFromWetBulb(dryBulbC, wetBulbC, pressurePa),
    humidityRatioFloor(saturationRatio)
  );
  const vaporPressure = vaporPressureFromHumidityRatio(humidityRatio, pressurePa);
  // saturated: dew point and wet bulb coincide with the dry bulb
  const dewPoint =
    wetBulbC === dryBulbC ? dryBulbC : Math.min(dewPointTemperature(vaporPressure, options), wetBulbC);
  const specificVolume = moistAirVolume(dryBulbC, humidityRatio, pressurePa);

  return Object.freeze({
    dry_bulb_c: dryBulbC,
    pressure_pa: pressurePa,
    humidity_ratio: humidityRatio,
    wet_bulb_c: wetBulbC,
    dew_point_c: dewPoint,
    relative_humidity_pct: (vaporPressure / pws) * 100,
    vapor_pressure_pa: vaporPressure,
    enthalpy_j_per_kg: moistAirEnthalpy(dryBulbC, humidityRatio),
    dry_air_enthalpy_j_per_kg: dryAirEnthalpy(dryBulbC),
    specific_volume_m3_per_kg: specificVolume,
    density_kg_m3: (1 + humidityRatio) / specificVolume,
    degree_of_saturation: humidityRatio / saturationRatio
  });
}

export function moistAirStateFromReading(
  dryBulbC: number,
  relativeHumidityPct: number,
  pressurePa: number,
  options: SolverOptions = DEFAULT_SOLVER_OPTIONS
): MoistAirState {
  const wetBulb = wetBulbTemperature(dryBulbC, relativeHumidityPct, pressurePa, options);
  return moistAirProperties(dryBulbC, wetBulb, pressurePa, options);
}
