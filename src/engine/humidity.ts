import { EngineError, requirePositive } from "./errors.js";
import { saturationVaporPressure } from "./saturation.js";

/** Ratio of the molecular masses of water and dry air. */
export const MOLECULAR_MASS_RATIO = 0.621945;

/** Floor applied to humidity ratios so bone-dry air still has a dew point. */
const MIN_HUMIDITY_RATIO = 1e-7;

/** Cap on the floor as a fraction of saturation (0.01 % RH). */
const MAX_FLOOR_SATURATION_FRACTION = 1e-4;

/** Lowest humidity ratio reported at a given saturation humidity ratio. */
export function humidityRatioFloor(saturationHumidityRatio: number): number {
  return Math.min(MIN_HUMIDITY_RATIO, MAX_FLOOR_SATURATION_FRACTION * saturationHumidityRatio);
}

export function humidityRatioFromVaporPressure(vaporPressurePa: number, pressurePa: number): number {
  return (MOLECULAR_MASS_RATIO * vaporPressurePa) / (pressurePa - vaporPressurePa);
}

export function vaporPressureFromHumidityRatio(humidityRatio: number, pressurePa: number): number {
  return (pressurePa * humidityRatio) / (MOLECULAR_MASS_RATIO + humidityRatio);
}

/**
 * Checks the pressure is usable and that water at `temperatureC` is below its
 * boiling point there; returns the saturation vapour pressure.
 */
export function saturationBelowBoiling(temperatureC: number, pressurePa: number, field = "dry_bulb_c"): number {
  requirePositive(pressurePa, "pressure_pa");
  const pws = saturationVaporPressure(temperatureC, field);
  if (pws >= pressurePa) {
    throw new EngineError(
      "InvalidInput",
      `${temperatureC} °C is at or above the boiling point at ${pressurePa.toFixed(0)} Pa`,
      field
    );
  }
  return pws;
}

export function saturationHumidityRatio(temperatureC: number, pressurePa: number): number {
  return humidityRatioFromVaporPressure(saturationBelowBoiling(temperatureC, pressurePa), pressurePa);
}

/**
 * Humidity ratio implied by a psychrometer reading: the adiabatic-saturation
 * energy balance between dry air, the evaporated water and saturated air at
 * the wet-bulb temperature. Uses the ice form of the balance below 0 °C.
 * Not floored; may be negative for wet bulbs below the true one.
 */
export function humidityRatioFromWetBulb(dryBulbC: number, wetBulbC: number, pressurePa: number): number {
  const wsStar = humidityRatioFromVaporPressure(saturationBelowBoiling(wetBulbC, pressurePa, "wet_bulb_c"), pressurePa);
  if (wetBulbC >= 0) {
    return (
      ((2501 - 2.326 * wetBulbC) * wsStar - 1.006 * (dryBulbC - wetBulbC)) /
      (2501 + 1.86 * dryBulbC - 4.186 * wetBulbC)
    );
  }
  return (
    ((2830 - 0.24 * wetBulbC) * wsStar - 1.006 * (dryBulbC - wetBulbC)) /
    (2830 + 1.86 * dryBulbC - 2.1 * wetBulbC)
  );
}
