import { EngineError, requireFinite } from "./errors.js";
import { humidityRatioFromVaporPressure, humidityRatioFromWetBulb, saturationBelowBoiling } from "./humidity.js";
import { DEFAULT_SOLVER_OPTIONS, SolverOptions } from "./options.js";
import { MIN_TEMPERATURE_C } from "./saturation.js";
import { bisect } from "./solver.js";

/** Wet-bulb iteration runs until W is within this fraction of W_sat(T_db). */
export const RELATIVE_HUMIDITY_RATIO_TOLERANCE = 1e-5;

export function requireRelativeHumidity(relativeHumidityPct: number): number {
  requireFinite(relativeHumidityPct, "relative_humidity_pct");
  if (relativeHumidityPct < 0 || relativeHumidityPct > 100) {
    throw new EngineError(
      "InvalidInput",
      `relative humidity must be within [0, 100] %, got ${relativeHumidityPct}`,
      "relative_humidity_pct"
    );
  }
  return relativeHumidityPct;
}

/**
 * Thermodynamic wet-bulb temperature from dry bulb and relative humidity.
 *
 * The bracket runs from the bottom of the saturation correlation up to the
 * dry bulb. The humidity-ratio residual is scaled by W_sat(T_db) so cold,
 * nearly dry air is solved to the same relative precision as warm air.
 */
export function wetBulbTemperature(
  dryBulbC: number,
  relativeHumidityPct: number,
  pressurePa: number,
  options: SolverOptions = DEFAULT_SOLVER_OPTIONS
): number {
  requireRelativeHumidity(relativeHumidityPct);
  const pws = saturationBelowBoiling(dryBulbC, pressurePa);
  if (relativeHumidityPct === 100) return dryBulbC;

  const target = humidityRatioFromVaporPressure((relativeHumidityPct / 100) * pws, pressurePa);
  const residual = (t: number) => humidityRatioFromWetBulb(dryBulbC, t, pressurePa) - target;

  if (residual(MIN_TEMPERATURE_C) > 0) {
    throw new EngineError(
      "TemperatureOutOfRange",
      `wet bulb for ${dryBulbC} °C / ${relativeHumidityPct} % lies below ${MIN_TEMPERATURE_C} °C`,
      "wet_bulb_c"
    );
  }

  const { root } = bisect(residual, MIN_TEMPERATURE_C, dryBulbC, options, {
    label: `wet bulb for ${dryBulbC} °C / ${relativeHumidityPct} %`,
    field: "wet_bulb_c",
    residualTolerance: RELATIVE_HUMIDITY_RATIO_TOLERANCE * humidityRatioFromVaporPressure(pws, pressurePa)
  });
  return root;
}
