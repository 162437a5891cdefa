import { EngineError, requireFinite } from "./errors.js";

export const MIN_TEMPERATURE_C = -100;
export const MAX_TEMPERATURE_C = 200;

const ZERO_CELSIUS_K = 273.15;

/**
 * Saturation vapour pressure of water (Pa) over ice below 0 °C and over
 * liquid water from 0 °C up, after Hyland & Wexler as given in the
 * ASHRAE Handbook Fundamentals (ch. 1, eqs. 5 and 6).
 */
export function saturationVaporPressure(temperatureC: number, field = "dry_bulb_c"): number {
  requireFinite(temperatureC, field);
  if (temperatureC < MIN_TEMPERATURE_C || temperatureC > MAX_TEMPERATURE_C) {
    throw new EngineError(
      "TemperatureOutOfRange",
      `temperature ${temperatureC} °C is outside [${MIN_TEMPERATURE_C}, ${MAX_TEMPERATURE_C}] °C`,
      field
    );
  }

  const T = temperatureC + ZERO_CELSIUS_K;
  let lnPws: number;
  if (temperatureC < 0) {
    lnPws =
      -5.6745359e3 / T +
      6.3925247 -
      9.677843e-3 * T +
      6.2215701e-7 * T * T +
      2.0747825e-9 * Math.pow(T, 3) -
      9.484024e-13 * Math.pow(T, 4) +
      4.1635019 * Math.log(T);
  } else {
    lnPws =
      -5.8002206e3 / T +
      1.3914993 -
      4.8640239e-2 * T +
      4.1764768e-5 * T * T -
      1.4452093e-8 * Math.pow(T, 3) +
      6.5459673 * Math.log(T);
  }
  return Math.exp(lnPws);
}
