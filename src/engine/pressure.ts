import { EngineError, EngineResult, captureEngineError, requireFinite } from "./errors.js";

export const SEA_LEVEL_PRESSURE_PA = 101325;
export const MIN_ALTITUDE_M = -5000;
export const MAX_ALTITUDE_M = 11000;

/**
 * Standard-atmosphere static pressure at a geopotential altitude
 * (ASHRAE Handbook Fundamentals, ch. 1, eq. 3).
 */
export function standardAtmosphericPressure(altitudeM: number): number {
  requireFinite(altitudeM, "altitude_m");
  if (altitudeM < MIN_ALTITUDE_M || altitudeM > MAX_ALTITUDE_M) {
    throw new EngineError(
      "AltitudeOutOfRange",
      `altitude ${altitudeM} m is outside [${MIN_ALTITUDE_M}, ${MAX_ALTITUDE_M}] m`,
      "altitude_m"
    );
  }
  return SEA_LEVEL_PRESSURE_PA * Math.pow(1 - 2.25577e-5 * altitudeM, 5.2559);
}

export function pressureFromAltitude(altitudeM: number): EngineResult<number> {
  return captureEngineError(() => standardAtmosphericPressure(altitudeM));
}
