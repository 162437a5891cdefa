import { EngineError } from "./errors.js";
import { DEFAULT_SOLVER_OPTIONS, SolverOptions } from "./options.js";
import { MAX_TEMPERATURE_C, MIN_TEMPERATURE_C, saturationVaporPressure } from "./saturation.js";
import { bisect } from "./solver.js";

/**
 * Temperature at which `vaporPressurePa` is the saturation pressure.
 * Bisects on ln(p_ws) since it is close to linear in temperature.
 */
export function dewPointTemperature(vaporPressurePa: number, options: SolverOptions = DEFAULT_SOLVER_OPTIONS): number {
  if (!Number.isFinite(vaporPressurePa) || vaporPressurePa <= 0) {
    throw new EngineError(
      "InvalidInput",
      `vapour pressure must be a positive number, got ${vaporPressurePa}`,
      "vapor_pressure_pa"
    );
  }

  const lowest = saturationVaporPressure(MIN_TEMPERATURE_C, "dew_point_c");
  const highest = saturationVaporPressure(MAX_TEMPERATURE_C, "dew_point_c");
  if (vaporPressurePa < lowest || vaporPressurePa > highest) {
    throw new EngineError(
      "TemperatureOutOfRange",
      `dew point for ${vaporPressurePa} Pa lies outside [${MIN_TEMPERATURE_C}, ${MAX_TEMPERATURE_C}] °C`,
      "dew_point_c"
    );
  }

  const lnTarget = Math.log(vaporPressurePa);
  const { root } = bisect(
    (t) => Math.log(saturationVaporPressure(t, "dew_point_c")) - lnTarget,
    MIN_TEMPERATURE_C,
    MAX_TEMPERATURE_C,
    options,
    { label: `dew point for ${vaporPressurePa} Pa`, field: "dew_point_c" }
  );
  return root;
}
