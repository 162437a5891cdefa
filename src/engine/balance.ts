import { Balance, Co2Classification, MoistAirState } from "../types.js";
import { EngineError, requireFinite, requirePositive } from "./errors.js";

export function classifyCo2Change(change: number): Co2Classification {
  if (change > 0) return "Release";
  if (change < 0) return "Capture";
  return "NoChange";
}

export function requireCo2Concentration(co2Ppm: number): number {
  requireFinite(co2Ppm, "co2_ppm");
  if (co2Ppm < 0) {
    throw new EngineError("InvalidInput", `CO2 concentration cannot be negative, got ${co2Ppm}`, "co2_ppm");
  }
  return co2Ppm;
}

/**
 * CO₂ "flow" as concentration times volumetric airflow. No molar-mass or
 * density correction is applied; see DESIGN.md.
 */
export function co2Flow(co2Ppm: number, airflowLps: number): number {
  return requireCo2Concentration(co2Ppm) * airflowLps;
}

export function computeBalance(params: {
  inlet: { state: MoistAirState; co2_ppm: number };
  outlet: { state: MoistAirState; co2_ppm: number };
  airflowLps: number;
}): Balance {
  const airflowLps = requirePositive(params.airflowLps, "airflow_lps");
  // Mass flow is fixed by the outlet density for both sides.
  const massFlow = params.outlet.state.density_kg_m3 * (airflowLps / 1000);

  const co2FlowInlet = co2Flow(params.inlet.co2_ppm, airflowLps);
  const co2FlowOutlet = co2Flow(params.outlet.co2_ppm, airflowLps);
  const co2Change = co2FlowOutlet - co2FlowInlet;

  return Object.freeze({
    mass_flow_kg_s: massFlow,
    energy_flux_inlet_w: params.inlet.state.enthalpy_j_per_kg * massFlow,
    energy_flux_outlet_w: params.outlet.state.enthalpy_j_per_kg * massFlow,
    co2_flow_inlet: co2FlowInlet,
    co2_flow_outlet: co2FlowOutlet,
    co2_change: co2Change,
    co2_classification: classifyCo2Change(co2Change)
  });
}
