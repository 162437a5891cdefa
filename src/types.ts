export interface StationReading {
  dry_bulb_c: number;
  relative_humidity_pct: number;
  co2_ppm: number;
}

export interface ProcessGeometry {
  altitude_m: number;
  airflow_lps: number;
  resin_diameter_mm: number;
  resin_mass_kg: number;
  resin_density_kgm3: number;
  chamber_diameter_mm: number;
}

export interface ProcessInput {
  geometry: ProcessGeometry;
  inlet: StationReading;
  outlet: StationReading;
}

/** Moist-air state at one station. Mass-specific values are per kg of dry air. */
export interface MoistAirState {
  readonly dry_bulb_c: number;
  readonly pressure_pa: number;
  readonly humidity_ratio: number;
  readonly wet_bulb_c: number;
  readonly dew_point_c: number;
  readonly relative_humidity_pct: number;
  readonly vapor_pressure_pa: number;
  readonly enthalpy_j_per_kg: number;
  readonly dry_air_enthalpy_j_per_kg: number;
  readonly specific_volume_m3_per_kg: number;
  readonly density_kg_m3: number;
  readonly degree_of_saturation: number;
}

export interface DerivedGeometry {
  readonly airflow_m3_s: number;
  readonly chamber_area_m2: number;
  readonly gas_velocity_m_s: number;
  readonly bead_surface_area_m2: number;
  readonly bead_volume_m3: number;
  readonly resin_volume_m3: number;
  /** Uniform-sphere estimate (resin volume / bead volume), not a measured count. */
  readonly estimated_bead_count: number;
  readonly total_surface_area_m2: number;
}

export type Co2Classification = "Release" | "Capture" | "NoChange";

export interface Balance {
  readonly mass_flow_kg_s: number;
  readonly energy_flux_inlet_w: number;
  readonly energy_flux_outlet_w: number;
  // ppm × L/s; see DESIGN.md on units
  readonly co2_flow_inlet: number;
  readonly co2_flow_outlet: number;
  readonly co2_change: number;
  readonly co2_classification: Co2Classification;
}

export interface StationSnapshot {
  readonly reading: Readonly<StationReading>;
  readonly state: MoistAirState;
}

/** Outlet minus inlet for every state field, plus the two measured-only quantities. */
export type StateDeltas = { readonly [K in keyof MoistAirState]: number } & {
  readonly measured_relative_humidity_pct: number;
  readonly co2_ppm: number;
};

export interface ComparisonReport {
  readonly pressure_pa: number;
  readonly process: Readonly<ProcessGeometry>;
  readonly inlet: StationSnapshot;
  readonly outlet: StationSnapshot;
  readonly geometry: DerivedGeometry;
  readonly balance: Balance;
  readonly deltas: StateDeltas;
}
