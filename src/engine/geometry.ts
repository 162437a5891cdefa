import { DerivedGeometry, ProcessGeometry } from "../types.js";
import { requirePositive } from "./errors.js";

/**
 * Chamber and resin-bed figures. The bead count treats the bed as identical
 * spheres of the nominal diameter filling the resin volume exactly.
 */
export function deriveGeometry(process: ProcessGeometry): DerivedGeometry {
  const airflowLps = requirePositive(process.airflow_lps, "airflow_lps");
  const chamberDiameterMm = requirePositive(process.chamber_diameter_mm, "chamber_diameter_mm");
  const resinDiameterMm = requirePositive(process.resin_diameter_mm, "resin_diameter_mm");
  const resinMassKg = requirePositive(process.resin_mass_kg, "resin_mass_kg");
  const resinDensity = requirePositive(process.resin_density_kgm3, "resin_density_kgm3");

  const airflowM3s = airflowLps / 1000;
  const chamberRadiusM = chamberDiameterMm / 2000;
  const chamberArea = Math.PI * chamberRadiusM * chamberRadiusM;

  const beadDiameterM = resinDiameterMm / 1000;
  const beadRadiusM = beadDiameterM / 2;
  const beadSurface = Math.PI * beadDiameterM * beadDiameterM;
  const beadVolume = (4 / 3) * Math.PI * Math.pow(beadRadiusM, 3);

  const resinVolume = resinMassKg / resinDensity;
  const beadCount = resinVolume / beadVolume;

  return Object.freeze({
    airflow_m3_s: airflowM3s,
    chamber_area_m2: chamberArea,
    gas_velocity_m_s: airflowM3s / chamberArea,
    bead_surface_area_m2: beadSurface,
    bead_volume_m3: beadVolume,
    resin_volume_m3: resinVolume,
    estimated_bead_count: beadCount,
    total_surface_area_m2: beadCount * beadSurface
  });
}
