import { z } from "zod";
import { EngineError, EngineResult } from "../engine/errors.js";
import { ProcessInput } from "../types.js";

const NUMERIC_TEXT = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// Spreadsheet exports often carry numbers as text; blanks and words are rejected, never read as 0.
export const NumericCellSchema = z.union(
  [z.number().finite(), z.string().trim().regex(NUMERIC_TEXT).transform(Number)],
  { errorMap: () => ({ message: "expected a numeric value" }) }
);

export const StationReadingSchema = z.object({
  dry_bulb_c: NumericCellSchema,
  relative_humidity_pct: NumericCellSchema,
  co2_ppm: NumericCellSchema
});

export const ProcessGeometrySchema = z.object({
  altitude_m: NumericCellSchema,
  airflow_lps: NumericCellSchema,
  resin_diameter_mm: NumericCellSchema,
  resin_mass_kg: NumericCellSchema,
  resin_density_kgm3: NumericCellSchema,
  chamber_diameter_mm: NumericCellSchema
});

export const ProcessInputSchema = z.object({
  geometry: ProcessGeometrySchema,
  inlet: StationReadingSchema,
  outlet: StationReadingSchema
});

function invalidInput(error: z.ZodError, fallbackField: string): EngineError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : fallbackField;
  return new EngineError("InvalidInput", `${field}: ${issue?.message ?? "invalid value"}`, field);
}

export function parseProcessInput(raw: unknown): EngineResult<ProcessInput> {
  const parsed = ProcessInputSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, error: invalidInput(parsed.error, "input") };
  const value: ProcessInput = parsed.data;
  return { ok: true, value };
}

export function parseAltitude(raw: unknown): EngineResult<number> {
  const parsed = NumericCellSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, error: invalidInput(parsed.error, "altitude_m") };
  return { ok: true, value: parsed.data };
}
