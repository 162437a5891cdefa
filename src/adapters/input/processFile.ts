import fs from "node:fs/promises";
import path from "node:path";
import { ProcessInput } from "../../types.js";
import { parseProcessInput } from "../../input/schema.js";

/**
 * Reads a `{ geometry, inlet, outlet }` JSON document. Validation failures
 * surface as the EngineError from the schema, naming the offending field.
 */
export async function loadProcessFile(filePath: string): Promise<ProcessInput> {
  const resolvedPath = path.resolve(filePath);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Failed to read process file at ${resolvedPath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Process file JSON parse error (${resolvedPath}): ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = parseProcessInput(json);
  if (!parsed.ok) throw parsed.error;
  return parsed.value;
}
