import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import Handlebars from "handlebars";
import { ComparisonReport, Co2Classification } from "../types.js";

export interface ReportTemplate {
  path: string;
  version: string;
  render: (report: ComparisonReport) => string;
}

const CO2_LABELS: Record<Co2Classification, string> = {
  Release: "CO2 Release",
  Capture: "CO2 Capture",
  NoChange: "No Change in CO2"
};

function isCo2Classification(value: unknown): value is Co2Classification {
  return value === "Release" || value === "Capture" || value === "NoChange";
}

function createRenderer(): typeof Handlebars {
  const hbs = Handlebars.create();

  // {{fixed value digits}}
  hbs.registerHelper("fixed", (value: unknown, digits: unknown) => {
    if (typeof value !== "number") return String(value);
    return value.toFixed(typeof digits === "number" ? digits : 3);
  });
  // {{sci value digits}}
  hbs.registerHelper("sci", (value: unknown, digits: unknown) => {
    if (typeof value !== "number") return String(value);
    return value.toExponential(typeof digits === "number" ? digits : 4);
  });
  hbs.registerHelper("co2Label", (value: unknown) =>
    isCo2Classification(value) ? CO2_LABELS[value] : String(value)
  );

  return hbs;
}

export function compileReportTemplate(source: string, name: string): ReportTemplate {
  const compiled = createRenderer().compile(source, { noEscape: true, strict: true });
  const hash = crypto.createHash("sha256").update(source).digest("hex").slice(0, 8);

  return {
    path: name,
    version: `${path.basename(name)}#${hash}`,
    render: (report: ComparisonReport) => compiled(report)
  };
}

export function loadReportTemplate(templatePath: string): ReportTemplate {
  const resolvedPath = path.resolve(templatePath);

  let templateSource: string;
  try {
    templateSource = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(
      `Failed to read report template at ${resolvedPath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  return compileReportTemplate(templateSource, resolvedPath);
}
