import { loadConfig, solverOptionsFromConfig } from "../src/config.js";
import { loadProcessFile } from "../src/adapters/input/processFile.js";
import { buildReport } from "../src/engine/report.js";
import { EngineError } from "../src/engine/errors.js";
import { loadReportTemplate } from "../src/report/template.js";
import { logger } from "../src/utils/logger.js";

const cfg = loadConfig();
const template = loadReportTemplate(cfg.REPORT_TEMPLATE_PATH);
const inputPath = process.argv[2] ?? "./mock/process.sample.json";

try {
  const { inlet, outlet, geometry } = await loadProcessFile(inputPath);
  const result = buildReport(inlet, outlet, geometry, solverOptionsFromConfig(cfg));
  if (!result.ok) throw result.error;

  // eslint-disable-next-line no-console
  console.log(template.render(result.value));
} catch (e: unknown) {
  if (e instanceof EngineError) {
    logger.error({ kind: e.kind, field: e.field, input: inputPath }, e.message);
  } else {
    logger.error({ err: e, input: inputPath }, "Report failed");
  }
  process.exitCode = 1;
}
