import { loadConfig, solverOptionsFromConfig } from "./config.js";
import { loadReportTemplate } from "./report/template.js";
import { startServer } from "./server.js";
import { logger } from "./utils/logger.js";

const cfg = loadConfig();
const template = loadReportTemplate(cfg.REPORT_TEMPLATE_PATH);
const solverOptions = solverOptionsFromConfig(cfg);

logger.info(
  { template: template.version, max_iterations: solverOptions.maxIterations, tolerance_c: solverOptions.toleranceC },
  "Starting moist-air balance service"
);

startServer({ port: cfg.PORT, template, solverOptions });
