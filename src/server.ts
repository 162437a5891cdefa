import express, { NextFunction, Request, Response } from "express";
import { buildReport } from "./engine/report.js";
import { EngineError } from "./engine/errors.js";
import { SolverOptions } from "./engine/options.js";
import { pressureFromAltitude } from "./engine/pressure.js";
import { parseAltitude, parseProcessInput } from "./input/schema.js";
import { ReportTemplate } from "./report/template.js";
import { logger } from "./utils/logger.js";

export interface AppParams {
  template: ReportTemplate;
  solverOptions: SolverOptions;
}

function sendEngineError(res: Response, error: EngineError) {
  logger.warn({ kind: error.kind, field: error.field }, error.message);
  return res.status(422).json({ ok: false, error: error.toJSON() });
}

export function createApp(params: AppParams) {
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, template_version: params.template.version });
  });

  app.get("/pressure", (req, res) => {
    const altitude = parseAltitude(req.query.altitude_m);
    if (!altitude.ok) return sendEngineError(res, altitude.error);

    const pressure = pressureFromAltitude(altitude.value);
    if (!pressure.ok) return sendEngineError(res, pressure.error);
    res.json({ ok: true, altitude_m: altitude.value, pressure_pa: pressure.value });
  });

  app.post("/reports", (req, res) => {
    const input = parseProcessInput(req.body);
    if (!input.ok) return sendEngineError(res, input.error);

    const { inlet, outlet, geometry } = input.value;
    const result = buildReport(inlet, outlet, geometry, params.solverOptions);
    if (!result.ok) return sendEngineError(res, result.error);

    logger.info(
      {
        co2_classification: result.value.balance.co2_classification,
        mass_flow_kg_s: result.value.balance.mass_flow_kg_s
      },
      "Report built"
    );

    if (req.query.format === "text") {
      return res.type("text/plain").send(params.template.render(result.value));
    }
    res.json({ ok: true, report: result.value });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      const error = new EngineError("InvalidInput", "request body is not valid JSON", "body");
      return res.status(400).json({ ok: false, error: error.toJSON() });
    }
    logger.error({ err }, "Request failed");
    res.status(500).json({ ok: false, error: { kind: "Internal", field: null, message: "internal error" } });
  });

  return app;
}

export function startServer(params: AppParams & { port: number }) {
  const app = createApp(params);
  const server = app.listen(params.port, () => {
    logger.info({ port: params.port }, "HTTP server listening");
  });
  return server;
}
