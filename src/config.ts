import { z } from "zod";
import dotenv from "dotenv";
import { SolverOptions, resolveSolverOptions } from "./engine/options.js";

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),

  REPORT_TEMPLATE_PATH: z.string().default("./config/report/comparison-report.txt.hbs"),

  SOLVER_MAX_ITERATIONS: z.coerce.number().int().positive().max(10_000).default(100),
  SOLVER_TOLERANCE_C: z.coerce.number().positive().max(0.1).default(1e-4)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}

export function solverOptionsFromConfig(cfg: AppConfig): SolverOptions {
  return resolveSolverOptions({
    maxIterations: cfg.SOLVER_MAX_ITERATIONS,
    toleranceC: cfg.SOLVER_TOLERANCE_C
  });
}
