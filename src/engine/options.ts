export interface SolverOptions {
  /** Bracket width (°C) at which a bisection is considered converged. */
  readonly toleranceC: number;
  readonly maxIterations: number;
}

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = Object.freeze({
  toleranceC: 1e-4,
  maxIterations: 100
});

export function resolveSolverOptions(overrides: Partial<SolverOptions> = {}): SolverOptions {
  return Object.freeze({ ...DEFAULT_SOLVER_OPTIONS, ...overrides });
}
