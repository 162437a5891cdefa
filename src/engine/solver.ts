import { EngineError } from "./errors.js";
import { SolverOptions } from "./options.js";

export interface BisectionResult {
  root: number;
  iterations: number;
}

export interface BisectionTarget {
  /** Human-readable description used in failure messages. */
  label: string;
  /** Field named on a `ConvergenceFailure`. */
  field: string;
  /**
   * When set, the bracket must also shrink until |fn(root)| is within this
   * value; the temperature width alone is not enough.
   */
  residualTolerance?: number;
}

/**
 * Bisection on a continuous (or monotone with small jumps) function whose
 * root lies in [lower, upper]. Stops once the bracket is narrower than
 * `options.toleranceC` and, if requested, the residual is small enough, or
 * when the bracket cannot be split any further in double precision.
 */
export function bisect(
  fn: (x: number) => number,
  lower: number,
  upper: number,
  options: SolverOptions,
  target: BisectionTarget
): BisectionResult {
  const { label, field, residualTolerance } = target;
  let lo = lower;
  let hi = upper;
  let fLo = fn(lo);
  const fHi = fn(hi);

  if (fLo === 0) return { root: lo, iterations: 0 };
  if (fHi === 0) return { root: hi, iterations: 0 };
  if (!Number.isFinite(fLo) || !Number.isFinite(fHi) || Math.sign(fLo) === Math.sign(fHi)) {
    throw new EngineError("ConvergenceFailure", `${label}: no root bracketed by [${lower}, ${upper}]`, field);
  }

  let iterations = 0;
  for (;;) {
    const mid = (lo + hi) / 2;
    const narrow = hi - lo <= options.toleranceC;
    if (narrow && residualTolerance === undefined) return { root: mid, iterations };
    if (mid <= lo || mid >= hi) return { root: mid, iterations };

    if (iterations >= options.maxIterations) {
      throw new EngineError(
        "ConvergenceFailure",
        `${label}: not converged after ${iterations} iterations (bracket [${lo}, ${hi}])`,
        field
      );
    }
    iterations++;

    const fMid = fn(mid);
    if (!Number.isFinite(fMid)) {
      throw new EngineError("ConvergenceFailure", `${label}: lost bracket at ${mid}`, field);
    }
    if (fMid === 0) return { root: mid, iterations };
    if (narrow && residualTolerance !== undefined && Math.abs(fMid) <= residualTolerance) {
      return { root: mid, iterations };
    }
    if (Math.sign(fMid) === Math.sign(fLo)) {
      lo = mid;
      fLo = fMid;
    } else {
      hi = mid;
    }
  }
}
