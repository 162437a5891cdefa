export type EngineErrorKind =
  | "AltitudeOutOfRange"
  | "TemperatureOutOfRange"
  | "InvalidInput"
  | "ConvergenceFailure";

export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly field?: string;

  constructor(kind: EngineErrorKind, message: string, field?: string) {
    super(message);
    this.name = "EngineError";
    this.kind = kind;
    this.field = field;
  }

  /** Returns a copy whose field is qualified by the record section it came from. */
  withFieldPrefix(prefix: string): EngineError {
    const field = this.field ? `${prefix}.${this.field}` : prefix;
    return new EngineError(this.kind, this.message, field);
  }

  toJSON(): { kind: EngineErrorKind; field: string | null; message: string } {
    return { kind: this.kind, field: this.field ?? null, message: this.message };
  }
}

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export function captureEngineError<T>(compute: () => T): EngineResult<T> {
  try {
    return { ok: true, value: compute() };
  } catch (e) {
    if (e instanceof EngineError) return { ok: false, error: e };
    throw e;
  }
}

export function withFieldPrefix<T>(prefix: string, compute: () => T): T {
  try {
    return compute();
  } catch (e) {
    if (e instanceof EngineError) throw e.withFieldPrefix(prefix);
    throw e;
  }
}

export function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new EngineError("InvalidInput", `${field} must be a finite number, got ${value}`, field);
  }
  return value;
}

export function requirePositive(value: number, field: string): number {
  requireFinite(value, field);
  if (value <= 0) {
    throw new EngineError("InvalidInput", `${field} must be greater than zero, got ${value}`, field);
  }
  return value;
}
