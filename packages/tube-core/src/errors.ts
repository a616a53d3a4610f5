export type TubeErrorKind = "configuration" | "degenerate-geometry" | "internal";

export class TubeError extends Error {
  readonly kind: TubeErrorKind;

  constructor(kind: TubeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "TubeError";
  }
}

/** Bad tolerances, malformed curves or an invalid config file. Raised before any curve is built. */
export class ConfigurationError extends TubeError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export class DegenerateGeometryError extends TubeError {
  constructor(message: string) {
    super("degenerate-geometry", message);
    this.name = "DegenerateGeometryError";
  }
}

export class InternalError extends TubeError {
  constructor(message: string, cause: unknown) {
    super("internal", message, { cause });
    this.name = "InternalError";
  }
}

export function toTubeError(err: unknown): TubeError {
  if (err instanceof TubeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(`Comparison failed: ${message}`, err);
}
