import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  DegenerateGeometryError,
  InternalError,
  TubeError,
  toTubeError,
} from "../src/index";

describe("toTubeError", () => {
  it("passes tube errors through", () => {
    const err = new DegenerateGeometryError("Lower or upper curve has 0 elements.");
    expect(toTubeError(err)).toBe(err);
    expect(err.kind).toBe("degenerate-geometry");
    expect(err.name).toBe("DegenerateGeometryError");
  });

  it("wraps anything else as an internal error", () => {
    const cause = new RangeError("Invalid array length");
    const err = toTubeError(cause);

    expect(err).toBeInstanceOf(InternalError);
    expect(err).toBeInstanceOf(TubeError);
    expect(err.kind).toBe("internal");
    expect(err.message).toBe("Comparison failed: Invalid array length");
    expect(err.cause).toBe(cause);
  });

  it("stringifies non-error values", () => {
    expect(toTubeError("boom").message).toBe("Comparison failed: boom");
  });

  it("keeps configuration errors distinguishable", () => {
    const err = new ConfigurationError("bad");
    expect(err).toBeInstanceOf(TubeError);
    expect(err.kind).toBe("configuration");
  });
});
