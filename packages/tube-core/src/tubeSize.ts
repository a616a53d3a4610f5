import type { DataSet, Tolerances, TubeSize } from "@tubecompare/core-types";
import { TUBE_FLOOR } from "./constants";
import { ConfigurationError } from "./errors";
import { assertNonNegative, equ } from "./utils";

export function validateTolerances(tol: Tolerances): void {
  assertNonNegative(tol.atolx, "atolx");
  assertNonNegative(tol.atoly, "atoly");
  assertNonNegative(tol.rtolx, "rtolx");
  assertNonNegative(tol.rtoly, "rtoly");

  if ((equ(tol.atolx, 0) && equ(tol.rtolx, 0)) || (equ(tol.atoly, 0) && equ(tol.rtoly, 0))) {
    throw new ConfigurationError("At least one tolerance has to be set for both, x and y.");
  }
}

function halfSize(range: number, max: number, atol: number, rtol: number): number {
  if (equ(range, 0)) return Math.max(TUBE_FLOOR, TUBE_FLOOR * Math.abs(max));
  return Math.max(atol, rtol * range);
}

/**
 * Half width and half height of the rectangle swept along the reference curve.
 * Relative tolerances scale with the reference's range on that axis; an axis
 * without range falls back to a 1e-5 floor (scaled by the largest value).
 */
export function tubeSize(reference: DataSet, tol: Tolerances): TubeSize {
  validateTolerances(tol);
  if (reference.x.length === 0) {
    throw new ConfigurationError("Reference curve has no points.");
  }

  let minX = reference.x[0], maxX = reference.x[0];
  let minY = reference.y[0], maxY = reference.y[0];
  for (let i = 1; i < reference.x.length; i++) {
    minX = Math.min(minX, reference.x[i]);
    maxX = Math.max(maxX, reference.x[i]);
    minY = Math.min(minY, reference.y[i]);
    maxY = Math.max(maxY, reference.y[i]);
  }
  const rangeX = maxX - minX;
  const rangeY = maxY - minY;

  return {
    halfWidth: halfSize(rangeX, maxX, tol.atolx, tol.rtolx),
    halfHeight: halfSize(rangeY, maxY, tol.atoly, tol.rtoly),
    rangeX,
    rangeY,
  };
}
