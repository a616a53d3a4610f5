import type { ComparisonInput, ComparisonResult } from "@tubecompare/core-types";
import { buildRawBounds } from "./boundCurve";
import { compareToTube } from "./compare";
import { DegenerateGeometryError } from "./errors";
import { resample } from "./interp";
import { resolveLoops } from "./loopResolver";
import { tubeSize, validateTolerances } from "./tubeSize";
import { assertCurve } from "./utils";

/**
 * Full comparison of a test curve against the tube around a reference curve.
 * Pure and synchronous: nothing is written, nothing is shared between calls.
 */
export function runComparison({ reference, test, tolerances }: ComparisonInput): ComparisonResult {
  validateTolerances(tolerances);
  assertCurve(reference, "reference");
  assertCurve(test, "test");

  const tube = tubeSize(reference, tolerances);

  const raw = buildRawBounds(reference, tube);
  const lower = resolveLoops(raw.lower, -1);
  const upper = resolveLoops(raw.upper, 1);

  if (lower.curve.x.length === 0 || upper.curve.x.length === 0) {
    throw new DegenerateGeometryError("Lower or upper curve has 0 elements.");
  }

  const resampledLower = resample(lower.curve, test.x);
  const resampledUpper = resample(upper.curve, test.x);
  const report = compareToTube(resampledLower, resampledUpper, test);
  const comparedCount = report.diff.x.length;

  return {
    tube,
    lower: lower.curve,
    upper: upper.curve,
    resampledLower,
    resampledUpper,
    report,
    diagnostics: {
      rawLowerCount: raw.lower.x.length,
      rawUpperCount: raw.upper.x.length,
      lowerLoops: lower.loops,
      upperLoops: upper.loops,
      comparedCount,
      truncated: comparedCount < test.x.length,
    },
  };
}
