import type { ComparisonResult, DataSet, ReportSummary, Tolerances } from "@tubecompare/core-types";
import {
  ConfigurationError,
  TubeError,
  runComparison,
  summarizeReport,
  toTubeError,
} from "@tubecompare/tube-core";
import { writeReport } from "./writer";

export interface CompareAndReportInput {
  reference: DataSet;
  test: DataSet;
  tolerances: Tolerances;
  outputDirectory: string;
  decimals?: number;
}

export type CompareAndReportOutcome =
  | { ok: true; exitCode: 0; result: ComparisonResult; summary: ReportSummary; files: string[] }
  | { ok: false; exitCode: 1; error: TubeError };

export function curveFromArrays(x: readonly number[], y: readonly number[], label: string): DataSet {
  if (x.length !== y.length) {
    throw new ConfigurationError(`x${label} and y${label} must have the same length.`);
  }
  return { x: [...x], y: [...y] };
}

/**
 * Runs the comparison and, only once it has fully succeeded, writes
 * reference, lower/upper bound, test and error series to `outputDirectory`.
 * Failures come back as a value; nothing is written for them.
 */
export function compareAndReport(input: CompareAndReportInput): CompareAndReportOutcome {
  try {
    const result = runComparison({
      reference: input.reference,
      test: input.test,
      tolerances: input.tolerances,
    });

    const files = writeReport(
      input.outputDirectory,
      {
        reference: input.reference,
        lower: result.lower,
        upper: result.upper,
        test: input.test,
        errors: result.report.diff,
      },
      input.decimals
    );

    return { ok: true, exitCode: 0, result, summary: summarizeReport(result.report), files };
  } catch (err) {
    return { ok: false, exitCode: 1, error: toTubeError(err) };
  }
}

// Same entry point on raw arrays, as called by embedding tools.
export function compareArrays(
  xReference: readonly number[],
  yReference: readonly number[],
  xTest: readonly number[],
  yTest: readonly number[],
  outputDirectory: string,
  tolerances: Tolerances
): CompareAndReportOutcome {
  try {
    return compareAndReport({
      reference: curveFromArrays(xReference, yReference, "Reference"),
      test: curveFromArrays(xTest, yTest, "Test"),
      tolerances,
      outputDirectory,
    });
  } catch (err) {
    return { ok: false, exitCode: 1, error: toTubeError(err) };
  }
}
