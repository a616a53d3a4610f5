import type { ErrorReport, ReportSummary } from "@tubecompare/core-types";

// Largest deviation and where it first occurs; passed means no deviation at all.
export function summarizeReport(report: ErrorReport): ReportSummary {
  const { x, y } = report.diff;
  let maxError = 0;
  let at = -1;
  for (let i = 0; i < y.length; i++) {
    if (at < 0 || y[i] > maxError) {
      maxError = y[i];
      at = i;
    }
  }

  return {
    passed: maxError === 0,
    outlierCount: report.outliers.x.length,
    comparedCount: y.length,
    maxError,
    xAtMaxError: at >= 0 ? x[at] : undefined,
  };
}
