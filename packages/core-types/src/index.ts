// Ordered (x, y) samples held as parallel arrays. x ascends in raw inputs;
// raw envelope curves may step backwards until their loops are resolved.
export interface DataSet {
  readonly x: readonly number[];
  readonly y: readonly number[];
}

export interface Tolerances {
  atolx: number;
  atoly: number;
  rtolx: number;
  rtoly: number;
}

export interface TubeSize {
  halfWidth: number;
  halfHeight: number;
  rangeX: number;
  rangeY: number;
}

export type BoundSide = "lower" | "upper";

// lower = -1, upper = +1
export type BoundDirection = -1 | 1;

export interface ErrorReport {
  outliers: DataSet; // (x, distance outside the tube)
  diff: DataSet;     // (x, distance or 0), one row per compared sample
}

export interface ComparisonInput {
  reference: DataSet;
  test: DataSet;
  tolerances: Tolerances;
}

export interface ComparisonDiagnostics {
  rawLowerCount: number;
  rawUpperCount: number;
  lowerLoops: number;
  upperLoops: number;
  comparedCount: number;
  truncated: boolean;
}

export interface ComparisonResult {
  tube: TubeSize;
  lower: DataSet;
  upper: DataSet;
  resampledLower: DataSet;
  resampledUpper: DataSet;
  report: ErrorReport;
  diagnostics: ComparisonDiagnostics;
}

export interface ReportSummary {
  passed: boolean;
  outlierCount: number;
  comparedCount: number;
  maxError: number;
  xAtMaxError?: number;
}
