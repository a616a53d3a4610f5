import type { DataSet } from "@tubecompare/core-types";
import { EMPTY, equ } from "./utils";

/**
 * Piecewise-linear resampling of `source` on an ascending grid.
 *
 * The cursor into `source` only moves forward. Sampling stops at the first
 * target beyond the source's last x, so the result may be shorter than
 * `targetX`; its x is always a prefix of `targetX`.
 */
export function resample(source: DataSet, targetX: readonly number[]): DataSet {
  const n = source.x.length;
  if (n === 0) return EMPTY;

  const X = source.x;
  const Y = source.y;
  const last = X[n - 1];

  if (n === 1) {
    const xs: number[] = [];
    for (const xq of targetX) {
      if (xq > last) break;
      xs.push(xq);
    }
    return { x: xs, y: xs.map(() => Y[0]) };
  }

  const xs: number[] = [];
  const ys: number[] = [];
  let j = 1;

  for (const xq of targetX) {
    // no extrapolation
    if (xq > last) break;

    while (X[j] < xq && j + 1 < n) j++;

    const x0 = X[j - 1], y0 = Y[j - 1];
    const x1 = X[j], y1 = Y[j];
    xs.push(xq);
    ys.push(equ(x1, x0) ? y0 : y0 + ((y1 - y0) / (x1 - x0)) * (xq - x0));
  }

  return { x: xs, y: ys };
}
