import type { DataSet, ErrorReport } from "@tubecompare/core-types";
import { equ } from "./utils";

/**
 * Classifies each test sample against bounds already resampled on the test's
 * x grid. Only the common prefix of the three curves is compared. A sample
 * lying on a bound (within the equality tolerance) is inside the tube.
 */
export function compareToTube(lower: DataSet, upper: DataSet, test: DataSet): ErrorReport {
  const n = Math.min(lower.y.length, upper.y.length, test.y.length);

  const outX: number[] = [];
  const outY: number[] = [];
  const diffX: number[] = new Array(n);
  const diffY: number[] = new Array(n);

  for (let i = 0; i < n; i++) {
    const y = test.y[i];
    const lo = lower.y[i];
    const up = upper.y[i];
    diffX[i] = test.x[i];

    let dist = 0;
    if (y < lo && !equ(y, lo)) dist = lo - y;
    else if (y > up && !equ(y, up)) dist = y - up;

    if (dist > 0) {
      outX.push(test.x[i]);
      outY.push(dist);
    }
    diffY[i] = dist;
  }

  return {
    outliers: { x: outX, y: outY },
    diff: { x: diffX, y: diffY },
  };
}
