import type { BoundDirection, DataSet } from "@tubecompare/core-types";
import { equ } from "./utils";

export interface LoopResolution {
  curve: DataSet;
  loops: number;
}

type Point = { x: number; y: number };

/**
 * Intersection of segments (i-1, i) and (k-1, k). Null when both are vertical
 * or when they are parallel.
 */
function intersect(X: number[], Y: number[], i: number, k: number): Point | null {
  const iVertical = equ(X[i], X[i - 1]);
  const kVertical = equ(X[k], X[k - 1]);

  if (iVertical && kVertical) return null;
  if (iVertical) {
    return {
      x: X[i],
      y: Y[k - 1] + ((X[i] - X[k - 1]) * (Y[k] - Y[k - 1])) / (X[k] - X[k - 1]),
    };
  }
  if (kVertical) {
    return {
      x: X[k],
      y: Y[i - 1] + ((X[k] - X[i - 1]) * (Y[i] - Y[i - 1])) / (X[i] - X[i - 1]),
    };
  }

  const a1 = (Y[i] - Y[i - 1]) / (X[i] - X[i - 1]);
  const a2 = (Y[k] - Y[k - 1]) / (X[k] - X[k - 1]);
  if (equ(a1, a2)) return null;

  const x = (a1 * X[i - 1] - a2 * X[k - 1] - Y[i - 1] + Y[k - 1]) / (a1 - a2);
  // evaluate on the flatter segment
  const y = Math.abs(a1) > Math.abs(a2)
    ? a2 * (x - X[k - 1]) + Y[k - 1]
    : a1 * (x - X[i - 1]) + Y[i - 1];
  return { x, y };
}

// y of segment (a-1, a) at xq
function yOn(X: number[], Y: number[], a: number, xq: number): number {
  return (Y[a] - Y[a - 1]) / (X[a] - X[a - 1]) * (xq - X[a - 1]) + Y[a - 1];
}

/**
 * Removes the backward segments that offsetting leaves at sharp turns.
 *
 * For each backward segment (j, j+1) the walk finds the earliest segment
 * (i-1, i) before it and the latest segment (k-1, k) after it that cross,
 * cuts everything between them and puts the crossing in their place. On the
 * lower bound (direction -1) the part kept is the one that lies lower; on the
 * upper bound the one that lies higher. The result is non-decreasing in x.
 */
export function resolveLoops(curve: DataSet, direction: BoundDirection): LoopResolution {
  const X = [...curve.x];
  const Y = [...curve.y];
  const lower = direction === -1;
  let loops = 0;

  // tracked y is still on the tube's side of Y[k]
  const inside = (yTracked: number, yk: number) => (lower ? yTracked < yk : yk < yTracked);

  let j = 1;
  while (j < X.length - 2) {
    if (X[j + 1] < X[j]) {
      loops++;
      const n = X.length;

      // ===== 1. locate i and k, such that (i-1, i) and (k-1, k) cross =====
      let i = j;
      let iPrevious = i;

      // X[i-1] <= X[j+1] < X[i]
      while (i > 1 && X[j + 1] < X[i - 1]) i--;

      let kMax = j + 1;
      while (X[kMax] < X[j] && kMax < n - 1) kMax++;

      let k = j + 1;
      let y = Y[i - 1];

      while (inside(y, Y[k]) && k < kMax) {
        iPrevious = i;
        k++;
        while (
          (X[i] < X[k]
            || (lower && equ(X[i], X[k]) && Y[i] < Y[k]
              && !(k + 1 < n && equ(X[k], X[k + 1]) && Y[k + 1] < Y[k]))
            || (!lower && equ(X[i], X[k]) && Y[i] > Y[k]
              && !(k + 1 < n && equ(X[k], X[k + 1]) && Y[k + 1] > Y[k])))
          && i < j
        ) {
          i++;
        }
        // X[i-1] < X[k] <= X[i]
        y = !equ(X[i], X[i - 1]) ? yOn(X, Y, i, X[k]) : Y[i];
      }

      // k found; the crossing lies on (iPrevious-1 .. i), walk i forward onto it
      i = iPrevious > 1 ? iPrevious - 1 : iPrevious;
      const kVertical = equ(X[k], X[k - 1]);
      if (!kVertical) y = yOn(X, Y, k, X[i]);

      while (
        i < k
        && ((!kVertical && (lower ? Y[i] < y : y < Y[i]))
          || (kVertical && X[i] < X[k]))
      ) {
        i++;
        if (!kVertical) y = yOn(X, Y, k, X[i]);
      }

      // ===== 2. crossing of (i-1, i) and (k-1, k) =====
      const cross = intersect(X, Y, i, k);

      // ===== 3. drop i .. k-1 =====
      X.splice(i, k - i);
      Y.splice(i, k - i);

      // ===== 4. insert the crossing unless it is already there =====
      if (cross && (!equ(X[i], cross.x) || !equ(Y[i], cross.y))) {
        X.splice(i, 0, cross.x);
        Y.splice(i, 0, cross.y);
      }

      j = i;

      // ===== 5. drop a doubled point =====
      if (equ(X[i - 1], X[i]) && equ(Y[i - 1], Y[i])) {
        X.splice(i, 1);
        Y.splice(i, 1);
        j = i - 1;
      }
    }
    j++;
  }

  return { curve: { x: X, y: Y }, loops };
}
