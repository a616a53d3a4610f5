import type { BoundSide, DataSet, TubeSize } from "@tubecompare/core-types";
import { VERTICAL_SLOPE } from "./constants";
import { ConfigurationError } from "./errors";
import { equ, sign } from "./utils";

type Segment = { s: -1 | 0 | 1; m: number };

// Slope sign and slope value of reference segment (i, i+1).
function segment(ref: DataSet, i: number): Segment {
  const dy = ref.y[i + 1] - ref.y[i];
  const s = sign(dy);
  const m = !equ(ref.x[i + 1], ref.x[i])
    ? dy / (ref.x[i + 1] - ref.x[i])
    : s > 0 ? VERTICAL_SLOPE : -VERTICAL_SLOPE;
  return { s, m };
}

/**
 * Corner points of the rectangles swept along the reference, on one side of it.
 *
 * Corners are written for the lower side: rising segments take the lower-right
 * corner, falling ones the lower-left, turns take both. The upper side is the
 * same table with the slope signs flipped and the corners moved up. The result
 * may step backwards in x at sharp turns; see `resolveLoops`.
 */
export function buildRawBound(reference: DataSet, tube: TubeSize, side: BoundSide): DataSet {
  const { x, y } = reference;
  const n = x.length;
  if (n === 0) throw new ConfigurationError("Reference curve has no points.");

  const dir = side === "lower" ? -1 : 1;
  const w = tube.halfWidth;
  const dy = dir * tube.halfHeight;
  const q = (s: number) => -dir * s;

  const xs: number[] = [];
  const ys: number[] = [];
  const left = (i: number) => { xs.push(x[i] - w); ys.push(y[i] + dy); };
  const right = (i: number) => { xs.push(x[i] + w); ys.push(y[i] + dy); };

  // skip identical points at the start
  let b = 0;
  while (b + 1 < n && equ(x[b], x[b + 1]) && equ(y[b], y[b + 1])) b++;

  if (b === n - 1) {
    left(b);
    right(b);
    return { x: xs, y: ys };
  }

  let { s: s0, m: m0 } = segment(reference, b);
  left(b);
  if (q(s0) === 1) right(b);

  for (let i = b + 1; i < n - 1; i++) {
    if (equ(x[i], x[i + 1]) && equ(y[i], y[i + 1])) continue;

    const { s: s1, m: m1 } = segment(reference, i);

    // collinear: no corner
    if (!equ(m0, m1)) {
      const p0 = q(s0), p1 = q(s1);
      if (p0 !== -1 && p1 !== -1) {
        right(i);
      } else if (p0 !== 1 && p1 !== 1) {
        left(i);
      } else if (p0 === -1 && p1 === 1) {
        left(i);
        right(i);
      } else {
        right(i);
        left(i);
      }

      // flat stretch of the bound: drop the corners that only repeat its height
      const last = ys.length - 1;
      const lastY = ys[last];
      if (equ(y[i + 1] + dy, lastY)) {
        if (s0 * s1 === -1 && equ(ys[last - 2], lastY)) {
          xs.length -= 2;
          ys.length -= 2;
        } else if (s0 * s1 !== -1 && equ(ys[last - 1], lastY)) {
          xs.length -= 1;
          ys.length -= 1;
        }
      }
    }
    s0 = s1;
    m0 = m1;
  }

  if (q(s0) === -1) left(n - 1);
  right(n - 1);

  return { x: xs, y: ys };
}

export function buildRawBounds(reference: DataSet, tube: TubeSize): { lower: DataSet; upper: DataSet } {
  return {
    lower: buildRawBound(reference, tube, "lower"),
    upper: buildRawBound(reference, tube, "upper"),
  };
}
