import type { DataSet } from "@tubecompare/core-types";
import { EPS_EQ } from "./constants";
import { ConfigurationError } from "./errors";

export function equ(a: number, b: number): boolean {
  return Math.abs(a - b) < EPS_EQ;
}

export function sign(v: number): -1 | 0 | 1 {
  if (v > 0) return 1;
  if (v < 0) return -1;
  return 0;
}

export function assertFinite(x: number, tag: string): void {
  if (!Number.isFinite(x)) {
    throw new ConfigurationError(`Non-finite value at ${tag}: ${x}`);
  }
}

export function assertNonNegative(x: number, tag: string): void {
  assertFinite(x, tag);
  if (x < 0) {
    throw new ConfigurationError(`Negative value at ${tag}: ${x}`);
  }
}

export function fromPoints(points: ReadonlyArray<readonly [number, number]>): DataSet {
  return {
    x: points.map(p => p[0]),
    y: points.map(p => p[1]),
  };
}

export const EMPTY: DataSet = { x: [], y: [] };

// Throws unless the curve is non-empty, finite and non-decreasing in x.
export function assertCurve(data: DataSet, label: string): void {
  if (data.x.length !== data.y.length) {
    throw new ConfigurationError(
      `${label}: x and y must have the same length (${data.x.length} vs ${data.y.length})`
    );
  }
  if (data.x.length === 0) {
    throw new ConfigurationError(`${label}: curve has no points`);
  }
  for (let i = 0; i < data.x.length; i++) {
    assertFinite(data.x[i], `${label}.x[${i}]`);
    assertFinite(data.y[i], `${label}.y[${i}]`);
    if (i > 0 && data.x[i] < data.x[i - 1]) {
      throw new ConfigurationError(
        `${label}: x must be non-decreasing (x[${i - 1}]=${data.x[i - 1]} > x[${i}]=${data.x[i]})`
      );
    }
  }
}
