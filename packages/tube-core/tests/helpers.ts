import { expect } from "vitest";
import type { DataSet } from "@tubecompare/core-types";

export function expectPoints(actual: DataSet, expected: Array<[number, number]>, digits = 12): void {
  expect(actual.x.length).toBe(expected.length);
  expect(actual.y.length).toBe(expected.length);
  expected.forEach(([x, y], i) => {
    expect(actual.x[i]).toBeCloseTo(x, digits);
    expect(actual.y[i]).toBeCloseTo(y, digits);
  });
}

export function isNonDecreasing(xs: readonly number[]): boolean {
  for (let i = 1; i < xs.length; i++) {
    if (xs[i] < xs[i - 1]) return false;
  }
  return true;
}
