import { describe, it, expect } from "vitest";
import type { TubeSize } from "@tubecompare/core-types";
import { buildRawBound, buildRawBounds, fromPoints } from "../src/index";
import { expectPoints } from "./helpers";

const tube = (halfWidth: number, halfHeight: number): TubeSize => ({
  halfWidth,
  halfHeight,
  rangeX: 0,
  rangeY: 0,
});

describe("buildRawBound", () => {
  it("offsets a peak: single corners on the flanks, both corners at the turn", () => {
    const ref = fromPoints([[0, 0], [1, 1], [2, 0]]);
    const { lower, upper } = buildRawBounds(ref, tube(0.1, 0.1));

    expectPoints(lower, [
      [-0.1, -0.1], [0.1, -0.1],
      [1.1, 0.9], [0.9, 0.9],
      [1.9, -0.1], [2.1, -0.1],
    ]);
    expectPoints(upper, [
      [-0.1, 0.1],
      [0.9, 1.1], [1.1, 1.1],
      [2.1, 0.1],
    ]);
  });

  it("mirrors the corner order on the upper side of a valley", () => {
    const ref = fromPoints([[0, 1], [1, 0], [2, 1]]);
    const upper = buildRawBound(ref, tube(0.6, 0.1), "upper");

    expectPoints(upper, [
      [-0.6, 1.1], [0.6, 1.1],
      [1.6, 0.1], [0.4, 0.1],
      [1.4, 1.1], [2.6, 1.1],
    ]);
  });

  it("adds no corner between collinear segments", () => {
    const ref = fromPoints([[0, 0], [1, 2], [2, 4], [3, 6]]);
    const lower = buildRawBound(ref, tube(0.1, 0.1), "lower");
    expectPoints(lower, [[-0.1, -0.1], [0.1, -0.1], [3.1, 5.9]]);
  });

  it("skips identical points", () => {
    const ref = fromPoints([[0, 0], [0, 0], [1, 1], [1, 1], [2, 0]]);
    const lower = buildRawBound(ref, tube(0.1, 0.1), "lower");
    expectPoints(lower, [
      [-0.1, -0.1], [0.1, -0.1],
      [1.1, 0.9], [0.9, 0.9],
      [1.9, -0.1], [2.1, -0.1],
    ]);
  });

  it("keeps a vertical step", () => {
    const ref = fromPoints([[0, 0], [1, 0], [1, 1], [2, 1]]);
    const lower = buildRawBound(ref, tube(0.1, 0.1), "lower");
    expectPoints(lower, [[-0.1, -0.1], [1.1, -0.1], [1.1, 0.9], [2.1, 0.9]]);
  });

  it("drops a corner that only repeats the height of a flat stretch", () => {
    // the last segment rises by less than the equality tolerance
    const ref = fromPoints([[0, 0], [1, 0], [1.001, 1e-11]]);
    const { lower, upper } = buildRawBounds(ref, tube(0.1, 0.1));

    expectPoints(lower, [[-0.1, -0.1], [1.101, 1e-11 - 0.1]]);
    expectPoints(upper, [[-0.1, 0.1], [0.901, 0.1 + 1e-11], [1.101, 0.1 + 1e-11]]);
  });

  it("keeps the corner when the curve really leaves the flat stretch", () => {
    const ref = fromPoints([[0, 0], [1, 0], [2, 1]]);
    const lower = buildRawBound(ref, tube(0.1, 0.1), "lower");
    expectPoints(lower, [[-0.1, -0.1], [1.1, -0.1], [2.1, 0.9]]);
  });

  it("returns the rectangle edge for a single distinct point", () => {
    const ref = fromPoints([[2, 5], [2, 5]]);
    expectPoints(buildRawBound(ref, tube(0.1, 0.1), "lower"), [[1.9, 4.9], [2.1, 4.9]]);
    expectPoints(buildRawBound(ref, tube(0.1, 0.1), "upper"), [[1.9, 5.1], [2.1, 5.1]]);
  });

  it("does not touch the reference", () => {
    const ref = fromPoints([[0, 0], [1, 1], [2, 0]]);
    buildRawBounds(ref, tube(0.5, 0.5));
    expect(ref.x).toEqual([0, 1, 2]);
    expect(ref.y).toEqual([0, 1, 0]);
  });
});
