import * as THREE from "three";
import { describe, expect, it } from "vitest";
import { BORDER_COLOR, DEFAULT_SIM_CONFIG } from "../config/defaults";
import { FRONT_LEFT, FRONT_RIGHT, REAR_LEFT, REAR_RIGHT } from "../physics/geometry";
import {
  angleBetween,
  dampingFactor,
  estimateWallNormal,
  reboundAction
} from "../physics/rebound";
import type { ColorLookup } from "../types";
import { FREE, uniformMap } from "./helpers";

const TUNING = DEFAULT_SIM_CONFIG.rebound;

/** Border everywhere at x >= 50. */
const wallMap: ColorLookup = {
  width: 100,
  height: 100,
  colorAt: (x) => (x >= 50 ? BORDER_COLOR : FREE)
};

describe("rebound", () => {
  it("measures unsigned angles and tolerates zero vectors", () => {
    expect(angleBetween([1, 0], [0, 1])).toBeCloseTo(90, 10);
    expect(angleBetween([1, 0], [-1, 0])).toBeCloseTo(180, 10);
    expect(angleBetween([0, 0], [1, 0])).toBe(0);
  });

  it("buckets damping by incidence", () => {
    expect(dampingFactor(0, TUNING)).toBe(1);
    expect(dampingFactor(10, TUNING)).toBe(0.8);
    expect(dampingFactor(45, TUNING)).toBe(0.5);
    expect(dampingFactor(80, TUNING)).toBe(0.2);
  });

  it("falls back to a fixed normal when no wall edge is found", () => {
    expect(estimateWallNormal([50, 50], uniformMap(BORDER_COLOR, 100, 100), BORDER_COLOR, TUNING)).toEqual([15, 0]);
    expect(estimateWallNormal([50, 50], uniformMap(FREE, 100, 100), BORDER_COLOR, TUNING)).toEqual([15, 0]);
  });

  it("finds the first border-to-free transition on the probe circle", () => {
    const [nx, ny] = estimateWallNormal([50, 50], wallMap, BORDER_COLOR, TUNING);
    const expected = THREE.MathUtils.degToRad(80);
    expect(nx).toBeCloseTo(15 * Math.cos(expected), 10);
    expect(ny).toBeCloseTo(15 * Math.sin(expected), 10);
  });

  it("stops a rear corner that reverses into the wall without turning or moving it", () => {
    for (const corner of [REAR_LEFT, REAR_RIGHT]) {
      expect(reboundAction([50, 50], corner, 45, -2, wallMap, BORDER_COLOR, TUNING)).toEqual({
        speed: 0,
        heading: 45,
        displacement: [0, 0],
        damped: false
      });
    }
  });

  it("damps, pushes back and turns a front corner", () => {
    const result = reboundAction([50, 50], FRONT_RIGHT, 0, 3, wallMap, BORDER_COLOR, TUNING);
    const incidence = THREE.MathUtils.degToRad(80);

    expect(result.damped).toBe(true);
    expect(result.speed).toBeCloseTo(0.6, 6);
    expect(result.heading).toBeCloseTo(7 * Math.sin(2 * incidence) + 1, 6);
    expect(result.displacement[0]).toBeCloseTo(-1.7 * 8 * 3 * Math.sin(incidence), 6);
    expect(result.displacement[1]).toBeCloseTo(0, 6);
  });

  it("turns the front-left corner the other way", () => {
    const left = reboundAction([50, 50], FRONT_LEFT, 0, 3, wallMap, BORDER_COLOR, TUNING);
    const right = reboundAction([50, 50], FRONT_RIGHT, 0, 3, wallMap, BORDER_COLOR, TUNING);
    expect(left.heading).toBeCloseTo(360 - right.heading, 6);
    expect(left.displacement).toEqual(right.displacement);
  });

  it("never speeds the car up", () => {
    for (const heading of [0, 30, 75, 120, 200, 300]) {
      const result = reboundAction([50, 50], FRONT_LEFT, heading, 2.5, wallMap, BORDER_COLOR, TUNING);
      expect(Math.abs(result.speed)).toBeLessThanOrEqual(2.5);
    }
  });
});
