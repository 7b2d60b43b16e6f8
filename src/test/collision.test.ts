import * as THREE from "three";
import { describe, expect, it } from "vitest";
import { BORDER_COLOR, DEFAULT_SIM_CONFIG, FINISH_LINE_COLOR } from "../config/defaults";
import { collisionStep, pushOutOfWall, type CollisionOptions } from "../physics/collision";
import { computeCorners } from "../physics/geometry";
import type { ColorLookup, Vec2 } from "../types";
import { FREE, collectLines, uniformMap } from "./helpers";

const CORNERS: Vec2[] = [
  [60, 45],
  [60, 55],
  [40, 45],
  [40, 55]
];

function options(onLapTime?: (lapTime: number) => void): CollisionOptions {
  return {
    borderColor: BORDER_COLOR,
    finishColor: FINISH_LINE_COLOR,
    rebound: DEFAULT_SIM_CONFIG.rebound,
    correction: DEFAULT_SIM_CONFIG.correction,
    onLapTime
  };
}

describe("collision", () => {
  it("changes nothing on open track", () => {
    const outcome = collisionStep(CORNERS, uniformMap(FREE, 100, 100), "rebound", 2, 30, 1, options());
    expect(outcome).toEqual({
      speed: 2,
      heading: 30,
      alive: true,
      finished: false,
      lapTime: 0,
      flags: { controlDisabled: false, positionDelta: [0, 0] }
    });
  });

  it("reports the finish once per step with the tick time", () => {
    const laps: number[] = [];
    const outcome = collisionStep(
      CORNERS,
      uniformMap(FINISH_LINE_COLOR, 100, 100),
      "rebound",
      2,
      30,
      1.5,
      options((lapTime) => laps.push(lapTime))
    );

    expect(outcome.finished).toBe(true);
    expect(outcome.lapTime).toBe(1.5);
    expect(laps).toEqual([1.5]);
  });

  it("checks the finish line at the front-left corner only", () => {
    const finishAbove: ColorLookup = {
      width: 100,
      height: 100,
      colorAt: (_x, y) => (y < 50 ? FINISH_LINE_COLOR : FREE)
    };
    const finishBelow: ColorLookup = {
      width: 100,
      height: 100,
      colorAt: (_x, y) => (y >= 50 ? FINISH_LINE_COLOR : FREE)
    };
    expect(collisionStep(CORNERS, finishAbove, "rebound", 2, 0, 1, options()).finished).toBe(true);
    expect(collisionStep(CORNERS, finishBelow, "rebound", 2, 0, 1, options()).finished).toBe(false);
  });

  it("turns a car away from a wall on its right", () => {
    const wallBelow: ColorLookup = {
      width: 600,
      height: 600,
      colorAt: (_x, y) => (y >= 306 ? BORDER_COLOR : FREE)
    };
    const corners = computeCorners([300, 300], 0, 16, 8);
    const outcome = collisionStep(corners, wallBelow, "rebound", 2, 0, 1, options());

    expect(outcome.heading).toBeGreaterThan(0);
    expect(outcome.heading).toBeLessThan(90);
    expect(Math.sin(THREE.MathUtils.degToRad(360 - outcome.heading))).toBeLessThan(0);
  });

  it("turns a car away from a wall on its left", () => {
    const wallAbove: ColorLookup = {
      width: 600,
      height: 600,
      colorAt: (_x, y) => (y <= 293 ? BORDER_COLOR : FREE)
    };
    const corners = computeCorners([300, 300], 0, 16, 8);
    const outcome = collisionStep(corners, wallAbove, "rebound", 2, 0, 1, options());

    expect(outcome.heading).toBeGreaterThan(270);
    expect(outcome.heading).toBeLessThan(360);
    expect(Math.sin(THREE.MathUtils.degToRad(360 - outcome.heading))).toBeGreaterThan(0);
  });

  it("stops the car and disables control under the stop policy", () => {
    const outcome = collisionStep(CORNERS, uniformMap(BORDER_COLOR, 100, 100), "stop", 2, 30, 1, options());
    expect(outcome.speed).toBe(0);
    expect(outcome.alive).toBe(true);
    expect(outcome.flags.controlDisabled).toBe(true);
  });

  it("kills the car under the remove policy", () => {
    const outcome = collisionStep(CORNERS, uniformMap(BORDER_COLOR, 100, 100), "remove", 2, 30, 1, options());
    expect(outcome.alive).toBe(false);
    expect(outcome.speed).toBe(2);
  });

  it("resolves only the first border contact per step", () => {
    const lines = collectLines(() => {
      collisionStep(CORNERS, uniformMap(BORDER_COLOR, 100, 100), "rebound", 2, 30, 1, options());
    });
    expect(lines.filter((line) => line.includes("[collision] border hit"))).toHaveLength(1);
    expect(lines.filter((line) => line.includes("[rebound] resolved"))).toHaveLength(1);
  });

  it("pushes the body toward its centre until it clears the wall", () => {
    const wallRight: ColorLookup = {
      width: 100,
      height: 100,
      colorAt: (x) => (x >= 60 ? BORDER_COLOR : FREE)
    };
    const offset = pushOutOfWall(CORNERS, [60, 50], [0, 0], wallRight, BORDER_COLOR, { maxAttempts: 6, stepPx: 4 });
    expect(offset).toEqual([-4, 0]);
  });

  it("gives up after the configured attempts", () => {
    const offset = pushOutOfWall(
      CORNERS,
      [60, 50],
      [0, 0],
      uniformMap(BORDER_COLOR, 100, 100),
      BORDER_COLOR,
      { maxAttempts: 3, stepPx: 2 }
    );
    expect(offset).toEqual([-6, 0]);
  });
});
