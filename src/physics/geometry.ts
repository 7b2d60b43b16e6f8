import * as THREE from "three";
import type { Vec2 } from "../types";

/**
 * Corner enumeration order. Collision handling scans corners in this order and
 * only the first border hit per tick is resolved, so the order decides which
 * of several simultaneous contacts wins. Index 0 is also the finish-line probe.
 */
export const CORNER_ORDER = ["frontLeft", "frontRight", "rearLeft", "rearRight"] as const;

export type CornerName = (typeof CORNER_ORDER)[number];

export type CornerSet = [Vec2, Vec2, Vec2, Vec2];

export const FRONT_LEFT = 0;
export const FRONT_RIGHT = 1;
export const REAR_LEFT = 2;
export const REAR_RIGHT = 3;

const CORNER_OFFSETS_DEG: Record<CornerName, number> = {
  frontLeft: 23,
  frontRight: -23,
  rearLeft: 157,
  rearRight: 203
};

/** Point at `radius` from `center` along heading + offset, screen convention. */
export function polarOffset(center: Vec2, headingDeg: number, offsetDeg: number, radius: number): Vec2 {
  const screenAngle = THREE.MathUtils.degToRad(360 - (headingDeg + offsetDeg));
  return [
    center[0] + Math.cos(screenAngle) * radius,
    center[1] + Math.sin(screenAngle) * radius
  ];
}

export function cornerRadius(halfLength: number, halfWidth: number): number {
  return Math.hypot(halfLength, halfWidth);
}

export function computeCorners(
  center: Vec2,
  headingDeg: number,
  halfLength: number,
  halfWidth: number
): CornerSet {
  const radius = cornerRadius(halfLength, halfWidth);
  const corner = (name: CornerName): Vec2 =>
    polarOffset(center, headingDeg, CORNER_OFFSETS_DEG[name], radius);

  return [corner("frontLeft"), corner("frontRight"), corner("rearLeft"), corner("rearRight")];
}

/** Front wheel contact points, as `[left, right]`. */
export function computeWheels(center: Vec2, headingDeg: number, reducedRadius: number): [Vec2, Vec2] {
  return [
    polarOffset(center, headingDeg, CORNER_OFFSETS_DEG.frontLeft, reducedRadius),
    polarOffset(center, headingDeg, CORNER_OFFSETS_DEG.frontRight, reducedRadius)
  ];
}

export function centroid(points: readonly Vec2[]): Vec2 {
  if (points.length === 0) {
    return [0, 0];
  }

  let sumX = 0;
  let sumY = 0;
  for (const [x, y] of points) {
    sumX += x;
    sumY += y;
  }

  return [sumX / points.length, sumY / points.length];
}
