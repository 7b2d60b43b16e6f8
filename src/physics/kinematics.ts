import * as THREE from "three";

const EPSILON = 1e-6;
export const MAX_STEER_DEG = 89;

/** Wraps any angle into [0, 360); non-finite input maps to 0. */
export function normalizeAngle(deg: number): number {
  if (!Number.isFinite(deg)) {
    return 0;
  }
  if (deg >= 0 && deg < 360) {
    return deg;
  }

  const wrapped = THREE.MathUtils.euclideanModulo(deg, 360);
  return wrapped >= 360 ? 0 : wrapped;
}

export function turnRadius(steerDeg: number, wheelbase: number, trackWidth: number): number {
  const clamped = Math.min(Math.abs(steerDeg), MAX_STEER_DEG);
  const tangent = Math.tan(THREE.MathUtils.degToRad(clamped));
  if (Math.abs(tangent) < EPSILON) {
    return Number.POSITIVE_INFINITY;
  }

  return wheelbase / tangent + trackWidth / 2;
}

/**
 * Heading after one tick of steering. Bicycle model with the turn radius
 * measured to the track centre; reversing rotates the other way.
 */
export function steerStep(
  headingDeg: number,
  steerDeg: number,
  speed: number,
  wheelbase: number,
  trackWidth: number
): number {
  if (Math.abs(steerDeg) < EPSILON || Math.abs(speed) < EPSILON) {
    return normalizeAngle(headingDeg);
  }

  const radius = turnRadius(steerDeg, wheelbase, trackWidth);
  if (!Number.isFinite(radius) || Math.abs(radius) < EPSILON) {
    return normalizeAngle(headingDeg);
  }

  const deltaDeg = THREE.MathUtils.radToDeg(Math.abs(speed) / radius);
  if (!Number.isFinite(deltaDeg)) {
    return normalizeAngle(headingDeg);
  }

  const steerSign = Math.sign(steerDeg);
  const travelSign = speed > 0 ? 1 : -1;

  return normalizeAngle(headingDeg + steerSign * travelSign * deltaDeg);
}
