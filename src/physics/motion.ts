import * as THREE from "three";
import type { TrackReference, VehicleGeometry, VehicleState } from "../types";
import { steerStep } from "./kinematics";

/**
 * Advances the pose by one tick: odometry first, then steering, then a
 * translation along the new heading clamped inside the boundary margin.
 */
export function stepMotion(
  state: VehicleState,
  geometry: Pick<VehicleGeometry, "wheelbase" | "trackWidth">,
  bounds: TrackReference,
  dt: number
): VehicleState {
  const speed = Number.isFinite(state.speed) ? state.speed : 0;

  const heading =
    state.steerAngle !== 0
      ? steerStep(state.heading, state.steerAngle, speed, geometry.wheelbase, geometry.trackWidth)
      : state.heading;

  const angle = THREE.MathUtils.degToRad(360 - heading);
  const margin = bounds.boundaryMarginPx;
  const x = state.position[0] + Math.cos(angle) * speed;
  const y = state.position[1] + Math.sin(angle) * speed;

  return {
    ...state,
    speed,
    heading,
    distanceTraveled: state.distanceTraveled + speed,
    elapsedTime: state.elapsedTime + dt,
    position: [
      clampOrMargin(x, margin, bounds.widthPx - margin),
      clampOrMargin(y, margin, bounds.heightPx - margin)
    ]
  };
}

function clampOrMargin(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min;
  }

  return THREE.MathUtils.clamp(value, min, max);
}
