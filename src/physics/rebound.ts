import * as THREE from "three";
import { logger } from "../logger";
import type { Color, ColorLookup, ReboundTuning, Vec2 } from "../types";
import { colorsEqual, sampleColor } from "../track/rasterMap";
import { FRONT_LEFT, REAR_LEFT, REAR_RIGHT } from "./geometry";
import { normalizeAngle } from "./kinematics";

export interface ReboundResult {
  speed: number;
  heading: number;
  displacement: Vec2;
  damped: boolean;
}

// Upper bound on probe positions around the circle.
const MAX_PROBES = 3600;

const tmpA = new THREE.Vector2();
const tmpB = new THREE.Vector2();

/** Unsigned angle in degrees; 0 when either vector has zero length. */
export function angleBetween(a: Vec2, b: Vec2): number {
  tmpA.set(a[0], a[1]);
  tmpB.set(b[0], b[1]);
  const denominator = tmpA.length() * tmpB.length();
  if (denominator === 0) {
    return 0;
  }

  const cos = THREE.MathUtils.clamp(tmpA.dot(tmpB) / denominator, -1, 1);
  return THREE.MathUtils.radToDeg(Math.acos(cos));
}

/**
 * Approximates the wall normal at `point` by sweeping a probe circle for the
 * first border-to-free transition. Falls back to `(radius, 0)`.
 */
export function estimateWallNormal(
  point: Vec2,
  map: ColorLookup,
  borderColor: Color,
  tuning: Pick<ReboundTuning, "probeRadiusPx" | "probeStepDeg" | "probePairOffsetDeg">
): Vec2 {
  const radius = tuning.probeRadiusPx;
  const step = tuning.probeStepDeg;
  const [x0, y0] = point;

  const probes = step > 0 ? Math.floor(360 / step + 1e-9) : Number.NaN;
  if (Number.isFinite(probes) && probes <= MAX_PROBES) {
    for (let index = 0; index <= probes; index += 1) {
      const probeDeg = index * step;
      const first = THREE.MathUtils.degToRad(probeDeg);
      const second = THREE.MathUtils.degToRad(probeDeg + tuning.probePairOffsetDeg);
      const x1 = x0 + radius * Math.cos(first);
      const y1 = y0 + radius * Math.sin(first);
      const x2 = x0 + radius * Math.cos(second);
      const y2 = y0 + radius * Math.sin(second);

      const firstIsBorder = colorsEqual(sampleColor(map, x1, y1, borderColor), borderColor);
      const secondIsBorder = colorsEqual(sampleColor(map, x2, y2, borderColor), borderColor);
      if (firstIsBorder && !secondIsBorder) {
        return [x1 - x0, y1 - y0];
      }
    }
  }

  return [radius, 0];
}

export function dampingFactor(incidenceDeg: number, tuning: ReboundTuning): number {
  if (incidenceDeg === 0) {
    return 1;
  }
  if (incidenceDeg < 30) {
    return tuning.smallDamping;
  }
  if (incidenceDeg < 60) {
    return tuning.mediumDamping;
  }
  return tuning.largeDamping;
}

export function reboundAction(
  point: Vec2,
  cornerIndex: number,
  headingDeg: number,
  speed: number,
  map: ColorLookup,
  borderColor: Color,
  tuning: ReboundTuning
): ReboundResult {
  if ((cornerIndex === REAR_LEFT || cornerIndex === REAR_RIGHT) && speed < 0) {
    return { speed: 0, heading: headingDeg, displacement: [0, 0], damped: false };
  }

  const normal = estimateWallNormal(point, map, borderColor, tuning);
  const travelAngle = THREE.MathUtils.degToRad(360 - headingDeg);
  const travel: Vec2 = [Math.cos(travelAngle), Math.sin(travelAngle)];

  let incidence = angleBetween(normal, travel);
  if (incidence > 90) {
    incidence = 180 - incidence;
  }

  const newSpeed = speed * dampingFactor(incidence, tuning);

  const incidenceRad = THREE.MathUtils.degToRad(incidence);
  const push = tuning.displacementFactor * Math.max(speed, 0) * Math.sin(incidenceRad);
  const displacement: Vec2 = [
    tuning.displacementGain * travel[0] * push,
    tuning.displacementGain * travel[1] * push
  ];

  const torqueSign = cornerIndex === FRONT_LEFT ? -1 : 1;
  const torque = tuning.turnFactor * Math.sin(2 * incidenceRad) + tuning.turnOffset;
  const heading = normalizeAngle(headingDeg + torqueSign * torque);

  logger.log("rebound", "resolved", {
    cornerIndex,
    incidence,
    speed: newSpeed,
    heading,
    displacement
  });

  return { speed: newSpeed, heading, displacement, damped: true };
}
