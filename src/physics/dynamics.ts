import type { UnitConverter } from "./units";
import { defaultUnits } from "./units";

// Empirical fits from track measurements; speeds in cm/s before scaling.
const ACCEL_SPEED_COEFF = -2.179;
const ACCEL_POWER_QUAD = 0.155;
const ACCEL_POWER_LINEAR = 7.015;
const ACCEL_SCALE = 100;

const VMAX_STRAIGHT_QUAD = -0.0496;
const VMAX_STRAIGHT_LINEAR = 9.008;
const VMAX_STRAIGHT_CONST = 31.8089;
const VMAX_STRAIGHT_SCALE = 100;

const VMAX_CURVE_COEFF = -81562;
const VMAX_CURVE_EXP = -2.47;
const VMAX_CURVE_CONST = 215.5123;
const VMAX_CURVE_SCALE = 100;

export const CURVE_THRESHOLD_DEG = 5;
export const DEFAULT_DT = 0.01;

function straightRegression(power: number): number {
  return (
    (VMAX_STRAIGHT_QUAD * power * power + VMAX_STRAIGHT_LINEAR * power + VMAX_STRAIGHT_CONST) /
    VMAX_STRAIGHT_SCALE
  );
}

/**
 * Top speed in real units. Below the curve threshold the straight-line
 * quadratic applies, above it the power law. The threshold compares the
 * signed steer angle.
 */
export function maxSpeedReal(power: number, steerDeg: number): number {
  const p = Math.abs(power);
  if (steerDeg < CURVE_THRESHOLD_DEG) {
    return straightRegression(p);
  }

  return (VMAX_CURVE_COEFF * Math.pow(p, VMAX_CURVE_EXP) + VMAX_CURVE_CONST) / VMAX_CURVE_SCALE;
}

export function accelerationReal(speedReal: number, power: number): number {
  const p = Math.abs(power);
  return (
    (ACCEL_SPEED_COEFF * speedReal + ACCEL_POWER_QUAD * p * p + ACCEL_POWER_LINEAR * p) /
    ACCEL_SCALE
  );
}

/** vmax in raster pixels per tick. */
export function maxSpeed(power: number, steerDeg: number, units: UnitConverter = defaultUnits): number {
  return units.toSim(maxSpeedReal(power, steerDeg));
}

/** Straight-line reference speed for a (signed) power; not integrated. */
export function targetSpeed(power: number, units: UnitConverter = defaultUnits): number {
  return units.toSim(straightRegression(power));
}

export function stepSpeed(
  speed: number,
  power: number,
  steerDeg: number,
  dt: number = DEFAULT_DT,
  units: UnitConverter = defaultUnits
): number {
  if (!Number.isFinite(speed) || !Number.isFinite(power)) {
    return 0;
  }

  let v = units.toReal(speed);
  let p = power;
  const turnback = p < 0;
  if (turnback) {
    p = -p;
    v = -v;
  }

  let next = 0;
  if (p !== 0) {
    const vmax = maxSpeedReal(p, steerDeg);
    const candidate = v + accelerationReal(v, p) * dt;
    if (Math.abs(candidate) <= Math.abs(vmax)) {
      next = candidate;
    } else {
      next = v >= 0 ? vmax : -vmax;
    }
  }

  return units.toSim(turnback ? -next : next);
}
