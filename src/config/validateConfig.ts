import type { CollisionPolicy, SimConfig } from "../types";

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const isPositive = (value: unknown): value is number =>
  isFiniteNumber(value) && value > 0;

const isColor = (value: unknown): boolean =>
  Array.isArray(value) &&
  value.length === 4 &&
  value.every(
    (channel) => Number.isInteger(channel) && channel >= 0 && channel <= 255
  );

export const VALID_COLLISION_POLICIES: CollisionPolicy[] = ["rebound", "stop", "remove"];

export const isCollisionPolicy = (value: unknown): value is CollisionPolicy =>
  typeof value === "string" &&
  VALID_COLLISION_POLICIES.some((policy) => policy === value);

export function collectSimConfigErrors(config: SimConfig): string[] {
  const errors: string[] = [];
  const { track, vehicle, actuation, radar, rebound, correction } = config;

  if (!isPositive(track.trackWidthCm)) {
    errors.push("track.trackWidthCm must be > 0");
  }

  if (!Number.isInteger(track.widthPx) || track.widthPx <= 0) {
    errors.push("track.widthPx must be an integer > 0");
  }

  if (!Number.isInteger(track.heightPx) || track.heightPx <= 0) {
    errors.push("track.heightPx must be an integer > 0");
  }

  if (!isFiniteNumber(track.boundaryMarginPx) || track.boundaryMarginPx < 0) {
    errors.push("track.boundaryMarginPx must be >= 0");
  }

  for (const key of ["lengthCm", "widthCm", "wheelbaseCm", "trackWidthCm"] as const) {
    if (!isPositive(vehicle[key])) {
      errors.push(`vehicle.${key} must be > 0`);
    }
  }

  if (!isPositive(actuation.maxPower)) {
    errors.push("actuation.maxPower must be > 0");
  }

  if (
    !isFiniteNumber(actuation.deadzone) ||
    actuation.deadzone < 0 ||
    actuation.deadzone > actuation.maxPower
  ) {
    errors.push("actuation.deadzone must lie in [0, maxPower]");
  }

  if (!isFiniteNumber(actuation.counterThrustPower) || actuation.counterThrustPower >= 0) {
    errors.push("actuation.counterThrustPower must be negative");
  }

  if (!Number.isInteger(actuation.pauseTicks) || actuation.pauseTicks < 1) {
    errors.push("actuation.pauseTicks must be an integer >= 1");
  }

  if (!isPositive(actuation.steerLimitDeg)) {
    errors.push("actuation.steerLimitDeg must be > 0");
  }

  if (!Number.isInteger(radar.sweepDeg) || radar.sweepDeg < 0) {
    errors.push("radar.sweepDeg must be an integer >= 0");
  }

  if (!Number.isInteger(radar.stepDeg) || radar.stepDeg <= 0) {
    errors.push("radar.stepDeg must be an integer > 0");
  }

  if (!isPositive(radar.maxLengthRatio)) {
    errors.push("radar.maxLengthRatio must be > 0");
  }

  if (!isPositive(rebound.probeRadiusPx)) {
    errors.push("rebound.probeRadiusPx must be > 0");
  }

  if (!Number.isInteger(rebound.probeStepDeg) || rebound.probeStepDeg <= 0) {
    errors.push("rebound.probeStepDeg must be an integer > 0");
  }

  for (const key of ["smallDamping", "mediumDamping", "largeDamping"] as const) {
    const factor = rebound[key];
    if (!isFiniteNumber(factor) || factor < 0 || factor > 1) {
      errors.push(`rebound.${key} must lie in [0, 1]`);
    }
  }

  for (const key of [
    "probePairOffsetDeg",
    "displacementFactor",
    "displacementGain",
    "turnFactor",
    "turnOffset"
  ] as const) {
    if (!isFiniteNumber(rebound[key])) {
      errors.push(`rebound.${key} must be numeric`);
    }
  }

  if (!Number.isInteger(correction.maxAttempts) || correction.maxAttempts < 0) {
    errors.push("correction.maxAttempts must be an integer >= 0");
  }

  if (!isPositive(correction.stepPx)) {
    errors.push("correction.stepPx must be > 0");
  }

  if (!isColor(config.borderColor)) {
    errors.push("borderColor must be four integer channels in [0, 255]");
  }

  if (!isColor(config.finishColor)) {
    errors.push("finishColor must be four integer channels in [0, 255]");
  }

  if (!isCollisionPolicy(config.collisionPolicy)) {
    errors.push(
      `collisionPolicy invalid (valid: ${VALID_COLLISION_POLICIES.join(", ")})`
    );
  }

  if (!isPositive(config.tickSeconds)) {
    errors.push("tickSeconds must be > 0");
  }

  return errors;
}

export function validateSimConfig(config: SimConfig): SimConfig {
  const errors = collectSimConfigErrors(config);
  if (errors.length > 0) {
    throw new Error(`Invalid SimConfig:\n- ${errors.join("\n- ")}`);
  }

  return config;
}
