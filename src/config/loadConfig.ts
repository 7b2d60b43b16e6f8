import { logger } from "../logger";
import type {
  ActuationTuning,
  Color,
  CollisionCorrection,
  CollisionPolicy,
  RadarTuning,
  ReboundTuning,
  SimConfig,
  TrackReference,
  VehicleDimensionsCm,
  VehicleGeometry
} from "../types";
import { createUnitConverter } from "../physics/units";
import { DEFAULT_SIM_CONFIG } from "./defaults";
import {
  VALID_COLLISION_POLICIES,
  collectSimConfigErrors,
  isCollisionPolicy
} from "./validateConfig";

export interface SimConfigOverrides {
  track?: Partial<TrackReference>;
  vehicle?: Partial<VehicleDimensionsCm>;
  actuation?: Partial<ActuationTuning>;
  radar?: Partial<RadarTuning>;
  rebound?: Partial<ReboundTuning>;
  correction?: Partial<CollisionCorrection>;
  borderColor?: Color;
  finishColor?: Color;
  collisionPolicy?: CollisionPolicy;
  tickSeconds?: number;
  sensorsEnabled?: boolean;
  debug?: boolean;
}

export type ConfigEnv = Record<string, string | undefined>;

interface EnvOverrides {
  overrides: SimConfigOverrides;
  errors: string[];
}

function readEnvOverrides(env: ConfigEnv): EnvOverrides {
  const overrides: SimConfigOverrides = {};
  const errors: string[] = [];

  if (env["RASTERCAR_DEBUG"] !== undefined) {
    overrides.debug = env["RASTERCAR_DEBUG"] === "1";
  }

  const deadzone = env["RASTERCAR_MOTOR_DEADZONE"];
  if (deadzone !== undefined) {
    const parsed = Number(deadzone);
    if (deadzone.trim() === "" || !Number.isFinite(parsed)) {
      errors.push(`RASTERCAR_MOTOR_DEADZONE is not a number: "${deadzone}"`);
    } else {
      overrides.actuation = { deadzone: parsed };
    }
  }

  const policy = env["RASTERCAR_COLLISION_POLICY"];
  if (policy !== undefined) {
    if (isCollisionPolicy(policy)) {
      overrides.collisionPolicy = policy;
    } else {
      errors.push(
        `RASTERCAR_COLLISION_POLICY invalid: "${policy}" (valid: ${VALID_COLLISION_POLICIES.join(", ")})`
      );
    }
  }

  return { overrides, errors };
}

function mergeConfig(base: SimConfig, overrides: SimConfigOverrides): SimConfig {
  return {
    ...base,
    ...overrides,
    track: { ...base.track, ...overrides.track },
    vehicle: { ...base.vehicle, ...overrides.vehicle },
    actuation: { ...base.actuation, ...overrides.actuation },
    radar: { ...base.radar, ...overrides.radar },
    rebound: { ...base.rebound, ...overrides.rebound },
    correction: { ...base.correction, ...overrides.correction }
  };
}

/**
 * Builds the effective configuration: defaults, then environment, then
 * explicit overrides. Throws one error listing every problem found.
 */
export function resolveSimConfig(
  overrides: SimConfigOverrides = {},
  env: ConfigEnv = process.env
): SimConfig {
  const fromEnv = readEnvOverrides(env);
  const config = mergeConfig(mergeConfig(DEFAULT_SIM_CONFIG, fromEnv.overrides), overrides);
  const errors = [...fromEnv.errors, ...collectSimConfigErrors(config)];

  if (errors.length > 0) {
    throw new Error(`Invalid SimConfig:\n- ${errors.join("\n- ")}`);
  }

  if (config.debug) {
    logger.setEnabled(true);
  }

  logger.log("config", "resolved", {
    collisionPolicy: config.collisionPolicy,
    deadzone: config.actuation.deadzone,
    widthPx: config.track.widthPx
  });

  return config;
}

/** Converts the configured real-world vehicle dimensions to raster pixels. */
export function deriveVehicleGeometry(config: SimConfig): VehicleGeometry {
  const units = createUnitConverter(config.track);
  const length = units.toSim(config.vehicle.lengthCm);
  const width = units.toSim(config.vehicle.widthCm);

  return {
    halfLength: length / 2,
    halfWidth: width / 2,
    wheelbase: units.toSim(config.vehicle.wheelbaseCm),
    trackWidth: units.toSim(config.vehicle.trackWidthCm),
    coverSize: Math.trunc(Math.max(length, width))
  };
}

export function maxRadarLength(config: SimConfig): number {
  return config.track.widthPx * config.radar.maxLengthRatio;
}
