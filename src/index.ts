export * from "./types";
export { logger, type LogSink } from "./logger";

export { BORDER_COLOR, DEFAULT_SIM_CONFIG, FINISH_LINE_COLOR } from "./config/defaults";
export {
  deriveVehicleGeometry,
  maxRadarLength,
  resolveSimConfig,
  type ConfigEnv,
  type SimConfigOverrides
} from "./config/loadConfig";
export { collectSimConfigErrors, validateSimConfig } from "./config/validateConfig";

export * from "./physics/units";
export * from "./physics/geometry";
export * from "./physics/actuation";
export * from "./physics/kinematics";
export * from "./physics/dynamics";
export * from "./physics/sensors";
export * from "./physics/rebound";
export * from "./physics/collision";
export { stepMotion } from "./physics/motion";

export { RasterMap, TRANSPARENT, colorsEqual, sampleColor } from "./track/rasterMap";
export * from "./track/finishLine";

export * from "./gameplay/vehicle";
export * from "./gameplay/snapshot";

export type { DriveController } from "./control/driveController";
export * from "./control/ruleBasedController";
export * from "./control/networkController";
export { createController, type ControllerOptions } from "./control/createController";

export { FixedStepRunner } from "./core/fixedStep";
export * from "./core/raceSimulation";
