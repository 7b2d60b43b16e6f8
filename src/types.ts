export type Vec2 = [number, number];

export type Color = readonly [number, number, number, number];

export type CollisionPolicy = "rebound" | "stop" | "remove";

export type ControllerKind = "rule-based" | "network";

export type ReversePhase = "idle" | "counterThrust" | "freewheel" | "reverse";

/**
 * Read-only view of the track raster. Implementations must return a stable
 * color for every in-bounds integer coordinate; callers guard the rest.
 */
export interface ColorLookup {
  readonly width: number;
  readonly height: number;
  colorAt(x: number, y: number): Color;
}

export type LapTimeListener = (lapTimeSeconds: number) => void;

/** Recomputes vehicle speed for a power value. */
export type SpeedFn = (power: number) => number;

/** Schedules a wait of `ms` virtual milliseconds; must not block. */
export type DelayFn = (ms: number) => void;

export interface RadarReading {
  endpoint: Vec2;
  distance: number;
}

export interface SensorSample {
  digitalBit: number;
  analogVolt: number;
}

export interface VehicleState {
  position: Vec2;
  heading: number;
  speed: number;
  power: number;
  steerAngle: number;
  distanceTraveled: number;
  elapsedTime: number;
  alive: boolean;
  finished: boolean;
  lapTime: number;
  controlDisabled: boolean;
}

export interface ReboundTuning {
  probeRadiusPx: number;
  probeStepDeg: number;
  probePairOffsetDeg: number;
  smallDamping: number;
  mediumDamping: number;
  largeDamping: number;
  displacementFactor: number;
  displacementGain: number;
  turnFactor: number;
  turnOffset: number;
}

export interface CollisionCorrection {
  maxAttempts: number;
  stepPx: number;
}

export interface TrackReference {
  trackWidthCm: number;
  widthPx: number;
  heightPx: number;
  boundaryMarginPx: number;
}

export interface VehicleDimensionsCm {
  lengthCm: number;
  widthCm: number;
  wheelbaseCm: number;
  trackWidthCm: number;
}

/** Vehicle dimensions after conversion to raster pixels. */
export interface VehicleGeometry {
  halfLength: number;
  halfWidth: number;
  wheelbase: number;
  trackWidth: number;
  coverSize: number;
}

export interface ActuationTuning {
  maxPower: number;
  deadzone: number;
  counterThrustPower: number;
  pauseTicks: number;
  steerLimitDeg: number;
}

export interface RadarTuning {
  sweepDeg: number;
  stepDeg: number;
  maxLengthRatio: number;
}

export interface SimConfig {
  track: TrackReference;
  vehicle: VehicleDimensionsCm;
  actuation: ActuationTuning;
  radar: RadarTuning;
  rebound: ReboundTuning;
  correction: CollisionCorrection;
  borderColor: Color;
  finishColor: Color;
  collisionPolicy: CollisionPolicy;
  tickSeconds: number;
  sensorsEnabled: boolean;
  debug: boolean;
}

export interface DriveCommand {
  power: number;
  servo: number;
}

export interface ControllerInput {
  /** Radar ranges in centimetres, right to left. */
  radarDistances: number[];
  samples: SensorSample[];
  position: Vec2;
  heading: number;
  speed: number;
  power: number;
  steerAngle: number;
}

export interface SpawnPose {
  position: Vec2;
  heading: number;
}

export interface SnapshotRecord {
  position: Vec2;
  heading: number;
  speed: number;
  speedSet: number;
  radars: Array<[Vec2, number]>;
  analogDigitalPairs: Array<[number, number]>;
  distanceTraveled: number;
  elapsedTime: number;
  power?: number;
  steerAngle?: number;
  rawThrottle?: number;
  rawServo?: number;
}
