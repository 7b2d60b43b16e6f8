import { deriveVehicleGeometry, maxRadarLength } from "../config/loadConfig";
import { logger } from "../logger";
import { clipSteer, PowerSequencer, servoToAngle } from "../physics/actuation";
import { collisionStep } from "../physics/collision";
import { stepSpeed } from "../physics/dynamics";
import { computeCorners, computeWheels, cornerRadius, type CornerSet } from "../physics/geometry";
import { normalizeAngle } from "../physics/kinematics";
import { stepMotion } from "../physics/motion";
import { collectRadars, radarDistances, sampleSensors } from "../physics/sensors";
import { createUnitConverter, type UnitConverter } from "../physics/units";
import type {
  CollisionPolicy,
  ColorLookup,
  ControllerInput,
  DriveCommand,
  LapTimeListener,
  RadarReading,
  ReversePhase,
  SensorSample,
  SimConfig,
  SpawnPose,
  Vec2,
  VehicleGeometry,
  VehicleState
} from "../types";

const WHEEL_INSET_PX = 6;

export interface TickOptions {
  policy?: CollisionPolicy;
  onLapTime?: LapTimeListener;
}

export interface VehicleOptions {
  /** Configured speed set-point, carried through snapshots. */
  speedSet?: number;
}

export function createVehicleState(pose: SpawnPose): VehicleState {
  return {
    position: [pose.position[0], pose.position[1]],
    heading: normalizeAngle(pose.heading),
    speed: 0,
    power: 0,
    steerAngle: 0,
    distanceTraveled: 0,
    elapsedTime: 0,
    alive: true,
    finished: false,
    lapTime: 0,
    controlDisabled: false
  };
}

export class Vehicle {
  private state: VehicleState;
  private readonly sequencer: PowerSequencer;
  private readonly units: UnitConverter;
  private readonly geometry: VehicleGeometry;
  private readonly radarLimit: number;
  private radars: RadarReading[] = [];
  private samples: SensorSample[] = [];
  private lastCommand: DriveCommand | null = null;
  private lapRecorded = false;
  // A stage entered by a command drives the next tick before it can advance.
  private stageEnteredByCommand = false;
  readonly speedSet: number;

  constructor(
    private readonly config: SimConfig,
    pose: SpawnPose,
    options: VehicleOptions = {}
  ) {
    this.state = createVehicleState(pose);
    this.sequencer = new PowerSequencer(config.actuation);
    this.units = createUnitConverter(config.track);
    this.geometry = deriveVehicleGeometry(config);
    this.radarLimit = maxRadarLength(config);
    this.speedSet = options.speedSet ?? 0;
  }

  getState(): VehicleState {
    return { ...this.state, position: [this.state.position[0], this.state.position[1]] };
  }

  getGeometry(): VehicleGeometry {
    return { ...this.geometry };
  }

  getRadars(): RadarReading[] {
    return this.radars.map((reading) => ({
      endpoint: [reading.endpoint[0], reading.endpoint[1]],
      distance: reading.distance
    }));
  }

  getSamples(): SensorSample[] {
    return this.samples.map((sample) => ({ ...sample }));
  }

  getLastCommand(): DriveCommand | null {
    return this.lastCommand ? { ...this.lastCommand } : null;
  }

  getReversePhase(): ReversePhase {
    return this.sequencer.getPhase();
  }

  isAlive(): boolean {
    return this.state.alive;
  }

  isFinished(): boolean {
    return this.state.finished;
  }

  get corners(): CornerSet {
    return computeCorners(
      this.state.position,
      this.state.heading,
      this.geometry.halfLength,
      this.geometry.halfWidth
    );
  }

  get wheels(): [Vec2, Vec2] {
    const radius = cornerRadius(this.geometry.halfLength, this.geometry.halfWidth) - WHEEL_INSET_PX;
    return computeWheels(this.state.position, this.state.heading, radius);
  }

  /** Odometry normalised by half the car length. */
  reward(): number {
    return this.state.distanceTraveled / this.geometry.halfLength;
  }

  /**
   * Maps a controller command onto the actuators. Ignored once the vehicle
   * is dead or its control has been disabled by a collision.
   */
  applyCommand(command: DriveCommand): boolean {
    this.lastCommand = { ...command };
    if (!this.state.alive || this.state.controlDisabled) {
      return false;
    }

    if (Number.isFinite(command.servo)) {
      const limit = this.config.actuation.steerLimitDeg;
      this.state.steerAngle = -servoToAngle(clipSteer(command.servo, -limit, limit));
    }

    const phaseBefore = this.sequencer.getPhase();
    const update = this.sequencer.request(
      command.power,
      this.state.power,
      this.state.speed,
      this.speedFn
    );
    if (!this.sequencer.isSequencing()) {
      this.stageEnteredByCommand = false;
    } else if (this.sequencer.getPhase() !== phaseBefore) {
      this.stageEnteredByCommand = true;
    }
    this.state.power = update.power;
    this.state.speed = update.speed;

    return true;
  }

  /**
   * One simulation tick: pending reverse stage, motion, collision against
   * the map, then the radar sweep.
   */
  tick(map: ColorLookup, options: TickOptions = {}): VehicleState {
    if (!this.state.alive) {
      return this.getState();
    }

    const staged = this.stageEnteredByCommand ? null : this.sequencer.advance(this.speedFn);
    this.stageEnteredByCommand = false;
    if (staged) {
      this.state.power = staged.power;
      this.state.speed = staged.speed;
    }

    this.state = stepMotion(this.state, this.geometry, this.config.track, this.config.tickSeconds);

    const outcome = collisionStep(
      this.corners,
      map,
      options.policy ?? this.config.collisionPolicy,
      this.state.speed,
      this.state.heading,
      this.state.elapsedTime,
      {
        borderColor: this.config.borderColor,
        finishColor: this.config.finishColor,
        rebound: this.config.rebound,
        correction: this.config.correction,
        onLapTime: (lapTime) => {
          if (this.lapRecorded) {
            return;
          }
          this.lapRecorded = true;
          this.state.lapTime = lapTime;
          options.onLapTime?.(lapTime);
        }
      }
    );

    const [dx, dy] = outcome.flags.positionDelta;
    this.state.speed = outcome.speed;
    this.state.heading = outcome.heading;
    this.state.position = [this.state.position[0] + dx, this.state.position[1] + dy];
    this.state.alive = this.state.alive && outcome.alive;
    this.state.finished = this.state.finished || outcome.finished;

    if (outcome.flags.controlDisabled && !this.state.controlDisabled) {
      this.state.controlDisabled = true;
      this.sequencer.reset();
      this.stageEnteredByCommand = false;
      logger.warn("vehicle", "control disabled after collision", { position: this.state.position });
    }
    if (!this.state.alive) {
      logger.log("vehicle", "removed after collision", { position: this.state.position });
    }

    this.sense(map);
    return this.getState();
  }

  controllerInput(): ControllerInput {
    return {
      radarDistances: radarDistances(this.radars).map((distance) => this.units.toReal(distance)),
      samples: this.getSamples(),
      position: [this.state.position[0], this.state.position[1]],
      heading: this.state.heading,
      speed: this.state.speed,
      power: this.state.power,
      steerAngle: this.state.steerAngle
    };
  }

  /** Replaces state and sensor readings wholesale, e.g. from a snapshot. */
  restore(state: VehicleState, radars: RadarReading[] = [], samples: SensorSample[] = []): void {
    this.state = { ...state, position: [state.position[0], state.position[1]] };
    this.radars = radars.map((reading) => ({
      endpoint: [reading.endpoint[0], reading.endpoint[1]],
      distance: reading.distance
    }));
    this.samples = samples.map((sample) => ({ ...sample }));
    this.lapRecorded = state.lapTime !== 0;
    this.sequencer.reset();
    this.stageEnteredByCommand = false;
  }

  private sense(map: ColorLookup): void {
    if (!this.config.sensorsEnabled) {
      this.radars = [];
      this.samples = [];
      return;
    }

    this.radars = collectRadars(this.state.position, this.state.heading, map, {
      sweepDeg: this.config.radar.sweepDeg,
      stepDeg: this.config.radar.stepDeg,
      maxLength: this.radarLimit,
      borderColor: this.config.borderColor
    });
    this.samples = sampleSensors(this.radars, this.units);
  }

  private readonly speedFn = (power: number): number => {
    const speed = stepSpeed(
      this.state.speed,
      power,
      this.state.steerAngle,
      this.config.tickSeconds,
      this.units
    );
    this.state.speed = speed;
    return speed;
  };
}
