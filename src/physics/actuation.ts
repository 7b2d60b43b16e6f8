import { logger } from "../logger";
import type { ActuationTuning, DelayFn, ReversePhase, SpeedFn } from "../types";

export const PAUSE_MS = 10;

export interface PowerUpdate {
  power: number;
  speed: number;
}

/** Servo set-point to wheel angle, from the servo calibration polynomial. */
export function servoToAngle(servo: number): number {
  if (servo === 0) {
    return 0;
  }

  const magnitude = Math.abs(servo);
  const angle = 0.03 * magnitude * magnitude + 0.97 * magnitude + 2.23;
  return servo < 0 ? -angle : angle;
}

export function clipSteer(value: number, minDeg = -10, maxDeg = 10): number {
  if (value === 0) {
    return 0;
  }
  if (value >= maxDeg) {
    return maxDeg;
  }
  if (value <= minDeg) {
    return minDeg;
  }
  return value;
}

type PowerBand = "deadzone" | "forward" | "reverse" | "outOfBand";

function classify(requested: number, deadzone: number, maxPower: number): PowerBand {
  if (requested > -deadzone && requested < deadzone) {
    return "deadzone";
  }
  if (requested >= deadzone && requested <= maxPower) {
    return "forward";
  }
  if (requested >= -maxPower && requested <= -deadzone) {
    return "reverse";
  }
  return "outOfBand";
}

/**
 * Motor power state machine. Reversing while forward power is still applied
 * runs counterThrust -> freewheel -> reverse, each stage held for
 * `pauseTicks` calls to `advance`.
 */
export class PowerSequencer {
  private phase: ReversePhase = "idle";
  private ticksInPhase = 0;
  private targetPower = 0;

  constructor(
    private readonly tuning: Pick<
      ActuationTuning,
      "maxPower" | "deadzone" | "counterThrustPower" | "pauseTicks"
    >
  ) {}

  getPhase(): ReversePhase {
    return this.phase;
  }

  isSequencing(): boolean {
    return this.phase === "counterThrust" || this.phase === "freewheel";
  }

  reset(): void {
    this.phase = "idle";
    this.ticksInPhase = 0;
    this.targetPower = 0;
  }

  /**
   * Handles a new power request. During a running reverse sequence a further
   * reverse request only retargets it; the returned power is then the
   * current stage's.
   */
  request(
    requested: number,
    currentPower: number,
    currentSpeed: number,
    speedFn: SpeedFn
  ): PowerUpdate {
    const band = classify(requested, this.tuning.deadzone, this.tuning.maxPower);

    if (this.isSequencing()) {
      if (band === "reverse") {
        this.targetPower = requested;
        return { power: currentPower, speed: currentSpeed };
      }
      if (band === "outOfBand") {
        return { power: currentPower, speed: currentSpeed };
      }
      logger.log("actuation", "reverse sequence aborted", { phase: this.phase, requested });
      this.reset();
    }

    switch (band) {
      case "deadzone":
        this.phase = "idle";
        return { power: 0, speed: speedFn(0) };
      case "forward":
        this.phase = "idle";
        return { power: requested, speed: speedFn(requested) };
      case "reverse":
        if (currentPower > 0) {
          return this.enter("counterThrust", requested, speedFn);
        }
        this.phase = "reverse";
        return { power: requested, speed: speedFn(requested) };
      case "outOfBand":
        return { power: currentPower, speed: currentSpeed };
    }
  }

  /**
   * Moves a running sequence forward by one tick. Returns the stage that
   * became active, or null while a stage is still being held or when idle.
   */
  advance(speedFn: SpeedFn): PowerUpdate | null {
    if (!this.isSequencing()) {
      return null;
    }

    this.ticksInPhase += 1;
    if (this.ticksInPhase < this.tuning.pauseTicks) {
      return null;
    }

    if (this.phase === "counterThrust") {
      return this.enter("freewheel", this.targetPower, speedFn);
    }

    this.phase = "reverse";
    this.ticksInPhase = 0;
    logger.log("actuation", "reverse engaged", { power: this.targetPower });
    return { power: this.targetPower, speed: speedFn(this.targetPower) };
  }

  private enter(phase: "counterThrust" | "freewheel", target: number, speedFn: SpeedFn): PowerUpdate {
    this.phase = phase;
    this.ticksInPhase = 0;
    this.targetPower = target;

    const stagePower = phase === "counterThrust" ? this.tuning.counterThrustPower : 0;
    logger.log("actuation", `enter ${phase}`, { stagePower, target });
    return { power: stagePower, speed: speedFn(stagePower) };
  }
}

/**
 * One-shot power update. Runs any reverse sequence to completion, calling
 * `delayFn` with virtual milliseconds between stages.
 */
export function applyPower(
  requested: number,
  currentPower: number,
  currentSpeed: number,
  maxPower: number,
  speedFn: SpeedFn,
  delayFn: DelayFn,
  tuning: Partial<Pick<ActuationTuning, "deadzone" | "counterThrustPower">> = {}
): PowerUpdate {
  const sequencer = new PowerSequencer({
    maxPower,
    deadzone: tuning.deadzone ?? 18,
    counterThrustPower: tuning.counterThrustPower ?? -30,
    pauseTicks: 1
  });

  let update = sequencer.request(requested, currentPower, currentSpeed, speedFn);
  while (sequencer.isSequencing()) {
    delayFn(PAUSE_MS);
    update = sequencer.advance(speedFn) ?? update;
  }

  return update;
}
