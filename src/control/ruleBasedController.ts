import type { ControllerInput, DriveCommand } from "../types";
import type { DriveController } from "./driveController";

export interface RuleBasedGains {
  k1: number;
  k2: number;
  k3: number;
  kp1: number;
  kp2: number;
}

export const DEFAULT_RULE_GAINS: RuleBasedGains = {
  k1: 1.1,
  k2: 1.1,
  k3: 1.1,
  kp1: 1.1,
  kp2: 1.1
};

const SIDE_ALERT_CM = 130;
const FAR_CM = 100;
const NEAR_CM = 50;
const CRUISE_POWER_CAP = 60;
const CREEP_POWER = 18;
const BACKOFF_STEER = 10;

/**
 * Proportional controller over the right, front and left ranges. Keeps its
 * throttle and servo outputs between calls; each band nudges them.
 */
export class RuleBasedController implements DriveController {
  readonly kind = "rule-based";
  private throttle = 0;
  private servo = 0;

  constructor(private readonly gains: RuleBasedGains = DEFAULT_RULE_GAINS) {}

  reset(): void {
    this.throttle = 0;
    this.servo = 0;
  }

  decide(input: ControllerInput): DriveCommand | null {
    const distances = input.radarDistances;
    if (distances.length < 3) {
      return null;
    }

    const right = distances[0] ?? 0;
    const front = distances[Math.floor(distances.length / 2)] ?? 0;
    const left = distances[distances.length - 1] ?? 0;
    const { k1, k2, k3, kp1, kp2 } = this.gains;

    if (right < SIDE_ALERT_CM || left < SIDE_ALERT_CM) {
      this.servo = -((left - right) * kp2);
    }

    if (front > FAR_CM) {
      if (input.power < CRUISE_POWER_CAP) {
        this.throttle += (front * k1 - front) * kp1 + CREEP_POWER;
        this.throttle = Math.min(this.throttle, CRUISE_POWER_CAP);
      }
    } else if (front > NEAR_CM) {
      if (input.power > CREEP_POWER) {
        this.throttle -= (front * k2 - front) * kp1;
        this.throttle = Math.max(this.throttle, CREEP_POWER);
      }
    } else {
      this.throttle = -(front * k3 - front) * kp1 - CREEP_POWER;
      this.servo = -(right - left) * kp2 - BACKOFF_STEER;
    }

    return { power: this.throttle, servo: this.servo };
  }
}
