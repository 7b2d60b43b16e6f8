import type { ControllerInput, ControllerKind, DriveCommand } from "../types";

/** Turns one tick of sensor input into an actuator command, or null to hold. */
export interface DriveController {
  readonly kind: ControllerKind;
  decide(input: ControllerInput): DriveCommand | null;
  reset(): void;
}
