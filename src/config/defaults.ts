import type { Color, SimConfig } from "../types";
import { DISPLAY_SCALE, TRACK_HEIGHT_PX, TRACK_WIDTH_CM, TRACK_WIDTH_PX } from "../physics/units";

export const BORDER_COLOR: Color = [255, 255, 255, 255];
export const FINISH_LINE_COLOR: Color = [237, 28, 36, 255];

export const DEFAULT_SIM_CONFIG: SimConfig = {
  track: {
    trackWidthCm: TRACK_WIDTH_CM,
    widthPx: TRACK_WIDTH_PX,
    heightPx: TRACK_HEIGHT_PX,
    boundaryMarginPx: 10 * DISPLAY_SCALE
  },
  vehicle: {
    lengthCm: 40,
    widthCm: 20,
    wheelbaseCm: 25,
    trackWidthCm: 10
  },
  actuation: {
    maxPower: 100,
    deadzone: 18,
    counterThrustPower: -30,
    pauseTicks: 1,
    steerLimitDeg: 10
  },
  radar: {
    sweepDeg: 60,
    stepDeg: 60,
    maxLengthRatio: 130 / 1900
  },
  rebound: {
    probeRadiusPx: 15,
    probeStepDeg: 10,
    probePairOffsetDeg: 15,
    smallDamping: 0.8,
    mediumDamping: 0.5,
    largeDamping: 0.2,
    displacementFactor: 8,
    displacementGain: -1.7,
    turnFactor: 7,
    turnOffset: 1
  },
  correction: {
    maxAttempts: 6,
    stepPx: 4
  },
  borderColor: BORDER_COLOR,
  finishColor: FINISH_LINE_COLOR,
  collisionPolicy: "rebound",
  tickSeconds: 0.01,
  sensorsEnabled: true,
  debug: false
};
