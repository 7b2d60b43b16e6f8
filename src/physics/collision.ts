import { logger } from "../logger";
import type {
  CollisionCorrection,
  CollisionPolicy,
  Color,
  ColorLookup,
  LapTimeListener,
  ReboundTuning,
  Vec2
} from "../types";
import { colorsEqual, sampleColor } from "../track/rasterMap";
import { CORNER_ORDER, FRONT_LEFT, centroid } from "./geometry";
import { reboundAction } from "./rebound";

export const FINISH_CORNER_INDEX = FRONT_LEFT;

export interface CollisionOptions {
  borderColor: Color;
  finishColor: Color;
  rebound: ReboundTuning;
  correction: CollisionCorrection;
  onLapTime?: LapTimeListener;
}

export interface CollisionFlags {
  controlDisabled: boolean;
  positionDelta: Vec2;
}

export interface CollisionOutcome {
  speed: number;
  heading: number;
  alive: boolean;
  finished: boolean;
  lapTime: number;
  flags: CollisionFlags;
}

function anyCornerInBorder(
  corners: readonly Vec2[],
  offset: Vec2,
  map: ColorLookup,
  borderColor: Color
): boolean {
  return corners.some(([x, y]) =>
    colorsEqual(sampleColor(map, x + offset[0], y + offset[1], borderColor), borderColor)
  );
}

/**
 * Extends a rebound displacement toward the body centre until no corner
 * samples border, within `correction.maxAttempts` steps.
 */
export function pushOutOfWall(
  corners: readonly Vec2[],
  hitPoint: Vec2,
  displacement: Vec2,
  map: ColorLookup,
  borderColor: Color,
  correction: CollisionCorrection
): Vec2 {
  const [cx, cy] = centroid(corners);
  let dx = cx - hitPoint[0];
  let dy = cy - hitPoint[1];
  const norm = Math.hypot(dx, dy) || 1;
  dx /= norm;
  dy /= norm;

  const offset: Vec2 = [displacement[0], displacement[1]];
  for (let attempt = 0; attempt < correction.maxAttempts; attempt += 1) {
    if (!anyCornerInBorder(corners, offset, map, borderColor)) {
      logger.log("collision", "push-out settled", { attempt, offset });
      return offset;
    }

    offset[0] += dx * correction.stepPx;
    offset[1] += dy * correction.stepPx;
  }

  return offset;
}

/**
 * Samples every corner against the map in `CORNER_ORDER`. The finish line is
 * checked only at the front-left corner; the first border contact is
 * resolved with `policy` and ends the scan.
 */
export function collisionStep(
  corners: readonly Vec2[],
  map: ColorLookup,
  policy: CollisionPolicy,
  speed: number,
  headingDeg: number,
  tickTime: number,
  options: CollisionOptions
): CollisionOutcome {
  const outcome: CollisionOutcome = {
    speed,
    heading: headingDeg,
    alive: true,
    finished: false,
    lapTime: 0,
    flags: { controlDisabled: false, positionDelta: [0, 0] }
  };

  for (let index = 0; index < corners.length; index += 1) {
    const corner = corners[index];
    if (!corner) {
      continue;
    }

    const color = sampleColor(map, corner[0], corner[1], options.borderColor);

    if (index === FINISH_CORNER_INDEX && colorsEqual(color, options.finishColor)) {
      outcome.finished = true;
      outcome.lapTime = tickTime;
      options.onLapTime?.(tickTime);
      logger.log("collision", "finish line reached", { lapTime: tickTime });
    }

    if (!colorsEqual(color, options.borderColor)) {
      continue;
    }

    logger.log("collision", "border hit", {
      corner: CORNER_ORDER[index] ?? index,
      point: [Math.trunc(corner[0]), Math.trunc(corner[1])],
      policy
    });

    switch (policy) {
      case "rebound": {
        const result = reboundAction(
          corner,
          index,
          outcome.heading,
          outcome.speed,
          map,
          options.borderColor,
          options.rebound
        );
        outcome.speed = result.speed;
        outcome.heading = result.heading;
        outcome.flags.positionDelta = pushOutOfWall(
          corners,
          corner,
          result.displacement,
          map,
          options.borderColor,
          options.correction
        );
        break;
      }
      case "stop":
        outcome.speed = 0;
        outcome.flags.controlDisabled = true;
        break;
      case "remove":
        outcome.alive = false;
        break;
    }
    break;
  }

  return outcome;
}
