import * as THREE from "three";
import { logger } from "../logger";
import type { Color, ColorLookup, SpawnPose, Vec2 } from "../types";
import { normalizeAngle } from "../physics/kinematics";

export interface FinishLine {
  /** Pixels of the largest connected finish-colored region. */
  pixels: Vec2[];
  /** Midpoint of the line along its tangent. */
  center: Vec2;
  tangent: Vec2;
  normal: Vec2;
}

export interface LocateOptions {
  /** Per-channel RGB tolerance when matching the finish color. */
  tolerance?: number;
}

export interface SpawnOptions {
  borderColor: Color;
  /** Distance from the line centre to the spawn point, in pixels. */
  offsetPx?: number;
}

const NEIGHBOURS: ReadonlyArray<Vec2> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
];

const DEFAULT_SPAWN_OFFSET_PX = 20;
const SIDE_PROBE_START = 8;
const SIDE_PROBE_END = 80;
const SIDE_PROBE_STEP = 4;
const SIDE_PROBE_OFF_MAP_PENALTY = 10;
const BORDER_MATCH_DISTANCE = 60;

function matches(color: Color, target: Color, tolerance: number): boolean {
  return (
    Math.abs(color[0] - target[0]) <= tolerance &&
    Math.abs(color[1] - target[1]) <= tolerance &&
    Math.abs(color[2] - target[2]) <= tolerance
  );
}

export function collectColorPixels(map: ColorLookup, color: Color, tolerance = 0): Vec2[] {
  const pixels: Vec2[] = [];
  for (let y = 0; y < map.height; y += 1) {
    for (let x = 0; x < map.width; x += 1) {
      if (matches(map.colorAt(x, y), color, tolerance)) {
        pixels.push([x, y]);
      }
    }
  }
  return pixels;
}

/** Largest 4-connected group; ties keep the first group found. */
export function selectLargestComponent(pixels: readonly Vec2[]): Vec2[] {
  const remaining = new Set(pixels.map(([x, y]) => `${x},${y}`));
  let best: Vec2[] = [];

  for (const [sx, sy] of pixels) {
    if (!remaining.delete(`${sx},${sy}`)) {
      continue;
    }

    const component: Vec2[] = [[sx, sy]];
    const queue: Vec2[] = [[sx, sy]];
    let next = queue.pop();
    while (next) {
      const [x0, y0] = next;
      for (const [dx, dy] of NEIGHBOURS) {
        const key = `${x0 + dx},${y0 + dy}`;
        if (remaining.delete(key)) {
          const point: Vec2 = [x0 + dx, y0 + dy];
          queue.push(point);
          component.push(point);
        }
      }
      next = queue.pop();
    }

    if (component.length > best.length) {
      best = component;
    }
  }

  return best;
}

/**
 * Unit eigenvector of the largest covariance eigenvalue. Degenerate clouds
 * (empty, or a flat horizontal run) give `(1, 0)`.
 */
export function principalDirection(points: readonly Vec2[], mean: Vec2): Vec2 {
  if (points.length === 0) {
    return [1, 0];
  }

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (const [x, y] of points) {
    const dx = x - mean[0];
    const dy = y - mean[1];
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }

  const n = points.length;
  if (n > 1) {
    sxx /= n - 1;
    syy /= n - 1;
    sxy /= n - 1;
  }

  const trace = sxx + syy;
  const det = sxx * syy - sxy * sxy;
  const largest = 0.5 * (trace + Math.sqrt(Math.max(0, trace * trace - 4 * det)));

  let vx = sxy;
  let vy = largest - sxx;
  if (Math.abs(vx) + Math.abs(vy) < 1e-12) {
    vx = 1;
    vy = 0;
  }

  const norm = Math.hypot(vx, vy) || 1;
  return [vx / norm, vy / norm];
}

export function locateFinishLine(
  map: ColorLookup,
  color: Color,
  options: LocateOptions = {}
): FinishLine | null {
  const pixels = selectLargestComponent(collectColorPixels(map, color, options.tolerance ?? 0));
  if (pixels.length === 0) {
    logger.warn("finish", "no finish-colored pixels found");
    return null;
  }

  let sumX = 0;
  let sumY = 0;
  for (const [x, y] of pixels) {
    sumX += x;
    sumY += y;
  }
  const mean: Vec2 = [sumX / pixels.length, sumY / pixels.length];
  const tangent = principalDirection(pixels, mean);

  let tMin = Number.POSITIVE_INFINITY;
  let tMax = Number.NEGATIVE_INFINITY;
  for (const [x, y] of pixels) {
    const t = (x - mean[0]) * tangent[0] + (y - mean[1]) * tangent[1];
    tMin = Math.min(tMin, t);
    tMax = Math.max(tMax, t);
  }
  const tMid = 0.5 * (tMin + tMax);

  const line: FinishLine = {
    pixels,
    center: [mean[0] + tMid * tangent[0], mean[1] + tMid * tangent[1]],
    tangent,
    normal: [-tangent[1], tangent[0]]
  };

  logger.log("finish", "line located", {
    size: pixels.length,
    center: line.center,
    tangent: line.tangent
  });

  return line;
}

function sideScore(map: ColorLookup, from: Vec2, direction: Vec2, borderColor: Color): number {
  let score = 0;
  for (let k = SIDE_PROBE_START; k < SIDE_PROBE_END; k += SIDE_PROBE_STEP) {
    const x = Math.trunc(from[0] + direction[0] * k);
    const y = Math.trunc(from[1] + direction[1] * k);
    if (x < 0 || y < 0 || x >= map.width || y >= map.height) {
      score += SIDE_PROBE_OFF_MAP_PENALTY;
      continue;
    }

    const [r, g, b] = map.colorAt(x, y);
    const dr = r - borderColor[0];
    const dg = g - borderColor[1];
    const db = b - borderColor[2];
    if (dr * dr + dg * dg + db * db < BORDER_MATCH_DISTANCE * BORDER_MATCH_DISTANCE) {
      score += 1;
    }
  }
  return score;
}

/**
 * Places a vehicle beside the finish line on the side with less border
 * ahead, facing away from the line along its normal.
 */
export function spawnPose(map: ColorLookup, line: FinishLine, options: SpawnOptions): SpawnPose {
  const [nx, ny] = line.normal;
  const positive = sideScore(map, line.center, [nx, ny], options.borderColor);
  const negative = sideScore(map, line.center, [-nx, -ny], options.borderColor);
  const sign = positive <= negative ? 1 : -1;

  const offset = options.offsetPx ?? DEFAULT_SPAWN_OFFSET_PX;
  const screenDeg = THREE.MathUtils.radToDeg(Math.atan2(sign * ny, sign * nx));

  return {
    position: [
      Math.trunc(line.center[0] + sign * nx * offset),
      Math.trunc(line.center[1] + sign * ny * offset)
    ],
    heading: normalizeAngle(360 - screenDeg)
  };
}
