import * as THREE from "three";
import type { Color, ColorLookup, RadarReading, SensorSample, Vec2 } from "../types";
import { colorsEqual, sampleColor } from "../track/rasterMap";
import type { UnitConverter } from "./units";

// Inverse-distance response of the IR distance sensor.
const DIGITAL_GAIN = 23962;
const DIGITAL_OFFSET = -20;
const ANALOG_GAIN = 58.5;
const ANALOG_OFFSET = -0.05;

export const DEFAULT_SWEEP_DEG = 60;
const MAX_RAYS = 720;

/**
 * Marches a ray outward one pixel at a time until it meets the border or
 * reaches `maxLength`. Off-map pixels count as border.
 */
export function castRadar(
  center: Vec2,
  headingDeg: number,
  offsetDeg: number,
  map: ColorLookup,
  maxLength: number,
  borderColor: Color
): RadarReading {
  const angle = THREE.MathUtils.degToRad(360 - (headingDeg + offsetDeg));
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  const limit = Math.trunc(maxLength);
  const [cx, cy] = center;

  let length = 0;
  let x = Math.trunc(cx + cos * length);
  let y = Math.trunc(cy + sin * length);

  while (!colorsEqual(sampleColor(map, x, y, borderColor), borderColor) && length < limit) {
    length += 1;
    x = Math.trunc(cx + cos * length);
    y = Math.trunc(cy + sin * length);
  }

  // Truncating the endpoint can push it just past the nominal ray length.
  const measured = Math.trunc(Math.hypot(x - cx, y - cy));
  const distance = Number.isFinite(measured) ? measured : 0;

  return {
    endpoint: [x, y],
    distance: limit >= 0 && distance > limit ? limit : distance
  };
}

export interface RadarFanOptions {
  sweepDeg?: number;
  stepDeg?: number;
  maxLength: number;
  borderColor: Color;
}

/** Rays from -sweep to +sweep inclusive: right side first, left side last. */
export function collectRadars(
  center: Vec2,
  headingDeg: number,
  map: ColorLookup,
  options: RadarFanOptions
): RadarReading[] {
  const sweep = options.sweepDeg ?? DEFAULT_SWEEP_DEG;
  const step = options.stepDeg ?? sweep;
  const readings: RadarReading[] = [];

  const intervals = step > 0 ? Math.floor((2 * sweep) / step + 1e-9) : Number.NaN;
  if (!Number.isFinite(intervals) || intervals > MAX_RAYS) {
    return [castRadar(center, headingDeg, 0, map, options.maxLength, options.borderColor)];
  }

  for (let index = 0; index <= intervals; index += 1) {
    const offset = -sweep + index * step;
    readings.push(castRadar(center, headingDeg, offset, map, options.maxLength, options.borderColor));
  }

  return readings;
}

export function radarDistances(readings: readonly RadarReading[]): number[] {
  return readings.map((reading) => Math.trunc(reading.distance));
}

export function linearizeDA(distancesCm: readonly number[]): SensorSample[] {
  return distancesCm.map((distance) => {
    if (distance === 0) {
      return { digitalBit: 0, analogVolt: 0 };
    }

    return {
      digitalBit: Math.trunc(DIGITAL_GAIN / distance + DIGITAL_OFFSET),
      analogVolt: ANALOG_GAIN / distance + ANALOG_OFFSET
    };
  });
}

export function sampleSensors(readings: readonly RadarReading[], units: UnitConverter): SensorSample[] {
  return linearizeDA(radarDistances(readings).map((distance) => units.toReal(distance)));
}
