import type { TrackReference } from "../types";

export interface UnitConverter {
  /** Raster pixels to centimetres. */
  toReal(px: number): number;
  /** Centimetres to raster pixels. */
  toSim(cm: number): number;
}

export const TRACK_WIDTH_CM = 1900;
export const DISPLAY_SCALE = 0.8;
export const TRACK_WIDTH_PX = Math.trunc(1920 * DISPLAY_SCALE);
export const TRACK_HEIGHT_PX = Math.trunc(1080 * DISPLAY_SCALE);

export function createUnitConverter(
  reference: Pick<TrackReference, "trackWidthCm" | "widthPx">
): UnitConverter {
  const { trackWidthCm, widthPx } = reference;

  return {
    toReal: (px) => (px * trackWidthCm) / widthPx,
    toSim: (cm) => (cm * widthPx) / trackWidthCm
  };
}

export const defaultUnits: UnitConverter = createUnitConverter({
  trackWidthCm: TRACK_WIDTH_CM,
  widthPx: TRACK_WIDTH_PX
});
