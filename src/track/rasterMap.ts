import type { Color, ColorLookup } from "../types";

export const TRANSPARENT: Color = [0, 0, 0, 0];

export function colorsEqual(a: Color, b: Color): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

/**
 * Samples the raster at truncated integer coordinates. Off-map and
 * non-finite coordinates read as `outside`.
 */
export function sampleColor(map: ColorLookup, x: number, y: number, outside: Color): Color {
  const px = Math.trunc(x);
  const py = Math.trunc(y);
  if (!Number.isFinite(px) || !Number.isFinite(py)) {
    return outside;
  }
  if (px < 0 || py < 0 || px >= map.width || py >= map.height) {
    return outside;
  }

  return map.colorAt(px, py);
}

/** RGBA raster in row-major order, four bytes per pixel. */
export class RasterMap implements ColorLookup {
  private readonly pixels: Uint8ClampedArray;

  constructor(
    readonly width: number,
    readonly height: number,
    pixels?: Uint8ClampedArray
  ) {
    const expected = width * height * 4;
    if (pixels && pixels.length !== expected) {
      throw new Error(
        `RasterMap: expected ${expected} bytes for ${width}x${height}, got ${pixels.length}`
      );
    }
    this.pixels = pixels ?? new Uint8ClampedArray(expected);
  }

  /**
   * Builds a map from equal-length character rows. Each character is looked
   * up in `palette`; unknown characters are transparent.
   */
  static fromRows(rows: readonly string[], palette: Readonly<Record<string, Color>>): RasterMap {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    const map = new RasterMap(width, height);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(`RasterMap.fromRows: row ${y} has ${row.length} columns, expected ${width}`);
      }
      for (let x = 0; x < width; x += 1) {
        map.setColor(x, y, palette[row.charAt(x)] ?? TRANSPARENT);
      }
    });

    return map;
  }

  colorAt(x: number, y: number): Color {
    const offset = (y * this.width + x) * 4;
    return [
      this.pixels[offset] ?? 0,
      this.pixels[offset + 1] ?? 0,
      this.pixels[offset + 2] ?? 0,
      this.pixels[offset + 3] ?? 0
    ];
  }

  setColor(x: number, y: number, color: Color): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }

    const offset = (y * this.width + x) * 4;
    this.pixels.set(color, offset);
  }

  fillRect(x: number, y: number, width: number, height: number, color: Color): void {
    for (let row = y; row < y + height; row += 1) {
      for (let column = x; column < x + width; column += 1) {
        this.setColor(column, row, color);
      }
    }
  }
}
