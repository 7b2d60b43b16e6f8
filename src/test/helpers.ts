import { logger } from "../logger";
import type { Color, ColorLookup } from "../types";

export const FREE: Color = [40, 40, 40, 255];

/** Map of the given size that reads `color` everywhere. */
export function uniformMap(color: Color, width = 1536, height = 864): ColorLookup {
  return { width, height, colorAt: () => color };
}

/** Captures logger output while `run` executes. */
export function collectLines(run: () => void): string[] {
  const lines: string[] = [];
  const wasEnabled = logger.isEnabled();
  const previous = logger.setSink((line) => {
    lines.push(line);
  });
  logger.setEnabled(true);
  try {
    run();
  } finally {
    logger.setSink(previous);
    logger.setEnabled(wasEnabled);
  }
  return lines;
}
