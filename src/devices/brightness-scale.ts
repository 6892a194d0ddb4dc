import { clampPercent } from "../core/curve-table.js";

export const DEFAULT_BRIGHTNESS_SCALE = 255;

export function percentToByte(percent: number, scale = DEFAULT_BRIGHTNESS_SCALE): number {
  return Math.round((clampPercent(percent) * scale) / 100);
}

/** Any non-zero device brightness maps to at least 1 %, so a lit light never reads as off. */
export function byteToPercent(value: number, scale = DEFAULT_BRIGHTNESS_SCALE): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (value >= scale) return 100;
  return Math.max(1, clampPercent((value * 100) / scale));
}
