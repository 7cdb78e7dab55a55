import type { RgbaImage } from "./types";
import { WatermarkError } from "./errors";
import { clampByte, cloneImage } from "./utils";

export function assertOpacity(factor: number): void {
  if (!Number.isFinite(factor) || factor < 0 || factor > 1) {
    throw new WatermarkError("InvalidOpacity", `Opacity must be a float between 0.0 and 1.0 (got ${factor})`);
  }
}

/** Returns a copy with every alpha value scaled by `factor`; RGB is left alone. */
export function applyOpacity(image: RgbaImage, factor: number): RgbaImage {
  assertOpacity(factor);

  const out = cloneImage(image);
  if (factor === 1) return out;

  const data = out.data;
  for (let idx = 3; idx < data.length; idx += 4) {
    data[idx] = clampByte(Math.floor(data[idx] * factor));
  }
  return out;
}
