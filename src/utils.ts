import * as path from "path";
import type { OutputFormat, RgbaImage } from "./types";
import { WatermarkError } from "./errors";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg"] as const;

export function clampByte(v: number): number {
  return Math.max(0, Math.min(255, v));
}

export function isNonNegativeInteger(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

export function isImagePath(file: string): boolean {
  const ext = path.extname(file).toLowerCase();
  return IMAGE_EXTENSIONS.some((e) => e === ext);
}

export function formatFromPath(file: string): OutputFormat | null {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".png") return "png";
  if (ext === ".jpg" || ext === ".jpeg") return "jpeg";
  return null;
}

export function extensionFor(format: OutputFormat): string {
  return format === "jpeg" ? ".jpg" : ".png";
}

// data.length must match the declared size, 4 bytes per pixel
export function assertRgba(image: RgbaImage, label: string): void {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new WatermarkError("DecodeError", `${label}: invalid dimensions ${width}x${height}`);
  }
  if (data.length !== width * height * 4) {
    throw new WatermarkError(
      "DecodeError",
      `${label}: expected ${width * height * 4} RGBA bytes, got ${data.length}`
    );
  }
}

export function cloneImage(image: RgbaImage): RgbaImage {
  return { width: image.width, height: image.height, data: Buffer.from(image.data) };
}
