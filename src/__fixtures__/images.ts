import { PNG } from "pngjs";
import type { RgbaImage } from "../types";

export type Rgba = [number, number, number, number];

export function solidImage(width: number, height: number, color: Rgba): RgbaImage {
  const data = Buffer.alloc(width * height * 4);
  for (let idx = 0; idx < data.length; idx += 4) {
    data[idx] = color[0];
    data[idx + 1] = color[1];
    data[idx + 2] = color[2];
    data[idx + 3] = color[3];
  }
  return { width, height, data };
}

export function pixelAt(image: RgbaImage, x: number, y: number): Rgba {
  const idx = (y * image.width + x) * 4;
  const d = image.data;
  return [d[idx], d[idx + 1], d[idx + 2], d[idx + 3]];
}

export function setPixel(image: RgbaImage, x: number, y: number, color: Rgba): void {
  const idx = (y * image.width + x) * 4;
  image.data[idx] = color[0];
  image.data[idx + 1] = color[1];
  image.data[idx + 2] = color[2];
  image.data[idx + 3] = color[3];
}

export function solidPng(width: number, height: number, color: Rgba): Buffer {
  const png = new PNG({ width, height });
  png.data = solidImage(width, height, color).data;
  return PNG.sync.write(png);
}

export function decodePng(buffer: Buffer): RgbaImage {
  const png = PNG.sync.read(buffer);
  return { width: png.width, height: png.height, data: png.data };
}
