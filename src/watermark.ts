import { Jimp, ResizeStrategy } from "jimp";
import { PNG } from "pngjs";
import * as jpeg from "jpeg-js";

import type { OutputFormat, RgbaImage, WatermarkOptions, WatermarkResult, ResolvedOptions } from "./types";
import { WatermarkError, describeError } from "./errors";
import { computePlacement, computeWatermarkSize } from "./geometry";
import { applyOpacity } from "./opacity";
import { compose, flattenAlpha } from "./compositor";
import { resolveOptions } from "./config";
import { Logger, silentLogger } from "./logger";

export type JimpImage = Awaited<ReturnType<typeof Jimp.read>>;

export function encodePngFromBitmap(image: RgbaImage): Buffer {
  const { width, height, data } = image; // RGBA
  const png = new PNG({ width, height });
  png.data = Buffer.from(data);
  return PNG.sync.write(png);
}

export function encodeJpegFromBitmap(image: RgbaImage, quality = 90): Buffer {
  const { width, height, data } = image; // RGBA, alpha ignored by the encoder
  return jpeg.encode({ data: Buffer.from(data), width, height }, quality).data;
}

export function encodeImage(image: RgbaImage, format: OutputFormat, quality = 95): Buffer {
  try {
    if (format === "png") return encodePngFromBitmap(image);
    if (format === "jpeg") return encodeJpegFromBitmap(flattenAlpha(image), quality);
  } catch (err) {
    throw new WatermarkError("EncodeError", `Could not encode ${format}: ${describeError(err)}`, { cause: err });
  }
  throw new WatermarkError("EncodeError", `Unsupported output format '${String(format)}'`);
}

export async function readImageCompat(imageBuffer: Buffer, label = "image"): Promise<JimpImage> {
  try {
    return await Jimp.read(imageBuffer);
  } catch (err) {
    throw new WatermarkError("DecodeError", `Could not decode ${label}: ${describeError(err)}`, { cause: err });
  }
}

// jimp always decodes to RGBA, so opaque sources arrive with alpha 255
export function toRgbaImage(img: JimpImage): RgbaImage {
  const { width, height, data } = img.bitmap;
  return { width, height, data: Buffer.from(data) };
}

/**
 * Rescale, fade, place and composite `mark` onto `base`.
 * Neither input is modified.
 */
export function renderWatermark(
  base: RgbaImage,
  mark: JimpImage,
  options: ResolvedOptions,
  logger: Logger = silentLogger
): RgbaImage {
  logger.debug(`Original image size: ${base.width}x${base.height}`);
  logger.debug(`Watermark image size: ${mark.bitmap.width}x${mark.bitmap.height}`);

  const size = computeWatermarkSize(
    base,
    { width: mark.bitmap.width, height: mark.bitmap.height },
    options.rescaleMode,
    options.proportion
  );

  let scaled: RgbaImage;
  if (size.width === mark.bitmap.width && size.height === mark.bitmap.height) {
    scaled = toRgbaImage(mark);
  } else {
    const copy = mark.clone();
    copy.resize({ w: size.width, h: size.height, mode: ResizeStrategy.BICUBIC });
    scaled = toRgbaImage(copy);
    logger.debug(`Watermark resized to: ${size.width}x${size.height} (${options.rescaleMode})`);
  }

  const faded = applyOpacity(scaled, options.opacity);

  const placement = computePlacement(base, size, {
    mode: options.mode,
    position: options.position,
    margin: options.margin,
    padding: options.tilePadding,
    pattern: options.pattern,
  });
  if (placement.kind === "SINGLE") {
    logger.debug(`Watermark placed at position: ${placement.offset.x},${placement.offset.y}`);
  } else {
    logger.debug(`Tiling watermark (${options.pattern}, padding ${options.tilePadding})`);
  }

  return compose(base, faded, placement);
}

export async function addWatermark(
  imageBuffer: Buffer,
  watermarkBuffer: Buffer,
  options: WatermarkOptions & { output?: OutputFormat } = {}
): Promise<WatermarkResult> {
  const resolved = resolveOptions(options);
  const output = options.output ?? "png";

  const base = toRgbaImage(await readImageCompat(imageBuffer, "image"));
  const mark = await readImageCompat(watermarkBuffer, "watermark");

  const result = renderWatermark(base, mark, resolved);
  return {
    image: encodeImage(result, output, resolved.jpegQuality),
    width: result.width,
    height: result.height,
  };
}
