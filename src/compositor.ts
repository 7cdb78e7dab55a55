import type { Offset, Placement, RgbaImage } from "./types";
import { assertFits } from "./geometry";
import { assertRgba, cloneImage } from "./utils";

/**
 * Source-over of one non-premultiplied RGBA pixel onto another, in place.
 * `si` indexes `src`, `di` indexes `dst`.
 */
function blendOver(src: Buffer, si: number, dst: Buffer, di: number): void {
  const sa = src[si + 3];
  if (sa === 0) return;
  if (sa === 255) {
    src.copy(dst, di, si, si + 4);
    return;
  }

  const srcA = sa / 255;
  const dstA = dst[di + 3] / 255;
  const outA = srcA + dstA * (1 - srcA);

  for (let c = 0; c < 3; c++) {
    const v = (src[si + c] * srcA + dst[di + c] * dstA * (1 - srcA)) / outA;
    dst[di + c] = Math.round(v);
  }
  dst[di + 3] = Math.round(outA * 255);
}

/** Pastes `src` at `offset` onto `dst` (mutated), clipped to dst's bounds. */
export function pasteOver(dst: RgbaImage, src: RgbaImage, offset: Offset): void {
  const x0 = Math.max(0, offset.x);
  const y0 = Math.max(0, offset.y);
  const x1 = Math.min(dst.width, offset.x + src.width);
  const y1 = Math.min(dst.height, offset.y + src.height);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const si = ((y - offset.y) * src.width + (x - offset.x)) * 4;
      const di = (y * dst.width + x) * 4;
      blendOver(src.data, si, dst.data, di);
    }
  }
}

/** Source-over of two images of the same size; returns a new image. */
export function alphaComposite(base: RgbaImage, layer: RgbaImage): RgbaImage {
  const out = cloneImage(base);
  for (let idx = 0; idx < out.data.length; idx += 4) {
    blendOver(layer.data, idx, out.data, idx);
  }
  return out;
}

/**
 * Stamps the watermark at every placement offset onto a transparent layer,
 * then composites the layer over the base once. Overlapping tiles blend in
 * iteration order on the layer, not against the base.
 */
export function compose(base: RgbaImage, watermark: RgbaImage, placement: Placement): RgbaImage {
  assertRgba(base, "base image");
  assertRgba(watermark, "watermark");

  const layer: RgbaImage = {
    width: base.width,
    height: base.height,
    data: Buffer.alloc(base.width * base.height * 4),
  };

  if (placement.kind === "SINGLE") {
    assertFits(base, watermark);
    pasteOver(layer, watermark, placement.offset);
  } else {
    for (const offset of placement.offsets) pasteOver(layer, watermark, offset);
  }

  return alphaComposite(base, layer);
}

// JPEG has no alpha channel: drop it the way an RGBA -> RGB conversion does.
export function flattenAlpha(image: RgbaImage): RgbaImage {
  const out = cloneImage(image);
  for (let idx = 3; idx < out.data.length; idx += 4) out.data[idx] = 255;
  return out;
}
