import type {
  NamedPosition,
  Offset,
  Placement,
  PlacementOptions,
  Position,
  RescaleMode,
  Size,
  TilePattern,
} from "./types";
import { WatermarkError } from "./errors";
import { isNonNegativeInteger } from "./utils";

const NAMED_POSITIONS: readonly NamedPosition[] = [
  "UPPER_LEFT",
  "UPPER_RIGHT",
  "LOWER_LEFT",
  "LOWER_RIGHT",
  "MIDDLE",
];

export function isNamedPosition(value: unknown): value is NamedPosition {
  return typeof value === "string" && NAMED_POSITIONS.some((p) => p === value);
}

export function assertProportion(proportion: number): void {
  if (!Number.isFinite(proportion) || proportion <= 0) {
    throw new WatermarkError("InvalidProportion", `Proportion must be greater than 0 (got ${proportion})`);
  }
  if (proportion > 1) {
    throw new WatermarkError("InvalidProportion", `Proportion must be less than or equal to 1 (got ${proportion})`);
  }
}

export function assertRescaleMode(mode: string): asserts mode is RescaleMode {
  if (mode !== "LINEAR" && mode !== "AREA") {
    throw new WatermarkError("InvalidMode", `Rescale mode must be 'LINEAR' or 'AREA' (got '${mode}')`);
  }
}

/**
 * Target size of the watermark on a given base image.
 *
 * LINEAR scales the watermark width to `proportion` of the base width;
 * AREA scales it to cover `proportion` of the base area. Both keep the
 * watermark's aspect ratio and never go below 1x1.
 */
export function computeWatermarkSize(
  base: Size,
  watermark: Size,
  mode: RescaleMode,
  proportion: number
): Size {
  assertProportion(proportion);
  assertRescaleMode(mode);
  assertNonEmpty(watermark);

  const scale =
    mode === "LINEAR"
      ? (base.width * proportion) / watermark.width
      : Math.sqrt((base.width * base.height * proportion) / (watermark.width * watermark.height));

  return {
    width: Math.max(1, Math.floor(watermark.width * scale)),
    height: Math.max(1, Math.floor(watermark.height * scale)),
  };
}

/**
 * Tile origins in row-major order. Every origin lies inside the base;
 * tiles hanging over the far edges are kept and clipped when pasted.
 */
export function* tileOffsets(
  base: Size,
  watermark: Size,
  padding: number,
  pattern: TilePattern = "GRID"
): Generator<Offset> {
  const stepX = watermark.width + padding;
  const stepY = watermark.height + padding;

  for (let y = 0, row = 0; y < base.height; y += stepY, row++) {
    for (let x = 0, col = 0; x < base.width; x += stepX, col++) {
      if (pattern === "CHECKERBOARD" && (row + col) % 2 !== 0) continue;
      yield { x, y };
    }
  }
}

function namedOffset(base: Size, watermark: Size, position: NamedPosition, margin: number): Offset {
  const right = base.width - watermark.width - margin;
  const bottom = base.height - watermark.height - margin;

  switch (position) {
    case "UPPER_LEFT":
      return { x: margin, y: margin };
    case "UPPER_RIGHT":
      return { x: right, y: margin };
    case "LOWER_LEFT":
      return { x: margin, y: bottom };
    case "LOWER_RIGHT":
      return { x: right, y: bottom };
    case "MIDDLE":
      return {
        x: Math.floor((base.width - watermark.width) / 2),
        y: Math.floor((base.height - watermark.height) / 2),
      };
  }
}

function explicitOffset(base: Size, position: Offset): Offset {
  const { x, y } = position;
  if (!isNonNegativeInteger(x) || !isNonNegativeInteger(y)) {
    throw new WatermarkError("OutOfBounds", `Position coordinates must be non-negative integers (got ${x},${y})`);
  }
  if (x >= base.width || y >= base.height) {
    throw new WatermarkError(
      "OutOfBounds",
      `Position ${x},${y} lies outside the ${base.width}x${base.height} image`
    );
  }
  return { x, y };
}

export function assertFits(base: Size, watermark: Size): void {
  if (watermark.width > base.width || watermark.height > base.height) {
    throw new WatermarkError(
      "SizeMismatch",
      `Watermark ${watermark.width}x${watermark.height} does not fit on ${base.width}x${base.height} image`
    );
  }
}

function assertNonEmpty(watermark: Size): void {
  if (watermark.width <= 0 || watermark.height <= 0) {
    throw new WatermarkError("SizeMismatch", "Watermark image dimensions cannot be zero");
  }
}

export function computePlacement(base: Size, watermark: Size, options: PlacementOptions): Placement {
  assertNonEmpty(watermark);
  const { mode, position } = options;
  const margin = options.margin ?? 0;
  const padding = options.padding ?? 0;
  const pattern = options.pattern ?? "GRID";

  if (mode === "TILE") {
    if (!isNonNegativeInteger(padding)) {
      throw new WatermarkError("InvalidPadding", `Tile padding must be a non-negative integer (got ${padding})`);
    }
    if (pattern !== "GRID" && pattern !== "CHECKERBOARD") {
      throw new WatermarkError("InvalidMode", `Tile pattern must be 'GRID' or 'CHECKERBOARD' (got '${pattern}')`);
    }
    return {
      kind: "TILE",
      offsets: { [Symbol.iterator]: () => tileOffsets(base, watermark, padding, pattern) },
    };
  }
  if (mode !== "SINGLE") {
    throw new WatermarkError("InvalidMode", `Mode must be 'SINGLE' or 'TILE' (got '${mode}')`);
  }

  return { kind: "SINGLE", offset: singleOffset(base, watermark, position, margin) };
}

function singleOffset(base: Size, watermark: Size, position: Position, margin: number): Offset {
  if (typeof position !== "string") return explicitOffset(base, position);

  if (!isNamedPosition(position)) {
    throw new WatermarkError("InvalidMode", `Unknown position '${position}'`);
  }
  if (!isNonNegativeInteger(margin)) {
    throw new WatermarkError("InvalidMargin", `Margin must be a non-negative integer (got ${margin})`);
  }
  assertFits(base, watermark);

  const offset = namedOffset(base, watermark, position, margin);
  if (offset.x < 0 || offset.y < 0) {
    throw new WatermarkError(
      "SizeMismatch",
      `Watermark ${watermark.width}x${watermark.height} with margin ${margin} does not fit on ${base.width}x${base.height} image`
    );
  }
  return offset;
}
