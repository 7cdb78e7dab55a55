import type { Position, ResolvedOptions, WatermarkOptions } from "./types";
import { WatermarkError } from "./errors";
import { assertProportion, assertRescaleMode, isNamedPosition } from "./geometry";
import { assertOpacity } from "./opacity";
import { isNonNegativeInteger } from "./utils";

export const DEFAULT_OPTIONS: ResolvedOptions = {
  mode: "SINGLE",
  position: "LOWER_RIGHT",
  opacity: 0.5,
  proportion: 0.1,
  rescaleMode: "LINEAR",
  margin: 20,
  tilePadding: 50,
  pattern: "GRID",
  jpegQuality: 95,
};

/** Accepts a named position (any case) or "x,y". */
export function parsePosition(text: string): Position {
  const trimmed = text.trim();
  const upper = trimmed.toUpperCase();
  if (isNamedPosition(upper)) return upper;

  const match = /^(-?\d+)\s*,\s*(-?\d+)$/.exec(trimmed);
  if (!match) {
    throw new WatermarkError(
      "InvalidMode",
      `Position must be UPPER_LEFT, UPPER_RIGHT, LOWER_LEFT, LOWER_RIGHT, MIDDLE or 'x,y' (got '${text}')`
    );
  }
  const x = Number(match[1]);
  const y = Number(match[2]);
  if (x < 0 || y < 0) {
    throw new WatermarkError("OutOfBounds", `Position coordinates must be non-negative (got ${x},${y})`);
  }
  return { x, y };
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw.trim().toUpperCase();
}

/**
 * Defaults overridden by WATERMARK_* variables. Values are not validated
 * here; resolveOptions does that once for the whole run.
 */
export function loadEnvDefaults(env: NodeJS.ProcessEnv = process.env): WatermarkOptions {
  const options: WatermarkOptions = {};

  const mode = envString(env, "WATERMARK_MODE");
  if (mode === "SINGLE" || mode === "TILE") options.mode = mode;
  else if (mode !== undefined) throw new WatermarkError("InvalidMode", `WATERMARK_MODE must be 'SINGLE' or 'TILE' (got '${mode}')`);

  const rescale = envString(env, "WATERMARK_RESCALE_MODE");
  if (rescale !== undefined) {
    assertRescaleMode(rescale);
    options.rescaleMode = rescale;
  }

  const pattern = envString(env, "WATERMARK_PATTERN");
  if (pattern === "GRID" || pattern === "CHECKERBOARD") options.pattern = pattern;
  else if (pattern !== undefined) throw new WatermarkError("InvalidMode", `WATERMARK_PATTERN must be 'GRID' or 'CHECKERBOARD' (got '${pattern}')`);

  const position = env.WATERMARK_POSITION;
  if (position !== undefined && position.trim() !== "") options.position = parsePosition(position);

  const opacity = envNumber(env, "WATERMARK_OPACITY");
  if (opacity !== undefined) options.opacity = opacity;
  const proportion = envNumber(env, "WATERMARK_PROPORTION");
  if (proportion !== undefined) options.proportion = proportion;
  const margin = envNumber(env, "WATERMARK_MARGIN");
  if (margin !== undefined) options.margin = margin;
  const tilePadding = envNumber(env, "WATERMARK_TILE_PADDING");
  if (tilePadding !== undefined) options.tilePadding = tilePadding;
  const jpegQuality = envNumber(env, "WATERMARK_JPEG_QUALITY");
  if (jpegQuality !== undefined) options.jpegQuality = jpegQuality;

  return options;
}

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/**
 * Merges options over defaults and checks every run-wide parameter,
 * throwing on the first one that is out of range.
 */
export function resolveOptions(
  options: WatermarkOptions = {},
  defaults: ResolvedOptions = DEFAULT_OPTIONS
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    mode: pick(options.mode, defaults.mode),
    position: pick(options.position, defaults.position),
    opacity: pick(options.opacity, defaults.opacity),
    proportion: pick(options.proportion, defaults.proportion),
    rescaleMode: pick(options.rescaleMode, defaults.rescaleMode),
    margin: pick(options.margin, defaults.margin),
    tilePadding: pick(options.tilePadding, defaults.tilePadding),
    pattern: pick(options.pattern, defaults.pattern),
    jpegQuality: pick(options.jpegQuality, defaults.jpegQuality),
  };

  assertProportion(resolved.proportion);
  assertOpacity(resolved.opacity);
  assertRescaleMode(resolved.rescaleMode);

  if (resolved.mode !== "SINGLE" && resolved.mode !== "TILE") {
    throw new WatermarkError("InvalidMode", `Mode must be 'SINGLE' or 'TILE' (got '${String(resolved.mode)}')`);
  }
  if (resolved.pattern !== "GRID" && resolved.pattern !== "CHECKERBOARD") {
    throw new WatermarkError("InvalidMode", `Tile pattern must be 'GRID' or 'CHECKERBOARD' (got '${String(resolved.pattern)}')`);
  }
  if (typeof resolved.position === "string") {
    if (!isNamedPosition(resolved.position)) {
      throw new WatermarkError("InvalidMode", `Unknown position '${String(resolved.position)}'`);
    }
  } else if (!isNonNegativeInteger(resolved.position.x) || !isNonNegativeInteger(resolved.position.y)) {
    throw new WatermarkError(
      "OutOfBounds",
      `Position coordinates must be non-negative integers (got ${resolved.position.x},${resolved.position.y})`
    );
  }
  if (!isNonNegativeInteger(resolved.margin)) {
    throw new WatermarkError("InvalidMargin", `Margin must be a non-negative integer (got ${resolved.margin})`);
  }
  if (!isNonNegativeInteger(resolved.tilePadding)) {
    throw new WatermarkError("InvalidPadding", `Tile padding must be a non-negative integer (got ${resolved.tilePadding})`);
  }
  if (!Number.isInteger(resolved.jpegQuality) || resolved.jpegQuality < 1 || resolved.jpegQuality > 100) {
    throw new WatermarkError("EncodeError", `JPEG quality must be an integer from 1 to 100 (got ${resolved.jpegQuality})`);
  }

  return resolved;
}
