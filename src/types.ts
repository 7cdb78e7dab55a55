// RGBA, row-major, non-premultiplied. Same shape as a jimp bitmap.
export interface RgbaImage {
  width: number;
  height: number;
  data: Buffer;
}

export interface Size {
  width: number;
  height: number;
}

export interface Offset {
  x: number;
  y: number;
}

export type WatermarkMode = "SINGLE" | "TILE";
export type RescaleMode = "LINEAR" | "AREA";
export type TilePattern = "GRID" | "CHECKERBOARD";
export type OutputFormat = "png" | "jpeg";

export type NamedPosition =
  | "UPPER_LEFT"
  | "UPPER_RIGHT"
  | "LOWER_LEFT"
  | "LOWER_RIGHT"
  | "MIDDLE";

export type Position = NamedPosition | Offset;

export type Placement =
  | { kind: "SINGLE"; offset: Offset }
  | { kind: "TILE"; offsets: Iterable<Offset> };

export interface PlacementOptions {
  mode: WatermarkMode;
  position: Position;
  margin?: number;       // corner inset, SINGLE only
  padding?: number;      // gap between tiles, TILE only
  pattern?: TilePattern;
}

export interface WatermarkOptions {
  mode?: WatermarkMode;
  position?: Position;
  opacity?: number;
  proportion?: number;
  rescaleMode?: RescaleMode;
  margin?: number;
  tilePadding?: number;
  pattern?: TilePattern;
  jpegQuality?: number;
}

export type ResolvedOptions = Required<WatermarkOptions>;

export interface WatermarkResult {
  image: Buffer;
  width: number;
  height: number;
}
