export * from "./types";
export { WatermarkError, WatermarkErrorKind, describeError, isBatchFatal, isWatermarkError } from "./errors";
export { computeWatermarkSize, computePlacement, tileOffsets } from "./geometry";
export { applyOpacity } from "./opacity";
export { compose, pasteOver, alphaComposite, flattenAlpha } from "./compositor";
export { DEFAULT_OPTIONS, loadEnvDefaults, parsePosition, resolveOptions } from "./config";
export {
  addWatermark,
  renderWatermark,
  readImageCompat,
  toRgbaImage,
  encodeImage,
  encodePngFromBitmap,
  encodeJpegFromBitmap,
} from "./watermark";
export { runBatch, collectInputs, outputPathFor, BatchRequest, BatchSummary, FileOutcome } from "./batch";
export { createLogger, silentLogger, Logger } from "./logger";
