export type WatermarkErrorKind =
  | "InvalidProportion"
  | "InvalidOpacity"
  | "InvalidMode"
  | "InvalidPadding"
  | "InvalidMargin"
  | "OutOfBounds"
  | "SizeMismatch"
  | "DecodeError"
  | "EncodeError"
  | "PathNotFound"
  | "InvalidOutput";

const BATCH_FATAL: ReadonlySet<WatermarkErrorKind> = new Set<WatermarkErrorKind>([
  "InvalidProportion",
  "InvalidOpacity",
  "InvalidMode",
  "InvalidPadding",
  "InvalidMargin",
  "PathNotFound",
  "InvalidOutput",
]);

export class WatermarkError extends Error {
  readonly kind: WatermarkErrorKind;
  readonly file?: string;

  constructor(kind: WatermarkErrorKind, message: string, options: { file?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "WatermarkError";
    this.kind = kind;
    this.file = options.file;
  }
}

export function isWatermarkError(err: unknown): err is WatermarkError {
  return err instanceof WatermarkError;
}

/** Kinds that would repeat for every file of a batch, so the run stops on them. */
export function isBatchFatal(kind: WatermarkErrorKind): boolean {
  return BATCH_FATAL.has(kind);
}

export function describeError(err: unknown): string {
  if (err instanceof WatermarkError) return `${err.kind}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
