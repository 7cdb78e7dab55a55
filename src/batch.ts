import * as fs from "fs/promises";
import * as path from "path";

import type { OutputFormat, ResolvedOptions, WatermarkOptions } from "./types";
import { WatermarkError, describeError, isBatchFatal, isWatermarkError } from "./errors";
import { resolveOptions } from "./config";
import { Logger, createLogger } from "./logger";
import { encodeImage, readImageCompat, renderWatermark, toRgbaImage, JimpImage } from "./watermark";
import { extensionFor, formatFromPath, isImagePath } from "./utils";

export interface BatchRequest {
  input: string;         // image file or directory of images
  watermark: string;
  outputDir: string;
  options?: WatermarkOptions;
  format?: OutputFormat; // forces every output to this format
  suffix?: string;       // appended to each output's base name
  logger?: Logger;
}

export interface FileOutcome {
  input: string;
  ok: boolean;
  output?: string;
  error?: WatermarkError;
}

export interface BatchSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  results: FileOutcome[];
}

async function statOrNull(p: string) {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/** Image files to process, in name order. Non-image files in a directory are skipped. */
export async function collectInputs(input: string): Promise<string[]> {
  const stat = await statOrNull(input);
  if (!stat) {
    throw new WatermarkError("PathNotFound", `The input path '${input}' does not exist`, { file: input });
  }

  if (stat.isDirectory()) {
    const entries = await fs.readdir(input, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && isImagePath(e.name))
      .map((e) => e.name)
      .sort()
      .map((name) => path.join(input, name));
  }

  if (!isImagePath(input)) {
    throw new WatermarkError("DecodeError", `Input file is not a valid image: '${input}'`, { file: input });
  }
  return [input];
}

export function outputPathFor(input: string, outputDir: string, format: OutputFormat | undefined, suffix = ""): string {
  const parsed = path.parse(input);
  const ext = format ? extensionFor(format) : parsed.ext;
  return path.join(outputDir, `${parsed.name}${suffix}${ext}`);
}

// Without a suffix, writing into the input directory would replace the sources.
async function assertOutputDir(input: string, outputDir: string, suffix: string): Promise<void> {
  if (suffix !== "") return;
  const stat = await statOrNull(input);
  const inputDir = stat && stat.isDirectory() ? input : path.dirname(input);
  if (path.resolve(inputDir) === path.resolve(outputDir)) {
    throw new WatermarkError(
      "InvalidOutput",
      `Output directory '${outputDir}' is the input directory; pass a suffix or another directory`,
      { file: input }
    );
  }
}

async function loadWatermark(file: string): Promise<JimpImage> {
  const stat = await statOrNull(file);
  if (!stat || !stat.isFile()) {
    throw new WatermarkError("PathNotFound", `Watermark's path not found in '${file}'`, { file });
  }
  return readImageCompat(await fs.readFile(file), `watermark '${file}'`);
}

async function processFile(
  input: string,
  output: string,
  mark: JimpImage,
  options: ResolvedOptions,
  format: OutputFormat | undefined,
  logger: Logger
): Promise<void> {
  const outFormat = format ?? formatFromPath(input);
  if (!outFormat) {
    throw new WatermarkError("EncodeError", `No encoder for '${path.extname(input)}'`, { file: input });
  }

  let raw: Buffer;
  try {
    raw = await fs.readFile(input);
  } catch (err) {
    throw new WatermarkError("DecodeError", `Could not read '${input}': ${describeError(err)}`, {
      file: input,
      cause: err,
    });
  }

  const base = toRgbaImage(await readImageCompat(raw, `'${input}'`));
  const result = renderWatermark(base, mark, options, logger);
  const encoded = encodeImage(result, outFormat, options.jpegQuality);

  try {
    await fs.writeFile(output, encoded);
  } catch (err) {
    throw new WatermarkError("EncodeError", `Could not write '${output}': ${describeError(err)}`, {
      file: input,
      cause: err,
    });
  }
}

/**
 * Watermarks one file or every image in a directory.
 *
 * Run-wide problems (bad options, missing paths, an unreadable watermark,
 * an output directory that would overwrite the sources) throw before any
 * output is written. Per-file failures are logged and
 * counted, and the run moves on to the next file.
 */
export async function runBatch(request: BatchRequest): Promise<BatchSummary> {
  const logger = request.logger ?? createLogger("watermark");
  const options = resolveOptions(request.options);

  const mark = await loadWatermark(request.watermark);
  const inputs = await collectInputs(request.input);
  await assertOutputDir(request.input, request.outputDir, request.suffix ?? "");
  if (inputs.length === 0) {
    logger.warn(`No valid image found in '${request.input}'`);
  }

  await fs.mkdir(request.outputDir, { recursive: true });
  logger.info(`Output directory: '${request.outputDir}'`);

  const results: FileOutcome[] = [];
  const claimed = new Map<string, string>(); // output -> input that produced it
  for (const input of inputs) {
    const output = outputPathFor(input, request.outputDir, request.format, request.suffix);
    try {
      const owner = claimed.get(output);
      if (owner !== undefined) {
        throw new WatermarkError("EncodeError", `'${output}' was already written for '${owner}'`, { file: input });
      }
      claimed.set(output, input);
      await processFile(input, output, mark, options, request.format, logger);
      results.push({ input, ok: true, output });
      logger.info(`${input} -> ${output}`);
    } catch (err) {
      if (!isWatermarkError(err) || isBatchFatal(err.kind)) throw err;
      results.push({ input, ok: false, error: err });
      logger.error(`${input}: ${describeError(err)}`);
    }
  }

  const succeeded = results.filter((r) => r.ok).length;
  return {
    attempted: results.length,
    succeeded,
    failed: results.length - succeeded,
    results,
  };
}
