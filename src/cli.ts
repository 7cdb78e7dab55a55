#!/usr/bin/env node
import dotenv from "dotenv";
import { Command, InvalidArgumentError, Option } from "commander";

import type { OutputFormat, WatermarkOptions } from "./types";
import { DEFAULT_OPTIONS, loadEnvDefaults, parsePosition, resolveOptions } from "./config";
import { runBatch } from "./batch";
import { createLogger } from "./logger";
import { describeError, isWatermarkError } from "./errors";

interface RunFlags {
  output: string;
  mode?: "SINGLE" | "TILE";
  position?: string;
  proportion?: number;
  margin?: number;
  tilePadding?: number;
  rescaleMode?: "LINEAR" | "AREA";
  opacity?: number;
  pattern?: "GRID" | "CHECKERBOARD";
  format?: OutputFormat;
  suffix: string;
  quality?: number;
  verbose?: boolean;
}

function parseFloatArg(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function parseIntArg(value: string): number {
  const n = parseFloatArg(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

function toOptions(flags: RunFlags): WatermarkOptions {
  const options: WatermarkOptions = {};
  if (flags.mode !== undefined) options.mode = flags.mode;
  if (flags.position !== undefined) options.position = parsePosition(flags.position);
  if (flags.proportion !== undefined) options.proportion = flags.proportion;
  if (flags.margin !== undefined) options.margin = flags.margin;
  if (flags.tilePadding !== undefined) options.tilePadding = flags.tilePadding;
  if (flags.rescaleMode !== undefined) options.rescaleMode = flags.rescaleMode;
  if (flags.opacity !== undefined) options.opacity = flags.opacity;
  if (flags.pattern !== undefined) options.pattern = flags.pattern;
  if (flags.quality !== undefined) options.jpegQuality = flags.quality;
  return options;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("pixel-watermark")
    .description("Apply a watermark image to an image or a directory of images, either one by one or in batch.");

  program
    .command("run")
    .description("Applies a watermark to an image or a directory of images.")
    .argument("<input>", "path to the image or directory of images")
    .argument("<watermark>", "path to the watermark image")
    .option("-o, --output <dir>", "directory to save the watermarked images", "output")
    .addOption(new Option("--mode <mode>", `SINGLE or TILE (default ${DEFAULT_OPTIONS.mode})`).choices(["SINGLE", "TILE"]))
    .option("--position <position>", "UPPER_LEFT, UPPER_RIGHT, LOWER_LEFT, LOWER_RIGHT, MIDDLE or x,y")
    .option("--proportion <p>", "fraction of the image width (LINEAR) or area (AREA) the watermark covers", parseFloatArg)
    .option("--margin <px>", "margin from the edges for corner positions", parseIntArg)
    .option("--tile-padding <px>", "gap between tiles in TILE mode", parseIntArg)
    .addOption(new Option("--rescale-mode <mode>", "LINEAR or AREA").choices(["LINEAR", "AREA"]))
    .option("--opacity <value>", "watermark opacity from 0.0 to 1.0", parseFloatArg)
    .addOption(new Option("--pattern <pattern>", "tile layout").choices(["GRID", "CHECKERBOARD"]))
    .addOption(new Option("--format <format>", "force the output format").choices(["png", "jpeg"]))
    .option("--suffix <text>", "appended to each output file name", "")
    .option("--quality <q>", "JPEG quality from 1 to 100", parseIntArg)
    .option("-v, --verbose", "log sizes and placement for every image")
    .action(async (input: string, watermark: string, flags: RunFlags) => {
      const logger = createLogger("watermark", { verbose: flags.verbose });
      try {
        const defaults = resolveOptions(loadEnvDefaults());
        const summary = await runBatch({
          input,
          watermark,
          outputDir: flags.output,
          options: resolveOptions(toOptions(flags), defaults),
          format: flags.format,
          suffix: flags.suffix,
          logger,
        });
        logger.info(
          `Done: ${summary.attempted} attempted, ${summary.succeeded} succeeded, ${summary.failed} failed`
        );
        process.exitCode = summary.failed > 0 ? 1 : 0;
      } catch (err) {
        if (!isWatermarkError(err)) throw err;
        logger.error(`Aborted. ${describeError(err)}`);
        process.exitCode = 2;
      }
    });

  return program;
}

if (require.main === module) {
  dotenv.config();
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error("[watermark] Unexpected error:", err);
      process.exitCode = 2;
    });
}
