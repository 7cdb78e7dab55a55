import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { collectInputs, outputPathFor, runBatch } from "../batch";
import { encodeJpegFromBitmap } from "../watermark";
import { silentLogger } from "../logger";
import type { WatermarkOptions } from "../types";
import { decodePng, pixelAt, solidImage, solidPng } from "../__fixtures__/images";

const RED: [number, number, number, number] = [255, 0, 0, 255];
const BLUE: [number, number, number, number] = [0, 0, 255, 255];

const stampTopLeft: WatermarkOptions = {
  proportion: 0.5,
  position: "UPPER_LEFT",
  margin: 0,
  opacity: 1,
};

describe("runBatch", () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;
  let watermark: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "pixel-watermark-"));
    inputDir = path.join(root, "in");
    outputDir = path.join(root, "out");
    await fs.mkdir(inputDir);

    watermark = path.join(root, "mark.png");
    await fs.writeFile(watermark, solidPng(2, 2, BLUE));

    await fs.writeFile(path.join(inputDir, "a.png"), solidPng(4, 4, RED));
    await fs.writeFile(path.join(inputDir, "b.png"), solidPng(6, 4, RED));
    await fs.writeFile(path.join(inputDir, "c.jpg"), encodeJpegFromBitmap(solidImage(4, 4, RED), 90));
    await fs.writeFile(path.join(inputDir, "broken.png"), "this is not a png");
    await fs.writeFile(path.join(inputDir, "notes.txt"), "skip me");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("keeps going past a corrupt file and reports the counts", async () => {
    const summary = await runBatch({
      input: inputDir,
      watermark,
      outputDir,
      options: stampTopLeft,
      logger: silentLogger,
    });

    expect(summary.attempted).toBe(4);
    expect(summary.succeeded).toBe(3);
    expect(summary.failed).toBe(1);

    const failed = summary.results.filter((r) => !r.ok);
    expect(failed).toHaveLength(1);
    expect(path.basename(failed[0].input)).toBe("broken.png");
    expect(failed[0].error?.kind).toBe("DecodeError");

    expect((await fs.readdir(outputDir)).sort()).toEqual(["a.png", "b.png", "c.jpg"]);

    const a = decodePng(await fs.readFile(path.join(outputDir, "a.png")));
    expect(pixelAt(a, 0, 0)).toEqual(BLUE);
    expect(pixelAt(a, 3, 3)).toEqual(RED);
  });

  it("writes nothing when explicit coordinates fall outside every image", async () => {
    const summary = await runBatch({
      input: inputDir,
      watermark,
      outputDir,
      options: { ...stampTopLeft, position: { x: 50, y: 50 } },
      logger: silentLogger,
    });

    expect(summary.succeeded).toBe(0);
    expect(summary.failed).toBe(4);
    const kinds = summary.results.map((r) => r.error?.kind);
    expect(kinds.filter((k) => k === "OutOfBounds")).toHaveLength(3);
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it("aborts on invalid options before touching the file system", async () => {
    await expect(
      runBatch({ input: inputDir, watermark, outputDir, options: { opacity: 1.5 }, logger: silentLogger })
    ).rejects.toMatchObject({ kind: "InvalidOpacity" });
    await expect(fs.access(outputDir)).rejects.toThrow();
  });

  it("aborts when the watermark is missing", async () => {
    await expect(
      runBatch({ input: inputDir, watermark: path.join(root, "nope.png"), outputDir, logger: silentLogger })
    ).rejects.toMatchObject({ kind: "PathNotFound" });
  });

  it("aborts when the input is missing", async () => {
    await expect(
      runBatch({ input: path.join(root, "missing"), watermark, outputDir, logger: silentLogger })
    ).rejects.toMatchObject({ kind: "PathNotFound" });
  });

  it("counts a failed write and moves on", async () => {
    await fs.mkdir(path.join(outputDir, "a.png"), { recursive: true });

    const summary = await runBatch({
      input: inputDir,
      watermark,
      outputDir,
      options: stampTopLeft,
      logger: silentLogger,
    });

    expect(summary).toMatchObject({ attempted: 4, succeeded: 2, failed: 2 });
    const byName = new Map(summary.results.map((r) => [path.basename(r.input), r]));
    expect(byName.get("a.png")?.error?.kind).toBe("EncodeError");
    expect(byName.get("broken.png")?.error?.kind).toBe("DecodeError");
    expect(byName.get("b.png")?.ok).toBe(true);
    expect(byName.get("c.jpg")?.ok).toBe(true);
  });

  it("refuses to write into the input directory without a suffix", async () => {
    await expect(
      runBatch({ input: inputDir, watermark, outputDir: inputDir, options: stampTopLeft, logger: silentLogger })
    ).rejects.toMatchObject({ kind: "InvalidOutput" });

    const a = decodePng(await fs.readFile(path.join(inputDir, "a.png")));
    expect(pixelAt(a, 0, 0)).toEqual(RED);
  });

  it("writes beside the sources when a suffix is given", async () => {
    const summary = await runBatch({
      input: inputDir,
      watermark,
      outputDir: inputDir,
      options: stampTopLeft,
      suffix: "_wm",
      logger: silentLogger,
    });

    expect(summary).toMatchObject({ attempted: 4, succeeded: 3, failed: 1 });
    const a = decodePng(await fs.readFile(path.join(inputDir, "a.png")));
    expect(pixelAt(a, 0, 0)).toEqual(RED);
    const stamped = decodePng(await fs.readFile(path.join(inputDir, "a_wm.png")));
    expect(pixelAt(stamped, 0, 0)).toEqual(BLUE);
  });

  it("does not let two inputs overwrite the same output", async () => {
    const dir = path.join(root, "same-name");
    await fs.mkdir(dir);
    await fs.writeFile(path.join(dir, "photo.jpg"), encodeJpegFromBitmap(solidImage(4, 4, RED), 90));
    await fs.writeFile(path.join(dir, "photo.png"), solidPng(4, 4, RED));

    const summary = await runBatch({
      input: dir,
      watermark,
      outputDir,
      options: stampTopLeft,
      format: "png",
      logger: silentLogger,
    });

    expect(summary).toMatchObject({ attempted: 2, succeeded: 1, failed: 1 });
    expect(summary.results[0]).toMatchObject({ ok: true, output: path.join(outputDir, "photo.png") });
    expect(path.basename(summary.results[1].input)).toBe("photo.png");
    expect(summary.results[1].error?.kind).toBe("EncodeError");
    expect(await fs.readdir(outputDir)).toEqual(["photo.png"]);
  });

  it("processes a single file with a suffix and forced format", async () => {
    const summary = await runBatch({
      input: path.join(inputDir, "c.jpg"),
      watermark,
      outputDir,
      options: stampTopLeft,
      format: "png",
      suffix: "_watermarked",
      logger: silentLogger,
    });

    expect(summary).toMatchObject({ attempted: 1, succeeded: 1, failed: 0 });
    expect(await fs.readdir(outputDir)).toEqual(["c_watermarked.png"]);
    const out = decodePng(await fs.readFile(path.join(outputDir, "c_watermarked.png")));
    expect(out.width).toBe(4);
    expect(pixelAt(out, 0, 0)).toEqual(BLUE);
  });
});

describe("collectInputs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "pixel-watermark-inputs-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("picks image extensions case-insensitively, in name order", async () => {
    for (const name of ["z.PNG", "m.Jpeg", "a.jpg", "readme.md", "photo.gif"]) {
      await fs.writeFile(path.join(dir, name), "");
    }
    await fs.mkdir(path.join(dir, "nested.png"));

    const files = await collectInputs(dir);
    expect(files.map((f) => path.basename(f))).toEqual(["a.jpg", "m.Jpeg", "z.PNG"]);
  });

  it("refuses a single file that is not an image", async () => {
    const file = path.join(dir, "readme.md");
    await fs.writeFile(file, "");
    await expect(collectInputs(file)).rejects.toMatchObject({ kind: "DecodeError" });
  });
});

describe("outputPathFor", () => {
  it("keeps the base name and extension by default", () => {
    expect(outputPathFor(path.join("in", "photo.jpeg"), "out", undefined)).toBe(path.join("out", "photo.jpeg"));
  });

  it("applies the suffix and forced format", () => {
    expect(outputPathFor(path.join("in", "photo.jpeg"), "out", "png", "_watermarked")).toBe(
      path.join("out", "photo_watermarked.png")
    );
  });
});
