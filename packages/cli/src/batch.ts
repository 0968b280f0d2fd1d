/**
 * Batch runner: renders a list of records, one file per record
 *
 * Records are validated one at a time; a record that fails validation,
 * rendering or writing is reported and the rest still run.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  InvalidInputError,
  IOFailureError,
  normalizeRequest,
  type PaletteRegistry,
} from "@banner-forge/core";
import { composeSvg, type GlyphBackend, type RasterBackend } from "@banner-forge/render";
import { safeName, uniquePath, writeArtifact } from "./output.js";

export const batchRecordSchema = z.object({
  kind: z.enum(["ascii", "svg", "png"]).default("svg"),
  text: z.string().trim().min(1, "text must not be empty"),
  subtitle: z.string().nullish(),
  palette: z.string().optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  style: z.string().optional(),
  effects: z.array(z.string()).optional(),
  animated: z.boolean().optional(),
  /** Glyph font for ascii records */
  font: z.string().optional(),
  /** Font file for png records */
  fontPath: z.string().optional(),
  font_path: z.string().optional(),
  template: z.string().optional(),
});

export type BatchRecord = z.infer<typeof batchRecordSchema>;

export const EXAMPLE_BATCH: readonly z.input<typeof batchRecordSchema>[] = [
  {
    kind: "svg",
    text: "BannerForge",
    subtitle: "Ultimate Banner Creator",
    width: 1200,
    height: 300,
    palette: "stealth",
    style: "wave",
    animated: false,
  },
  {
    kind: "png",
    text: "Tech Conference 2025",
    subtitle: "Innovation & Future",
    width: 1920,
    height: 400,
    palette: "neon",
    effects: ["glow", "shadow"],
  },
  { kind: "ascii", text: "Welcome", font: "slant" },
  {
    kind: "svg",
    text: "Open Source",
    subtitle: "Built by the Community",
    palette: "forest",
    style: "geometric",
    animated: true,
  },
];

export interface BatchOptions {
  outdir: string;
  glyph: GlyphBackend;
  /** Raster backend for a record's font file (undefined: configured default) */
  raster: (fontPath?: string) => RasterBackend;
  palettes?: PaletteRegistry;
  maxArea?: number;
}

export interface BatchFailure {
  /** 1-based position in the batch file */
  index: number;
  message: string;
}

export interface BatchResult {
  written: string[];
  failures: BatchFailure[];
}

/**
 * Read a batch file: a JSON array of records
 */
export function loadBatchFile(path: string): unknown[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IOFailureError(path, `Could not read batch file ${path}: ${reason}`, { cause: error });
  }
  if (!Array.isArray(raw)) {
    throw new InvalidInputError(`Batch file ${path} must contain a JSON array of records`);
  }
  return raw;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`).join("; ");
}

function renderRecord(record: BatchRecord, options: BatchOptions): { ext: string; data: Uint8Array | string } {
  if (record.kind === "ascii") {
    return { ext: "txt", data: options.glyph.render(record.text, record.font) };
  }

  const request = normalizeRequest(
    {
      text: record.text,
      subtitle: record.subtitle,
      width: record.width,
      height: record.height,
      palette: record.palette,
      style: record.style,
      effects: record.effects,
      animated: record.animated,
      template: record.template,
    },
    { palettes: options.palettes, maxArea: options.maxArea }
  );

  if (record.kind === "svg") {
    return { ext: "svg", data: composeSvg(request) };
  }
  const raster = options.raster(record.fontPath ?? record.font_path);
  return { ext: "png", data: raster.encode(raster.render(request)) };
}

export function runBatch(records: readonly unknown[], options: BatchOptions): BatchResult {
  const result: BatchResult = { written: [], failures: [] };
  const taken = new Set<string>();
  const total = records.length;

  records.forEach((raw, i) => {
    const index = i + 1;
    const parsed = batchRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const message = describeIssues(parsed.error);
      console.error(`[batch] Record ${index}/${total} skipped: ${message}`);
      result.failures.push({ index, message });
      return;
    }

    const record = parsed.data;
    console.log(`[${index}/${total}] Generating ${record.kind}: ${record.text}`);
    try {
      // Render fully before claiming a path, so failures leave no file behind
      const { ext, data } = renderRecord(record, options);
      const path = uniquePath(options.outdir, safeName(record.text), ext, taken);
      writeArtifact(path, data);
      result.written.push(path);
      console.log(`  ✓ ${path}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[batch] Record ${index}/${total} failed: ${message}`);
      result.failures.push({ index, message });
    }
  });

  return result;
}
