/**
 * banner-forge command definitions
 */

import { join } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import {
  BUILT_IN_PALETTES,
  EFFECTS,
  InvalidInputError,
  isBannerForgeError,
  listPaletteNames,
  listTemplateNames,
  mergeCustomPalette,
  MissingCapabilityError,
  normalizeRequest,
  paletteToHex,
  STYLES,
  TEMPLATES,
  toHex,
  type PaletteRegistry,
  type RenderOptions,
} from "@banner-forge/core";
import {
  colorizeGlyph,
  composeSvg,
  createGlyphBackend,
  createRasterBackend,
  DEFAULT_GLYPH_FONT,
  renderAllFormats,
  SAMPLE_GLYPH_FONTS,
  stripAnsi,
  suggestTaglines,
  type GlyphBackend,
  type RasterBackend,
} from "@banner-forge/render";
import { loadConfig, type CliConfig } from "./config.js";
import { defaultOutputName, ensureDir, safeName, utcTimestamp, writeArtifact } from "./output.js";
import { loadPaletteStore, mergePalette, registryFromStore, savePaletteStore } from "./palette-store.js";
import { EXAMPLE_BATCH, loadBatchFile, runBatch } from "./batch.js";

export const VERSION = "2.0.0";

export interface ProgramDeps {
  config: CliConfig;
  glyph: GlyphBackend;
  /** Raster backend for a font file; undefined means the configured font */
  raster: (fontPath?: string) => RasterBackend;
  now: () => Date;
}

function resolveDeps(overrides: Partial<ProgramDeps>): ProgramDeps {
  const config = overrides.config ?? loadConfig();
  const rasterBackends = new Map<string, RasterBackend>();

  return {
    config,
    glyph: overrides.glyph ?? createGlyphBackend(),
    raster:
      overrides.raster ??
      ((fontPath = config.fontPath) => {
        const key = fontPath ?? "";
        let backend = rasterBackends.get(key);
        if (!backend) {
          backend = createRasterBackend({ fontPath });
          rasterBackends.set(key, backend);
        }
        return backend;
      }),
    now: overrides.now ?? (() => new Date()),
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Run a command action, reporting any failure as a message and exit code 1
 */
function withErrorReporting<Args extends unknown[]>(
  action: (...args: Args) => void | Promise<void>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(...args);
    } catch (error) {
      if (!isBannerForgeError(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`Error: ${reason}`);
        process.exitCode = 1;
        return;
      }
      console.error(`Error: ${error.message}`);
      if (error instanceof MissingCapabilityError) {
        console.error(`Hint: ${error.hint}`);
      }
      process.exitCode = 1;
    }
  };
}

interface RenderFlags {
  subtitle?: string;
  width?: number;
  height?: number;
  palette?: string;
  style?: string;
  effects?: string[];
  animated?: boolean;
  template?: string;
  ai?: boolean;
  paletteFile?: string;
}

export function createProgram(overrides: Partial<ProgramDeps> = {}): Command {
  let resolved: ProgramDeps | null = null;
  // Resolved on first use so `--help` needs no configuration
  const deps = (): ProgramDeps => (resolved ??= resolveDeps(overrides));

  const palettesFor = (paletteFile?: string): PaletteRegistry =>
    paletteFile ? registryFromStore(loadPaletteStore(paletteFile)) : BUILT_IN_PALETTES;

  const subtitleFor = async (text: string, flags: RenderFlags): Promise<string | undefined> => {
    if (!flags.ai || flags.subtitle !== undefined) {
      return flags.subtitle;
    }
    const { modelId, region } = deps().config;
    const [suggestion] = await suggestTaglines(text, 1, { modelId, region });
    if (suggestion) {
      console.log(`AI suggestion: ${suggestion}`);
    }
    return suggestion;
  };

  const buildRequest = async (text: string, flags: RenderFlags) => {
    const options: RenderOptions = {
      text,
      subtitle: await subtitleFor(text, flags),
      width: flags.width,
      height: flags.height,
      palette: flags.palette,
      style: flags.style,
      effects: flags.effects,
      animated: flags.animated,
      template: flags.template,
    };
    return normalizeRequest(options, { maxArea: deps().config.maxArea, palettes: palettesFor(flags.paletteFile) });
  };

  const program = new Command();

  program
    .name("banner-forge")
    .description("Banner creator: glyph art, SVG and PNG from one palette/style configuration")
    .version(VERSION);

  program
    .command("ascii")
    .description("Generate a glyph-art banner")
    .argument("[text]", "banner text")
    .option("-f, --font <name>", "figlet font", DEFAULT_GLYPH_FONT)
    .option("-c, --color <color>", "color name or hex for --colorize", "cyan")
    .option("--colorize", "color the output", false)
    .option("-o, --out <path>", "output file (defaults to stdout)")
    .option("--list-fonts", "list available fonts")
    .action(
      withErrorReporting(
        (text: string | undefined, flags: { font: string; color: string; colorize: boolean; out?: string; listFonts?: boolean }) => {
          const { glyph } = deps();
          if (flags.listFonts) {
            const fonts = glyph.listFonts();
            console.log(`Available fonts (${fonts.length}):`);
            fonts.slice(0, 50).forEach((font) => console.log(`  - ${font}`));
            console.log("\n... and more. Use --font <name> to select.");
            return;
          }
          if (!text || text.trim().length === 0) {
            throw new InvalidInputError("Banner text must not be empty");
          }

          const art = glyph.render(text.trim(), flags.font);
          if (flags.out) {
            writeArtifact(flags.out, art);
            console.log(`✓ Wrote ASCII banner to ${flags.out}`);
          } else {
            console.log(flags.colorize ? colorizeGlyph(art, flags.color) : art);
          }
        }
      )
    );

  program
    .command("svg")
    .description("Generate an SVG vector banner")
    .argument("<text>", "banner text")
    .option("-s, --subtitle <text>", "subtitle text")
    .option("-W, --width <px>", "width", parsePositiveInt)
    .option("-H, --height <px>", "height", parsePositiveInt)
    .option("-p, --palette <name>", `color palette (${listPaletteNames().join(", ")})`)
    .option("--style <name>", `accent style (${STYLES.join(", ")})`)
    .option("--animated", "animate the gradient and title")
    .option("-t, --template <name>", `predefined template (${listTemplateNames().join(", ")})`)
    .option("-o, --out <path>", "output SVG path")
    .option("--ai", "suggest a subtitle when none is given")
    .option("--palette-file <path>", "JSON file of custom palettes")
    .action(
      withErrorReporting(async (text: string, flags: RenderFlags & { out?: string }) => {
        const request = await buildRequest(text, flags);
        const out = flags.out ?? defaultOutputName(request.text, "svg", deps().now());
        writeArtifact(out, composeSvg(request));
        console.log(`✓ Wrote SVG to ${out}`);
      })
    );

  program
    .command("png")
    .description("Generate a PNG raster banner")
    .argument("<text>", "banner text")
    .option("-s, --subtitle <text>", "subtitle text")
    .option("-W, --width <px>", "width", parsePositiveInt)
    .option("-H, --height <px>", "height", parsePositiveInt)
    .option("-p, --palette <name>", `color palette (${listPaletteNames().join(", ")})`)
    .option("-e, --effects <effects...>", `visual effects (${EFFECTS.join(", ")})`)
    .option("-t, --template <name>", `predefined template (${listTemplateNames().join(", ")})`)
    .option("-o, --out <path>", "output PNG path")
    .option("--font <path>", "font file (.ttf/.otf)")
    .option("--ai", "suggest a subtitle when none is given")
    .option("--palette-file <path>", "JSON file of custom palettes")
    .action(
      withErrorReporting(async (text: string, flags: RenderFlags & { out?: string; font?: string }) => {
        const request = await buildRequest(text, flags);
        const raster = deps().raster(flags.font);
        const png = raster.encode(raster.render(request));
        const out = flags.out ?? defaultOutputName(request.text, "png", deps().now());
        writeArtifact(out, png);
        console.log(`✓ Wrote PNG to ${out}`);
      })
    );

  program
    .command("combo")
    .description("Generate glyph art, SVG and PNG into one folder")
    .argument("<text>", "banner text")
    .option("-s, --subtitle <text>", "subtitle for SVG/PNG")
    .option("-P, --prefix <dir>", "output folder")
    .option("-t, --template <name>", "predefined template")
    .option("-p, --palette <name>", "color palette")
    .option("--font <path>", "font file for the PNG")
    .option("--ai", "suggest a subtitle when none is given")
    .option("--palette-file <path>", "JSON file of custom palettes")
    .action(
      withErrorReporting(async (text: string, flags: RenderFlags & { prefix?: string; font?: string }) => {
        const { glyph, raster, now } = deps();
        const request = await buildRequest(text, flags);
        const artifacts = renderAllFormats(request, { glyph, raster: raster(flags.font) });

        const folder = flags.prefix ?? `banners_${utcTimestamp(now())}`;
        ensureDir(folder);
        const name = safeName(request.text);
        const outputs: [string, string, Uint8Array][] = [
          ["ASCII", join(folder, `${name}.txt`), artifacts.glyph],
          ["SVG", join(folder, `${name}.svg`), artifacts.vector],
          ["PNG", join(folder, `${name}.png`), artifacts.raster],
        ];
        for (const [label, path, data] of outputs) {
          writeArtifact(path, data);
          console.log(`✓ ${label}: ${path}`);
        }
        console.log(`\nGenerated combo in: ${folder}`);
      })
    );

  program
    .command("batch")
    .description("Generate banners from a JSON batch file")
    .argument("<file>", "batch file (JSON array of records)")
    .option("-o, --outdir <dir>", "output directory", "batch_banners")
    .option("--palette-file <path>", "JSON file of custom palettes")
    .action(
      withErrorReporting((file: string, flags: { outdir: string; paletteFile?: string }) => {
        const { glyph, raster, config } = deps();
        const records = loadBatchFile(file);
        ensureDir(flags.outdir);

        const result = runBatch(records, {
          outdir: flags.outdir,
          glyph,
          raster,
          palettes: palettesFor(flags.paletteFile),
          maxArea: config.maxArea,
        });

        console.log(`\nBatch complete: ${result.written.length}/${records.length} banners in ${flags.outdir}`);
        if (result.failures.length > 0) {
          console.error(`${result.failures.length} record(s) failed: ${result.failures.map((f) => f.index).join(", ")}`);
          process.exitCode = 1;
        }
      })
    );

  program
    .command("info")
    .description("List palettes, templates, fonts, effects and styles")
    .option("--palette-file <path>", "JSON file of custom palettes")
    .action(
      withErrorReporting((flags: { paletteFile?: string }) => {
        const palettes = palettesFor(flags.paletteFile);
        console.log("Available Palettes:");
        for (const name of listPaletteNames(palettes)) {
          const hex = paletteToHex(palettes[name]);
          console.log(`  ${name.padEnd(12)} - bg:${hex.bg} accent:${hex.accent}`);
        }

        console.log("\nAvailable Templates:");
        for (const name of listTemplateNames()) {
          const template = TEMPLATES[name];
          console.log(`  ${name.padEnd(12)} - ${template.palette} palette, ${template.style} style`);
        }

        console.log("\nSample Figlet Fonts:");
        const installed = new Set(deps().glyph.listFonts());
        SAMPLE_GLYPH_FONTS.filter((font) => installed.has(font)).forEach((font) => console.log(`  - ${font}`));

        console.log("\nVisual Effects (PNG):");
        EFFECTS.forEach((effect) => console.log(`  - ${effect}`));

        console.log("\nStyles:");
        STYLES.forEach((style) => console.log(`  - ${style}`));
      })
    );

  program
    .command("preview")
    .description("Preview a colored glyph-art banner in the terminal")
    .argument("<text>", "banner text")
    .option("-f, --font <name>", "figlet font", DEFAULT_GLYPH_FONT)
    .option("-c, --color <color>", "preview color", "cyan")
    .option("--to <color>", "gradient end color")
    .action(
      withErrorReporting((text: string, flags: { font: string; color: string; to?: string }) => {
        const art = deps().glyph.render(text, flags.font);
        const rule = "=".repeat(60);
        console.log(`\n${rule}\nPREVIEW:\n${rule}`);
        console.log(colorizeGlyph(art, flags.color, flags.to));
        console.log(rule);
      })
    );

  program
    .command("palette")
    .description("Create a custom palette")
    .requiredOption("-n, --name <name>", "palette name")
    .requiredOption("--bg <hex>", "background color")
    .requiredOption("--accent <hex>", "accent color")
    .requiredOption("--text <hex>", "text color")
    .requiredOption("--muted <hex>", "muted color")
    .option("--save", "merge into the palette file")
    .option("--palette-file <path>", "palette file to save into")
    .action(
      withErrorReporting(
        (flags: { name: string; bg: string; accent: string; text: string; muted: string; save?: boolean; paletteFile?: string }) => {
          const created = mergeCustomPalette(flags.name, flags.bg, flags.accent, flags.text, flags.muted);
          const hex = paletteToHex(created.palette);

          console.log(`\n✓ Created palette '${created.name}':`);
          for (const [key, value] of Object.entries(hex)) {
            console.log(`  ${key.padEnd(15)} : ${value}`);
          }

          if (flags.save) {
            const file = flags.paletteFile ?? deps().config.paletteFile;
            savePaletteStore(file, mergePalette(loadPaletteStore(file), created.name, hex));
            console.log(`\n✓ Saved to ${file}`);
            console.log(`  Load with: --palette-file ${file}`);
          }
        }
      )
    );

  program
    .command("example")
    .description("Write an example batch file")
    .option("-o, --out <name>", "output file name without extension", "banner_config")
    .action(
      withErrorReporting((flags: { out: string }) => {
        const file = `${flags.out}.json`;
        writeArtifact(file, `${JSON.stringify(EXAMPLE_BATCH, null, 2)}\n`);
        console.log(`✓ Created example config: ${file}`);
        console.log(`  Run with: banner-forge batch ${file}`);
      })
    );

  program
    .command("quick")
    .description("Quick banner with default options")
    .argument("<text>", "banner text")
    .option("-t, --type <type>", "ascii, svg, png or all", "svg")
    .option("-d, --dir <dir>", "output directory", ".")
    .action(
      withErrorReporting((text: string, flags: { type: string; dir: string }) => {
        const types = ["ascii", "svg", "png", "all"];
        if (!types.includes(flags.type)) {
          throw new InvalidInputError(`Unknown type "${flags.type}" (expected one of: ${types.join(", ")})`);
        }
        const { glyph, raster, config } = deps();
        const want = (type: string) => flags.type === type || flags.type === "all";
        const request = normalizeRequest({ text, effects: ["shadow"] }, { maxArea: config.maxArea });
        const name = join(flags.dir, safeName(request.text));

        if (want("ascii")) {
          const art = glyph.render(request.text);
          console.log(colorizeGlyph(art, toHex(request.palette.accent)));
          if (flags.type === "all") {
            const file = `${name}_quick.txt`;
            writeArtifact(file, stripAnsi(art));
            console.log(`✓ ASCII: ${file}`);
          }
        }
        if (want("svg")) {
          const file = `${name}_quick.svg`;
          writeArtifact(file, composeSvg(request));
          console.log(`✓ SVG: ${file}`);
        }
        if (want("png")) {
          const file = `${name}_quick.png`;
          const backend = raster();
          writeArtifact(file, backend.encode(backend.render(request)));
          console.log(`✓ PNG: ${file}`);
        }
      })
    );

  return program;
}
