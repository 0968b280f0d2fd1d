import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  BUILT_IN_PALETTES,
  DEFAULT_MAX_AREA,
  MissingCapabilityError,
  normalizeRequest,
  toHex,
} from "@banner-forge/core";
import { composeSvg, createRasterBackend, type GlyphBackend } from "@banner-forge/render";
import { createProgram, type ProgramDeps } from "./program.js";

const glyph: GlyphBackend = {
  render: (text, font) => {
    if (font === "nope") {
      throw new MissingCapabilityError(`Glyph font "${font}" is not available`, "Run with --list-fonts");
    }
    return `<<${text}>>`;
  },
  listFonts: () => ["Standard", "Slant"],
};

describe("banner-forge program", () => {
  let dir: string;
  let deps: ProgramDeps;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  const run = (...args: string[]) => createProgram(deps).parseAsync(args, { from: "user" });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "banner-forge-cli-"));
    const raster = createRasterBackend({ candidates: [] });
    deps = {
      config: { maxArea: DEFAULT_MAX_AREA, paletteFile: join(dir, "custom_palettes.json") },
      glyph,
      raster: () => raster,
      now: () => new Date(Date.UTC(2025, 0, 2, 3, 4, 5)),
    };
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it("svg writes the composed document", async () => {
    const out = join(dir, "test.svg");
    await run("svg", "Test", "-o", out);
    expect(readFileSync(out, "utf-8")).toBe(composeSvg(normalizeRequest({ text: "Test" })));
    expect(log).toHaveBeenCalledWith(`✓ Wrote SVG to ${out}`);
  });

  it("svg lets explicit flags override the template", async () => {
    const out = join(dir, "pro.svg");
    await run("svg", "Test", "-t", "professional", "-p", "ocean", "-o", out);
    const expected = normalizeRequest({ text: "Test", template: "professional", palette: "ocean" });
    expect(expected.style).toBe("grid");
    const svg = readFileSync(out, "utf-8");
    expect(svg).toBe(composeSvg(expected));
    expect(svg).toContain(`fill="${toHex(BUILT_IN_PALETTES.ocean.background)}"`);
  });

  it("png writes a PNG file", async () => {
    const out = join(dir, "test.png");
    await run("png", "Test", "-W", "80", "-H", "30", "-e", "shadow", "glow", "-o", out);
    expect(readFileSync(out).subarray(1, 4).toString("ascii")).toBe("PNG");
  });

  it("reports invalid input with exit code 1", async () => {
    await run("svg", "   ", "-o", join(dir, "empty.svg"));
    expect(error).toHaveBeenCalledWith("Error: Banner text must not be empty");
    expect(process.exitCode).toBe(1);
    expect(existsSync(join(dir, "empty.svg"))).toBe(false);
  });

  it("prints the hint for a missing capability", async () => {
    await run("ascii", "Hi", "-f", "nope");
    expect(error).toHaveBeenCalledWith('Error: Glyph font "nope" is not available');
    expect(error).toHaveBeenCalledWith("Hint: Run with --list-fonts");
    expect(process.exitCode).toBe(1);
  });

  it("reports unexpected failures as a message with exit code 1", async () => {
    deps.raster = () => ({
      render: () => {
        throw new Error("layout exploded");
      },
      encode: () => new Uint8Array(),
    });
    const out = join(dir, "boom.png");

    await expect(run("png", "Hello World", "-o", out)).resolves.toBeDefined();
    expect(error).toHaveBeenCalledWith("Error: layout exploded");
    expect(process.exitCode).toBe(1);
    expect(existsSync(out)).toBe(false);
  });

  it("ascii writes plain art to a file", async () => {
    const out = join(dir, "hi.txt");
    await run("ascii", "Hi", "-o", out);
    expect(readFileSync(out, "utf-8")).toBe("<<Hi>>");
  });

  it("ascii lists fonts", async () => {
    await run("ascii", "--list-fonts");
    expect(log).toHaveBeenCalledWith("Available fonts (2):");
    expect(log).toHaveBeenCalledWith("  - Slant");
  });

  it("combo writes all three forms into the folder", async () => {
    const folder = join(dir, "combo");
    await run("combo", "My Banner", "-P", folder);
    expect(readdirSync(folder).sort()).toEqual(["My_Banner.png", "My_Banner.svg", "My_Banner.txt"]);
    expect(readFileSync(join(folder, "My_Banner.txt"), "utf-8")).toBe("<<My Banner>>");
  });

  it("palette --save stores a palette that render commands can use", async () => {
    await run("palette", "-n", "brand", "--bg", "#101010", "--accent", "#ff6600", "--text", "#ffffff", "--muted", "#999999", "--save");
    const stored = JSON.parse(readFileSync(deps.config.paletteFile, "utf-8"));
    expect(stored.brand.bg).toBe("#101010");
    expect(stored.brand.gradient_end).toBe("#ff6600");

    const out = join(dir, "brand.svg");
    await run("svg", "Test", "-p", "brand", "--palette-file", deps.config.paletteFile, "-o", out);
    expect(readFileSync(out, "utf-8")).toContain('<rect width="100%" height="100%" fill="#101010"/>');
  });

  it("batch writes valid records and fails the run for bad ones", async () => {
    const file = join(dir, "batch.json");
    const outdir = join(dir, "out");
    writeFileSync(file, JSON.stringify([{ text: "One" }, { text: "" }, { kind: "ascii", text: "Two" }]));

    await run("batch", file, "-o", outdir);
    expect(readdirSync(outdir).sort()).toEqual(["One.svg", "Two.txt"]);
    expect(log).toHaveBeenCalledWith(`\nBatch complete: 2/3 banners in ${outdir}`);
    expect(process.exitCode).toBe(1);
  });

  it("example writes a batch file the batch command accepts", async () => {
    const base = join(dir, "banner_config");
    await run("example", "-o", base);
    const records = JSON.parse(readFileSync(`${base}.json`, "utf-8"));
    expect(records).toHaveLength(4);

    const outdir = join(dir, "example-out");
    await run("batch", `${base}.json`, "-o", outdir);
    expect(readdirSync(outdir)).toHaveLength(4);
    expect(process.exitCode).toBeUndefined();
  });

  it("example reports a write failure as an IO error", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "not a directory");
    await run("example", "-o", join(blocker, "cfg"));
    expect(error).toHaveBeenCalledWith(`Error: Could not create directory ${blocker}`);
    expect(process.exitCode).toBe(1);
  });

  it("quick --type all writes every form into the directory", async () => {
    await run("quick", "Fast", "-t", "all", "-d", dir);
    expect(existsSync(join(dir, "Fast_quick.txt"))).toBe(true);
    expect(existsSync(join(dir, "Fast_quick.svg"))).toBe(true);
    expect(existsSync(join(dir, "Fast_quick.png"))).toBe(true);
  });

  it("info lists palettes, effects and installed sample fonts", async () => {
    await run("info");
    expect(log).toHaveBeenCalledWith("  stealth      - bg:#0a0f14 accent:#00ffff");
    expect(log).toHaveBeenCalledWith("  professional - royal palette, grid style");
    expect(log).toHaveBeenCalledWith("  - Slant");
    expect(log).not.toHaveBeenCalledWith("  - Banner");
    expect(log).toHaveBeenCalledWith("  - blur");
  });
});
