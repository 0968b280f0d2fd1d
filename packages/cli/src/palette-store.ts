/**
 * Custom palette store: a JSON file of name -> hex palette
 *
 * {
 *   "brand": { "bg": "#101010", "accent": "#ff6600", "text": "#ffffff",
 *              "muted": "#999999", "gradient_start": "#ff6600", "gradient_end": "#ff6600" }
 * }
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import {
  BUILT_IN_PALETTES,
  InvalidInputError,
  IOFailureError,
  isHexColor,
  paletteFromHex,
  withCustomPalettes,
  type PaletteHex,
  type PaletteRegistry,
  type Palette,
} from "@banner-forge/core";

const hexColor = z.string().refine(isHexColor, { message: "expected a hex color like #1a2b3c" });

const paletteHexSchema = z.object({
  bg: hexColor,
  accent: hexColor,
  text: hexColor,
  muted: hexColor,
  gradient_start: hexColor,
  gradient_end: hexColor,
});

const storeSchema = z.record(z.string(), paletteHexSchema);

export type PaletteStore = Readonly<Record<string, PaletteHex>>;

/**
 * Read a store file. A missing file is an empty store.
 */
export function loadPaletteStore(path: string): PaletteStore {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IOFailureError(path, `Could not read palette file ${path}: ${reason}`, { cause: error });
  }

  const result = storeSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(
      `Invalid palette file ${path}: ${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
  }
  return result.data;
}

/** Add or replace one palette; the input store is not modified */
export function mergePalette(store: PaletteStore, name: string, palette: PaletteHex): PaletteStore {
  return { ...store, [name]: palette };
}

export function savePaletteStore(path: string, store: PaletteStore): void {
  try {
    writeFileSync(path, `${JSON.stringify(store, null, 2)}\n`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IOFailureError(path, `Could not write palette file ${path}: ${reason}`, { cause: error });
  }
}

/**
 * Built-in palettes plus the store's; store entries override built-ins of the same name
 */
export function registryFromStore(store: PaletteStore, base: PaletteRegistry = BUILT_IN_PALETTES): PaletteRegistry {
  const additions: Record<string, Palette> = {};
  for (const [name, hex] of Object.entries(store)) {
    additions[name] = paletteFromHex(hex);
  }
  return withCustomPalettes(base, additions);
}
