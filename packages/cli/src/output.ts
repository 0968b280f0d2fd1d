/**
 * Output paths and artifact writes
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { IOFailureError } from "@banner-forge/core";

const MAX_SAFE_NAME_LENGTH = 30;

/**
 * File-name-safe form of banner text: spaces become underscores, characters
 * that are unsafe in paths are dropped, first 30 characters kept.
 */
export function safeName(text: string): string {
  const cleaned = text
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, "");
  const name = Array.from(cleaned).slice(0, MAX_SAFE_NAME_LENGTH).join("");
  return name.length > 0 && name !== "." && name !== ".." ? name : "banner";
}

/** UTC timestamp as YYYYMMDD_HHMMSS */
export function utcTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** banner_<safe>_<timestamp>.<ext> */
export function defaultOutputName(text: string, ext: string, date: Date = new Date()): string {
  return `banner_${safeName(text)}_${utcTimestamp(date)}.${ext}`;
}

/**
 * A path in `dir` for `<base>.<ext>` that no earlier call has returned and
 * no existing file uses: `<base>_2.<ext>`, `<base>_3.<ext>`, ...
 */
export function uniquePath(dir: string, base: string, ext: string, taken: Set<string>): string {
  let candidate = join(dir, `${base}.${ext}`);
  for (let n = 2; taken.has(candidate) || existsSync(candidate); n++) {
    candidate = join(dir, `${base}_${n}.${ext}`);
  }
  taken.add(candidate);
  return candidate;
}

export function ensureDir(path: string): void {
  try {
    mkdirSync(path, { recursive: true });
  } catch (error) {
    throw new IOFailureError(path, `Could not create directory ${path}`, { cause: error });
  }
}

/**
 * Write a finished artifact, creating the parent directory
 */
export function writeArtifact(path: string, data: Uint8Array | string): void {
  ensureDir(dirname(path) || ".");
  try {
    writeFileSync(path, data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IOFailureError(path, `Could not write ${path}: ${reason}`, { cause: error });
  }
}
