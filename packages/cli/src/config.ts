/**
 * CLI configuration from the environment and .env files
 */

import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { DEFAULT_MAX_AREA, InvalidInputError } from "@banner-forge/core";

export const DEFAULT_PALETTE_FILE = "custom_palettes.json";

// Blank variables count as unset
const optionalString = z.preprocess((value) => (value === "" ? undefined : value), z.string().optional());

const envSchema = z.object({
  MODEL_ID: optionalString,
  AWS_REGION: optionalString,
  BANNER_FORGE_FONT: optionalString,
  BANNER_FORGE_MAX_AREA: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().positive().default(DEFAULT_MAX_AREA)
  ),
  BANNER_FORGE_PALETTE_FILE: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.string().default(DEFAULT_PALETTE_FILE)
  ),
});

export interface CliConfig {
  /** Bedrock model for tagline suggestions; offline suggestions when unset */
  modelId?: string;
  region?: string;
  /** Font file tried before the platform fonts */
  fontPath?: string;
  maxArea: number;
  paletteFile: string;
}

/**
 * Load .env.local, then .env, from a directory. Variables already set win.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: resolve(cwd, ".env.local") });
  loadDotenv({ path: resolve(cwd, ".env") });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidInputError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const parsed = result.data;
  return {
    modelId: parsed.MODEL_ID,
    region: parsed.AWS_REGION,
    fontPath: parsed.BANNER_FORGE_FONT,
    maxArea: parsed.BANNER_FORGE_MAX_AREA,
    paletteFile: parsed.BANNER_FORGE_PALETTE_FILE,
  };
}
