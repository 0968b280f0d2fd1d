/**
 * Template resolver
 * Maps template names to style/palette/effects bundles.
 *
 * Precedence: explicit value > template value > default.
 */

import type { Effect, Style, Template } from "./types.js";
import { DEFAULT_PALETTE_NAME } from "./palettes.js";

export const DEFAULT_STYLE: Style = "wave";

const TEMPLATE_TABLE: Record<string, Template> = {
  minimal: { style: "wave", palette: "stealth", effects: [] },
  professional: { style: "grid", palette: "royal", effects: ["shadow"] },
  creative: { style: "geometric", palette: "sunset", effects: ["glow", "gradient"] },
  tech: { style: "wave", palette: "neon", effects: ["glow"] },
  nature: { style: "wave", palette: "forest", effects: ["blur"] },
  cyberpunk: { style: "particles", palette: "cyberpunk", effects: ["glow", "shadow"] },
};

for (const template of Object.values(TEMPLATE_TABLE)) {
  Object.freeze(template.effects);
  Object.freeze(template);
}

export const TEMPLATES: Readonly<Record<string, Template>> = Object.freeze(TEMPLATE_TABLE);

export interface TemplateOverrides {
  style?: Style;
  palette?: string;
  effects?: readonly Effect[];
}

export interface ResolvedTemplate {
  style: Style;
  palette: string;
  effects: readonly Effect[];
}

export function listTemplateNames(): string[] {
  return Object.keys(TEMPLATES);
}

export function getTemplate(name: string | undefined): Template | undefined {
  if (name === undefined || !Object.prototype.hasOwnProperty.call(TEMPLATES, name)) {
    return undefined;
  }
  return TEMPLATES[name];
}

/**
 * Resolve a template against explicit overrides.
 * An unrecognized name behaves as if no template were given.
 */
export function resolveTemplate(
  name: string | undefined,
  overrides: TemplateOverrides = {}
): ResolvedTemplate {
  const template = getTemplate(name);
  return {
    style: overrides.style ?? template?.style ?? DEFAULT_STYLE,
    palette: overrides.palette ?? template?.palette ?? DEFAULT_PALETTE_NAME,
    effects: overrides.effects ?? template?.effects ?? [],
  };
}
