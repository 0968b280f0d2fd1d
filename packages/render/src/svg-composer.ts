/**
 * Vector composer - assembles a complete, self-contained SVG banner
 *
 * Layout (fractions of the canvas):
 * ┌──────────────────────────────────────────┐
 * │  background rect + accent geometry       │
 * │                                          │
 * │              TITLE                       │  baseline .55h, size .2h
 * │                                          │
 * │            subtitle                      │  baseline .78h, size .075h
 * └──────────────────────────────────────────┘
 */

import type { RenderRequest } from "@banner-forge/core";
import { toHex } from "@banner-forge/core";
import { generateAccent, type AccentShape, type PathCommand } from "./accent.js";

export const TITLE_FONT_FAMILY = "Orbitron,Inter,Arial,sans-serif";
export const SUBTITLE_FONT_FAMILY = "Inter,Arial,Helvetica,sans-serif";

const GRADIENT_ID = "grad";
const GLOW_FILTER_ID = "glow";

// Code points XML 1.0 does not allow in a document
const XML_ILLEGAL = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\ufffe\uffff]/g;

export function escapeXml(value: string): string {
  return value
    .replace(XML_ILLEGAL, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** At most two decimals, no trailing zeros */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

function pathData(commands: PathCommand[]): string {
  const n = formatNumber;
  return commands
    .map((cmd) => {
      switch (cmd.op) {
        case "M":
          return `M${n(cmd.x)} ${n(cmd.y)}`;
        case "C":
          return `C ${n(cmd.x1)} ${n(cmd.y1)}, ${n(cmd.x2)} ${n(cmd.y2)}, ${n(cmd.x)} ${n(cmd.y)}`;
        case "L":
          return `L ${n(cmd.x)} ${n(cmd.y)}`;
        case "Z":
          return "Z";
      }
    })
    .join(" ");
}

/**
 * Serialize one accent shape to an SVG element
 */
export function shapeToSvg(shape: AccentShape): string {
  const n = formatNumber;
  switch (shape.kind) {
    case "path":
      return `<path d="${pathData(shape.commands)}" fill="${toHex(shape.fill)}" opacity="${n(shape.opacity)}"/>`;
    case "circle":
      return `<circle cx="${n(shape.cx)}" cy="${n(shape.cy)}" r="${n(shape.r)}" fill="${toHex(shape.fill)}" opacity="${n(shape.opacity)}"/>`;
    case "rect": {
      const transform = shape.rotation
        ? ` transform="rotate(${n(shape.rotation.angle)} ${n(shape.rotation.cx)} ${n(shape.rotation.cy)})"`
        : "";
      return `<rect x="${n(shape.x)}" y="${n(shape.y)}" width="${n(shape.width)}" height="${n(shape.height)}" fill="${toHex(shape.fill)}" opacity="${n(shape.opacity)}"${transform}/>`;
    }
    case "line":
      return `<line x1="${n(shape.x1)}" y1="${n(shape.y1)}" x2="${n(shape.x2)}" y2="${n(shape.y2)}" stroke="${toHex(shape.stroke)}" opacity="${n(shape.opacity)}"/>`;
  }
}

function gradientStops(request: RenderRequest): string[] {
  const start = toHex(request.palette.gradientStart);
  const end = toHex(request.palette.gradientEnd);
  if (!request.animated) {
    return [
      `      <stop offset="0%" stop-color="${start}"/>`,
      `      <stop offset="100%" stop-color="${end}"/>`,
    ];
  }
  return [
    `      <stop offset="0%" stop-color="${start}">`,
    `        <animate attributeName="stop-color" values="${start};${end};${start}" dur="3s" repeatCount="indefinite"/>`,
    `      </stop>`,
    `      <stop offset="100%" stop-color="${end}">`,
    `        <animate attributeName="stop-color" values="${end};${start};${end}" dur="3s" repeatCount="indefinite"/>`,
    `      </stop>`,
  ];
}

function titleElement(request: RenderRequest): string[] {
  const { width, height } = request.geometry;
  const x = Math.floor(width / 2);
  const y = Math.floor(height * 0.55);
  const fontSize = Math.floor(height * 0.2);
  const title = escapeXml(request.text);
  const common = `x="${x}" y="${y}" font-family="${TITLE_FONT_FAMILY}" font-size="${fontSize}" font-weight="700" text-anchor="middle"`;

  if (request.animated) {
    return [
      `  <text ${common} fill="url(#${GRADIENT_ID})">${title}`,
      `    <animate attributeName="opacity" values="0.8;1;0.8" dur="2s" repeatCount="indefinite"/>`,
      `  </text>`,
    ];
  }

  const filter = request.style === "glow" ? ` filter="url(#${GLOW_FILTER_ID})"` : "";
  return [`  <text ${common} fill="${toHex(request.palette.text)}"${filter}>${title}</text>`];
}

function subtitleElement(request: RenderRequest): string[] {
  if (!request.subtitle) {
    return [];
  }
  const { width, height } = request.geometry;
  const x = Math.floor(width / 2);
  const y = Math.floor(height * 0.78);
  const fontSize = Math.floor(height * 0.075);
  return [
    `  <text x="${x}" y="${y}" font-family="${SUBTITLE_FONT_FAMILY}" font-size="${fontSize}" fill="${toHex(request.palette.muted)}" text-anchor="middle">${escapeXml(request.subtitle)}</text>`,
  ];
}

/**
 * Compose the SVG document for a request
 */
export function composeSvg(request: RenderRequest): string {
  const { width, height } = request.geometry;
  const { palette } = request;
  const useGlowFilter = request.style === "glow" && !request.animated;

  const accent = Array.from(generateAccent(request.style, width, height, palette.accent)).map(
    (shape) => `  ${shapeToSvg(shape)}`
  );

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg" role="img" aria-label="${escapeXml(request.text)}">`,
    `  <defs>`,
    `    <linearGradient id="${GRADIENT_ID}" x1="0%" y1="0%" x2="100%" y2="100%">`,
    ...gradientStops(request),
    `    </linearGradient>`,
    ...(useGlowFilter
      ? [
          `    <filter id="${GLOW_FILTER_ID}">`,
          `      <feGaussianBlur stdDeviation="2" result="coloredBlur"/>`,
          `      <feMerge><feMergeNode in="coloredBlur"/><feMergeNode in="SourceGraphic"/></feMerge>`,
          `    </filter>`,
        ]
      : []),
    `  </defs>`,
    `  <rect width="100%" height="100%" fill="${toHex(palette.background)}"/>`,
    ...accent,
    ...titleElement(request),
    ...subtitleElement(request),
    `</svg>`,
    "",
  ].join("\n");
}
