import fs from "node:fs";
import { createCanvas, GlobalFonts } from "@napi-rs/canvas";

import { RenderError } from "./errors.ts";
import { createLogger } from "./logger.ts";
import {
  currentPlatform,
  type FontRole,
  type Platform,
  type SignatureConfig,
} from "./signatureConfig.ts";

const log = createLogger("fonts");

export type ResolvedFont = {
  role: FontRole;
  family: string;
  size: number;
  weight: "bold" | "normal";
  /** Font file the family was registered from; null for the fallback family. */
  source: string | null;
  /** Value for CanvasRenderingContext2D.font */
  css: string;
};

export type SignatureFonts = Record<FontRole, ResolvedFont>;

/** (text, font) -> advance width in pixels */
export type TextMeasurer = (text: string, font: ResolvedFont) => number;

// font file -> alias it was registered under (or null if Skia refused it)
const registered = new Map<string, string | null>();

/**
 * Returns the first candidate font for `role` that the canvas can load, or
 * the configured fallback family. Missing files are skipped, never fatal.
 */
export function resolveFont(
  role: FontRole,
  size: number,
  config: SignatureConfig,
  platform: Platform = currentPlatform()
): ResolvedFont {
  const weight = role === "name" ? "bold" : "normal";
  const candidates = config.fonts[platform][role];

  for (const candidate of candidates) {
    const family = registerFontFile(candidate);
    if (family) {
      log.debug(`using ${candidate} for ${role}`);
      return { role, family, size, weight, source: candidate, css: fontCss(weight, size, family) };
    }
  }

  if (config.fallbackFontFamily === null) {
    throw new RenderError(
      "font resolution",
      `no usable font for role '${role}' (tried ${candidates.length} candidate(s) on ${platform}) and no fallback family is configured`
    );
  }

  log.warn(`no candidate font loaded for ${role}, falling back to ${config.fallbackFontFamily}`, {
    candidates: [...candidates],
  });
  const family = config.fallbackFontFamily;
  return { role, family, size, weight, source: null, css: fontCss(weight, size, family) };
}

export function resolveFonts(
  config: SignatureConfig,
  platform: Platform = currentPlatform()
): SignatureFonts {
  return {
    name: resolveFont("name", config.fontSizes.name, config, platform),
    details: resolveFont("details", config.fontSizes.details, config, platform),
    confidentiality: resolveFont(
      "confidentiality",
      config.fontSizes.confidentiality,
      config,
      platform
    ),
  };
}

/** Measures with the same font engine the renderer draws with. */
export function canvasMeasurer(): TextMeasurer {
  const ctx = createCanvas(1, 1).getContext("2d");
  return (text, font) => {
    ctx.font = font.css;
    return ctx.measureText(text).width;
  };
}

/* =========================
 * Helpers
 * ========================= */

function registerFontFile(fontPath: string): string | null {
  const known = registered.get(fontPath);
  if (known !== undefined) return known;

  let family: string | null = null;
  if (!isReadableFile(fontPath)) {
    log.debug(`font not found: ${fontPath}`);
  } else {
    const alias = `SignatureFont${registered.size + 1}`;
    try {
      family = GlobalFonts.registerFromPath(fontPath, alias) ? alias : null;
    } catch (err) {
      log.debug(`font failed to load: ${fontPath}`, { error: String(err) });
    }
    if (!family) log.debug(`font rejected by the canvas: ${fontPath}`);
  }

  registered.set(fontPath, family);
  return family;
}

function isReadableFile(p: string) {
  try {
    fs.accessSync(p, fs.constants.R_OK);
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

function fontCss(weight: "bold" | "normal", size: number, family: string) {
  // generic families (sans-serif, serif, ...) must stay unquoted
  const isGeneric = /^(sans-serif|serif|monospace|cursive|fantasy|system-ui)$/.test(family);
  return `${weight} ${size}px ${isGeneric ? family : `"${family}"`}`;
}
