import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { ResolvedFont, SignatureFonts, TextMeasurer } from "../signature/fonts.ts";
import {
  defaultSignatureConfig,
  updateSignatureConfig,
  type FontRole,
  type SignatureConfig,
} from "../signature/signatureConfig.ts";
import type { SignatureInput } from "../signature/signatureData.ts";

/** SIL OFL font shipped with the tests (see fixtures/Lato-Regular.OFL.txt). */
export const fixtureFont = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "fixtures",
  "Lato-Regular.ttf"
);

/** Every role on every platform resolves to the given candidate list. */
export function fontsEverywhere(candidates: string[]) {
  const roles = { name: candidates, details: candidates, confidentiality: candidates };
  return { linux: roles, darwin: roles, win32: roles };
}

export const johnDoe: SignatureInput = {
  name: "John Doe",
  position: "Software Engineer",
  address: "Anytown, USA",
  phone: "+1 555 0100",
  mobile: "+1 555 0101",
  email: "john.doe@example.com",
  website: "",
};

function font(role: FontRole, size: number): ResolvedFont {
  const weight = role === "name" ? "bold" : "normal";
  return { role, family: "Test", size, weight, source: null, css: `${weight} ${size}px Test` };
}

/** Fonts that never touch the canvas font registry. */
export function fakeFonts(): SignatureFonts {
  return {
    name: font("name", 16),
    details: font("details", 14),
    confidentiality: font("confidentiality", 9),
  };
}

/** 8px per character, whatever the font. */
export const perChar: TextMeasurer = (text) => text.length * 8;

export async function tempDir(prefix = "signature-test-") {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Defaults with a short notice, so widths stay easy to work out. */
export function testConfig(patch: Record<string, unknown> = {}): SignatureConfig {
  return updateSignatureConfig(defaultSignatureConfig, {
    confidentialityText: "Confidential.",
    ...patch,
  });
}

/** Width and height from the PNG IHDR chunk. */
export function pngSize(png: Buffer) {
  return { width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
}
