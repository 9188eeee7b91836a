import fs from "node:fs/promises";
import { existsSync, statSync } from "node:fs";
import path from "node:path";

import { FileSystemError } from "./errors.ts";
import { computeLayout, type LayoutOptions, type LayoutResult } from "./layout.ts";
import { createLogger } from "./logger.ts";
import { loadLogo, renderSignature } from "./renderSignature.ts";
import type { SignatureConfig } from "./signatureConfig.ts";
import type { SignatureData } from "./signatureData.ts";

const log = createLogger("generate");

export type GenerateResult = {
  png: Buffer;
  layout: LayoutResult;
};

/**
 * The one entry point of the core: validated data in, PNG bytes out.
 * Throws RenderError for logo, font and canvas failures.
 */
export async function generate(
  data: SignatureData,
  config: SignatureConfig,
  options: LayoutOptions = {}
): Promise<Buffer> {
  const { png } = await generateWithLayout(data, config, options);
  return png;
}

export async function generateWithLayout(
  data: SignatureData,
  config: SignatureConfig,
  options: LayoutOptions = {}
): Promise<GenerateResult> {
  const logo = data.logoPath ? await loadLogo(data.logoPath) : null;
  const layout = computeLayout(
    data,
    config,
    logo ? { width: logo.width, height: logo.height } : null,
    options
  );
  log.debug("layout computed", { width: layout.width, height: layout.height, lines: layout.lines.length });

  return { png: renderSignature(data, config, layout, logo), layout };
}

/** Renders and writes the PNG, creating the parent directory if needed. */
export async function generateToFile(
  data: SignatureData,
  config: SignatureConfig,
  outputPath: string
): Promise<{ path: string; width: number; height: number }> {
  log.info(`generating signature for ${data.name}`);
  const { png, layout } = await generateWithLayout(data, config);

  const target = path.resolve(outputPath);
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, png);
  } catch (err) {
    throw new FileSystemError("write signature to", target, err);
  }

  log.info(`wrote ${target} (${layout.width}x${layout.height})`);
  return { path: target, width: layout.width, height: layout.height };
}

/** First search path (relative to `cwd`) that is an existing file, else null. */
export function findLogo(searchPaths: readonly string[], cwd = process.cwd()): string | null {
  for (const candidate of searchPaths) {
    const resolved = path.resolve(cwd, candidate);
    if (existsSync(resolved) && statSync(resolved).isFile()) return resolved;
  }
  return null;
}
