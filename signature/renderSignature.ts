import fs from "node:fs/promises";
import { createCanvas, loadImage, type Image, type SKRSContext2D } from "@napi-rs/canvas";

import { describeError, RenderError } from "./errors.ts";
import { fontFor, type LayoutResult, type TextLine } from "./layout.ts";
import type { Color, SignatureConfig } from "./signatureConfig.ts";
import type { SignatureData } from "./signatureData.ts";
import type { ResolvedFont } from "./fonts.ts";

/** The part of a 2D context the halo primitive needs. */
export type HaloTarget = Pick<SKRSContext2D, "font" | "fillStyle" | "textBaseline" | "fillText">;

/**
 * Paints the composed signature on a transparent canvas and encodes it as
 * PNG. `logo` must be given whenever the layout reserves a logo box.
 */
export function renderSignature(
  data: SignatureData,
  config: SignatureConfig,
  layout: LayoutResult,
  logo: Image | null = null
): Buffer {
  if (layout.logo && !logo) {
    throw new RenderError("logo", `layout reserves a logo box but no image was loaded for ${data.logoPath ?? "(no path)"}`);
  }

  try {
    // new canvases start fully transparent
    const canvas = createCanvas(layout.width, layout.height);
    const ctx = canvas.getContext("2d");

    if (layout.logo && logo) {
      ctx.imageSmoothingEnabled = true;
      ctx.imageSmoothingQuality = "high";
      ctx.drawImage(logo, layout.logo.x, layout.logo.y, layout.logo.width, layout.logo.height);
    }

    for (const line of layout.lines) {
      const isName = line.role === "name";
      drawLine(
        ctx,
        line,
        fontFor(layout, line),
        isName ? config.colors.name : config.colors.details,
        config.colors.outline,
        isName ? config.outlineWidth.name : config.outlineWidth.text
      );
    }

    const { separator } = layout;
    if (separator.width > 0) {
      ctx.fillStyle = cssColor(config.colors.separator);
      ctx.fillRect(separator.x, separator.y, separator.width, separator.thickness);
    }

    if (layout.confidentiality) {
      drawLine(
        ctx,
        layout.confidentiality,
        fontFor(layout, layout.confidentiality),
        config.colors.confidentiality,
        config.colors.outline,
        config.outlineWidth.text
      );
    }

    return canvas.toBuffer("image/png");
  } catch (err) {
    if (err instanceof RenderError) throw err;
    throw new RenderError("compositing", describeError(err), { cause: err });
  }
}

/**
 * Outlined text: the outline color is painted at every offset within
 * `outlineWidth` (the 8 neighbours for a width of 1), then the fill color at
 * the true position on top.
 */
export function drawHaloText(
  ctx: HaloTarget,
  position: { x: number; y: number },
  text: string,
  font: ResolvedFont,
  fill: Color,
  outline: Color,
  outlineWidth = 1
) {
  const { x, y } = position;
  ctx.font = font.css;
  ctx.textBaseline = "top";

  ctx.fillStyle = cssColor(outline);
  for (let dx = -outlineWidth; dx <= outlineWidth; dx++) {
    for (let dy = -outlineWidth; dy <= outlineWidth; dy++) {
      if (dx === 0 && dy === 0) continue;
      ctx.fillText(text, x + dx, y + dy);
    }
  }

  ctx.fillStyle = cssColor(fill);
  ctx.fillText(text, x, y);
}

/** Decodes a logo file; any read or decode failure becomes a RenderError. */
export async function loadLogo(logoPath: string): Promise<Image> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(logoPath);
  } catch (err) {
    throw new RenderError("logo", `cannot read ${logoPath}: ${describeError(err)}`, { cause: err });
  }

  try {
    const image = await loadImage(bytes);
    if (!image.width || !image.height) {
      throw new Error("image has no pixels");
    }
    return image;
  } catch (err) {
    throw new RenderError("logo", `cannot decode ${logoPath}: ${describeError(err)}`, { cause: err });
  }
}

/** [r, g, b(, a)] with 0..255 channels -> CSS rgba() */
export function cssColor(color: Color): string {
  const [r, g, b] = color;
  const alpha = color.length === 4 ? color[3] : 255;
  return `rgba(${r}, ${g}, ${b}, ${+(alpha / 255).toFixed(4)})`;
}

function drawLine(
  ctx: SKRSContext2D,
  line: TextLine,
  font: ResolvedFont,
  fill: Color,
  outline: Color,
  outlineWidth: number
) {
  drawHaloText(ctx, { x: line.x, y: line.y }, line.text, font, fill, outline, outlineWidth);
}
