import type { SKRSContext2D } from "@napi-rs/canvas";

import type { LayoutResult } from "./layout.ts";

export type OverlayTarget = Pick<
  SKRSContext2D,
  "save" | "restore" | "beginPath" | "moveTo" | "lineTo" | "stroke" | "strokeRect" | "strokeStyle" | "lineWidth"
>;

export type OverlayOptions = {
  /** pixels between grid lines; 0 disables the grid */
  gridStep?: number;
};

/**
 * Debug overlay for checking a layout by eye: a pixel grid plus a box around
 * the logo, every text line, the separator and the notice.
 */
export function drawLayoutOverlay(
  ctx: OverlayTarget,
  layout: LayoutResult,
  options: OverlayOptions = {}
) {
  const gridStep = options.gridStep ?? 10;
  ctx.save();

  if (gridStep > 0) {
    ctx.lineWidth = 0.5;
    ctx.strokeStyle = "rgba(0, 0, 0, 0.15)";
    ctx.beginPath();
    for (let x = 0; x <= layout.width; x += gridStep) {
      ctx.moveTo(x + 0.5, 0);
      ctx.lineTo(x + 0.5, layout.height);
    }
    for (let y = 0; y <= layout.height; y += gridStep) {
      ctx.moveTo(0, y + 0.5);
      ctx.lineTo(layout.width, y + 0.5);
    }
    ctx.stroke();
  }

  ctx.lineWidth = 1;

  if (layout.logo) {
    ctx.strokeStyle = "#22C55E";
    ctx.strokeRect(layout.logo.x, layout.logo.y, layout.logo.width, layout.logo.height);
  }

  ctx.strokeStyle = "#3B82F6";
  for (const line of layout.lines) {
    ctx.strokeRect(line.x, line.y, line.width, layout.fonts[line.role].size);
  }

  ctx.strokeStyle = "#F59E0B";
  ctx.strokeRect(
    layout.separator.x,
    layout.separator.y,
    layout.separator.width,
    layout.separator.thickness
  );

  if (layout.confidentiality) {
    ctx.strokeStyle = "#A855F7";
    ctx.strokeRect(
      layout.confidentiality.x,
      layout.confidentiality.y,
      layout.confidentiality.width,
      layout.fonts.confidentiality.size
    );
  }

  ctx.restore();
}
