import { createCanvas, loadImage } from "@napi-rs/canvas";
import fs from "node:fs/promises";

import { sampleSignature } from "./example.ts";
import { generateWithLayout } from "./signature/generate.ts";
import { drawLayoutOverlay } from "./signature/overlay.ts";
import { loadSignatureConfig } from "./signature/signatureConfig.ts";
import { createSignatureData } from "./signature/signatureData.ts";

/**
 * Renders the sample signature and draws a pixel grid plus element boxes on
 * top of it, so layout changes can be checked by eye.
 *
 * Coordinates are canvas pixels with the origin at the top-left.
 */
async function addLayoutOverlay(outputPath: string, logoPath?: string) {
  const config = loadSignatureConfig();
  const data = createSignatureData({ ...sampleSignature, logoPath });

  const { png, layout } = await generateWithLayout(data, config);

  const canvas = createCanvas(layout.width, layout.height);
  const ctx = canvas.getContext("2d");
  ctx.drawImage(await loadImage(png), 0, 0);
  drawLayoutOverlay(ctx, layout, { gridStep: 10 });

  await fs.writeFile(outputPath, canvas.toBuffer("image/png"));
  return layout;
}

async function main() {
  const [outputPath, logoPath] = process.argv.slice(2);

  if (!outputPath) {
    console.error("Usage: tsx layoutOverlay.ts <output.png> [logo.png]");
    process.exit(1);
  }

  const layout = await addLayoutOverlay(outputPath, logoPath);
  console.log(`Wrote layout overlay (${layout.width}x${layout.height}) to: ${outputPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
