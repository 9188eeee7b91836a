import fs from "node:fs/promises";
import path from "node:path";
import { createCanvas, loadImage } from "@napi-rs/canvas";
import { describe, expect, it } from "vitest";

import { RenderError } from "../signature/errors.ts";
import { generate, generateToFile, generateWithLayout, findLogo } from "../signature/generate.ts";
import { computeLayout } from "../signature/layout.ts";
import {
  cssColor,
  drawHaloText,
  loadLogo,
  renderSignature,
  type HaloTarget,
} from "../signature/renderSignature.ts";
import { createSignatureData } from "../signature/signatureData.ts";
import { resolveFonts } from "../signature/fonts.ts";
import {
  fakeFonts,
  fixtureFont,
  fontsEverywhere,
  johnDoe,
  perChar,
  pngSize,
  tempDir,
  testConfig,
} from "./helpers.ts";

const options = { fonts: fakeFonts(), measure: perChar };

async function pixels(png: Buffer) {
  const image = await loadImage(png);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext("2d");
  ctx.drawImage(image, 0, 0);
  const { data, width } = ctx.getImageData(0, 0, image.width, image.height);
  return (x: number, y: number) => {
    const i = (y * width + x) * 4;
    return [data[i], data[i + 1], data[i + 2], data[i + 3]];
  };
}

/** 40x20 PNG, left half transparent, right half opaque red. */
async function writeHalfRedLogo(dir: string) {
  const canvas = createCanvas(40, 20);
  const ctx = canvas.getContext("2d");
  ctx.fillStyle = "rgb(255, 0, 0)";
  ctx.fillRect(20, 0, 20, 20);
  const file = path.join(dir, "logo.png");
  await fs.writeFile(file, canvas.toBuffer("image/png"));
  return file;
}

const NEIGHBOURS = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

describe("drawHaloText", () => {
  function recorder() {
    const calls: Array<{ x: number; y: number; style: string }> = [];
    const target: HaloTarget = {
      font: "",
      fillStyle: "",
      textBaseline: "alphabetic",
      fillText(_text: string, x: number, y: number) {
        calls.push({ x, y, style: String(target.fillStyle) });
      },
    };
    return { target, calls };
  }

  it("paints the 8 neighbours in the outline color, then the fill on top", () => {
    const { target, calls } = recorder();
    drawHaloText(target, { x: 10, y: 20 }, "Hi", fakeFonts().details, [1, 2, 3], [255, 255, 255]);

    expect(target.font).toBe("normal 14px Test");
    expect(target.textBaseline).toBe("top");
    expect(calls.map(({ x, y }) => [x, y])).toEqual([
      [9, 19],
      [9, 20],
      [9, 21],
      [10, 19],
      [10, 21],
      [11, 19],
      [11, 20],
      [11, 21],
      [10, 20],
    ]);
    expect(calls.slice(0, 8).every((c) => c.style === "rgba(255, 255, 255, 1)")).toBe(true);
    expect(calls[8]?.style).toBe("rgba(1, 2, 3, 1)");
  });

  it("covers the whole square for wider outlines", () => {
    const { target, calls } = recorder();
    drawHaloText(target, { x: 0, y: 0 }, "Hi", fakeFonts().name, [0, 0, 0], [255, 255, 255], 2);

    expect(calls).toHaveLength(25);
    expect(calls.some((c) => c.x === 0 && c.y === 0 && c.style === "rgba(255, 255, 255, 1)")).toBe(false);
  });
});

describe("cssColor", () => {
  it("maps 0..255 alpha onto 0..1", () => {
    expect(cssColor([10, 20, 30])).toBe("rgba(10, 20, 30, 1)");
    expect(cssColor([200, 0, 40, 200])).toBe("rgba(200, 0, 40, 0.7843)");
    expect(cssColor([0, 0, 0, 0])).toBe("rgba(0, 0, 0, 0)");
  });
});

describe("renderSignature", () => {
  it("produces a PNG of the layout size with a transparent border", async () => {
    const png = await generate(createSignatureData(johnDoe), testConfig(), options);

    expect(png.subarray(0, 8)).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]));
    expect(pngSize(png)).toEqual({ width: 190, height: 224 });

    const at = await pixels(png);
    for (let x = 0; x < 190; x++) expect(at(x, 0)[3]).toBe(0);
    for (let y = 0; y < 224; y++) expect(at(0, y)[3]).toBe(0);
  });

  it("draws the separator in its configured color", async () => {
    const png = await generate(createSignatureData(johnDoe), testConfig(), options);
    const [r, g, b, a] = (await pixels(png))(20, 176);

    expect(a).toBe(200);
    expect(r).toBeGreaterThanOrEqual(198);
    expect(g).toBeLessThanOrEqual(2);
    expect(b).toBeGreaterThanOrEqual(38);
  });

  it("is deterministic for the same input", async () => {
    const data = createSignatureData(johnDoe);
    const first = await generate(data, testConfig(), options);
    const second = await generate(data, testConfig(), options);
    expect(first.equals(second)).toBe(true);
  });

  it("scales the logo into its box", async () => {
    const dir = await tempDir();
    const logoPath = await writeHalfRedLogo(dir);
    const data = createSignatureData({ ...johnDoe, logoPath });

    const { png, layout } = await generateWithLayout(data, testConfig(), options);
    expect(layout.logo).toEqual({ x: 15, y: 15, width: 140, height: 70 });
    expect(pngSize(png)).toEqual({ width: 350, height: 224 });

    const at = await pixels(png);
    expect(at(120, 50)).toEqual([255, 0, 0, 255]);
    expect(at(50, 50)[3]).toBe(0);
  });

  it("surrounds every solid fill pixel with the outline", async () => {
    const config = testConfig({
      fonts: fontsEverywhere([fixtureFont]),
      fontSizes: { name: 32, details: 24, confidentiality: 18 },
      lineHeight: 40,
      colors: {
        outline: [255, 255, 255],
        name: [0, 0, 255],
        details: [0, 0, 255],
        separator: [255, 0, 0],
        confidentiality: [0, 0, 255],
      },
    });
    const fonts = resolveFonts(config, "linux");
    expect(fonts.name.source).toBe(fixtureFont);

    const { png, layout } = await generateWithLayout(createSignatureData(johnDoe), config, { fonts });
    const at = await pixels(png);

    let fillPixels = 0;
    const gaps: string[] = [];
    for (let y = 1; y < layout.height - 1; y++) {
      for (let x = 1; x < layout.width - 1; x++) {
        const [r, g, b, a] = at(x, y);
        if (r !== 0 || g !== 0 || b !== 255 || a !== 255) continue;
        fillPixels++;
        for (const [dx, dy] of NEIGHBOURS) {
          if (at(x + dx, y + dy)[3] === 0) gaps.push(`${x + dx},${y + dy}`);
        }
      }
    }

    expect(fillPixels).toBeGreaterThan(100);
    expect(gaps).toEqual([]);
  });

  it("refuses a layout with a logo box but no image", () => {
    const data = createSignatureData(johnDoe);
    const layout = computeLayout(data, testConfig(), { width: 10, height: 10 }, options);
    expect(() => renderSignature(data, testConfig(), layout, null)).toThrow(RenderError);
  });
});

describe("loadLogo", () => {
  it("reports unreadable and undecodable files as render errors", async () => {
    const dir = await tempDir();
    const garbage = path.join(dir, "broken.png");
    await fs.writeFile(garbage, "not an image");

    await expect(loadLogo(path.join(dir, "missing.png"))).rejects.toThrow(
      "Rendering failed during 'logo': cannot read"
    );
    await expect(loadLogo(garbage)).rejects.toThrow("Rendering failed during 'logo': cannot decode");
  });
});

describe("generateToFile", () => {
  it("creates the directory and reports the written size", async () => {
    const dir = await tempDir();
    const output = path.join(dir, "out", "signature.png");

    const result = await generateToFile(createSignatureData(johnDoe), testConfig(), output);
    const png = await fs.readFile(output);

    expect(result.path).toBe(output);
    expect(pngSize(png)).toEqual({ width: result.width, height: result.height });
  });
});

describe("findLogo", () => {
  it("returns the first existing file in search order", async () => {
    const dir = await tempDir();
    await fs.mkdir(path.join(dir, "logo"));
    await fs.writeFile(path.join(dir, "logo", "logo.png"), "");
    await fs.writeFile(path.join(dir, "logo.jpg"), "");

    expect(findLogo(["logo.png", "logo", "logo/logo.png", "logo.jpg"], dir)).toBe(
      path.join(dir, "logo", "logo.png")
    );
    expect(findLogo(["nothing.png"], dir)).toBeNull();
  });
});
