import {
  canvasMeasurer,
  resolveFonts,
  type ResolvedFont,
  type SignatureFonts,
  type TextMeasurer,
} from "./fonts.ts";
import type { ElementId, FontRole, SignatureConfig } from "./signatureConfig.ts";
import type { SignatureData } from "./signatureData.ts";

export type LineField =
  | "name"
  | "position"
  | "address"
  | "phone"
  | "mobile"
  | "email"
  | "website";

export type Size = { width: number; height: number };
export type Box = { x: number; y: number; width: number; height: number };

export type TextLine = {
  field: LineField | "confidentiality";
  role: FontRole;
  text: string;
  /** top-left anchor */
  x: number;
  y: number;
  /** measured advance width */
  width: number;
};

export type SeparatorBox = { x: number; y: number; width: number; thickness: number };

export type LayoutResult = {
  width: number;
  height: number;
  textX: number;
  logo: Box | null;
  lines: TextLine[];
  separator: SeparatorBox;
  confidentiality: TextLine | null;
  fonts: SignatureFonts;
};

export type LayoutOptions = {
  /** Pre-resolved fonts; resolved from the config when omitted. */
  fonts?: SignatureFonts;
  measure?: TextMeasurer;
};

/**
 * Canvas size and the anchor of every element.
 *
 *   margin | logo | logoMarginRight | lines...        | margin
 *                                   | ---separator--- |
 *                                   | notice          |
 *
 * Elements are stacked from the top margin in `config.elementOrder`: a text
 * line takes `lineHeight`, the separator takes `lineHeight` with the rule
 * drawn `floor(lineHeight * 0.3)` into it, the notice takes
 * `confidentialityLineHeight`. Empty lines are dropped so they reserve no
 * space. The logo entry takes no vertical space; the logo always sits at the
 * top-left margin.
 */
export function computeLayout(
  data: SignatureData,
  config: SignatureConfig,
  logoSize: Size | null,
  options: LayoutOptions = {}
): LayoutResult {
  const fonts = options.fonts ?? resolveFonts(config);
  const measure = options.measure ?? canvasMeasurer();
  const { margin, lineHeight } = config;

  const logoBox = logoSize ? scaleLogo(logoSize, config.logoHeight) : null;
  const logo = logoBox ? { x: margin, y: margin, ...logoBox } : null;
  const textX = margin + (logo ? logo.width + config.logoMarginRight : 0);

  const specs = new Map(buildTextLines(data, config).map((spec): [LineField, LineSpec] => [spec.field, spec]));
  const noticeText = config.confidentialityText.trim();

  const lines: TextLine[] = [];
  let confidentiality: TextLine | null = null;
  let separatorY = margin;
  let y = margin;

  for (const id of config.elementOrder) {
    if (id === "logo") continue;

    if (id === "separator") {
      separatorY = y + Math.floor(lineHeight * 0.3);
      y += lineHeight;
    } else if (id === "confidentiality") {
      if (!noticeText) continue;
      confidentiality = {
        field: "confidentiality",
        role: "confidentiality",
        text: noticeText,
        x: textX,
        y,
        width: measure(noticeText, fonts.confidentiality),
      };
      y += config.confidentialityLineHeight;
    } else {
      const spec = specs.get(id);
      if (!spec) continue;
      lines.push({ ...spec, x: textX, y, width: measure(spec.text, fonts[spec.role]) });
      y += lineHeight;
    }
  }

  const contactWidth = maxWidth(lines);
  const separator: SeparatorBox = {
    x: textX,
    y: separatorY,
    width: Math.ceil(contactWidth),
    thickness: config.separatorThickness,
  };

  const textBlockHeight = y - margin;
  const widest = Math.ceil(Math.max(contactWidth, confidentiality?.width ?? 0));

  return {
    width: textX + widest + margin,
    height: margin * 2 + Math.max(logo?.height ?? 0, textBlockHeight),
    textX,
    logo,
    lines,
    separator,
    confidentiality,
    fonts,
  };
}

export type LineSpec = { field: LineField; role: FontRole; text: string };

/** Text lines in element order with empty optional content removed. */
export function buildTextLines(data: SignatureData, config: SignatureConfig): LineSpec[] {
  const website = data.website.trim() || config.defaultWebsite;
  const content: Record<LineField, { text: string; prefix?: string }> = {
    name: { text: data.name },
    position: { text: data.position },
    address: { text: data.address },
    phone: { text: data.phone, prefix: "Tel: " },
    mobile: { text: data.mobile, prefix: "Mobile: " },
    email: { text: data.email },
    website: { text: website },
  };

  const specs: LineSpec[] = [];
  for (const id of config.elementOrder) {
    if (!isLineField(id)) continue;
    const { text, prefix } = content[id];
    if (text.trim() === "") continue;
    specs.push({
      field: id,
      role: id === "name" ? "name" : "details",
      text: `${prefix ?? ""}${text.trim()}`,
    });
  }
  return specs;
}

/** Height pinned to `targetHeight`; width keeps the source aspect ratio. */
export function scaleLogo(source: Size, targetHeight: number): Size {
  if (source.width <= 0 || source.height <= 0) {
    return { width: 1, height: targetHeight };
  }
  return {
    width: Math.max(1, Math.round((source.width * targetHeight) / source.height)),
    height: targetHeight,
  };
}

/** Font lookup for a text line. */
export function fontFor(layout: LayoutResult, line: TextLine): ResolvedFont {
  return layout.fonts[line.role];
}

function isLineField(id: ElementId): id is LineField {
  return id !== "logo" && id !== "separator" && id !== "confidentiality";
}

function maxWidth(lines: TextLine[]) {
  let max = 0;
  for (const line of lines) {
    if (line.width > max) max = line.width;
  }
  return max;
}
