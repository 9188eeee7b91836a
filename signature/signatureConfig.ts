import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ConfigError, describeError, FileSystemError } from "./errors.ts";

export type Platform = "linux" | "darwin" | "win32";
export type FontRole = "name" | "details" | "confidentiality";
export type ColorRole = "outline" | "name" | "details" | "separator" | "confidentiality";

/** Things the layout stacks top to bottom; the logo keeps its top-left box wherever it appears. */
export const ELEMENT_IDS = [
  "logo",
  "name",
  "position",
  "address",
  "phone",
  "mobile",
  "email",
  "website",
  "separator",
  "confidentiality",
] as const;

export type ElementId = (typeof ELEMENT_IDS)[number];

/** [r, g, b] or [r, g, b, alpha], each 0..255 */
export type Color = readonly [number, number, number] | readonly [number, number, number, number];

export type SignatureConfig = {
  readonly margin: number;
  readonly logoHeight: number;
  readonly logoMarginRight: number;
  readonly lineHeight: number;
  readonly confidentialityLineHeight: number;
  readonly separatorThickness: number;
  readonly outlineWidth: { readonly name: number; readonly text: number };
  readonly colors: Readonly<Record<ColorRole, Color>>;
  readonly fonts: Readonly<Record<Platform, Readonly<Record<FontRole, readonly string[]>>>>;
  readonly fontSizes: Readonly<Record<FontRole, number>>;
  /** Family the canvas falls back to when no candidate loads; null disables the fallback. */
  readonly fallbackFontFamily: string | null;
  readonly defaultWebsite: string;
  readonly logoSearchPaths: readonly string[];
  readonly confidentialityText: string;
  /** Every ElementId exactly once. */
  readonly elementOrder: readonly ElementId[];
};

export const DEFAULT_CONFIG_PATH = path.join("config", "signature.config.json");

export const defaultSignatureConfig: SignatureConfig = {
  margin: 15,
  logoHeight: 70,
  logoMarginRight: 20,
  lineHeight: 22,
  confidentialityLineHeight: 18,
  separatorThickness: 2,
  outlineWidth: { name: 2, text: 1 },
  colors: {
    outline: [255, 255, 255],
    name: [51, 51, 51],
    details: [100, 100, 100],
    separator: [200, 0, 40, 200],
    confidentiality: [150, 150, 150],
  },
  fonts: {
    linux: {
      name: [
        "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf",
        "/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf",
      ],
      details: [
        "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
        "/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf",
      ],
      confidentiality: [
        "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
        "/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf",
      ],
    },
    darwin: {
      name: ["/System/Library/Fonts/Supplemental/Arial Bold.ttf", "/System/Library/Fonts/Helvetica.ttc"],
      details: ["/System/Library/Fonts/Supplemental/Arial.ttf", "/System/Library/Fonts/Helvetica.ttc"],
      confidentiality: ["/System/Library/Fonts/Supplemental/Arial.ttf", "/System/Library/Fonts/Helvetica.ttc"],
    },
    win32: {
      name: ["C:\\Windows\\Fonts\\arialbd.ttf", "C:\\Windows\\Fonts\\segoeuib.ttf"],
      details: ["C:\\Windows\\Fonts\\arial.ttf", "C:\\Windows\\Fonts\\segoeui.ttf"],
      confidentiality: ["C:\\Windows\\Fonts\\arial.ttf", "C:\\Windows\\Fonts\\segoeui.ttf"],
    },
  },
  fontSizes: { name: 16, details: 14, confidentiality: 9 },
  fallbackFontFamily: "sans-serif",
  defaultWebsite: "www.example.com",
  logoSearchPaths: ["logo.png", "logo.jpg", "logo/logo.png", "logo/logo.jpg"],
  confidentialityText:
    "CONFIDENTIALITY: This message is intended solely for the use of the addressee " +
    "and may contain confidential information.",
  elementOrder: ELEMENT_IDS,
};

/* =========================
 * Schema
 * ========================= */

const channel = z.number().int().min(0).max(255);
const colorSchema = z.union([
  z.tuple([channel, channel, channel]),
  z.tuple([channel, channel, channel, channel]),
]);
const dimension = z.number().int().positive();
const fontListSchema = z.array(z.string().min(1));
const roleFontsSchema = z.object({
  name: fontListSchema,
  details: fontListSchema,
  confidentiality: fontListSchema,
});

const elementOrderSchema = z
  .array(z.enum(ELEMENT_IDS))
  .superRefine((order, ctx) => {
    const missing = ELEMENT_IDS.filter((id) => !order.includes(id));
    const repeated = order.filter((id, i) => order.indexOf(id) !== i);
    if (missing.length || repeated.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must list every element exactly once (missing: ${missing.join(", ") || "none"}; repeated: ${repeated.join(", ") || "none"})`,
      });
    }
  });

export const signatureConfigSchema = z
  .object({
    margin: dimension,
    logoHeight: dimension,
    logoMarginRight: dimension,
    lineHeight: dimension,
    confidentialityLineHeight: dimension,
    separatorThickness: dimension,
    outlineWidth: z.object({
      name: z.number().int().min(0),
      text: z.number().int().min(0),
    }),
    colors: z.object({
      outline: colorSchema,
      name: colorSchema,
      details: colorSchema,
      separator: colorSchema,
      confidentiality: colorSchema,
    }),
    fonts: z.object({
      linux: roleFontsSchema,
      darwin: roleFontsSchema,
      win32: roleFontsSchema,
    }),
    fontSizes: z.object({
      name: dimension,
      details: dimension,
      confidentiality: dimension,
    }),
    fallbackFontFamily: z.string().min(1).nullable(),
    defaultWebsite: z.string().min(1),
    logoSearchPaths: z.array(z.string().min(1)),
    confidentialityText: z.string(),
    elementOrder: elementOrderSchema,
  })
  .strict();

/** Anything JSON can hold; the file layer is merged before the schema runs. */
type JsonObject = { [key: string]: unknown };

/* =========================
 * Loading
 * ========================= */

export type LoadConfigOptions = {
  /** Config file; defaults to SIGNATURE_CONFIG, then config/signature.config.json. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Base directory the default path is resolved from. */
  cwd?: string;
};

/**
 * Builds the configuration in layers: defaults, then the JSON file (when it
 * exists), then environment overrides. The result is validated as a whole
 * and frozen; any issue aborts with a ConfigError.
 */
export function loadSignatureConfig(options: LoadConfigOptions = {}): SignatureConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicitPath = options.path ?? env.SIGNATURE_CONFIG;
  const configPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_PATH);

  let merged: JsonObject = toJsonObject(defaultSignatureConfig);

  if (fs.existsSync(configPath)) {
    merged = deepMerge(merged, readConfigFile(configPath));
  } else if (explicitPath) {
    throw new ConfigError(configPath, ["configuration file does not exist"]);
  }

  merged = deepMerge(merged, envOverrides(env));

  return parseSignatureConfig(merged, configPath);
}

/** Validates a complete configuration value and freezes it. */
export function parseSignatureConfig(value: unknown, source = "configuration"): SignatureConfig {
  const parsed = signatureConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Merges a partial document over the current configuration and validates the
 * result. Used by the settings screen.
 */
export function updateSignatureConfig(current: SignatureConfig, patch: unknown): SignatureConfig {
  if (!isJsonObject(patch)) {
    throw new ConfigError("settings", ["settings must be a JSON object"]);
  }
  return parseSignatureConfig(deepMerge(toJsonObject(current), patch), "settings");
}

export function saveSignatureConfig(config: SignatureConfig, configPath: string) {
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    const tmpPath = `${configPath}.tmp`;
    fs.writeFileSync(tmpPath, `${JSON.stringify(config, null, 2)}\n`, "utf8");
    fs.renameSync(tmpPath, configPath);
  } catch (err) {
    throw new FileSystemError("save configuration to", configPath, err);
  }
}

export function currentPlatform(platform: NodeJS.Platform = process.platform): Platform {
  if (platform === "darwin" || platform === "win32") return platform;
  return "linux";
}

/* =========================
 * Helpers
 * ========================= */

const ENV_INTEGERS = {
  SIGNATURE_MARGIN: "margin",
  SIGNATURE_LOGO_HEIGHT: "logoHeight",
  SIGNATURE_LOGO_MARGIN_RIGHT: "logoMarginRight",
  SIGNATURE_LINE_HEIGHT: "lineHeight",
} as const;

function envOverrides(env: NodeJS.ProcessEnv): JsonObject {
  const overrides: JsonObject = {};
  const issues: string[] = [];

  for (const [name, key] of Object.entries(ENV_INTEGERS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    const n = Number(raw.trim());
    if (!Number.isInteger(n) || n <= 0) {
      issues.push(`${name}: expected a positive integer, got "${raw}"`);
      continue;
    }
    overrides[key] = n;
  }

  const website = env.SIGNATURE_DEFAULT_WEBSITE?.trim();
  if (website) overrides.defaultWebsite = website;

  if (issues.length) throw new ConfigError("environment", issues);
  return overrides;
}

function readConfigFile(configPath: string): JsonObject {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(configPath, [`cannot read file: ${describeError(err)}`], { cause: err });
  }
  if (!text.trim()) return {};

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(configPath, [`malformed JSON: ${describeError(err)}`], { cause: err });
  }
  if (!isJsonObject(data)) {
    throw new ConfigError(configPath, ["top level must be a JSON object"]);
  }
  return data;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toJsonObject(config: SignatureConfig): JsonObject {
  return { ...config };
}

/** Objects merge key by key; arrays and scalars replace. */
function deepMerge(base: JsonObject, patch: JsonObject): JsonObject {
  const out: JsonObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = out[key];
    out[key] = isJsonObject(current) && isJsonObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
