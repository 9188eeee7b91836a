import fs from "node:fs";
import path from "node:path";

import { ValidationError } from "./errors.ts";

export type Validation =
  | { ok: true; value: string }
  | { ok: false; error: ValidationError };

export const SUPPORTED_IMAGE_EXTENSIONS = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".bmp",
  ".webp",
] as const;

const MIN_PHONE_DIGITS = 7;
const MAX_PROFILE_NAME_LENGTH = 100;

const RESERVED_DEVICE_NAMES = new Set([
  "CON",
  "PRN",
  "AUX",
  "NUL",
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

const HOST_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;

/** Required free-text field (name, position, address). */
export function validateRequired(raw: string, field: string): Validation {
  const value = raw.trim();
  if (!value) {
    return fail(field, raw, `${capitalize(field)} is required and cannot be empty`);
  }
  return { ok: true, value };
}

export function validateName(raw: string): Validation {
  return validateRequired(raw, "name");
}

export function validateEmail(raw: string): Validation {
  const value = raw.trim();
  if (!value) return fail("email", raw, "Email is required and cannot be empty");

  if (/\s/.test(value)) {
    return fail("email", raw, "Email must not contain whitespace");
  }

  const at = value.indexOf("@");
  if (at === -1) {
    return fail("email", raw, 'Email is missing the "@" symbol (e.g. user@example.com)');
  }
  if (value.indexOf("@", at + 1) !== -1) {
    return fail("email", raw, 'Email must contain exactly one "@" symbol');
  }

  const local = value.slice(0, at);
  const domain = value.slice(at + 1);
  if (!local) return fail("email", raw, 'Email needs a name before the "@"');

  const dot = domain.indexOf(".");
  if (dot <= 0 || dot === domain.length - 1 || domain.endsWith(".")) {
    return fail(
      "email",
      raw,
      'Email domain must contain a "." between its parts (e.g. example.com)'
    );
  }

  // case is kept as typed
  return { ok: true, value };
}

/** Optional phone number; empty input is accepted as "no number". */
export function validatePhone(raw: string, field = "phone"): Validation {
  const value = raw.trim();
  if (!value) return { ok: true, value: "" };

  if (/[a-z]/i.test(value)) {
    return fail(field, raw, "Phone number must not contain letters");
  }
  if (!/^\+?[\d\s\-().]+$/.test(value)) {
    return fail(
      field,
      raw,
      "Phone number may only contain digits, a leading +, spaces, hyphens, dots and parentheses"
    );
  }

  const digits = value.replace(/\D/g, "");
  if (digits.length < MIN_PHONE_DIGITS) {
    return fail(
      field,
      raw,
      `Phone number must contain at least ${MIN_PHONE_DIGITS} digits`
    );
  }

  return { ok: true, value };
}

/**
 * Optional website. Empty input is not an error: it means "use the default".
 * Accepts `host.tld`, `host.tld:port/path` and the same with a `scheme://`.
 */
export function validateUrl(raw: string, field = "website"): Validation {
  const value = raw.trim();
  if (!value) return { ok: true, value: "" };

  if (/\s/.test(value)) {
    return fail(field, raw, "Website must not contain whitespace");
  }

  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(value);
  let host: string;
  try {
    host = new URL(hasScheme ? value : `http://${value}`).hostname;
  } catch {
    return fail(field, raw, "Website is not a valid address (e.g. www.example.com)");
  }

  const labels = host.split(".");
  if (labels.length < 2 || !labels.every((label) => HOST_LABEL.test(label))) {
    return fail(
      field,
      raw,
      "Website must be a host name with a domain (e.g. www.example.com)"
    );
  }

  return { ok: true, value };
}

/** Optional logo path: an existing, readable image file. */
export function validatePath(raw: string, field = "logoPath"): Validation {
  const value = raw.trim();
  if (!value) return { ok: true, value: "" };

  const ext = path.extname(value).toLowerCase();
  if (!SUPPORTED_IMAGE_EXTENSIONS.some((supported) => supported === ext)) {
    return fail(
      field,
      raw,
      `Unsupported image format "${ext || "(none)"}"; use one of ${SUPPORTED_IMAGE_EXTENSIONS.join(", ")}`
    );
  }

  let stat: fs.Stats;
  try {
    stat = fs.statSync(value);
  } catch {
    return fail(field, raw, `File not found: ${value}`);
  }
  if (!stat.isFile()) return fail(field, raw, `Not a file: ${value}`);

  try {
    fs.accessSync(value, fs.constants.R_OK);
  } catch {
    return fail(field, raw, `File is not readable: ${value}`);
  }

  return { ok: true, value };
}

/** A profile name must be usable as a single file name on every platform. */
export function validateProfileName(raw: string): Validation {
  const value = raw.trim();
  const field = "profileName";

  if (!value) return fail(field, raw, "Profile name cannot be empty");
  if (value.length > MAX_PROFILE_NAME_LENGTH) {
    return fail(
      field,
      raw,
      `Profile name must be at most ${MAX_PROFILE_NAME_LENGTH} characters`
    );
  }
  if (/[\/\\:*?"<>|]/.test(value)) {
    return fail(field, raw, 'Profile name must not contain / \\ : * ? " < > |');
  }
  if (/[\u0000-\u001f\u007f]/.test(value)) {
    return fail(field, raw, "Profile name must not contain control characters");
  }
  if (value === "." || value === ".." || value.endsWith(".")) {
    return fail(field, raw, "Profile name must not end with a dot");
  }
  if (RESERVED_DEVICE_NAMES.has(value.split(".")[0].toUpperCase())) {
    return fail(field, raw, `"${value}" is a reserved file name`);
  }

  return { ok: true, value };
}

/** Throwing form of a validation result. */
export function unwrap(result: Validation): string {
  if (!result.ok) throw result.error;
  return result.value;
}

/* =========================
 * Helpers
 * ========================= */

function fail(field: string, value: string, reason: string): Validation {
  return { ok: false, error: new ValidationError(field, value, reason) };
}

function capitalize(s: string) {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
