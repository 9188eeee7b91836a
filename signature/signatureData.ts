import { z } from "zod";

import { ValidationError } from "./errors.ts";
import { createLogger } from "./logger.ts";
import {
  unwrap,
  validateEmail,
  validatePath,
  validatePhone,
  validateProfileName,
  validateRequired,
  validateUrl,
  type Validation,
} from "./validators.ts";

const log = createLogger("profiles");

/** Validated, frozen field values for one signature. */
export type SignatureData = Readonly<{
  name: string;
  position: string;
  address: string;
  /** "" when absent */
  phone: string;
  /** "" when absent */
  mobile: string;
  email: string;
  /** "" means "use the configured default website" */
  website: string;
  logoPath: string | null;
}>;

/** Raw form / prompt / profile values before validation. */
export type SignatureInput = {
  name: string;
  position: string;
  address: string;
  phone?: string;
  mobile?: string;
  email: string;
  website?: string;
  logoPath?: string | null;
};

export type SignatureField = keyof SignatureInput;

/** Field order used for prompting and for reporting failures. */
export const SIGNATURE_FIELDS: readonly SignatureField[] = [
  "name",
  "position",
  "address",
  "email",
  "phone",
  "mobile",
  "website",
  "logoPath",
];

export const fieldValidators: Record<SignatureField, (raw: string) => Validation> = {
  name: (raw) => validateRequired(raw, "name"),
  position: (raw) => validateRequired(raw, "position"),
  address: (raw) => validateRequired(raw, "address"),
  email: validateEmail,
  phone: (raw) => validatePhone(raw, "phone"),
  mobile: (raw) => validatePhone(raw, "mobile"),
  website: (raw) => validateUrl(raw, "website"),
  logoPath: (raw) => validatePath(raw, "logoPath"),
};

/** Every field failure at once, in field order; empty when the input is valid. */
export function validateSignatureInput(input: SignatureInput): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const field of SIGNATURE_FIELDS) {
    const result = fieldValidators[field](input[field] ?? "");
    if (!result.ok) errors.push(result.error);
  }
  return errors;
}

/**
 * Validates every field and builds the frozen record. Throws the first
 * ValidationError; no partially valid instance is ever returned.
 */
export function createSignatureData(input: SignatureInput): SignatureData {
  const [first] = validateSignatureInput(input);
  if (first) throw first;

  const value = (field: SignatureField) => unwrap(fieldValidators[field](input[field] ?? ""));
  const logoPath = value("logoPath");

  return Object.freeze({
    name: value("name"),
    position: value("position"),
    address: value("address"),
    phone: value("phone"),
    mobile: value("mobile"),
    email: value("email"),
    website: value("website"),
    logoPath: logoPath || null,
  });
}

/* =========================
 * Profiles
 * ========================= */

export const profileRecordSchema = z.object({
  profileName: z.string(),
  name: z.string(),
  position: z.string(),
  address: z.string(),
  phone: z.string().default(""),
  mobile: z.string().default(""),
  email: z.string(),
  website: z.string().default(""),
  logoPath: z.string().nullable().default(null),
});

export type ProfileRecord = z.infer<typeof profileRecordSchema>;

export function toProfile(profileName: string, data: SignatureData): ProfileRecord {
  return {
    profileName: unwrap(validateProfileName(profileName)),
    name: data.name,
    position: data.position,
    address: data.address,
    phone: data.phone,
    mobile: data.mobile,
    email: data.email,
    website: data.website,
    logoPath: data.logoPath,
  };
}

/**
 * Rebuilds SignatureData from a stored record, running full validation. A
 * stored logo that is no longer usable is dropped with a warning so the
 * rest of the profile still loads.
 */
export function fromProfile(record: unknown): SignatureData {
  const parsed = profileRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "profile";
    throw new ValidationError(field, "", `Profile record is invalid: ${issue?.message ?? "unknown issue"}`);
  }
  const { profileName, ...fields } = parsed.data;

  if (fields.logoPath) {
    const logo = validatePath(fields.logoPath, "logoPath");
    if (!logo.ok) {
      log.warn(`profile '${profileName}': ignoring stored logo`, { reason: logo.error.reason });
      fields.logoPath = null;
    }
  }
  return createSignatureData(fields);
}
