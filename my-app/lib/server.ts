import path from "node:path";
import { NextResponse } from "next/server";

import {
  ConfigError,
  FileSystemError,
  ProfileError,
  RenderError,
  ValidationError,
} from "@/signature/errors";
import { createLogger } from "@/signature/logger";
import type { Validation } from "@/signature/validators";
import { ProfileStore, DEFAULT_PROFILES_DIR } from "@/signature/profiles";
import {
  DEFAULT_CONFIG_PATH,
  loadSignatureConfig,
  type SignatureConfig,
} from "@/signature/signatureConfig";

const log = createLogger("api");

export function configPath() {
  return path.resolve(process.cwd(), process.env.SIGNATURE_CONFIG ?? DEFAULT_CONFIG_PATH);
}

/** Read on every request so saved settings apply to the next render. */
export function currentConfig(): SignatureConfig {
  return loadSignatureConfig();
}

export function profileStore() {
  return new ProfileStore(
    path.resolve(process.cwd(), process.env.SIGNATURE_PROFILES_DIR ?? DEFAULT_PROFILES_DIR)
  );
}

/**
 * The form may only name one of the configured logo search paths; anything
 * else on the server's disk is refused.
 */
export function resolveFormLogo(raw: string, config: SignatureConfig): Validation {
  const value = raw.trim();
  if (!value) return { ok: true, value: "" };

  const requested = path.resolve(process.cwd(), value);
  const allowed = config.logoSearchPaths.map((candidate) => path.resolve(process.cwd(), candidate));
  if (allowed.includes(requested)) return { ok: true, value: requested };

  return {
    ok: false,
    error: new ValidationError(
      "logoPath",
      raw,
      `Logo must be one of the configured logo files: ${config.logoSearchPaths.join(", ")}`
    ),
  };
}

export type FieldErrors = Record<string, string>;

export function fieldErrorsResponse(errors: ValidationError[]) {
  const fields: FieldErrors = {};
  for (const err of errors) fields[err.field] = err.reason;
  return NextResponse.json({ status: "error", message: "Invalid input", fields }, { status: 422 });
}

/** Maps the tool's error classes onto HTTP responses. */
export function errorResponse(err: unknown) {
  if (err instanceof ValidationError) return fieldErrorsResponse([err]);
  if (err instanceof ProfileError) {
    return NextResponse.json({ status: "error", message: err.message }, { status: 404 });
  }
  if (err instanceof ConfigError) {
    return NextResponse.json(
      { status: "error", message: "Invalid configuration", issues: err.issues },
      { status: 400 }
    );
  }
  if (err instanceof RenderError || err instanceof FileSystemError) {
    log.error(err.message);
    return NextResponse.json({ status: "error", message: err.message }, { status: 500 });
  }
  throw err;
}

export async function readJson(req: Request): Promise<unknown> {
  return req.json().catch(() => null);
}
