/** Base class for every failure the signature tool reports on purpose. */
export class SignatureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw field value failed its field-level contract. Recover by re-asking. */
export class ValidationError extends SignatureError {
  readonly field: string;
  readonly value: string;
  readonly reason: string;

  constructor(field: string, value: string, reason: string) {
    super(`Validation failed for field '${field}': ${reason}`);
    this.field = field;
    this.value = value;
    this.reason = reason;
  }
}

/**
 * Logo decode failure, no usable font, or any canvas failure while painting.
 * Aborts the current render only.
 */
export class RenderError extends SignatureError {
  readonly operation: string;

  constructor(operation: string, reason: string, options?: { cause?: unknown }) {
    super(`Rendering failed during '${operation}': ${reason}`, options);
    this.operation = operation;
  }
}

/** Configuration document could not be parsed or holds out-of-range values. */
export class ConfigError extends SignatureError {
  readonly issues: string[];

  constructor(source: string, issues: string[], options?: { cause?: unknown }) {
    super(
      `Invalid configuration (${source}):\n  - ${issues.join("\n  - ")}`,
      options
    );
    this.issues = issues;
  }
}

export class ProfileError extends SignatureError {
  readonly profileName: string;

  constructor(profileName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.profileName = profileName;
  }
}

export class FileSystemError extends SignatureError {
  readonly operation: string;
  readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    super(`Failed to ${operation} '${path}': ${describeError(cause)}`, { cause });
    this.operation = operation;
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
