/**
 * Error taxonomy
 *
 * Unknown palette, style and template names are not errors: they resolve to
 * documented defaults in their registries.
 */

export type BannerForgeErrorCode = "MISSING_CAPABILITY" | "INVALID_INPUT" | "IO_FAILURE";

export class BannerForgeError extends Error {
  readonly code: BannerForgeErrorCode;

  constructor(code: BannerForgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BannerForgeError";
    this.code = code;
  }
}

/** A rendering backend (raster toolkit, glyph font data) is unavailable */
export class MissingCapabilityError extends BannerForgeError {
  readonly hint: string;

  constructor(message: string, hint: string, options?: { cause?: unknown }) {
    super("MISSING_CAPABILITY", message, options);
    this.name = "MissingCapabilityError";
    this.hint = hint;
  }
}

/** Malformed colors, non-positive geometry, empty text, unknown effects */
export class InvalidInputError extends BannerForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_INPUT", message, options);
    this.name = "InvalidInputError";
  }
}

/** Writing or reading an artifact failed */
export class IOFailureError extends BannerForgeError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("IO_FAILURE", message, options);
    this.name = "IOFailureError";
    this.path = path;
  }
}

export function isBannerForgeError(error: unknown): error is BannerForgeError {
  return error instanceof BannerForgeError;
}
