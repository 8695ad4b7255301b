/**
 * Error taxonomy. Every failure a user can hit is one of these, and each
 * carries a message fit to show as-is.
 */

/** Config file could not be read, parsed or written. Non-fatal. */
export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

/** A conversion was requested without the inputs it needs. */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputValidationError";
  }
}

/** Any failure reported by, or on the way to, the OCR service. */
export class RemoteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RemoteError";
  }
}

export class AuthenticationError extends RemoteError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/** Upload or signed-URL retrieval failed. */
export class TransferError extends RemoteError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransferError";
  }
}

export class ProcessingError extends RemoteError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProcessingError";
  }
}

/** Saving Markdown or writing the preview file failed. In-memory results are unaffected. */
export class LocalIOError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LocalIOError";
    this.path = path;
  }
}

export class RenderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RenderError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
