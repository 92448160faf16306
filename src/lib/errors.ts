/** Image bytes could not be parsed as a raster image. */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/** No narrative backend (or another required setting) is configured. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export const INVALID_PARAMS_CODE = -32602;

/** Malformed arguments, rejected before any core logic runs. */
export class ValidationError extends Error {
  readonly code = INVALID_PARAMS_CODE;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
