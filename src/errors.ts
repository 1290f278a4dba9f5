export type BoPiErrorCode =
  | "API_ERROR"
  | "CONFIG_ERROR"
  | "CONNECTION_ERROR"
  | "VALIDATION_ERROR"
  | "MISSING_FIELD";

export interface BoPiErrorOptions {
  /** HTTP status of the response that caused the error, if any. */
  status?: number;
  cause?: unknown;
}

/**
 * Base error for everything the BoPi client raises.
 *
 * Used directly for API errors: an error status from the device, or a
 * success response whose JSON body can't be decoded.
 */
export class BoPiError extends Error {
  public readonly code: BoPiErrorCode;
  public readonly status?: number;

  constructor(
    message: string,
    options: BoPiErrorOptions = {},
    code: BoPiErrorCode = "API_ERROR",
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "BoPiError";
    this.code = code;
    this.status = options.status;
  }
}

/** Invalid client construction parameter or environment setting. */
export class BoPiConfigError extends BoPiError {
  constructor(message: string) {
    super(message, {}, "CONFIG_ERROR");
    this.name = "BoPiConfigError";
  }
}

/** Network failure or timeout while talking to the device. */
export class BoPiConnectionError extends BoPiError {
  constructor(message: string, cause: unknown) {
    super(message, { cause }, "CONNECTION_ERROR");
    this.name = "BoPiConnectionError";
  }
}

/** A decoded field value outside its permitted domain. */
export class BoPiValidationError extends BoPiError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, {}, "VALIDATION_ERROR");
    this.name = "BoPiValidationError";
    this.field = field;
  }
}

/** A required field absent from a decoded payload. */
export class BoPiMissingFieldError extends BoPiError {
  public readonly field: string;

  constructor(field: string) {
    super(`Missing required field in sensor data: ${field}`, {}, "MISSING_FIELD");
    this.name = "BoPiMissingFieldError";
    this.field = field;
  }
}

export function isBoPiError(err: unknown): err is BoPiError {
  return err instanceof BoPiError;
}
