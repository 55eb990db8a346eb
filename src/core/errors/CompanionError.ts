import { BaseError } from "./BaseError";

/**
 * Companion device error codes
 */
export enum CompanionErrorCode {
  NOT_CONFIGURED = "COMPANION_NOT_CONFIGURED",
  REQUEST_FAILED = "COMPANION_REQUEST_FAILED",
  TIMEOUT = "COMPANION_TIMEOUT",
  BAD_RESPONSE = "COMPANION_BAD_RESPONSE",
  UNKNOWN = "COMPANION_UNKNOWN_ERROR",
}

/**
 * Error talking to the companion device
 */
export class CompanionError extends BaseError {
  constructor(
    message: string,
    code: CompanionErrorCode = CompanionErrorCode.UNKNOWN,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, recoverable, context, cause);
  }

  static notConfigured(): CompanionError {
    return new CompanionError(
      "No companion device configured (set REMOTE_DEVICE_HOST)",
      CompanionErrorCode.NOT_CONFIGURED,
      false,
    );
  }

  static requestFailed(url: string, error: Error): CompanionError {
    return new CompanionError(
      `Request to ${url} failed: ${error.message}`,
      CompanionErrorCode.REQUEST_FAILED,
      true,
      { url, originalError: error.message },
      error,
    );
  }

  static timeout(url: string, timeoutMs: number): CompanionError {
    return new CompanionError(
      `Request to ${url} timed out after ${timeoutMs}ms`,
      CompanionErrorCode.TIMEOUT,
      true,
      { url, timeoutMs },
    );
  }

  static badResponse(url: string, status: number): CompanionError {
    return new CompanionError(
      `Companion device answered ${status} for ${url}`,
      CompanionErrorCode.BAD_RESPONSE,
      true,
      { url, status },
    );
  }
}
