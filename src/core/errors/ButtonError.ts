import { BaseError } from "./BaseError";

/**
 * Button subsystem error codes
 */
export enum ButtonErrorCode {
  INIT_FAILED = "BUTTON_INIT_FAILED",
  UNKNOWN = "BUTTON_UNKNOWN_ERROR",
}

/**
 * Button input error
 */
export class ButtonError extends BaseError {
  constructor(
    message: string,
    code: ButtonErrorCode = ButtonErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, recoverable, context, cause);
  }

  static initFailed(reason: string, error?: Error): ButtonError {
    return new ButtonError(
      `Failed to initialize buttons: ${reason}`,
      ButtonErrorCode.INIT_FAILED,
      false,
      { reason, originalError: error?.message },
      error,
    );
  }
}
