import { BaseError } from "./BaseError";

/**
 * State persistence error codes
 */
export enum StateErrorCode {
  LOAD_FAILED = "STATE_LOAD_FAILED",
  SAVE_FAILED = "STATE_SAVE_FAILED",
  INVALID_DATA = "STATE_INVALID_DATA",
  NOT_INITIALIZED = "STATE_NOT_INITIALIZED",
  UNKNOWN = "STATE_UNKNOWN_ERROR",
}

/**
 * Error from a JSON state store
 */
export class StateError extends BaseError {
  constructor(
    message: string,
    code: StateErrorCode = StateErrorCode.UNKNOWN,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, recoverable, context, cause);
  }

  static loadFailed(filePath: string, error: Error): StateError {
    return new StateError(
      `Failed to load ${filePath}: ${error.message}`,
      StateErrorCode.LOAD_FAILED,
      true,
      { filePath, originalError: error.message },
      error,
    );
  }

  static saveFailed(filePath: string, error: Error): StateError {
    return new StateError(
      `Failed to save ${filePath}: ${error.message}`,
      StateErrorCode.SAVE_FAILED,
      true,
      { filePath, originalError: error.message },
      error,
    );
  }

  static invalidData(filePath: string, reason: string): StateError {
    return new StateError(
      `Invalid data in ${filePath}: ${reason}`,
      StateErrorCode.INVALID_DATA,
      true,
      { filePath, reason },
    );
  }

  static notInitialized(store: string): StateError {
    return new StateError(
      `${store} not initialized. Call initialize() first.`,
      StateErrorCode.NOT_INITIALIZED,
      false,
      { store },
    );
  }
}
