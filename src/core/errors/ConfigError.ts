import { BaseError } from "./BaseError";

/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
  INVALID_VALUE = "CONFIG_INVALID_VALUE",
  OUT_OF_RANGE = "CONFIG_OUT_OF_RANGE",
  UNKNOWN = "CONFIG_UNKNOWN_ERROR",
}

/**
 * Configuration / settings error
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * Create error for invalid value
   */
  static invalidValue(
    field: string,
    value: unknown,
    expected: string,
  ): ConfigError {
    return new ConfigError(
      `Invalid value for ${field}: ${String(value)} (expected: ${expected})`,
      ConfigErrorCode.INVALID_VALUE,
      false,
      { field, value, expected },
    );
  }

  /**
   * Create error for out of range value
   */
  static outOfRange(
    field: string,
    value: number,
    min: number,
    max: number,
  ): ConfigError {
    return new ConfigError(
      `Value for ${field} (${value}) is out of range (${min}-${max})`,
      ConfigErrorCode.OUT_OF_RANGE,
      false,
      { field, value, min, max },
    );
  }
}
