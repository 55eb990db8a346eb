/**
 * Runtime narrowing for caught errors
 */

/**
 * Convert an unknown caught error to an Error instance.
 *
 * In TypeScript, caught errors are typed as `unknown`. This function
 * safely converts any value to an Error instance for consistent handling.
 *
 * @param error - The caught error value
 * @returns An Error instance
 *
 * @example
 * ```ts
 * try {
 *   await driver.display(buffer);
 * } catch (err) {
 *   return failure(DisplayError.updateFailed(toError(err)));
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Type guard for Node.js ErrnoException.
 *
 * Checks if an error is a Node.js system error with an error code. The
 * check is structural, so errors from another realm also pass.
 *
 * @param error - The error to check
 * @returns True if the error is an ErrnoException
 *
 * @example
 * ```ts
 * try {
 *   await fs.readFile(this.filePath, "utf-8");
 * } catch (err) {
 *   if (isNodeJSErrnoException(err) && err.code === "ENOENT") {
 *     // first boot, write defaults
 *   }
 * }
 * ```
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  // fs errors raised inside a Jest sandbox come from another realm and fail
  // `instanceof Error`, so match on shape
  return (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string" &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

/**
 * Type guard for error-like objects with code and getUserMessage.
 *
 * Checks if an object has the properties needed for error extraction,
 * even if it's not a true Error instance (e.g., mock objects in tests).
 */
function hasErrorInfo(
  error: unknown,
): error is { code: string; getUserMessage: () => string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    "getUserMessage" in error &&
    typeof error.getUserMessage === "function"
  );
}

/**
 * Extract error code and user message from a Result error.
 *
 * Works with BaseError subclasses, plain Error instances, and
 * error-like objects (useful for testing with mocks).
 *
 * @param error - The error from a failed Result
 * @returns Object with code and message for API responses
 */
export function extractErrorInfo(error: unknown): {
  code: string;
  message: string;
} {
  // Handle BaseError and error-like objects with code and getUserMessage
  if (hasErrorInfo(error)) {
    return {
      code: error.code,
      message: error.getUserMessage(),
    };
  }
  // Handle plain Error instances
  if (error instanceof Error) {
    return {
      code: "UNKNOWN_ERROR",
      message: error.message,
    };
  }
  // Fallback for any other type
  return {
    code: "UNKNOWN_ERROR",
    message: String(error),
  };
}
