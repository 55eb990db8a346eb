import { BaseError } from "./BaseError";

/**
 * Web-related error codes
 */
export enum WebErrorCode {
  SERVER_START_FAILED = "WEB_SERVER_START_FAILED",
  SERVER_NOT_RUNNING = "WEB_SERVER_NOT_RUNNING",
  PORT_IN_USE = "WEB_PORT_IN_USE",
  INVALID_REQUEST = "WEB_INVALID_REQUEST",
  NOT_FOUND = "WEB_NOT_FOUND",
  UNKNOWN = "WEB_UNKNOWN_ERROR",
}

/**
 * Web Service Error
 */
export class WebError extends BaseError {
  /**
   * HTTP status code associated with this error
   */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: WebErrorCode = WebErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    statusCode?: number,
  ) {
    super(message, code, recoverable, context);
    this.statusCode = statusCode;
  }

  /**
   * Create error for server start failure
   */
  static serverStartFailed(port: number, error: Error): WebError {
    return new WebError(
      `Failed to start web server on port ${port}: ${error.message}`,
      WebErrorCode.SERVER_START_FAILED,
      false,
      { port, originalError: error.message },
      500,
    );
  }

  /**
   * Create error for port in use
   */
  static portInUse(port: number): WebError {
    return new WebError(
      `Port ${port} is already in use`,
      WebErrorCode.PORT_IN_USE,
      false,
      { port },
      500,
    );
  }

  /**
   * Create error for stopping a server that is not running
   */
  static serverNotRunning(): WebError {
    return new WebError(
      "Web server is not running",
      WebErrorCode.SERVER_NOT_RUNNING,
      true,
      undefined,
      500,
    );
  }

  /**
   * Create error for an unknown route
   */
  static notFound(path: string): WebError {
    return new WebError(
      `No route for ${path}`,
      WebErrorCode.NOT_FOUND,
      true,
      { path },
      404,
    );
  }
}
