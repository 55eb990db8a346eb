import { BaseError } from "./BaseError";
import { MenuId } from "@core/types/MenuTypes";

/**
 * Menu navigation error codes
 */
export enum MenuErrorCode {
  RENDER_FAILED = "MENU_RENDER_FAILED",
  RECOVERY_FAILED = "MENU_RECOVERY_FAILED",
  NOT_SET_UP = "MENU_NOT_SET_UP",
  UNKNOWN = "MENU_UNKNOWN_ERROR",
}

/**
 * Menu / navigation error
 */
export class MenuError extends BaseError {
  constructor(
    message: string,
    code: MenuErrorCode = MenuErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, recoverable, context, cause);
  }

  /**
   * A menu failed to draw itself; counted, not fatal
   */
  static renderFailed(menu: MenuId, error: Error): MenuError {
    return new MenuError(
      `Failed to render ${menu} menu: ${error.message}`,
      MenuErrorCode.RENDER_FAILED,
      true,
      { menu, originalError: error.message },
      error,
    );
  }

  /**
   * The recovery render of Home failed after repeated failures
   */
  static recoveryFailed(failureCount: number, error: Error): MenuError {
    return new MenuError(
      `Home screen recovery failed after ${failureCount} consecutive render failures: ${error.message}`,
      MenuErrorCode.RECOVERY_FAILED,
      false,
      { failureCount, originalError: error.message },
      error,
    );
  }

  static notSetUp(): MenuError {
    return new MenuError(
      "Menu state machine not set up. Call setup() first.",
      MenuErrorCode.NOT_SET_UP,
      false,
    );
  }
}
