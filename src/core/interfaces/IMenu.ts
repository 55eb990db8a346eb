import { MenuId, Result } from "@core/types";

/**
 * One screen of the device.
 *
 * Menus draw into the shared framebuffer and commit through the
 * RefreshCoordinator. They are only ever called by the MenuStateMachine,
 * inside its render guard, so they never lock anything themselves.
 */
export interface IMenu {
  readonly id: MenuId;
  readonly title: string;

  /**
   * Draw the whole screen and commit it
   * @param full ask for a full refresh; otherwise a partial one is requested
   */
  render(full: boolean): Promise<Result<void>>;

  /**
   * Return button. A no-op everywhere but Home, where it feeds the pet.
   */
  onBack(): Promise<Result<void>>;

  /**
   * Go button. Runs the screen's own action and redraws it.
   */
  onActivate(): Promise<Result<void>>;
}

/**
 * Home screen, with fields that refresh on their own
 */
export interface IHomeMenu extends IMenu {
  /**
   * Redraw only the time. Falls back to a full render without a base image.
   */
  updateClockField(): Promise<Result<void>>;

  /**
   * Redraw only the pet sprite. Falls back to a full render without a base image.
   */
  updateSpriteField(): Promise<Result<void>>;
}
