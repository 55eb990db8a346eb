import {
  HomeField,
  MenuId,
  NavigationEvent,
  NavigationState,
  TransitionOutcome,
} from "@core/types";

/**
 * Menu navigation with a single render guard.
 *
 * Button transitions wait for the guard; the periodic entry points
 * (`renderCurrent`, `tryUpdateHomeField`) skip their turn when it is held.
 */
export interface IMenuStateMachine {
  /**
   * Render Home for the first time with a full refresh
   */
  setup(): Promise<void>;

  /**
   * Apply a navigation event. Events arriving inside the throttle window or
   * while a render or transition is running are dropped.
   * @throws MenuError when recovery to Home fails after repeated failures
   */
  handleEvent(event: NavigationEvent): Promise<TransitionOutcome>;

  /**
   * Render the active menu if one was requested and the guard is free
   * @returns true when a render ran
   * @throws MenuError when recovery to Home fails after repeated failures
   */
  renderCurrent(): Promise<boolean>;

  /**
   * Mark the active menu dirty for the next renderCurrent
   * @param full ask for a full refresh
   */
  requestRender(full?: boolean): void;

  /**
   * Refresh one Home field if Home is active and the guard is free.
   * Failures are absorbed and turn into a full render request.
   * @returns true when the field was refreshed
   */
  tryUpdateHomeField(field: HomeField): Promise<boolean>;

  getActiveMenuId(): MenuId;

  isHomeActive(): boolean;

  /**
   * True while a transition runs
   */
  isInTransition(): boolean;

  getState(): Readonly<NavigationState>;
}
