/**
 * Menu identifiers, in navigation order
 */
export enum MenuId {
  HOME = "home",
  MESSAGES = "messages",
  STATS = "stats",
  SETTINGS = "settings",
}

/**
 * Abstract navigation verbs the state machine understands
 */
export enum NavigationEvent {
  BACK = "back",
  NEXT = "next",
  ACTIVATE = "activate",
  /** Redraw the active screen with a full refresh */
  REFRESH = "refresh",
}

/**
 * What happened to a navigation event
 */
export enum TransitionOutcome {
  APPLIED = "applied",
  /** Arrived before the throttle interval elapsed */
  THROTTLED = "throttled",
  /** A render or transition was in progress */
  BUSY = "busy",
}

/**
 * Navigation bookkeeping owned by the MenuStateMachine
 */
export type NavigationState = {
  activeMenuIndex: number;
  needsRender: boolean;
  inTransition: boolean;
  rendering: boolean;
  renderFailureCount: number;
  /** Epoch milliseconds of the last accepted event */
  lastButtonTime: number;
};

/**
 * Home screen fields that can be refreshed on their own
 */
export type HomeField = "clock" | "sprite";
