/**
 * Device identity and companion addressing
 */
export type DeviceConfig = {
  /** Name reported to the companion device */
  name: string;

  /** Host or IP of the companion device, null when running alone */
  remoteHost: string | null;

  /** Port of the companion device's API */
  remotePort: number;

  /** Directory for persisted state */
  dataDirectory: string;
};

/**
 * Pet defaults used when no state file exists yet
 */
export type PetConfig = {
  name: string;
  type: string;
};

/**
 * Ghost-suppression thresholds
 */
export type RefreshConfig = {
  /** Partial commits before a full one is forced */
  fullRefreshCycleLimit: number;

  /** Milliseconds before a full commit is forced */
  fullRefreshTimeLimitMs: number;
};

/**
 * Navigation throttle and failure recovery
 */
export type MenuConfig = {
  minButtonIntervalMs: number;
  failureThreshold: number;
};

/**
 * Main loop cadences, in milliseconds
 */
export type LoopConfig = {
  tickIntervalMs: number;
  petUpdateIntervalMs: number;
  animationIntervalMs: number;
  inboundCheckIntervalMs: number;
};

/**
 * Web server configuration
 */
export type WebConfig = {
  /** Server port */
  port: number;

  /** Server host */
  host: string;

  /**
   * Enable CORS with `origin: "*"`.
   * The companion device and phones on the local network call the API directly.
   */
  cors: boolean;

  /** API base path */
  apiBasePath: string;
};
