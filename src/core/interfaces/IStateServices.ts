import {
  DeviceStats,
  MessageKind,
  PetMood,
  PetSnapshot,
  Result,
  StatCounter,
  StoredMessage,
  UserSettings,
} from "@core/types";

/**
 * Persisted virtual pet
 */
export interface IPetStateService {
  initialize(): Promise<Result<void>>;

  getSnapshot(now?: Date): PetSnapshot;

  getMood(now?: Date): PetMood;

  readonly hunger: number;
  readonly happiness: number;
  readonly health: number;

  /**
   * Hunger down by 3, happiness up by 1
   */
  feed(): Promise<Result<PetSnapshot>>;

  /**
   * Happiness up by 2
   */
  interact(): Promise<Result<PetSnapshot>>;

  messageSent(): Promise<Result<void>>;

  messageReceived(): Promise<Result<void>>;

  /**
   * Apply the hunger, happiness and health changes for the time elapsed
   * since the last update
   * @returns true when enough time had passed for anything to change
   */
  updateState(now?: Date): Promise<Result<boolean>>;
}

export interface MessageQuery {
  limit?: number;
  unreadOnly?: boolean;
}

/**
 * Messages received from the companion device, newest first
 */
export interface IMessageLogService {
  initialize(): Promise<Result<void>>;

  addMessage(
    from: string,
    message: string,
    type?: MessageKind,
  ): Promise<Result<StoredMessage>>;

  getMessages(query?: MessageQuery): StoredMessage[];

  getUnreadCount(): number;

  markAllRead(): Promise<Result<void>>;

  /**
   * @returns false when no message had that id
   */
  deleteMessage(id: number): Promise<Result<boolean>>;

  /**
   * @returns the removed message, or null when the log was empty
   */
  deleteMostRecent(): Promise<Result<StoredMessage | null>>;
}

/**
 * User-adjustable settings
 */
export interface ISettingsService {
  initialize(): Promise<Result<void>>;

  getSettings(): Readonly<UserSettings>;

  get<K extends keyof UserSettings>(key: K): UserSettings[K];

  /**
   * Validate and persist one setting
   * @returns ConfigError for out of range values
   */
  set<K extends keyof UserSettings>(
    key: K,
    value: UserSettings[K],
  ): Promise<Result<void>>;

  /**
   * Clock field refresh interval for the current refresh mode
   */
  getClockIntervalMs(): number;

  /**
   * Whether the sleep window is enabled and contains `now`
   */
  isInSleepWindow(now: Date): boolean;
}

/**
 * Device usage counters
 */
export interface IStatsService {
  initialize(): Promise<Result<void>>;

  getStats(): Readonly<DeviceStats>;

  increment(counter: StatCounter, amount?: number): Promise<Result<void>>;

  recordError(message: string): Promise<Result<void>>;
}
