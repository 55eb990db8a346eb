/**
 * Kinds of messages exchanged with the companion device
 */
export type MessageKind = "text" | "poke" | "feed";

/**
 * Message as stored in the message log
 */
export type StoredMessage = {
  id: number;
  from: string;
  message: string;
  type: MessageKind;
  /** ISO timestamp */
  timestamp: string;
  read: boolean;
};

export type TimeFormat = 12 | 24;

export type RefreshMode = "fast" | "balanced" | "slow";

/**
 * User-adjustable settings
 */
export type UserSettings = {
  timeFormat: TimeFormat;
  /** 1 to 5 */
  brightness: number;
  sleepEnabled: boolean;
  /** "HH:MM" local time */
  sleepTime: string;
  /** "HH:MM" local time */
  wakeTime: string;
  refreshMode: RefreshMode;
  notificationsEnabled: boolean;
  /** ISO timestamp */
  lastModified: string;
};

/**
 * Device usage counters
 */
export type DeviceStats = {
  /** ISO timestamp */
  firstBoot: string;
  totalUptimeHours: number;
  totalButtonPresses: number;
  totalDisplayUpdates: number;
  totalMessagesSent: number;
  totalMessagesReceived: number;
  networkErrors: number;
  lastError: { message: string; timestamp: string } | null;
};

/**
 * Numeric counters in DeviceStats
 */
export type StatCounter =
  | "totalUptimeHours"
  | "totalButtonPresses"
  | "totalDisplayUpdates"
  | "totalMessagesSent"
  | "totalMessagesReceived"
  | "networkErrors";
