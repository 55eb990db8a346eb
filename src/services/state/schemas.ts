import { z } from "zod";
import {
  DeviceStats,
  PetState,
  StoredMessage,
  UserSettings,
} from "@core/types";
import { PET_STAT_MAX } from "@core/constants";

const stat = z.number().int().min(0).max(PET_STAT_MAX);
const counter = z.number().min(0);
const isoTimestamp = z.string().datetime({ offset: true });
const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

export const PetStateSchema: z.ZodType<PetState> = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  hunger: stat,
  happiness: stat,
  health: stat,
  lastFed: isoTimestamp,
  lastInteraction: isoTimestamp,
  lastUpdate: isoTimestamp,
  createdAt: isoTimestamp,
  ageHours: counter,
  totalFeeds: counter,
  totalInteractions: counter,
  messagesSent: counter,
  messagesReceived: counter,
});

export const UserSettingsSchema: z.ZodType<UserSettings> = z.object({
  timeFormat: z.union([z.literal(12), z.literal(24)]),
  brightness: z.number().int().min(1).max(5),
  sleepEnabled: z.boolean(),
  sleepTime: clockTime,
  wakeTime: clockTime,
  refreshMode: z.enum(["fast", "balanced", "slow"]),
  notificationsEnabled: z.boolean(),
  lastModified: isoTimestamp,
});

export const DeviceStatsSchema: z.ZodType<DeviceStats> = z.object({
  firstBoot: isoTimestamp,
  totalUptimeHours: counter,
  totalButtonPresses: counter,
  totalDisplayUpdates: counter,
  totalMessagesSent: counter,
  totalMessagesReceived: counter,
  networkErrors: counter,
  lastError: z
    .object({ message: z.string(), timestamp: isoTimestamp })
    .nullable(),
});

export const StoredMessageSchema: z.ZodType<StoredMessage> = z.object({
  id: z.number().int(),
  from: z.string(),
  message: z.string(),
  type: z.enum(["text", "poke", "feed"]),
  timestamp: isoTimestamp,
  read: z.boolean(),
});
