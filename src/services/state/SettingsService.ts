import path from "path";
import { ISettingsService } from "@core/interfaces";
import {
  RefreshMode,
  Result,
  UserSettings,
  failure,
  success,
} from "@core/types";
import { ConfigError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { JsonStateStore } from "./JsonStateStore";
import { UserSettingsSchema } from "./schemas";

const logger = getLogger("SettingsService");

/** Clock field refresh interval per refresh mode */
export const CLOCK_INTERVAL_MS: Record<RefreshMode, number> = {
  fast: 30_000,
  balanced: 60_000,
  slow: 120_000,
};

const BRIGHTNESS_MIN = 1;
const BRIGHTNESS_MAX = 5;

export const defaultSettings = (now: Date = new Date()): UserSettings => ({
  timeFormat: 24,
  brightness: 3,
  sleepEnabled: false,
  sleepTime: "23:00",
  wakeTime: "07:00",
  refreshMode: "balanced",
  notificationsEnabled: true,
  lastModified: now.toISOString(),
});

const minutesOfDay = (hhmm: string): number => {
  const [hours, minutes] = hhmm.split(":").map(Number);
  return hours * 60 + minutes;
};

/**
 * User settings in settings.json
 */
export class SettingsService implements ISettingsService {
  private readonly store: JsonStateStore<UserSettings>;
  private settings: UserSettings;

  constructor(
    dataDirectory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.store = new JsonStateStore(
      path.join(dataDirectory, "settings.json"),
      UserSettingsSchema,
      () => defaultSettings(this.clock()),
    );
    this.settings = defaultSettings(this.clock());
  }

  async initialize(): Promise<Result<void>> {
    const loaded = await this.store.load();
    if (!loaded.success) {
      return failure(loaded.error);
    }
    this.settings = loaded.data;
    logger.info(
      `Settings loaded: ${this.settings.timeFormat}h, ${this.settings.refreshMode} refresh`,
    );
    return success(undefined);
  }

  getSettings(): Readonly<UserSettings> {
    return { ...this.settings };
  }

  get<K extends keyof UserSettings>(key: K): UserSettings[K] {
    return this.settings[key];
  }

  async set<K extends keyof UserSettings>(
    key: K,
    value: UserSettings[K],
  ): Promise<Result<void>> {
    const candidate = {
      ...this.settings,
      [key]: value,
      lastModified: this.clock().toISOString(),
    };

    const checked = UserSettingsSchema.safeParse(candidate);
    if (!checked.success) {
      if (key === "brightness" && typeof value === "number") {
        return failure(
          ConfigError.outOfRange(key, value, BRIGHTNESS_MIN, BRIGHTNESS_MAX),
        );
      }
      return failure(
        ConfigError.invalidValue(key, value, checked.error.issues[0].message),
      );
    }

    const saved = await this.store.save(checked.data);
    if (!saved.success) {
      return failure(saved.error);
    }
    this.settings = checked.data;
    logger.info(`Setting ${key} = ${String(value)}`);
    return success(undefined);
  }

  getClockIntervalMs(): number {
    return CLOCK_INTERVAL_MS[this.settings.refreshMode];
  }

  /**
   * The window runs from sleepTime to wakeTime and may cross midnight
   */
  isInSleepWindow(now: Date): boolean {
    if (!this.settings.sleepEnabled) {
      return false;
    }
    const start = minutesOfDay(this.settings.sleepTime);
    const end = minutesOfDay(this.settings.wakeTime);
    const current = now.getHours() * 60 + now.getMinutes();

    if (start === end) {
      return false;
    }
    return start < end
      ? current >= start && current < end
      : current >= start || current < end;
  }
}
