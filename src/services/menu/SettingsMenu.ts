import { IFrameBuffer } from "@core/interfaces";
import {
  MenuId,
  RefreshMode,
  Result,
  UserSettings,
  failure,
} from "@core/types";
import { BaseMenu, MenuContext } from "./BaseMenu";

const LINES_X = 10;
const LINES_Y = 30;
const LINE_STEP = 14;
const DEVICE_LINE_GAP = 6;
const MAX_BRIGHTNESS = 5;

const REFRESH_MODES: RefreshMode[] = ["fast", "balanced", "slow"];

/**
 * Settings the menu can change, in display order
 */
export const SETTINGS_ITEMS = [
  "timeFormat",
  "brightness",
  "refreshMode",
  "sleepEnabled",
] as const;

export type SettingsItem = (typeof SETTINGS_ITEMS)[number];

export function formatSettingLine(
  item: SettingsItem,
  settings: Readonly<UserSettings>,
  selected: boolean,
): string {
  const prefix = selected ? ">" : " ";
  switch (item) {
    case "timeFormat":
      return `${prefix} Time: ${settings.timeFormat}h`;
    case "brightness":
      return `${prefix} Bright: ${"#".repeat(settings.brightness)}${"-".repeat(MAX_BRIGHTNESS - settings.brightness)}`;
    case "refreshMode":
      return `${prefix} Refresh: ${settings.refreshMode}`;
    case "sleepEnabled":
      return `${prefix} Sleep: ${settings.sleepEnabled ? `${settings.sleepTime}-${settings.wakeTime}` : "off"}`;
  }
}

/**
 * Cycle four settings. Go changes the setting under the cursor, then moves
 * the cursor to the next one.
 */
export class SettingsMenu extends BaseMenu {
  readonly id = MenuId.SETTINGS;
  readonly title = "Settings";

  private cursor = 0;

  constructor(context: MenuContext) {
    super(context, "SettingsMenu");
  }

  getSelectedItem(): SettingsItem {
    return SETTINGS_ITEMS[this.cursor];
  }

  async onActivate(): Promise<Result<void>> {
    const changed = await this.changeSetting(this.getSelectedItem());
    if (!changed.success) {
      return failure(changed.error);
    }
    this.cursor = (this.cursor + 1) % SETTINGS_ITEMS.length;
    return this.render(false);
  }

  protected draw(frameBuffer: IFrameBuffer): void {
    const settings = this.context.settings.getSettings();

    this.drawHeader(frameBuffer, this.title);
    SETTINGS_ITEMS.forEach((item, i) => {
      frameBuffer.drawText(
        formatSettingLine(item, settings, i === this.cursor),
        LINES_X,
        LINES_Y + i * LINE_STEP,
      );
    });
    frameBuffer.drawText(
      `Device: ${this.context.deviceName}`,
      LINES_X,
      LINES_Y + SETTINGS_ITEMS.length * LINE_STEP + DEVICE_LINE_GAP,
    );
    this.drawHints(frameBuffer, ["[Back]", "[Chg]", "[>]"]);
  }

  private changeSetting(item: SettingsItem): Promise<Result<void>> {
    const { settings } = this.context;
    switch (item) {
      case "timeFormat":
        return settings.set(
          "timeFormat",
          settings.get("timeFormat") === 24 ? 12 : 24,
        );
      case "brightness":
        return settings.set(
          "brightness",
          (settings.get("brightness") % MAX_BRIGHTNESS) + 1,
        );
      case "refreshMode": {
        const index = REFRESH_MODES.indexOf(settings.get("refreshMode"));
        return settings.set(
          "refreshMode",
          REFRESH_MODES[(index + 1) % REFRESH_MODES.length],
        );
      }
      case "sleepEnabled":
        return settings.set("sleepEnabled", !settings.get("sleepEnabled"));
    }
  }
}
