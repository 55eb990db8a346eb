import { Rectangle } from "@core/types/DisplayTypes";

/**
 * Screen layout for the 250x122 landscape framebuffer.
 *
 * These rectangles are shared with the sprite assets (64x64 frames) and the
 * font scales below; moving a field usually means re-checking both.
 */

// =============================================================================
// Framebuffer
// =============================================================================

export const SCREEN_WIDTH = 250;
export const SCREEN_HEIGHT = 122;

export const FULL_SCREEN_RECT: Rectangle = {
  x: 0,
  y: 0,
  width: SCREEN_WIDTH,
  height: SCREEN_HEIGHT,
};

// =============================================================================
// Font scales (5x7 glyphs)
// =============================================================================

export const FONT_SMALL = 1;
export const FONT_MEDIUM = 2;
export const FONT_GIANT = 5;

// =============================================================================
// Home screen
// =============================================================================

export const HOME_DATE_RECT: Rectangle = { x: 5, y: 4, width: 165, height: 16 };
export const HOME_TIME_RECT: Rectangle = { x: 5, y: 26, width: 168, height: 38 };
export const HOME_MOOD_RECT: Rectangle = { x: 5, y: 72, width: 168, height: 10 };
export const HOME_SPRITE_RECT: Rectangle = {
  x: 178,
  y: 24,
  width: 64,
  height: 64,
};
export const HOME_ERROR_INDICATOR = { x: 238, y: 4 };

/**
 * Horizontal rule between the pet area and the stats bar
 */
export const HOME_SEPARATOR_Y = 95;

export const HOME_STATS_Y = 98;
export const HOME_STATS_HEALTH_X = 5;
export const HOME_STATS_HUNGER_X = 50;
export const HOME_STATS_MOOD_X = 90;
export const HOME_STATS_MESSAGES_X = 130;

// =============================================================================
// Shared menu chrome
// =============================================================================

export const MENU_TITLE_POS = { x: 5, y: 4 };
export const MENU_TITLE_SEPARATOR_Y = 22;
export const MENU_CONTENT_X = 5;
export const MENU_CONTENT_Y = 28;
export const MENU_HINTS_Y = 110;
