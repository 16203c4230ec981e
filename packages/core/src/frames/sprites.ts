/**
 * Built-in sprites. Every line of a sprite has the same glyph width.
 */

import type { Sprite } from "./types.js";

/** Delivery truck, 13 rows by 26 glyphs, drawn on the default background. */
export const TRUCK_SPRITE: Sprite = Object.freeze([
  "▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒",
  "▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒",
  "▛▀▀▀▀▀▀▀▀▀▀▀▀▀▀▀▀▀▀▀█▒▒▒▒▒",
  "▌▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒█▄▄▄▒▒",
  "▌▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒█▒▒▐▒▒",
  "▌▒▒▒▀▀▜▒▀▀▜▒▛▜▒▛▜▒▒▒█║█▐▒▒",
  "▌▄▄▒▄▄▟▒▄▄▟║▙▟▒▙▟▒▒▒█║▌▐▒▒",
  "▌▒▒▒▌▒▒▒▌▒▒▒▌▌▒▌▌▒▒▒█████▒",
  "▌▒▒▒▙▄▄▒▙▄▄▒▌▙▒▌▙▒▒▒█████▒",
  "▌▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒▒█████▒",
  "▙▄▄▄▄▄▄▄▄▄▄▄▄▄▄▄▄▄▄▄█████▒",
  "▒▒▛▜▛▜▒▒▒▒▒▒▒▒▒▒▛▜▛▜▒▒▒▒▒▒",
  "▒▒▙▟▙▟▒▒▒▒▒▒▒▒▒▒▙▟▙▟▒▒▒▒▒▒",
]);

export const TRUCK_ANIMATION_NAME = "Truck";
