/**
 * packages/core/src/menu/defaults.ts — Built-in menu.
 */

import { TRUCK_ANIMATION_NAME } from "../frames/sprites.js";
import type { MenuDefinition, SubmenuDefinition } from "./types.js";

export const ROOT_MENU_NAME = "Main";

export const DEFAULT_MENU: MenuDefinition = Object.freeze({
  options: Object.freeze(["Rocket League", "Animations", "Combat", "Tactics", "Social", "Strategy"]),
  submenus: Object.freeze<Record<string, SubmenuDefinition>>({
    Combat: {
      action: "voice-wheel",
      wheelIndex: 1,
      options: ["Need Support", "Caution here!", "Need Healing!", "On My Way", "Ultimate Status"],
    },
    Tactics: {
      action: "voice-wheel",
      wheelIndex: 2,
      options: ["I'll Take Point", "Let's rush them!", "Be Quiet", "Fall Back!", "Play For Picks"],
    },
    Social: {
      action: "voice-wheel",
      wheelIndex: 3,
      options: ["Thanks", "Commend", "Yes", "No", "Sorry", "Hello"],
    },
    Strategy: {
      action: "voice-wheel",
      wheelIndex: 4,
      options: ["Going A", "Going B", "Going C", "Going Mid"],
    },
    "Rocket League": {
      action: "free-text",
      options: ["What a save!", "Nice shot!", "Thanks!", "Well played!"],
    },
    Animations: {
      action: "animation",
      options: [TRUCK_ANIMATION_NAME],
    },
  }),
});
