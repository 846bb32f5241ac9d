import { DEFAULT_HIGHLIGHT_SCALE } from "../config/constants.js";
import { type CVar, clampTo, parseBoolean, parseNumber } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

export interface MenuCVars {
  ui_touchscreen: CVar<boolean>;
  ui_highlight_scale: CVar<number>;
}

export function registerMenuCVars(cvars: CVarRegistry): MenuCVars {
  const ui_touchscreen = cvars.register<boolean>({
    name: "ui_touchscreen",
    description: "Use touch-screen texture variants in menus",
    defaultValue: false,
    category: "ui",
    parse: parseBoolean,
  });

  const ui_highlight_scale = cvars.register<number>({
    name: "ui_highlight_scale",
    description: "Size multiplier for the focused menu button",
    defaultValue: DEFAULT_HIGHLIGHT_SCALE,
    category: "ui",
    parse: parseNumber,
    normalize: clampTo(1, 2),
  });

  return { ui_touchscreen, ui_highlight_scale };
}
