/**
 * packages/core/src/menu/graph.ts — Menu graph construction and menu-file parsing.
 *
 * The graph is built once and frozen; navigation never changes it.
 */

import { CommwheelError } from "../errors.js";
import { ROOT_MENU_NAME } from "./defaults.js";
import type {
  ActionKind,
  MenuDefinition,
  MenuGraph,
  MenuNode,
  SubmenuDefinition,
} from "./types.js";

export type MenuParseError = Readonly<{
  code: "NOT_AN_OBJECT" | "INVALID_OPTIONS" | "INVALID_SUBMENU";
  detail: string;
}>;

export type ParseMenuResult =
  | Readonly<{ ok: true; value: MenuDefinition }>
  | Readonly<{ ok: false; error: MenuParseError }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function parseSubmenu(name: string, raw: unknown): SubmenuDefinition | MenuParseError {
  if (!isRecord(raw)) {
    return { code: "INVALID_SUBMENU", detail: `submenu "${name}" must be an object` };
  }
  const options = raw["options"];
  if (!isStringList(options)) {
    return { code: "INVALID_OPTIONS", detail: `submenu "${name}" options must be a list of strings` };
  }
  const action = raw["action"];
  switch (action) {
    case "voice-wheel": {
      const wheelIndex = raw["wheelIndex"];
      if (typeof wheelIndex !== "number") {
        return { code: "INVALID_SUBMENU", detail: `submenu "${name}" needs a numeric wheelIndex` };
      }
      return { action: "voice-wheel", wheelIndex, options: [...options] };
    }
    case "animation":
      return { action: "animation", options: [...options] };
    case "free-text":
      return { action: "free-text", options: [...options] };
    default:
      return {
        code: "INVALID_SUBMENU",
        detail: `submenu "${name}" has unknown action ${JSON.stringify(action)}`,
      };
  }
}

/**
 * Decode a menu file. Structural checks only; `buildMenuGraph` enforces the
 * cross-references.
 */
export function parseMenuDefinition(raw: unknown): ParseMenuResult {
  if (!isRecord(raw)) {
    return { ok: false, error: { code: "NOT_AN_OBJECT", detail: "menu file must be an object" } };
  }
  const options = raw["options"];
  if (!isStringList(options)) {
    return {
      ok: false,
      error: { code: "INVALID_OPTIONS", detail: "options must be a list of strings" },
    };
  }
  const rawSubmenus = raw["submenus"] ?? {};
  if (!isRecord(rawSubmenus)) {
    return { ok: false, error: { code: "INVALID_SUBMENU", detail: "submenus must be an object" } };
  }

  const submenus: Record<string, SubmenuDefinition> = {};
  for (const [name, entry] of Object.entries(rawSubmenus)) {
    const parsed = parseSubmenu(name, entry);
    if ("code" in parsed) return { ok: false, error: parsed };
    submenus[name] = parsed;
  }
  return { ok: true, value: { options: [...options], submenus } };
}

const ANIMATION_ACTION: ActionKind = Object.freeze({ kind: "animation" });
const FREE_TEXT_ACTION: ActionKind = Object.freeze({ kind: "free-text" });

function actionOf(name: string, def: SubmenuDefinition): ActionKind {
  if (def.action !== "voice-wheel") {
    return def.action === "animation" ? ANIMATION_ACTION : FREE_TEXT_ACTION;
  }
  if (!Number.isInteger(def.wheelIndex) || def.wheelIndex < 0 || def.wheelIndex > 9) {
    throw new CommwheelError(
      "INVALID_PROPS",
      `submenu "${name}" wheelIndex must be a digit (0-9), got ${String(def.wheelIndex)}`,
    );
  }
  return Object.freeze({ kind: "voice-wheel", wheelIndex: def.wheelIndex });
}

/**
 * @throws CommwheelError INVALID_PROPS for duplicate main options, submenus
 *   the main menu never lists, or a wheel index that is not a digit
 */
export function buildMenuGraph(def: MenuDefinition): MenuGraph {
  const seen = new Set<string>();
  for (const label of def.options) {
    if (seen.has(label)) {
      throw new CommwheelError("INVALID_PROPS", `duplicate main menu option "${label}"`);
    }
    seen.add(label);
  }

  const submenus = new Map<string, MenuNode>();
  for (const [name, sub] of Object.entries(def.submenus)) {
    if (!seen.has(name)) {
      throw new CommwheelError("INVALID_PROPS", `submenu "${name}" is not listed in the main menu`);
    }
    submenus.set(
      name,
      Object.freeze({ name, options: Object.freeze([...sub.options]), action: actionOf(name, sub) }),
    );
  }

  const root: MenuNode = Object.freeze({
    name: ROOT_MENU_NAME,
    options: Object.freeze([...def.options]),
    action: null,
  });

  return Object.freeze({
    root,
    submenu: (name: string) => submenus.get(name),
    submenus,
  });
}
