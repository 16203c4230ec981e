/**
 * packages/core/src/hotkeys/parser.ts — Parse hotkey strings to ParsedHotkey.
 *
 * Format examples:
 *   - Single key: ".", "escape", "f1"
 *   - With modifiers: "ctrl+space", "shift+f2", "ctrl+alt+o"
 *
 * A bare "+" is the plus key; "ctrl++" is ctrl with the plus key.
 */

import type { HotkeyParseError, Modifiers, ParseHotkeyResult, ParsedHotkey } from "./types.js";

export const NO_MODS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

type ModifierName = keyof Modifiers;

const MODIFIER_ALIASES: ReadonlyMap<string, ModifierName> = new Map<string, ModifierName>([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["option", "alt"],
  ["meta", "meta"],
  ["cmd", "meta"],
  ["command", "meta"],
  ["win", "meta"],
  ["super", "meta"],
]);

const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ["esc", "escape"],
  ["return", "enter"],
  ["period", "."],
  ["plus", "+"],
]);

const NAMED_KEYS: ReadonlySet<string> = new Set([
  "escape",
  "enter",
  "space",
  "tab",
  "backspace",
  "delete",
  "insert",
  "home",
  "end",
  "pageup",
  "pagedown",
  "up",
  "down",
  "left",
  "right",
  ...Array.from({ length: 12 }, (_, i) => `f${String(i + 1)}`),
]);

function fail(code: HotkeyParseError["code"], detail: string): ParseHotkeyResult {
  return { ok: false, error: { code, detail } };
}

function splitPieces(lower: string): string[] {
  // A trailing "++" means the plus key itself.
  if (lower === "+") return ["+"];
  if (lower.endsWith("++")) return [...lower.slice(0, -2).split("+"), "+"];
  return lower.split("+");
}

/**
 * Parse a single hotkey.
 *
 * Modifier names (case-insensitive): shift; ctrl, control; alt, option;
 * meta, cmd, command, win, super.
 */
export function parseHotkey(input: string): ParseHotkeyResult {
  const trimmed = input.trim();
  if (trimmed.length === 0) return fail("EMPTY_KEY", "hotkey string is empty");
  if (/\s/.test(trimmed)) return fail("INVALID_KEY", `"${trimmed}" must be a single key`);

  const pieces = splitPieces(trimmed.toLowerCase());
  const mods: Record<ModifierName, boolean> = { shift: false, ctrl: false, alt: false, meta: false };

  for (let i = 0; i < pieces.length - 1; i++) {
    const piece = pieces[i] ?? "";
    const modifier = MODIFIER_ALIASES.get(piece);
    if (modifier === undefined) {
      return fail("INVALID_MODIFIER", `"${piece}" is not a valid modifier in "${trimmed}"`);
    }
    if (mods[modifier]) {
      return fail("INVALID_MODIFIER", `duplicate modifier "${piece}" in "${trimmed}"`);
    }
    mods[modifier] = true;
  }

  const last = pieces[pieces.length - 1] ?? "";
  if (last.length === 0) return fail("INVALID_KEY", `empty component in "${trimmed}"`);
  if (MODIFIER_ALIASES.has(last)) {
    return fail("INVALID_KEY", `modifier "${last}" cannot be the final key in "${trimmed}"`);
  }

  const key = KEY_ALIASES.get(last) ?? last;
  if (Array.from(key).length !== 1 && !NAMED_KEYS.has(key)) {
    return fail("INVALID_KEY", `unknown key "${last}" in "${trimmed}"`);
  }

  return { ok: true, value: Object.freeze({ key, mods: Object.freeze(mods) }) };
}

export function hotkeysEqual(a: ParsedHotkey, b: ParsedHotkey): boolean {
  return (
    a.key === b.key &&
    a.mods.shift === b.mods.shift &&
    a.mods.ctrl === b.mods.ctrl &&
    a.mods.alt === b.mods.alt &&
    a.mods.meta === b.mods.meta
  );
}

/**
 * Convert a ParsedHotkey to its canonical string, e.g. "ctrl+." or "escape".
 */
export function hotkeyToString(key: ParsedHotkey): string {
  const parts: string[] = [];
  if (key.mods.ctrl) parts.push("ctrl");
  if (key.mods.alt) parts.push("alt");
  if (key.mods.shift) parts.push("shift");
  if (key.mods.meta) parts.push("meta");
  parts.push(key.key);
  return parts.join("+");
}
