/**
 * packages/core/src/hotkeys/bridge.ts — Routes key presses onto menu transitions.
 *
 *   - toggle key (default ".")       -> toggle, visible or not
 *   - digits 1-9 without modifiers   -> select(n), only while visible
 *   - back key (default "escape")    -> back, only while visible
 */

import { CommwheelError } from "../errors.js";
import { type LogSink, createLogger } from "../log.js";
import type { MenuStateMachine } from "../menu/machine.js";
import { hotkeyToString, hotkeysEqual, parseHotkey } from "./parser.js";
import type { HotkeyRoute, HotkeySource, ParsedHotkey } from "./types.js";

export const DEFAULT_TOGGLE_KEY = ".";
export const DEFAULT_BACK_KEY = "escape";

export type HotkeyBridgeOptions = Readonly<{
  machine: Pick<MenuStateMachine, "toggle" | "select" | "back" | "isVisible">;
  toggleKey?: string;
  backKey?: string;
  log?: LogSink;
}>;

export type HotkeyBridge = Readonly<{
  handle: (key: ParsedHotkey) => HotkeyRoute;
  /** Feed `source` into the bridge; returns a function that detaches it. */
  attach: (source: HotkeySource) => () => void;
  toggleKey: ParsedHotkey;
  backKey: ParsedHotkey;
}>;

const IGNORED: HotkeyRoute = Object.freeze({ kind: "ignored" });

function resolveKey(label: string, input: string): ParsedHotkey {
  const parsed = parseHotkey(input);
  if (!parsed.ok) {
    throw new CommwheelError("INVALID_PROPS", `${label}: ${parsed.error.detail}`);
  }
  return parsed.value;
}

function selectionDigit(key: ParsedHotkey): number | null {
  const { shift, ctrl, alt, meta } = key.mods;
  if (shift || ctrl || alt || meta) return null;
  if (key.key.length !== 1 || key.key < "1" || key.key > "9") return null;
  return Number(key.key);
}

/**
 * @throws CommwheelError INVALID_PROPS when a configured key does not parse
 */
export function createHotkeyBridge(opts: HotkeyBridgeOptions): HotkeyBridge {
  const machine = opts.machine;
  const log = createLogger(opts.log, "hotkeys");
  const toggleKey = resolveKey("toggleKey", opts.toggleKey ?? DEFAULT_TOGGLE_KEY);
  const backKey = resolveKey("backKey", opts.backKey ?? DEFAULT_BACK_KEY);

  const handle = (key: ParsedHotkey): HotkeyRoute => {
    if (hotkeysEqual(key, toggleKey)) {
      machine.toggle();
      return { kind: "toggle" };
    }
    if (!machine.isVisible()) return IGNORED;

    if (hotkeysEqual(key, backKey)) {
      machine.back();
      return { kind: "back" };
    }
    const n = selectionDigit(key);
    if (n !== null) {
      const outcome = machine.select(n);
      log("debug", `select ${String(n)}: ${outcome}`);
      return { kind: "select", n };
    }
    log("debug", `unbound key ${hotkeyToString(key)}`);
    return IGNORED;
  };

  return Object.freeze({
    handle,
    attach: (source: HotkeySource) =>
      source.start((key) => {
        handle(key);
      }),
    toggleKey,
    backKey,
  });
}
