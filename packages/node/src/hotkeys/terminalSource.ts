/**
 * packages/node/src/hotkeys/terminalSource.ts — Key presses from a TTY.
 *
 * Puts the input stream in raw mode and turns readline keypress events into
 * ParsedHotkey values. Ctrl+C is not a hotkey: it goes to `onInterrupt`.
 */

import { type Key, emitKeypressEvents } from "node:readline";
import type { HotkeyListener, HotkeySource, ParsedHotkey } from "@commwheel/core";

export type KeypressInput = NodeJS.ReadableStream &
  Readonly<{
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
  }>;

export type TerminalHotkeySourceOptions = Readonly<{
  /** Defaults to process.stdin. */
  input?: KeypressInput;
  onInterrupt?: () => void;
}>;

const READLINE_NAMES: ReadonlyMap<string, string> = new Map([
  ["return", "enter"],
  ["enter", "enter"],
  ["escape", "escape"],
  ["space", "space"],
  ["tab", "tab"],
  ["backspace", "backspace"],
  ["delete", "delete"],
  ["up", "up"],
  ["down", "down"],
  ["left", "left"],
  ["right", "right"],
]);

export function isInterrupt(key: Key | undefined): boolean {
  return key?.ctrl === true && key.name === "c";
}

/**
 * Map a readline keypress to a ParsedHotkey; null for sequences that carry no
 * key (bare escape sequences, paste chunks).
 */
export function keypressToHotkey(str: string | undefined, key: Key | undefined): ParsedHotkey | null {
  const name = key?.name;
  const mods = Object.freeze({
    shift: key?.shift === true,
    ctrl: key?.ctrl === true,
    alt: key?.meta === true,
    meta: false,
  });

  if (name !== undefined) {
    const named = READLINE_NAMES.get(name) ?? (/^f\d{1,2}$/.test(name) ? name : undefined);
    if (named !== undefined) return Object.freeze({ key: named, mods });
    if (name.length === 1) return Object.freeze({ key: name.toLowerCase(), mods });
  }
  if (str !== undefined && Array.from(str).length === 1) {
    // Punctuation arrives without a name; shift is already applied to the glyph.
    return Object.freeze({ key: str, mods: Object.freeze({ ...mods, shift: false }) });
  }
  return null;
}

export function createTerminalHotkeySource(opts: TerminalHotkeySourceOptions = {}): HotkeySource {
  const input: KeypressInput = opts.input ?? process.stdin;

  return Object.freeze({
    start: (listener: HotkeyListener) => {
      emitKeypressEvents(input);
      const raw = input.isTTY === true && input.setRawMode !== undefined;
      if (raw) input.setRawMode?.(true);

      const onKeypress = (str: string | undefined, key: Key | undefined): void => {
        if (isInterrupt(key)) {
          opts.onInterrupt?.();
          return;
        }
        const parsed = keypressToHotkey(str, key);
        if (parsed !== null) listener(parsed);
      };
      input.on("keypress", onKeypress);
      input.resume();

      return () => {
        input.off("keypress", onKeypress);
        if (raw) input.setRawMode?.(false);
        input.pause();
      };
    },
  });
}
