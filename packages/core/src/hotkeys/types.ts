/**
 * packages/core/src/hotkeys/types.ts — Hotkey type definitions.
 *
 * Key capture belongs to the host. A host turns whatever its platform reports
 * into `ParsedHotkey` values and feeds them to a `HotkeySource` listener; the
 * bridge maps them onto menu transitions.
 */

/**
 * Keyboard modifier state.
 */
export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

/**
 * A single key with its modifiers.
 * `key` is a lower-case single character ("." or "3") or a named key
 * ("escape", "enter", "f1").
 */
export type ParsedHotkey = Readonly<{
  key: string;
  mods: Modifiers;
}>;

/**
 * Error returned when parsing a hotkey string fails.
 */
export type HotkeyParseError = Readonly<{
  code: "INVALID_KEY" | "EMPTY_KEY" | "INVALID_MODIFIER";
  detail: string;
}>;

export type ParseHotkeyResult =
  | Readonly<{ ok: true; value: ParsedHotkey }>
  | Readonly<{ ok: false; error: HotkeyParseError }>;

export type HotkeyListener = (key: ParsedHotkey) => void;

/**
 * A platform key stream. `start` begins delivering key presses and returns a
 * function that stops delivery.
 */
export interface HotkeySource {
  start(listener: HotkeyListener): () => void;
}

/** What the bridge did with a key press. */
export type HotkeyRoute =
  | Readonly<{ kind: "toggle" }>
  | Readonly<{ kind: "select"; n: number }>
  | Readonly<{ kind: "back" }>
  | Readonly<{ kind: "ignored" }>;
