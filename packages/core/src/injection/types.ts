/**
 * packages/core/src/injection/types.ts — Input backend contract and wire steps.
 *
 * The overlay never talks to the OS directly. It encodes every action as a list
 * of `InputStep`s and plays them against an `InputBackend`, which a host
 * package implements on top of a real input-synthesis library.
 */

export type DigitKey = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

/** Keys the injection protocols synthesize. */
export type InputKey = "shift" | "ctrl" | "enter" | "v" | "backslash" | "escape" | DigitKey;

export const DIGIT_KEYS: readonly DigitKey[] = Object.freeze([
  "0",
  "1",
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
]);

/**
 * One synthesized event.
 *
 *   - clipboard: replace the shared clipboard text
 *   - press / release: key down / key up
 *   - wait: settle delay before the next step
 */
export type InputStep =
  | Readonly<{ kind: "clipboard"; text: string }>
  | Readonly<{ kind: "press"; key: InputKey }>
  | Readonly<{ kind: "release"; key: InputKey }>
  | Readonly<{ kind: "wait"; ms: number }>;

/**
 * OS-level input synthesis.
 *
 * Calls are fire-and-forget from the target's point of view: resolving means
 * the OS accepted the event, not that the target application consumed it.
 * Implementations reject when the OS refuses the call (missing permissions,
 * no active window).
 */
export interface InputBackend {
  /** Replace the shared clipboard contents with `text`. */
  setClipboard(text: string): Promise<void>;

  /** Synthesize a key-down for `key`. */
  pressKey(key: InputKey): Promise<void>;

  /** Synthesize a key-up for `key`. */
  releaseKey(key: InputKey): Promise<void>;
}

/** Suspend for `ms` milliseconds. */
export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export function isDigitKey(value: string): value is DigitKey {
  return value.length === 1 && value >= "0" && value <= "9";
}
