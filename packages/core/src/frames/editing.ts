/**
 * packages/core/src/frames/editing.ts — Pure frame-list edits.
 *
 * Each edit returns a new frozen list and leaves the input untouched.
 * Out-of-range indices return the input as is. Remove, replace and move work
 * on any list, so callers can apply the same edit to per-frame metadata.
 */

import type { Frame } from "./types.js";

export type MoveDirection = "up" | "down";

const EMPTY_FRAME: Frame = Object.freeze([]);

/** Split editor text into frame lines ("\r\n" and "\n" both end a line). */
export function frameFromText(text: string): Frame {
  return Object.freeze(text.split(/\r?\n/u));
}

export function frameToText(frame: Frame): string {
  return frame.join("\n");
}

export function appendFrame(frames: readonly Frame[], frame: Frame = EMPTY_FRAME): readonly Frame[] {
  return Object.freeze([...frames, frame]);
}

export function removeFrame<T>(frames: readonly T[], index: number): readonly T[] {
  if (!Number.isInteger(index) || index < 0 || index >= frames.length) return frames;
  return Object.freeze(frames.filter((_, i) => i !== index));
}

export function replaceFrame<T>(frames: readonly T[], index: number, frame: T): readonly T[] {
  if (!Number.isInteger(index) || index < 0 || index >= frames.length) return frames;
  return Object.freeze(frames.map((current, i) => (i === index ? frame : current)));
}

export function moveFrame<T>(
  frames: readonly T[],
  index: number,
  direction: MoveDirection,
): readonly T[] {
  const target = direction === "up" ? index - 1 : index + 1;
  if (!Number.isInteger(index) || index < 0 || index >= frames.length) return frames;
  if (target < 0 || target >= frames.length) return frames;

  const next = [...frames];
  const moving = next[index];
  const displaced = next[target];
  if (moving === undefined || displaced === undefined) return frames;
  next[target] = moving;
  next[index] = displaced;
  return Object.freeze(next);
}
