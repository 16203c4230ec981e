/**
 * packages/core/src/animation/types.ts — Animation and timing types.
 */

import type { Frame } from "../frames/types.js";

/** Per-animation playback timing. */
export type AnimationTiming = Readonly<{
  /** Play every n-th frame (>= 1). */
  skipStride: number;
  /** Pause between two emitted frames, in milliseconds (> 0). */
  frameDelayMs: number;
}>;

/** A named frame sequence with its resolved timing. */
export type Animation = Readonly<{
  name: string;
  frames: readonly Frame[];
  skipStride: number;
  frameDelayMs: number;
}>;

/** Animation name -> timing. */
export type AnimationConfig = Readonly<Record<string, AnimationTiming>>;

/** On-disk shape of the settings file. Delays are stored in seconds. */
export type PersistedAnimationConfig = Readonly<{
  animations: Readonly<
    Record<
      string,
      Readonly<{
        skip_frames: number;
        frame_delay: number;
      }>
    >
  >;
}>;

export const DEFAULT_SKIP_STRIDE = 5;
export const DEFAULT_FRAME_DELAY_MS = 500;

export const DEFAULT_TIMING: AnimationTiming = Object.freeze({
  skipStride: DEFAULT_SKIP_STRIDE,
  frameDelayMs: DEFAULT_FRAME_DELAY_MS,
});
