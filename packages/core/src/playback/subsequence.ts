/**
 * packages/core/src/playback/subsequence.ts — Stride downsampling.
 */

import { CommwheelError } from "../errors.js";

/**
 * Indices of the frames to play: every `stride`-th index from 0, plus the
 * final index when the stride skips over it. The final index always appears
 * exactly once, so the closing pose is shown whatever the stride.
 *
 * @throws CommwheelError INVALID_PROPS when `stride` is not an integer >= 1
 */
export function playbackIndices(length: number, stride: number): readonly number[] {
  if (!Number.isInteger(stride) || stride < 1) {
    throw new CommwheelError("INVALID_PROPS", `stride must be an integer >= 1, got ${String(stride)}`);
  }
  const out: number[] = [];
  for (let i = 0; i < length; i += stride) out.push(i);
  const last = length - 1;
  if (length > 0 && out[out.length - 1] !== last) out.push(last);
  return Object.freeze(out);
}

export function selectPlaybackFrames<T>(frames: readonly T[], stride: number): readonly T[] {
  const out: T[] = [];
  for (const i of playbackIndices(frames.length, stride)) {
    const frame = frames[i];
    if (frame !== undefined) out.push(frame);
  }
  return Object.freeze(out);
}
