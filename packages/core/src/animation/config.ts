/**
 * packages/core/src/animation/config.ts — Settings snapshot codec.
 *
 * Reading is permissive: each field is validated on its own and replaced by the
 * default when it is missing or malformed. Writing always emits the full
 * snapshot.
 */

import { TRUCK_ANIMATION_NAME } from "../frames/sprites.js";
import {
  type AnimationConfig,
  type AnimationTiming,
  DEFAULT_FRAME_DELAY_MS,
  DEFAULT_SKIP_STRIDE,
  DEFAULT_TIMING,
  type PersistedAnimationConfig,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePositiveIntOr(n: unknown, fallback: number): number {
  if (typeof n !== "number") return fallback;
  if (!Number.isFinite(n)) return fallback;
  if (!Number.isInteger(n)) return fallback;
  if (n <= 0) return fallback;
  return n;
}

export function parsePositiveSecondsToMsOr(seconds: unknown, fallbackMs: number): number {
  if (typeof seconds !== "number" || !Number.isFinite(seconds) || seconds <= 0) return fallbackMs;
  const ms = secondsToMs(seconds);
  return ms > 0 ? ms : fallbackMs;
}

/** Not rounded: sub-millisecond delays stay positive. */
export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}

/** Drops the float noise of the `* 1000` / `/ 1000` pair, so seconds read back as written. */
export function msToSeconds(ms: number): number {
  return Number((ms / 1000).toPrecision(15));
}

export function defaultAnimationConfig(): AnimationConfig {
  return Object.freeze({ [TRUCK_ANIMATION_NAME]: DEFAULT_TIMING });
}

function parseTiming(entry: Record<string, unknown>): AnimationTiming {
  const stride = entry["skip_frames"] ?? entry["skip_stride"];
  return Object.freeze({
    skipStride: parsePositiveIntOr(stride, DEFAULT_SKIP_STRIDE),
    frameDelayMs: parsePositiveSecondsToMsOr(entry["frame_delay"], DEFAULT_FRAME_DELAY_MS),
  });
}

/**
 * Parse a settings document.
 *
 * Accepts either `{ "animations": { name: entry } }` or the bare
 * `{ name: entry }` mapping. Entries that are not objects are skipped.
 *
 * @returns the parsed config, or null when `raw` is not an object at all
 */
export function parseAnimationConfig(raw: unknown): AnimationConfig | null {
  if (!isRecord(raw)) return null;
  const container = isRecord(raw["animations"]) ? raw["animations"] : raw;

  const out: Record<string, AnimationTiming> = {};
  for (const [name, entry] of Object.entries(container)) {
    if (!isRecord(entry)) continue;
    out[name] = parseTiming(entry);
  }
  return Object.freeze(out);
}

export function serializeAnimationConfig(config: AnimationConfig): PersistedAnimationConfig {
  const animations: Record<string, { skip_frames: number; frame_delay: number }> = {};
  for (const [name, timing] of Object.entries(config)) {
    animations[name] = {
      skip_frames: timing.skipStride,
      frame_delay: msToSeconds(timing.frameDelayMs),
    };
  }
  return { animations };
}
