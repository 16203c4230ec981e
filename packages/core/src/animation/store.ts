/**
 * packages/core/src/animation/store.ts — Named animations and their timing.
 *
 * The store owns the animation table and the timing config. Persistence is a
 * host concern reached through `ConfigPersistence`.
 */

import { CommwheelError, describeError, isCommwheelError } from "../errors.js";
import { generateScrollFrames } from "../frames/generator.js";
import { TRUCK_ANIMATION_NAME, TRUCK_SPRITE } from "../frames/sprites.js";
import type { Frame } from "../frames/types.js";
import { type LogSink, createLogger } from "../log.js";
import { defaultAnimationConfig, parseAnimationConfig, serializeAnimationConfig } from "./config.js";
import {
  type Animation,
  type AnimationConfig,
  type AnimationTiming,
  DEFAULT_TIMING,
  type PersistedAnimationConfig,
} from "./types.js";

/**
 * Host-provided storage for the settings snapshot.
 */
export interface ConfigPersistence {
  /**
   * Read the persisted document.
   * Resolves with undefined when nothing has been persisted yet.
   * Rejects when the document exists but cannot be read or parsed.
   */
  read(): Promise<unknown>;

  /**
   * Replace the persisted document with `snapshot`.
   */
  write(snapshot: PersistedAnimationConfig): Promise<void>;
}

export type AnimationStoreOptions = Readonly<{
  persistence?: ConfigPersistence;
  /** Screen width used to generate the built-in animations. */
  screenWidth?: number;
  /** Skip registering the built-in truck animation. */
  omitBuiltins?: boolean;
  log?: LogSink;
}>;

export type AnimationStore = Readonly<{
  /**
   * Load the persisted config. Missing or unreadable data falls back to the
   * built-in defaults; this never rejects.
   */
  load: () => Promise<AnimationConfig>;
  /**
   * Upsert one animation's timing and persist the full snapshot.
   * @throws CommwheelError INVALID_PROPS for a non-positive stride or delay
   * @throws CommwheelError PERSISTENCE_ERROR when the write fails
   */
  save: (name: string, skipStride: number, frameDelayMs: number) => Promise<void>;
  /**
   * @throws CommwheelError NOT_FOUND for an unknown name
   */
  get: (name: string) => Animation;
  has: (name: string) => boolean;
  names: () => readonly string[];
  /**
   * Register (or replace) the frames of an animation. `fallbackTiming` applies
   * while the settings have no entry for `name`.
   */
  define: (name: string, frames: readonly Frame[], fallbackTiming?: AnimationTiming) => void;
  timingFor: (name: string) => AnimationTiming;
  config: () => AnimationConfig;
}>;

export function createAnimationStore(opts: AnimationStoreOptions = {}): AnimationStore {
  const log = createLogger(opts.log, "animations");
  const frames = new Map<string, readonly Frame[]>();
  const fallbacks = new Map<string, AnimationTiming>();
  let config: AnimationConfig = defaultAnimationConfig();

  if (opts.omitBuiltins !== true) {
    const geometry = opts.screenWidth === undefined ? {} : { screenWidth: opts.screenWidth };
    frames.set(TRUCK_ANIMATION_NAME, Object.freeze([...generateScrollFrames(TRUCK_SPRITE, geometry)]));
  }

  const fallBack = (reason: string, error?: unknown): AnimationConfig => {
    log("warn", `using default animation settings: ${reason}`, error);
    config = defaultAnimationConfig();
    return config;
  };

  const load = async (): Promise<AnimationConfig> => {
    const persistence = opts.persistence;
    if (persistence === undefined) {
      config = defaultAnimationConfig();
      return config;
    }

    let raw: unknown;
    try {
      raw = await persistence.read();
    } catch (err) {
      const error = isCommwheelError(err)
        ? err
        : new CommwheelError("CONFIG_LOAD_ERROR", describeError(err), { cause: err });
      return fallBack(error.message, error);
    }

    if (raw === undefined) {
      log("debug", "no persisted animation settings; using defaults");
      config = defaultAnimationConfig();
      return config;
    }

    const parsed = parseAnimationConfig(raw);
    if (parsed === null) {
      return fallBack("settings document is not an object");
    }
    config = parsed;
    return config;
  };

  const save = async (name: string, skipStride: number, frameDelayMs: number): Promise<void> => {
    if (!Number.isInteger(skipStride) || skipStride < 1) {
      throw new CommwheelError(
        "INVALID_PROPS",
        `skipStride must be an integer >= 1, got ${String(skipStride)}`,
      );
    }
    if (!Number.isFinite(frameDelayMs) || frameDelayMs <= 0) {
      throw new CommwheelError(
        "INVALID_PROPS",
        `frameDelayMs must be a positive number, got ${String(frameDelayMs)}`,
      );
    }

    config = Object.freeze({ ...config, [name]: Object.freeze({ skipStride, frameDelayMs }) });

    const persistence = opts.persistence;
    if (persistence === undefined) return;
    try {
      await persistence.write(serializeAnimationConfig(config));
    } catch (err) {
      const error = isCommwheelError(err, "PERSISTENCE_ERROR")
        ? err
        : new CommwheelError("PERSISTENCE_ERROR", describeError(err), { cause: err });
      log("error", `failed to persist settings for ${name}`, error);
      throw error;
    }
  };

  const timingFor = (name: string): AnimationTiming =>
    config[name] ?? fallbacks.get(name) ?? DEFAULT_TIMING;

  const get = (name: string): Animation => {
    const animationFrames = frames.get(name);
    if (animationFrames === undefined) {
      throw new CommwheelError("NOT_FOUND", `unknown animation: ${name}`);
    }
    const timing = timingFor(name);
    return Object.freeze({
      name,
      frames: animationFrames,
      skipStride: timing.skipStride,
      frameDelayMs: timing.frameDelayMs,
    });
  };

  const define = (
    name: string,
    animationFrames: readonly Frame[],
    fallbackTiming?: AnimationTiming,
  ): void => {
    if (name.length === 0) {
      throw new CommwheelError("INVALID_PROPS", "animation name must be non-empty");
    }
    frames.set(name, Object.freeze([...animationFrames]));
    if (fallbackTiming === undefined) fallbacks.delete(name);
    else fallbacks.set(name, Object.freeze({ ...fallbackTiming }));
  };

  return Object.freeze({
    load,
    save,
    get,
    has: (name: string) => frames.has(name),
    names: () => Object.freeze([...frames.keys()]),
    define,
    timingFor,
    config: () => config,
  });
}
