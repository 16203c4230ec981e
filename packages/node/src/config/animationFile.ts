/**
 * packages/node/src/config/animationFile.ts — Load and save animation files.
 */

import { basename, extname } from "node:path";
import {
  type AnimationFileData,
  type AnimationStore,
  CommwheelError,
  DEFAULT_SKIP_STRIDE,
  decodeAnimationFile,
  encodeAnimationFile,
} from "@commwheel/core";
import { readJsonFile, writeJsonFile } from "./jsonFile.js";

export type LoadedAnimationFile = Readonly<{
  name: string;
  data: AnimationFileData;
}>;

/** "frames/wave.json" -> "wave" */
export function animationNameFromPath(path: string): string {
  const file = basename(path);
  return file.slice(0, file.length - extname(file).length);
}

/**
 * @throws CommwheelError NOT_FOUND when the file does not exist
 * @throws CommwheelError CONFIG_LOAD_ERROR when it cannot be read or decoded
 */
export async function loadAnimationFile(path: string, name?: string): Promise<LoadedAnimationFile> {
  const raw = await readJsonFile(path);
  if (raw === undefined) {
    throw new CommwheelError("NOT_FOUND", `animation file not found: ${path}`);
  }
  const decoded = decodeAnimationFile(raw);
  if (!decoded.ok) {
    throw new CommwheelError("CONFIG_LOAD_ERROR", `${path}: ${decoded.error.detail}`);
  }
  return Object.freeze({ name: name ?? animationNameFromPath(path), data: decoded.value });
}

export async function saveAnimationFile(path: string, data: AnimationFileData): Promise<void> {
  await writeJsonFile(path, encodeAnimationFile(data));
}

/**
 * Load an animation file and register it in `store`. The file's delay applies
 * until the settings hold an entry for the animation.
 */
export async function registerAnimationFile(
  store: AnimationStore,
  path: string,
  name?: string,
): Promise<LoadedAnimationFile> {
  const loaded = await loadAnimationFile(path, name);
  store.define(loaded.name, loaded.data.frames, {
    skipStride: DEFAULT_SKIP_STRIDE,
    frameDelayMs: loaded.data.frameDelayMs,
  });
  return loaded;
}
