/**
 * packages/core/src/animation/file.ts — Animation file codec.
 *
 * File shape: `{ "frames": [...], "delay": seconds }`. A frame is either a list
 * of lines or a single string (editor frames typed without newlines). Single
 * strings decode to one-line frames and encode back to plain strings, so a
 * file survives decode/encode unchanged.
 */

import { CommwheelError } from "../errors.js";
import {
  type MoveDirection,
  appendFrame,
  moveFrame,
  removeFrame,
  replaceFrame,
} from "../frames/editing.js";
import type { Frame } from "../frames/types.js";
import { msToSeconds, parsePositiveSecondsToMsOr } from "./config.js";
import { DEFAULT_FRAME_DELAY_MS } from "./types.js";

export type AnimationFileData = Readonly<{
  frames: readonly Frame[];
  /** Which frames were stored as bare strings. */
  stringFrames: ReadonlySet<number>;
  frameDelayMs: number;
}>;

export type PersistedAnimationFile = Readonly<{
  frames: readonly (string | readonly string[])[];
  delay: number;
}>;

export type AnimationFileError = Readonly<{
  code: "NOT_AN_OBJECT" | "INVALID_FRAMES" | "INVALID_FRAME";
  detail: string;
}>;

export type DecodeAnimationFileResult =
  | Readonly<{ ok: true; value: AnimationFileData }>
  | Readonly<{ ok: false; error: AnimationFileError }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeAnimationFile(raw: unknown): DecodeAnimationFileResult {
  if (!isRecord(raw)) {
    return { ok: false, error: { code: "NOT_AN_OBJECT", detail: "animation file must be an object" } };
  }

  const rawFrames = raw["frames"] ?? [];
  if (!Array.isArray(rawFrames)) {
    return { ok: false, error: { code: "INVALID_FRAMES", detail: "frames must be an array" } };
  }

  const frames: Frame[] = [];
  const stringFrames = new Set<number>();
  for (let i = 0; i < rawFrames.length; i++) {
    const item: unknown = rawFrames[i];
    if (typeof item === "string") {
      frames.push(Object.freeze([item]));
      stringFrames.add(i);
      continue;
    }
    if (Array.isArray(item) && item.every((line): line is string => typeof line === "string")) {
      frames.push(Object.freeze([...item]));
      continue;
    }
    return {
      ok: false,
      error: {
        code: "INVALID_FRAME",
        detail: `frame ${String(i)} must be a string or an array of strings`,
      },
    };
  }

  return {
    ok: true,
    value: Object.freeze({
      frames: Object.freeze(frames),
      stringFrames,
      frameDelayMs: parsePositiveSecondsToMsOr(raw["delay"], DEFAULT_FRAME_DELAY_MS),
    }),
  };
}

export function encodeAnimationFile(data: AnimationFileData): PersistedAnimationFile {
  const frames = data.frames.map((frame, i) =>
    data.stringFrames.has(i) && frame.length === 1 ? (frame[0] ?? "") : [...frame],
  );
  return { frames, delay: msToSeconds(data.frameDelayMs) };
}

/** One editor operation on an animation file. Indices are 0-based. */
export type FrameEdit =
  | Readonly<{ kind: "append"; frame?: Frame }>
  | Readonly<{ kind: "remove"; index: number }>
  | Readonly<{ kind: "replace"; index: number; frame: Frame }>
  | Readonly<{ kind: "move"; index: number; direction: MoveDirection }>;

/**
 * Apply `edit` to the frames of a decoded file. Frames that keep their place
 * keep their string form; new and replaced frames are written as line lists.
 * @throws CommwheelError INVALID_PROPS when the index names no frame
 */
export function applyFrameEdit(data: AnimationFileData, edit: FrameEdit): AnimationFileData {
  if (edit.kind !== "append") {
    const count = data.frames.length;
    if (!Number.isInteger(edit.index) || edit.index < 0 || edit.index >= count) {
      throw new CommwheelError(
        "INVALID_PROPS",
        `frame ${String(edit.index + 1)} does not exist (the file has ${String(count)} frames)`,
      );
    }
  }

  const asString = data.frames.map((_, i) => data.stringFrames.has(i));
  let frames: readonly Frame[];
  let nextAsString: readonly boolean[];
  switch (edit.kind) {
    case "append":
      frames = appendFrame(data.frames, edit.frame);
      nextAsString = [...asString, false];
      break;
    case "remove":
      frames = removeFrame(data.frames, edit.index);
      nextAsString = removeFrame(asString, edit.index);
      break;
    case "replace":
      frames = replaceFrame(data.frames, edit.index, edit.frame);
      nextAsString = replaceFrame(asString, edit.index, false);
      break;
    case "move":
      frames = moveFrame(data.frames, edit.index, edit.direction);
      nextAsString = moveFrame(asString, edit.index, edit.direction);
      break;
  }

  const stringFrames = new Set<number>();
  nextAsString.forEach((flag, i) => {
    if (flag) stringFrames.add(i);
  });
  return Object.freeze({ frames, stringFrames, frameDelayMs: data.frameDelayMs });
}
