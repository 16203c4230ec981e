/**
 * packages/node/src/cli/commands.ts — CLI command bodies.
 *
 * Every command takes its collaborators explicitly so tests can drive it with
 * a recording backend, an instant sleeper and an in-memory output stream.
 */

import {
  type AnimationStore,
  DEFAULT_SCREEN_WIDTH,
  type FrameEdit,
  type HotkeyBridge,
  type HotkeySource,
  type Overlay,
  type PlaybackResult,
  type Sleep,
  formatFramePayload,
  hotkeyToString,
  msToSeconds,
  renderMenuLines,
  secondsToMs,
  applyFrameEdit,
  selectPlaybackFrames,
} from "@commwheel/core";
import { loadAnimationFile, saveAnimationFile } from "../config/animationFile.js";
import type { LogStream } from "../log.js";

/** Seconds between `play` and the first frame, to focus the game window. */
export const PLAY_COUNTDOWN_SECONDS = 3;

function writeLine(out: LogStream, line: string): void {
  out.write(`${line}\n`);
}

/**
 * Print the payload of every frame playback would send, one per line.
 * @throws CommwheelError NOT_FOUND for an unknown animation
 */
export function printFrames(
  store: AnimationStore,
  name: string,
  out: LogStream,
  screenWidth: number = DEFAULT_SCREEN_WIDTH,
): number {
  const animation = store.get(name);
  const frames = selectPlaybackFrames(animation.frames, animation.skipStride);
  for (const frame of frames) {
    writeLine(out, formatFramePayload(frame, screenWidth));
  }
  return frames.length;
}

/**
 * Write every frame of `name`, with its frame delay, to an animation file.
 * @throws CommwheelError NOT_FOUND for an unknown animation
 * @throws CommwheelError PERSISTENCE_ERROR when the file cannot be written
 */
export async function saveFrames(
  store: AnimationStore,
  name: string,
  path: string,
  out: LogStream,
): Promise<void> {
  const animation = store.get(name);
  await saveAnimationFile(path, {
    frames: animation.frames,
    stringFrames: new Set(),
    frameDelayMs: animation.frameDelayMs,
  });
  writeLine(out, `saved ${name} (${String(animation.frames.length)} frames) to ${path}`);
}

function describeEdit(edit: FrameEdit): string {
  switch (edit.kind) {
    case "append":
      return "appended a frame";
    case "remove":
      return `removed frame ${String(edit.index + 1)}`;
    case "replace":
      return `replaced frame ${String(edit.index + 1)}`;
    case "move":
      return `moved frame ${String(edit.index + 1)} ${edit.direction}`;
  }
}

/**
 * Load an animation file, apply one edit and write it back in place.
 * @throws CommwheelError NOT_FOUND when the file does not exist
 * @throws CommwheelError INVALID_PROPS when the edit names no frame
 */
export async function editAnimationFile(
  path: string,
  edit: FrameEdit,
  out: LogStream,
): Promise<void> {
  const loaded = await loadAnimationFile(path);
  const edited = applyFrameEdit(loaded.data, edit);
  await saveAnimationFile(path, edited);
  writeLine(out, `${path}: ${describeEdit(edit)}, ${String(edited.frames.length)} frames`);
}

/**
 * Persist new timing for `name`; omitted values keep their current setting.
 */
export async function setAnimationConfig(
  store: AnimationStore,
  name: string,
  stride: number | undefined,
  delaySeconds: number | undefined,
  out: LogStream,
): Promise<void> {
  const current = store.timingFor(name);
  const skipStride = stride ?? current.skipStride;
  const frameDelayMs = delaySeconds === undefined ? current.frameDelayMs : secondsToMs(delaySeconds);
  await store.save(name, skipStride, frameDelayMs);
  writeLine(
    out,
    `${name}: skip_frames=${String(skipStride)} frame_delay=${String(msToSeconds(frameDelayMs))}`,
  );
}

export type PlayCommandOptions = Readonly<{
  overlay: Pick<Overlay, "scheduler" | "store">;
  name: string;
  out: LogStream;
  sleep: Sleep;
  countdownSeconds?: number;
  /** Called with a cancel function while playback can still be stopped. */
  onCancellable?: (cancel: () => void) => void;
}>;

/**
 * Count down, then play one animation to completion.
 * @throws CommwheelError NOT_FOUND for an unknown animation
 */
export async function playAnimation(opts: PlayCommandOptions): Promise<PlaybackResult> {
  const { overlay, name, out, sleep } = opts;
  const animation = overlay.store.get(name);
  let cancelled = false;
  opts.onCancellable?.(() => {
    cancelled = true;
    overlay.scheduler.cancel();
  });

  for (let s = opts.countdownSeconds ?? PLAY_COUNTDOWN_SECONDS; s > 0; s--) {
    if (cancelled) break;
    writeLine(out, `Starting ${name} in ${String(s)}...`);
    await sleep(1000);
  }
  if (cancelled) {
    const result: PlaybackResult = { name, status: "cancelled", framesPlayed: 0, total: 0 };
    writeLine(out, `${name}: cancelled`);
    return result;
  }

  const unsubscribe = overlay.scheduler.subscribe((event) => {
    if (event.kind === "frame") {
      writeLine(out, `frame ${String(event.index)}/${String(event.total)}`);
    }
  });
  try {
    const result = await overlay.scheduler.play(animation).done;
    writeLine(
      out,
      `${name}: ${result.status} (${String(result.framesPlayed)}/${String(result.total)} frames)`,
    );
    return result;
  } finally {
    unsubscribe();
  }
}

export type InteractiveOptions = Readonly<{
  overlay: Pick<Overlay, "machine" | "view" | "shutdown">;
  bridge: Pick<HotkeyBridge, "attach" | "toggleKey">;
  source: HotkeySource;
  out: LogStream;
  /** Resolves when the session should end (e.g. on Ctrl+C). */
  until: Promise<void>;
}>;

/**
 * Drive the overlay from `source`, printing the menu whenever it changes.
 */
export async function runInteractive(opts: InteractiveOptions): Promise<void> {
  const { overlay, out } = opts;
  const render = (): void => {
    const view = overlay.view();
    if (view === null) {
      writeLine(out, "(hidden)");
      return;
    }
    for (const line of renderMenuLines(view)) writeLine(out, line);
  };

  const toggle = hotkeyToString(opts.bridge.toggleKey);
  writeLine(out, `Press "${toggle}" to open the menu, Ctrl+C to quit.`);
  const unsubscribe = overlay.machine.subscribe(render);
  const detach = opts.bridge.attach(opts.source);
  try {
    await opts.until;
  } finally {
    detach();
    unsubscribe();
    await overlay.shutdown();
  }
}
