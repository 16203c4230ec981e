/**
 * packages/core/src/playback/scheduler.ts — Timed, cancellable frame playback.
 *
 * At most one playback runs at a time. `play()` returns immediately; the new
 * run first cancels the active one and waits for it to retire, so two
 * keystroke streams never interleave in the target.
 *
 * Each run emits one `start`, a `frame` per played frame and exactly one
 * `complete`. Injection failures end the run with status "failed"; `done`
 * never rejects.
 */

import { describeError } from "../errors.js";
import type { Animation } from "../animation/types.js";
import { DEFAULT_SCREEN_WIDTH } from "../frames/types.js";
import { formatFramePayload } from "../frames/wire.js";
import type { InputInjector } from "../injection/injector.js";
import { type Sleep, realSleep } from "../injection/types.js";
import { type LogSink, createLogger } from "../log.js";
import { type CancellationToken, createCancellationToken } from "./cancellation.js";
import { playbackIndices } from "./subsequence.js";

export type PlaybackStatus = "completed" | "cancelled" | "failed";

export type PlaybackResult = Readonly<{
  name: string;
  status: PlaybackStatus;
  framesPlayed: number;
  total: number;
  error?: unknown;
}>;

export type PlaybackEvent =
  | Readonly<{ kind: "start"; name: string; total: number }>
  | Readonly<{ kind: "frame"; name: string; index: number; total: number }>
  | Readonly<{ kind: "complete"; result: PlaybackResult }>;

export type PlaybackListener = (event: PlaybackEvent) => void;

export type PlaybackHandle = Readonly<{
  /** Resolves once the run has completed, been cancelled or failed. */
  done: Promise<PlaybackResult>;
  cancel: () => void;
}>;

export type PlaybackSchedulerOptions = Readonly<{
  injector: Pick<InputInjector, "sendFrame">;
  sleep?: Sleep;
  /** Width used to chunk frame payloads. */
  screenWidth?: number;
  /** Pause before the first frame. */
  leadInMs?: number;
  log?: LogSink;
}>;

export type PlaybackScheduler = Readonly<{
  play: (animation: Animation) => PlaybackHandle;
  /** Cancel the active run, if any. */
  cancel: () => void;
  isPlaying: () => boolean;
  subscribe: (listener: PlaybackListener) => () => void;
  /** Resolves once every run started so far has finished. */
  whenIdle: () => Promise<void>;
}>;

export function createPlaybackScheduler(opts: PlaybackSchedulerOptions): PlaybackScheduler {
  const injector = opts.injector;
  const sleep = opts.sleep ?? realSleep;
  const screenWidth = opts.screenWidth ?? DEFAULT_SCREEN_WIDTH;
  const leadInMs = opts.leadInMs ?? 0;
  const log = createLogger(opts.log, "playback");
  const listeners = new Set<PlaybackListener>();

  let active: { token: CancellationToken; done: Promise<PlaybackResult> } | null = null;
  let tail: Promise<unknown> = Promise.resolve();

  const emit = (event: PlaybackEvent): void => {
    for (const listener of [...listeners]) {
      try {
        listener(event);
      } catch (err) {
        log("error", `playback listener threw: ${describeError(err)}`, err);
      }
    }
  };

  const runPlayback = async (
    animation: Animation,
    token: CancellationToken,
  ): Promise<PlaybackResult> => {
    let total = 0;
    let framesPlayed = 0;

    const finish = (status: PlaybackStatus, error?: unknown): PlaybackResult => {
      const result: PlaybackResult = Object.freeze(
        error === undefined
          ? { name: animation.name, status, framesPlayed, total }
          : { name: animation.name, status, framesPlayed, total, error },
      );
      log(
        "debug",
        `playback of ${animation.name} ${status} after ${String(framesPlayed)}/${String(total)} frames`,
      );
      emit({ kind: "complete", result });
      return result;
    };

    try {
      const indices = playbackIndices(animation.frames.length, animation.skipStride);
      total = indices.length;
      log("debug", `playing ${animation.name}: ${String(total)} frames, stride ${String(animation.skipStride)}`);
      emit({ kind: "start", name: animation.name, total });
      if (leadInMs > 0) await sleep(leadInMs);
      for (let i = 0; i < total; i++) {
        if (token.cancelled) return finish("cancelled");
        const frame = animation.frames[indices[i] ?? 0] ?? [];
        const payload = formatFramePayload(frame, screenWidth);
        // Blank frames are timing only.
        if (payload.length > 0) await injector.sendFrame(payload);
        framesPlayed++;
        emit({ kind: "frame", name: animation.name, index: framesPlayed, total });
        if (i < total - 1 && !token.cancelled) await sleep(animation.frameDelayMs);
      }
      return finish("completed");
    } catch (err) {
      log("warn", `playback of ${animation.name} aborted: ${describeError(err)}`, err);
      return finish("failed", err);
    }
  };

  const play = (animation: Animation): PlaybackHandle => {
    active?.token.cancel();
    const token = createCancellationToken();
    const prior = tail;
    const done = prior.then(() => runPlayback(animation, token));
    const entry = { token, done };
    active = entry;
    tail = done;
    void done.then(() => {
      if (active === entry) active = null;
    });
    return Object.freeze({ done, cancel: token.cancel });
  };

  return Object.freeze({
    play,
    cancel: () => {
      active?.token.cancel();
    },
    isPlaying: () => active !== null,
    subscribe: (listener: PlaybackListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    whenIdle: async () => {
      await tail;
    },
  });
}
