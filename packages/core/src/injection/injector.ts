/**
 * packages/core/src/injection/injector.ts — Plays step lists against a backend.
 *
 * Steps run strictly in order. When a backend call fails, every key this run
 * still holds is released before the failure propagates.
 */

import { CommwheelError, describeError, isCommwheelError } from "../errors.js";
import { type LogSink, createLogger } from "../log.js";
import {
  DEFAULT_INJECTION_PROFILE,
  type InjectionProfile,
  encodeFramePayload,
  encodeFreeText,
  encodeVoiceWheel,
} from "./protocol.js";
import { type InputBackend, type InputKey, type InputStep, type Sleep, realSleep } from "./types.js";

export type InputInjectorOptions = Readonly<{
  backend: InputBackend;
  sleep?: Sleep;
  profile?: InjectionProfile;
  log?: LogSink;
}>;

export type InputInjector = Readonly<{
  /**
   * Execute raw steps in order.
   * @throws CommwheelError INJECTION_ERROR when the backend rejects a step
   */
  run: (steps: readonly InputStep[]) => Promise<void>;
  /** Open chat, paste `message`, send. */
  sendFreeText: (message: string) => Promise<void>;
  /** Send one pre-formatted animation frame through chat. */
  sendFrame: (payload: string) => Promise<void>;
  /**
   * Drive the native voice wheel.
   * @throws CommwheelError INVALID_PROPS when an index is not a single digit
   */
  triggerVoiceWheel: (mainIndex: number, subIndex: number) => Promise<void>;
}>;

function describeStep(step: InputStep): string {
  switch (step.kind) {
    case "clipboard":
      return "clipboard write";
    case "press":
    case "release":
      return `${step.kind} ${step.key}`;
    case "wait":
      return `wait ${String(step.ms)}ms`;
  }
}

function wrapInjectionError(step: InputStep, err: unknown): CommwheelError {
  if (isCommwheelError(err, "INJECTION_ERROR")) return err;
  return new CommwheelError("INJECTION_ERROR", `${describeStep(step)} failed: ${describeError(err)}`, {
    cause: err,
  });
}

export function createInputInjector(opts: InputInjectorOptions): InputInjector {
  const backend = opts.backend;
  const sleep = opts.sleep ?? realSleep;
  const profile = opts.profile ?? DEFAULT_INJECTION_PROFILE;
  const log = createLogger(opts.log, "injection");

  const releaseHeld = async (held: ReadonlySet<InputKey>): Promise<void> => {
    for (const key of [...held].reverse()) {
      try {
        await backend.releaseKey(key);
      } catch (err) {
        log("warn", `could not release ${key} after a failed step`, err);
      }
    }
  };

  const run = async (steps: readonly InputStep[]): Promise<void> => {
    const held = new Set<InputKey>();
    for (const step of steps) {
      try {
        switch (step.kind) {
          case "clipboard":
            await backend.setClipboard(step.text);
            break;
          case "press":
            await backend.pressKey(step.key);
            held.add(step.key);
            break;
          case "release":
            await backend.releaseKey(step.key);
            held.delete(step.key);
            break;
          case "wait":
            await sleep(step.ms);
            break;
        }
      } catch (err) {
        const error = wrapInjectionError(step, err);
        log("error", error.message, error);
        await releaseHeld(held);
        throw error;
      }
    }
  };

  return Object.freeze({
    run,
    sendFreeText: (message: string) => run(encodeFreeText(message, profile)),
    sendFrame: (payload: string) => run(encodeFramePayload(payload, profile)),
    triggerVoiceWheel: async (mainIndex: number, subIndex: number) => {
      const steps = encodeVoiceWheel(mainIndex, subIndex, profile);
      await run(steps);
    },
  });
}
