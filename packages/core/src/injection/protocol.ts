/**
 * packages/core/src/injection/protocol.ts — Keystroke protocols.
 *
 * Each protocol is a fixed, ordered step list. The settle delays were tuned
 * against the target's input polling and are constants, not user settings.
 *
 * Chat (free text and animation frames):
 *   clipboard <- payload
 *   shift down, enter tap, shift up      open all-chat
 *   ctrl down, v tap, ctrl up            paste
 *   enter tap                            send
 *
 * Voice wheel:
 *   backslash tap, wait, main digit tap, wait, sub digit tap
 */

import { CommwheelError } from "../errors.js";
import { DIGIT_KEYS, type DigitKey, type InputKey, type InputStep } from "./types.js";

export type InjectionProfile = Readonly<{
  chatOpenModifier: InputKey;
  chatOpenKey: InputKey;
  pasteModifier: InputKey;
  pasteKey: InputKey;
  sendKey: InputKey;
  wheelKey: InputKey;
}>;

export const DEFAULT_INJECTION_PROFILE: InjectionProfile = Object.freeze({
  chatOpenModifier: "shift",
  chatOpenKey: "enter",
  pasteModifier: "ctrl",
  pasteKey: "v",
  sendKey: "enter",
  wheelKey: "backslash",
});

type ChatTimings = Readonly<{
  afterClipboardMs: number;
  chordStepMs: number;
  afterChatOpenMs: number;
  afterPasteMs: number;
}>;

const FREE_TEXT_TIMINGS: ChatTimings = Object.freeze({
  afterClipboardMs: 0,
  chordStepMs: 10,
  afterChatOpenMs: 30,
  afterPasteMs: 20,
});

const FRAME_TIMINGS: ChatTimings = Object.freeze({
  afterClipboardMs: 10,
  chordStepMs: 10,
  afterChatOpenMs: 20,
  afterPasteMs: 10,
});

/** Pause between voice-wheel levels so the native wheel can advance. */
export const VOICE_WHEEL_STEP_MS = 80;

/** Delay before a free-text or voice-wheel dispatch starts. */
export const QUICK_LEAD_IN_MS = 50;

/** Delay before the first animation frame. */
export const ANIMATION_LEAD_IN_MS = 100;

function tap(key: InputKey): InputStep[] {
  return [
    { kind: "press", key },
    { kind: "release", key },
  ];
}

function wait(ms: number): InputStep[] {
  return ms > 0 ? [{ kind: "wait", ms }] : [];
}

function chatSteps(text: string, profile: InjectionProfile, t: ChatTimings): readonly InputStep[] {
  return Object.freeze([
    { kind: "clipboard", text },
    ...wait(t.afterClipboardMs),
    { kind: "press", key: profile.chatOpenModifier },
    ...wait(t.chordStepMs),
    { kind: "press", key: profile.chatOpenKey },
    ...wait(t.chordStepMs),
    { kind: "release", key: profile.chatOpenKey },
    ...wait(t.chordStepMs),
    { kind: "release", key: profile.chatOpenModifier },
    ...wait(t.afterChatOpenMs),
    { kind: "press", key: profile.pasteModifier },
    ...tap(profile.pasteKey),
    { kind: "release", key: profile.pasteModifier },
    ...wait(t.afterPasteMs),
    ...tap(profile.sendKey),
  ]);
}

export function encodeFreeText(
  message: string,
  profile: InjectionProfile = DEFAULT_INJECTION_PROFILE,
): readonly InputStep[] {
  return chatSteps(message, profile, FREE_TEXT_TIMINGS);
}

/** `payload` is expected to be pre-formatted by `formatFramePayload`. */
export function encodeFramePayload(
  payload: string,
  profile: InjectionProfile = DEFAULT_INJECTION_PROFILE,
): readonly InputStep[] {
  return chatSteps(payload, profile, FRAME_TIMINGS);
}

function digitFor(label: string, index: number): DigitKey {
  const digit = Number.isInteger(index) ? DIGIT_KEYS[index] : undefined;
  if (digit === undefined) {
    throw new CommwheelError(
      "INVALID_PROPS",
      `${label} must be a single digit (0-9), got ${String(index)}`,
    );
  }
  return digit;
}

/**
 * @throws CommwheelError INVALID_PROPS when either index has no digit key
 */
export function encodeVoiceWheel(
  mainIndex: number,
  subIndex: number,
  profile: InjectionProfile = DEFAULT_INJECTION_PROFILE,
): readonly InputStep[] {
  const main = digitFor("mainIndex", mainIndex);
  const sub = digitFor("subIndex", subIndex);
  return Object.freeze([
    ...tap(profile.wheelKey),
    ...wait(VOICE_WHEEL_STEP_MS),
    ...tap(main),
    ...wait(VOICE_WHEEL_STEP_MS),
    ...tap(sub),
  ]);
}
