/**
 * packages/node/src/backend/nutBackend.ts — OS input backend on nut-js.
 *
 * The native module is imported on first use, so hosts that only print frames
 * or run with --dry-run never load it. nut-js's own auto-delay is switched off:
 * the injection protocols own every settle delay.
 */

import type { Key } from "@nut-tree-fork/nut-js";
import { CommwheelError, type InputBackend, type InputKey, describeError } from "@commwheel/core";

type NutModule = typeof import("@nut-tree-fork/nut-js");
export type NutApi = Pick<NutModule, "keyboard" | "clipboard" | "Key">;

export type NutBackendOptions = Readonly<{
  /** Loader override for tests and alternative builds. */
  load?: () => Promise<unknown>;
}>;

function isNutApi(value: unknown): value is NutApi {
  return (
    typeof value === "object" &&
    value !== null &&
    "keyboard" in value &&
    "clipboard" in value &&
    "Key" in value
  );
}

function unwrap(mod: unknown): NutApi {
  if (isNutApi(mod)) return mod;
  const fallback = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : undefined;
  if (isNutApi(fallback)) return fallback;
  throw new CommwheelError(
    "INJECTION_ERROR",
    "@nut-tree-fork/nut-js did not expose keyboard, clipboard and Key",
  );
}

async function loadNut(load: () => Promise<unknown>): Promise<NutApi> {
  let mod: unknown;
  try {
    mod = await load();
  } catch (err) {
    throw new CommwheelError(
      "INJECTION_ERROR",
      `Failed to load @nut-tree-fork/nut-js.\n\nKeyboard synthesis needs its native libraries for this platform.\n\n${describeError(err)}`,
      { cause: err },
    );
  }
  const api = unwrap(mod);
  api.keyboard.config.autoDelayMs = 0;
  return api;
}

export function nutKeyFor(api: Pick<NutApi, "Key">, key: InputKey): Key {
  const { Key: K } = api;
  switch (key) {
    case "shift":
      return K.LeftShift;
    case "ctrl":
      return K.LeftControl;
    case "enter":
      return K.Enter;
    case "v":
      return K.V;
    case "backslash":
      return K.Backslash;
    case "escape":
      return K.Escape;
    case "0":
      return K.Num0;
    case "1":
      return K.Num1;
    case "2":
      return K.Num2;
    case "3":
      return K.Num3;
    case "4":
      return K.Num4;
    case "5":
      return K.Num5;
    case "6":
      return K.Num6;
    case "7":
      return K.Num7;
    case "8":
      return K.Num8;
    case "9":
      return K.Num9;
  }
}

export function createNutBackend(opts: NutBackendOptions = {}): InputBackend {
  const load = opts.load ?? (() => import("@nut-tree-fork/nut-js"));
  let api: Promise<NutApi> | null = null;

  const getApi = (): Promise<NutApi> => {
    if (api !== null) return api;
    const pending = loadNut(load);
    api = pending;
    // A failed load is retried on the next call; the caller still sees the rejection.
    void pending.catch(() => {
      if (api === pending) api = null;
    });
    return pending;
  };

  return Object.freeze({
    setClipboard: async (text: string) => {
      const nut = await getApi();
      await nut.clipboard.setContent(text);
    },
    pressKey: async (key: InputKey) => {
      const nut = await getApi();
      await nut.keyboard.pressKey(nutKeyFor(nut, key));
    },
    releaseKey: async (key: InputKey) => {
      const nut = await getApi();
      await nut.keyboard.releaseKey(nutKeyFor(nut, key));
    },
  });
}
