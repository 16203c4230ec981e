/**
 * packages/node/src/backend/dryRunBackend.ts — Logs synthesized input instead of sending it.
 */

import { type InputBackend, type InputKey, type LogSink, createLogger } from "@commwheel/core";

export function createDryRunBackend(log: LogSink): InputBackend {
  const emit = createLogger(log, "dry-run");
  return Object.freeze({
    setClipboard: async (text: string) => {
      emit("info", `clipboard <- ${JSON.stringify(text)}`);
    },
    pressKey: async (key: InputKey) => {
      emit("info", `press ${key}`);
    },
    releaseKey: async (key: InputKey) => {
      emit("info", `release ${key}`);
    },
  });
}
