import type { Sleep, TimerHost } from "@commwheel/core";

export type RecordingSleep = Readonly<{
  sleep: Sleep;
  /** Every requested delay, in order. */
  calls: readonly number[];
  total: () => number;
}>;

/**
 * A sleeper that records the delay and resolves on the next microtask.
 * `onSleep` runs before resolving, so a test can cancel work mid-run.
 */
export function createRecordingSleep(onSleep?: (ms: number, callIndex: number) => void): RecordingSleep {
  const calls: number[] = [];
  return Object.freeze({
    sleep: async (ms: number) => {
      calls.push(ms);
      onSleep?.(ms, calls.length - 1);
    },
    calls,
    total: () => calls.reduce((sum, ms) => sum + ms, 0),
  });
}

export type ManualTimers = TimerHost &
  Readonly<{
    /** Advance the clock, firing every timer that comes due. */
    advance: (ms: number) => void;
    pending: () => number;
    now: () => number;
  }>;

/**
 * Deterministic timer host: nothing fires until `advance` is called.
 */
export function createManualTimers(): ManualTimers {
  type Entry = { id: number; due: number; fn: () => void };
  let now = 0;
  let nextId = 1;
  let entries: Entry[] = [];

  const advance = (ms: number): void => {
    const target = now + ms;
    for (;;) {
      const due = entries
        .filter((entry) => entry.due <= target)
        .sort((a, b) => a.due - b.due || a.id - b.id)[0];
      if (due === undefined) break;
      entries = entries.filter((entry) => entry.id !== due.id);
      now = due.due;
      due.fn();
    }
    now = target;
  };

  return Object.freeze({
    set: (fn: () => void, ms: number) => {
      const entry: Entry = { id: nextId++, due: now + ms, fn };
      entries.push(entry);
      return () => {
        entries = entries.filter((e) => e.id !== entry.id);
      };
    },
    advance,
    pending: () => entries.length,
    now: () => now,
  });
}
