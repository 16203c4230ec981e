/**
 * packages/core/src/timers.ts — One-shot timer seam.
 */

/** Schedule `fn` after `ms`; the returned function cancels it. */
export type TimerHost = Readonly<{
  set: (fn: () => void, ms: number) => () => void;
}>;

export const realTimers: TimerHost = Object.freeze({
  set: (fn: () => void, ms: number) => {
    const handle = setTimeout(fn, ms);
    return () => {
      clearTimeout(handle);
    };
  },
});
