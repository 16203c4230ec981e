/**
 * packages/core/src/playback/cancellation.ts — Cooperative cancellation token.
 *
 * One token belongs to exactly one playback task. Cancelling is sticky and
 * advisory: the task polls `cancelled` between frames.
 */

export type CancellationToken = Readonly<{
  readonly cancelled: boolean;
  cancel: () => void;
}>;

export function createCancellationToken(): CancellationToken {
  let cancelled = false;
  return Object.freeze({
    get cancelled() {
      return cancelled;
    },
    cancel: () => {
      cancelled = true;
    },
  });
}
