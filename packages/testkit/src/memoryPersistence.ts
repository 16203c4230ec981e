import type { ConfigPersistence, PersistedAnimationConfig } from "@commwheel/core";

export type MemoryPersistence = ConfigPersistence &
  Readonly<{
    writes: readonly PersistedAnimationConfig[];
  }>;

export type MemoryPersistenceOptions = Readonly<{
  /** Document returned by `read`; undefined means nothing persisted. */
  initial?: unknown;
  readError?: Error;
  writeError?: Error;
}>;

/**
 * Settings storage held in memory. `read` returns the last written snapshot.
 */
export function createMemoryPersistence(opts: MemoryPersistenceOptions = {}): MemoryPersistence {
  const writes: PersistedAnimationConfig[] = [];
  let current: unknown = opts.initial;

  return Object.freeze({
    writes,
    read: async () => {
      if (opts.readError !== undefined) throw opts.readError;
      return current;
    },
    write: async (snapshot: PersistedAnimationConfig) => {
      if (opts.writeError !== undefined) throw opts.writeError;
      writes.push(snapshot);
      current = snapshot;
    },
  });
}
