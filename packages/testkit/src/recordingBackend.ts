import type { InputBackend, InputKey } from "@commwheel/core";

export type RecordedInput =
  | Readonly<{ kind: "clipboard"; text: string }>
  | Readonly<{ kind: "press"; key: InputKey }>
  | Readonly<{ kind: "release"; key: InputKey }>;

export type RecordingBackend = InputBackend &
  Readonly<{
    events: readonly RecordedInput[];
    /** Every clipboard payload, in order. */
    clipboardWrites: () => readonly string[];
    /** Make the next matching call reject with `error`. */
    failOn: (match: (event: RecordedInput) => boolean, error?: Error) => void;
    reset: () => void;
  }>;

/**
 * In-memory input backend. Records every call; nothing reaches the OS.
 */
export function createRecordingBackend(): RecordingBackend {
  const events: RecordedInput[] = [];
  let failure: { match: (event: RecordedInput) => boolean; error: Error } | null = null;

  const record = async (event: RecordedInput): Promise<void> => {
    if (failure !== null && failure.match(event)) {
      const { error } = failure;
      failure = null;
      throw error;
    }
    events.push(event);
  };

  return Object.freeze({
    events,
    setClipboard: (text: string) => record({ kind: "clipboard", text }),
    pressKey: (key: InputKey) => record({ kind: "press", key }),
    releaseKey: (key: InputKey) => record({ kind: "release", key }),
    clipboardWrites: () =>
      events.flatMap((event) => (event.kind === "clipboard" ? [event.text] : [])),
    failOn: (match: (event: RecordedInput) => boolean, error = new Error("input refused")) => {
      failure = { match, error };
    },
    reset: () => {
      events.length = 0;
      failure = null;
    },
  });
}
