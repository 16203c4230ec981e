import {
  assert,
  createRecordingBackend,
  createRecordingSleep,
  describe,
  test,
} from "@commwheel/testkit";
import { isCommwheelError } from "../../errors.js";
import type { LogEvent } from "../../log.js";
import { createInputInjector } from "../injector.js";

describe("createInputInjector", () => {
  test("sendFreeText plays the chat chord against the backend", async () => {
    const backend = createRecordingBackend();
    const sleeper = createRecordingSleep();
    const injector = createInputInjector({ backend, sleep: sleeper.sleep });

    await injector.sendFreeText("gl hf");

    assert.deepEqual(backend.events, [
      { kind: "clipboard", text: "gl hf" },
      { kind: "press", key: "shift" },
      { kind: "press", key: "enter" },
      { kind: "release", key: "enter" },
      { kind: "release", key: "shift" },
      { kind: "press", key: "ctrl" },
      { kind: "press", key: "v" },
      { kind: "release", key: "v" },
      { kind: "release", key: "ctrl" },
      { kind: "press", key: "enter" },
      { kind: "release", key: "enter" },
    ]);
    assert.deepEqual(sleeper.calls, [10, 10, 10, 30, 20]);
  });

  test("triggerVoiceWheel taps the wheel key and both digits", async () => {
    const backend = createRecordingBackend();
    const sleeper = createRecordingSleep();
    const injector = createInputInjector({ backend, sleep: sleeper.sleep });

    await injector.triggerVoiceWheel(3, 1);

    assert.deepEqual(
      backend.events.map((event) => (event.kind === "clipboard" ? "clipboard" : `${event.kind} ${event.key}`)),
      ["press backslash", "release backslash", "press 3", "release 3", "press 1", "release 1"],
    );
    assert.deepEqual(sleeper.calls, [80, 80]);
  });

  test("triggerVoiceWheel rejects before any input for an out-of-range index", async () => {
    const backend = createRecordingBackend();
    const injector = createInputInjector({ backend, sleep: createRecordingSleep().sleep });
    await assert.rejects(injector.triggerVoiceWheel(12, 0), (err: unknown) =>
      isCommwheelError(err, "INVALID_PROPS"),
    );
    assert.equal(backend.events.length, 0);
  });

  test("a failed step releases held keys and surfaces INJECTION_ERROR", async () => {
    const backend = createRecordingBackend();
    const events: LogEvent[] = [];
    const injector = createInputInjector({
      backend,
      sleep: createRecordingSleep().sleep,
      log: (event) => events.push(event),
    });
    backend.failOn((event) => event.kind === "press" && event.key === "v");

    await assert.rejects(injector.sendFreeText("hi"), (err: unknown) => {
      assert.equal(isCommwheelError(err, "INJECTION_ERROR"), true);
      assert.equal(err instanceof Error ? err.message : "", "press v failed: input refused");
      return true;
    });

    assert.deepEqual(backend.events.slice(-2), [
      { kind: "press", key: "ctrl" },
      { kind: "release", key: "ctrl" },
    ]);
    assert.deepEqual(
      events.map((event) => event.level),
      ["error"],
    );
  });

  test("releases every held key in reverse order", async () => {
    const backend = createRecordingBackend();
    const injector = createInputInjector({ backend });
    backend.failOn((event) => event.kind === "clipboard");

    await assert.rejects(
      injector.run([
        { kind: "press", key: "shift" },
        { kind: "press", key: "ctrl" },
        { kind: "clipboard", text: "x" },
      ]),
      (err: unknown) => isCommwheelError(err, "INJECTION_ERROR"),
    );

    assert.deepEqual(backend.events, [
      { kind: "press", key: "shift" },
      { kind: "press", key: "ctrl" },
      { kind: "release", key: "ctrl" },
      { kind: "release", key: "shift" },
    ]);
  });
});
