import { createManualTimers, createRecordingSleep } from "../timers.js";
import { createRecordingBackend } from "../recordingBackend.js";
import { createMemoryPersistence } from "../memoryPersistence.js";
import { assert, describe, test } from "../nodeTest.js";

describe("createManualTimers", () => {
  test("fires timers in due order only when advanced past them", () => {
    const timers = createManualTimers();
    const fired: string[] = [];
    timers.set(() => fired.push("late"), 50);
    timers.set(() => fired.push("early"), 10);

    timers.advance(9);
    assert.deepEqual(fired, []);
    timers.advance(41);
    assert.deepEqual(fired, ["early", "late"]);
    assert.equal(timers.pending(), 0);
    assert.equal(timers.now(), 50);
  });

  test("cancelled timers never fire", () => {
    const timers = createManualTimers();
    let fired = false;
    const cancel = timers.set(() => {
      fired = true;
    }, 5);
    cancel();
    timers.advance(100);
    assert.equal(fired, false);
  });

  test("timers scheduled while firing run in the same advance when due", () => {
    const timers = createManualTimers();
    const fired: number[] = [];
    timers.set(() => {
      fired.push(timers.now());
      timers.set(() => fired.push(timers.now()), 5);
    }, 10);
    timers.advance(20);
    assert.deepEqual(fired, [10, 15]);
  });
});

describe("createRecordingSleep", () => {
  test("records delays and totals them", async () => {
    const seen: number[] = [];
    const rec = createRecordingSleep((_ms, i) => seen.push(i));
    await rec.sleep(10);
    await rec.sleep(30);
    assert.deepEqual(rec.calls, [10, 30]);
    assert.equal(rec.total(), 40);
    assert.deepEqual(seen, [0, 1]);
  });
});

describe("createRecordingBackend", () => {
  test("records calls and fails the matching call once", async () => {
    const backend = createRecordingBackend();
    await backend.setClipboard("hi");
    backend.failOn((event) => event.kind === "press" && event.key === "v");
    await assert.rejects(backend.pressKey("v"), /input refused/);
    await backend.pressKey("v");
    assert.deepEqual(backend.events, [
      { kind: "clipboard", text: "hi" },
      { kind: "press", key: "v" },
    ]);
    assert.deepEqual(backend.clipboardWrites(), ["hi"]);
  });
});

describe("createMemoryPersistence", () => {
  test("read returns the last written snapshot", async () => {
    const persistence = createMemoryPersistence();
    assert.equal(await persistence.read(), undefined);
    const snapshot = { animations: { Truck: { skip_frames: 2, frame_delay: 0.25 } } };
    await persistence.write(snapshot);
    assert.deepEqual(await persistence.read(), snapshot);
    assert.equal(persistence.writes.length, 1);
  });
});
