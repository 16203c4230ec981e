import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  assert,
  createManualTimers,
  createMemoryPersistence,
  createRecordingBackend,
  createRecordingSleep,
  describe,
  test,
} from "@commwheel/testkit";
import {
  type HotkeyListener,
  createAnimationStore,
  createHotkeyBridge,
  createOverlay,
  isCommwheelError,
} from "@commwheel/core";
import {
  editAnimationFile,
  playAnimation,
  printFrames,
  runInteractive,
  saveFrames,
  setAnimationConfig,
} from "../commands.js";

function collector() {
  const chunks: string[] = [];
  return {
    out: { write: (chunk: string) => chunks.push(chunk) },
    lines: () => chunks.join("").split("\n").slice(0, -1),
  };
}

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "commwheel-commands-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf8"));
}

function blinkStore() {
  const persistence = createMemoryPersistence();
  const store = createAnimationStore({ persistence, omitBuiltins: true });
  store.define("Blink", [["*"], ["-"], ["+"]], { skipStride: 2, frameDelayMs: 200 });
  return { store, persistence };
}

describe("printFrames", () => {
  test("prints the payload of every frame playback would send", () => {
    const { store } = blinkStore();
    const sink = collector();
    assert.equal(printFrames(store, "Blink", sink.out), 2);
    assert.deepEqual(sink.lines(), ["*", "+"]);
  });

  test("the built-in truck prints twelve payloads", () => {
    const sink = collector();
    assert.equal(printFrames(createAnimationStore(), "Truck", sink.out), 12);
  });

  test("an unknown name is NOT_FOUND", () => {
    const sink = collector();
    assert.throws(
      () => printFrames(createAnimationStore(), "Nope", sink.out),
      (err: unknown) => isCommwheelError(err, "NOT_FOUND"),
    );
  });
});

describe("setAnimationConfig", () => {
  test("keeps the current delay when only the stride changes", async () => {
    const store = createAnimationStore({ persistence: createMemoryPersistence() });
    const sink = collector();
    await setAnimationConfig(store, "Truck", 3, undefined, sink.out);
    assert.deepEqual(sink.lines(), ["Truck: skip_frames=3 frame_delay=0.5"]);
    assert.deepEqual(store.timingFor("Truck"), { skipStride: 3, frameDelayMs: 500 });
  });

  test("persists the full snapshot", async () => {
    const { store, persistence } = blinkStore();
    const sink = collector();
    await setAnimationConfig(store, "Blink", undefined, 0.75, sink.out);
    assert.deepEqual(sink.lines(), ["Blink: skip_frames=2 frame_delay=0.75"]);
    assert.deepEqual(persistence.writes, [
      {
        animations: {
          Truck: { skip_frames: 5, frame_delay: 0.5 },
          Blink: { skip_frames: 2, frame_delay: 0.75 },
        },
      },
    ]);
  });
});

describe("saveFrames", () => {
  test("writes every frame and the delay in seconds", async () => {
    await withTempDir(async (dir) => {
      const { store } = blinkStore();
      const sink = collector();
      const path = join(dir, "blink.json");
      await saveFrames(store, "Blink", path, sink.out);
      assert.deepEqual(await readJson(path), { frames: [["*"], ["-"], ["+"]], delay: 0.2 });
      assert.deepEqual(sink.lines(), [`saved Blink (3 frames) to ${path}`]);
    });
  });
});

describe("editAnimationFile", () => {
  test("applies one edit and writes the file back in place", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "wave.json");
      await writeFile(path, JSON.stringify({ frames: ["o/", ["\\o", " |"]], delay: 0.1234 }));
      const sink = collector();

      await editAnimationFile(path, { kind: "move", index: 1, direction: "up" }, sink.out);
      await editAnimationFile(path, { kind: "append", frame: ["o|"] }, sink.out);

      assert.deepEqual(await readJson(path), {
        frames: [["\\o", " |"], "o/", ["o|"]],
        delay: 0.1234,
      });
      assert.deepEqual(sink.lines(), [
        `${path}: moved frame 2 up, 2 frames`,
        `${path}: appended a frame, 3 frames`,
      ]);
    });
  });

  test("an edit past the last frame leaves the file alone", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "wave.json");
      await writeFile(path, JSON.stringify({ frames: ["o/"], delay: 0.5 }));
      await assert.rejects(
        editAnimationFile(path, { kind: "remove", index: 4 }, collector().out),
        (err: unknown) => isCommwheelError(err, "INVALID_PROPS"),
      );
      assert.deepEqual(await readJson(path), { frames: ["o/"], delay: 0.5 });
    });
  });
});

describe("playAnimation", () => {
  test("counts down, then reports every frame", async () => {
    const { store } = blinkStore();
    const backend = createRecordingBackend();
    const sleeper = createRecordingSleep();
    const overlay = createOverlay({ backend, store, sleep: sleeper.sleep });
    const sink = collector();

    const result = await playAnimation({ overlay, name: "Blink", out: sink.out, sleep: sleeper.sleep });

    assert.equal(result.status, "completed");
    assert.deepEqual(sink.lines(), [
      "Starting Blink in 3...",
      "Starting Blink in 2...",
      "Starting Blink in 1...",
      "frame 1/2",
      "frame 2/2",
      "Blink: completed (2/2 frames)",
    ]);
    assert.deepEqual(backend.clipboardWrites(), ["*", "+"]);
    assert.deepEqual(sleeper.calls.slice(0, 3), [1000, 1000, 1000]);
  });

  test("cancelling during the countdown sends nothing", async () => {
    const { store } = blinkStore();
    const backend = createRecordingBackend();
    let cancel = () => {};
    const sleeper = createRecordingSleep((_ms, callIndex) => {
      if (callIndex === 0) cancel();
    });
    const overlay = createOverlay({ backend, store, sleep: sleeper.sleep });
    const sink = collector();

    const result = await playAnimation({
      overlay,
      name: "Blink",
      out: sink.out,
      sleep: sleeper.sleep,
      onCancellable: (fn) => {
        cancel = fn;
      },
    });

    assert.equal(result.status, "cancelled");
    assert.deepEqual(sink.lines(), ["Starting Blink in 3...", "Blink: cancelled"]);
    assert.equal(backend.events.length, 0);
  });
});

describe("runInteractive", () => {
  test("prints the menu on every change until the session ends", async () => {
    const overlay = createOverlay({
      backend: createRecordingBackend(),
      store: createAnimationStore(),
      sleep: createRecordingSleep().sleep,
      timers: createManualTimers(),
    });
    const bridge = createHotkeyBridge({ machine: overlay.machine });
    const sink = collector();
    let emit: HotkeyListener = () => {};
    let stopped = false;
    let end = () => {};
    const until = new Promise<void>((res) => {
      end = res;
    });

    const session = runInteractive({
      overlay,
      bridge,
      source: {
        start: (listener) => {
          emit = listener;
          return () => {
            stopped = true;
          };
        },
      },
      out: sink.out,
      until,
    });
    const mods = { shift: false, ctrl: false, alt: false, meta: false };
    emit({ key: ".", mods });
    emit({ key: "escape", mods });
    end();
    await session;

    assert.deepEqual(sink.lines(), [
      'Press "." to open the menu, Ctrl+C to quit.',
      "COMMUNICATION",
      "  1  Rocket League",
      "  2  Animations",
      "  3  Combat",
      "  4  Tactics",
      "  5  Social",
      "  6  Strategy",
      "  Esc  Close",
      "(hidden)",
    ]);
    assert.equal(stopped, true);
  });
});
