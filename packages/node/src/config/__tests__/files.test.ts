import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assert, describe, test } from "@commwheel/testkit";
import { createAnimationStore, isCommwheelError } from "@commwheel/core";
import {
  animationNameFromPath,
  loadAnimationFile,
  registerAnimationFile,
  saveAnimationFile,
} from "../animationFile.js";
import { createJsonFilePersistence, readJsonFile, writeJsonFile } from "../jsonFile.js";
import { loadMenuFile } from "../menuFile.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "commwheel-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("json files", () => {
  test("a missing file reads as undefined", async () => {
    await withTempDir(async (dir) => {
      assert.equal(await readJsonFile(join(dir, "absent.json")), undefined);
    });
  });

  test("writes indented JSON and creates parent directories", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "nested", "doc.json");
      await writeJsonFile(path, { a: [1] });
      assert.equal(await readFile(path, "utf8"), '{\n  "a": [\n    1\n  ]\n}\n');
      assert.deepEqual(await readJsonFile(path), { a: [1] });
    });
  });

  test("invalid JSON is a CONFIG_LOAD_ERROR", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "broken.json");
      await writeFile(path, "{ nope", "utf8");
      await assert.rejects(readJsonFile(path), (err: unknown) =>
        isCommwheelError(err, "CONFIG_LOAD_ERROR"),
      );
    });
  });

  test("writing over a directory is a PERSISTENCE_ERROR", async () => {
    await withTempDir(async (dir) => {
      await assert.rejects(writeJsonFile(dir, {}), (err: unknown) =>
        isCommwheelError(err, "PERSISTENCE_ERROR"),
      );
    });
  });

  test("the settings store round-trips through a settings file", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "animation_config.json");
      const first = createAnimationStore({ persistence: createJsonFilePersistence(path) });
      await first.load();
      await first.save("Truck", 2, 250);

      const second = createAnimationStore({ persistence: createJsonFilePersistence(path) });
      await second.load();
      assert.deepEqual(second.timingFor("Truck"), { skipStride: 2, frameDelayMs: 250 });
    });
  });

  test("a corrupt settings file falls back to defaults", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "animation_config.json");
      await writeFile(path, "not json", "utf8");
      const store = createAnimationStore({ persistence: createJsonFilePersistence(path) });
      assert.deepEqual(await store.load(), { Truck: { skipStride: 5, frameDelayMs: 500 } });
    });
  });
});

describe("animation files", () => {
  test("derives the animation name from the file name", () => {
    assert.equal(animationNameFromPath(join("frames", "wave.json")), "wave");
    assert.equal(animationNameFromPath("plain"), "plain");
  });

  test("registers frames with the file's delay as the fallback timing", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "wave.json");
      await writeFile(path, JSON.stringify({ frames: ["~", ["-", "-"]], delay: 0.2 }), "utf8");
      const store = createAnimationStore({ omitBuiltins: true });

      const loaded = await registerAnimationFile(store, path);

      assert.equal(loaded.name, "wave");
      assert.deepEqual(store.get("wave"), {
        name: "wave",
        frames: [["~"], ["-", "-"]],
        skipStride: 5,
        frameDelayMs: 200,
      });
    });
  });

  test("saving a loaded file writes it back unchanged", async () => {
    await withTempDir(async (dir) => {
      const source = { frames: ["~", ["-", "-"]], delay: 0.2 };
      const path = join(dir, "wave.json");
      await writeFile(path, JSON.stringify(source), "utf8");
      const loaded = await loadAnimationFile(path);
      const copy = join(dir, "copy.json");
      await saveAnimationFile(copy, loaded.data);
      assert.deepEqual(await readJsonFile(copy), source);
    });
  });

  test("missing and malformed files are reported by code", async () => {
    await withTempDir(async (dir) => {
      await assert.rejects(loadAnimationFile(join(dir, "none.json")), (err: unknown) =>
        isCommwheelError(err, "NOT_FOUND"),
      );
      const bad = join(dir, "bad.json");
      await writeFile(bad, JSON.stringify({ frames: [42] }), "utf8");
      await assert.rejects(loadAnimationFile(bad), (err: unknown) =>
        isCommwheelError(err, "CONFIG_LOAD_ERROR"),
      );
    });
  });
});

describe("menu files", () => {
  test("loads a menu definition", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "menu.json");
      const menu = { options: ["Chat"], submenus: { Chat: { action: "free-text", options: ["gg"] } } };
      await writeFile(path, JSON.stringify(menu), "utf8");
      assert.deepEqual(await loadMenuFile(path), menu);
    });
  });

  test("rejects a missing or malformed menu file", async () => {
    await withTempDir(async (dir) => {
      await assert.rejects(loadMenuFile(join(dir, "menu.json")), (err: unknown) =>
        isCommwheelError(err, "NOT_FOUND"),
      );
      const path = join(dir, "bad.json");
      await writeFile(path, JSON.stringify({ options: "Chat" }), "utf8");
      await assert.rejects(loadMenuFile(path), (err: unknown) =>
        isCommwheelError(err, "CONFIG_LOAD_ERROR"),
      );
    });
  });
});
