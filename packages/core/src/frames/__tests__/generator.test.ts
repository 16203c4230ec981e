import { assert, describe, test } from "@commwheel/testkit";
import { isCommwheelError } from "../../errors.js";
import { generateScrollFrames, scrollFrameCount } from "../generator.js";
import { TRUCK_SPRITE } from "../sprites.js";
import { glyphWidth } from "../types.js";

const SMALL = Object.freeze(["ab", "cd"]);

describe("generateScrollFrames", () => {
  test("produces W + S + 1 frames of exact width", () => {
    const frames = [...generateScrollFrames(SMALL, { screenWidth: 4, background: "." })];
    assert.equal(frames.length, 7);
    for (const frame of frames) {
      assert.equal(frame.length, 2);
      for (const line of frame) assert.equal(line.length, 4);
    }
  });

  test("scrolls the sprite from off-screen left to off-screen right", () => {
    const frames = [...generateScrollFrames(SMALL, { screenWidth: 4, background: "." })];
    assert.deepEqual(frames, [
      ["....", "...."],
      ["b...", "d..."],
      ["ab..", "cd.."],
      [".ab.", ".cd."],
      ["..ab", "..cd"],
      ["...a", "...c"],
      ["....", "...."],
    ]);
  });

  test("frameAt matches iteration and the first and last frames are pure background", () => {
    const scroll = generateScrollFrames(SMALL, { screenWidth: 4, background: "." });
    assert.deepEqual(scroll.frameAt(-2), ["....", "...."]);
    assert.deepEqual(scroll.frameAt(4), ["....", "...."]);
    assert.deepEqual(scroll.frameAt(0), ["ab..", "cd.."]);
    assert.equal(scroll.length, scrollFrameCount(2, 4));
  });

  test("is restartable and deterministic", () => {
    const scroll = generateScrollFrames(SMALL, { screenWidth: 5 });
    assert.deepEqual([...scroll], [...scroll]);
  });

  test("truck sprite yields 53 frames of 13 lines by 26 glyphs", () => {
    const frames = [...generateScrollFrames(TRUCK_SPRITE)];
    assert.equal(frames.length, 53);
    for (const frame of frames) {
      assert.equal(frame.length, 13);
      for (const line of frame) assert.equal(glyphWidth(line), 26);
    }
    assert.deepEqual(frames[26], TRUCK_SPRITE);
    assert.deepEqual(frames[0], Array.from({ length: 13 }, () => "▒".repeat(26)));
    assert.deepEqual(frames[52], Array.from({ length: 13 }, () => "▒".repeat(26)));
  });

  test("an empty sprite gives W + 1 empty frames", () => {
    const frames = [...generateScrollFrames([], { screenWidth: 3 })];
    assert.equal(frames.length, 4);
    assert.deepEqual(frames[0], []);
  });

  test("rejects a sprite wider than the screen", () => {
    assert.throws(
      () => generateScrollFrames(["abcde"], { screenWidth: 4 }),
      (err: unknown) => isCommwheelError(err, "INVALID_PROPS"),
    );
  });

  test("rejects ragged sprites and malformed geometry", () => {
    const invalid = (err: unknown) => isCommwheelError(err, "INVALID_PROPS");
    assert.throws(() => generateScrollFrames(["ab", "c"], { screenWidth: 4 }), invalid);
    assert.throws(() => generateScrollFrames(SMALL, { screenWidth: 0 }), invalid);
    assert.throws(() => generateScrollFrames(SMALL, { screenWidth: 2.5 }), invalid);
    assert.throws(() => generateScrollFrames(SMALL, { background: "--" }), invalid);
  });
});
