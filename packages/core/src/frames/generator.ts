/**
 * packages/core/src/frames/generator.ts — Horizontal scroll frame generator.
 *
 * Translates a sprite across a fixed-width screen from fully off-screen left
 * (position = -S) to fully off-screen right (position = W), inclusive. The
 * result is lazy and restartable: every iteration renders the frames again
 * from the same inputs and yields byte-identical output.
 */

import { CommwheelError } from "../errors.js";
import {
  DEFAULT_BACKGROUND_GLYPH,
  DEFAULT_SCREEN_WIDTH,
  type Frame,
  type ScrollGeometry,
  type Sprite,
  glyphWidth,
} from "./types.js";

export type ScrollFrames = Iterable<Frame> &
  Readonly<{
    /** Total frame count, W + S + 1. */
    length: number;
    spriteWidth: number;
    screenWidth: number;
    /** Render the frame whose sprite left edge sits at `position`. */
    frameAt: (position: number) => Frame;
  }>;

export function scrollFrameCount(spriteWidth: number, screenWidth: number): number {
  return screenWidth + spriteWidth + 1;
}

function resolveScreenWidth(value: number | undefined): number {
  if (value === undefined) return DEFAULT_SCREEN_WIDTH;
  if (!Number.isInteger(value) || value <= 0) {
    throw new CommwheelError(
      "INVALID_PROPS",
      `screenWidth must be a positive integer, got ${String(value)}`,
    );
  }
  return value;
}

function resolveBackground(value: string | undefined): string {
  if (value === undefined) return DEFAULT_BACKGROUND_GLYPH;
  if (glyphWidth(value) !== 1) {
    throw new CommwheelError(
      "INVALID_PROPS",
      `background must be exactly one glyph, got ${JSON.stringify(value)}`,
    );
  }
  return value;
}

function measureSprite(sprite: Sprite): number {
  const first = sprite[0];
  if (first === undefined) return 0;
  const width = glyphWidth(first);
  for (let row = 1; row < sprite.length; row++) {
    const line = sprite[row] ?? "";
    const lineWidth = glyphWidth(line);
    if (lineWidth !== width) {
      throw new CommwheelError(
        "INVALID_PROPS",
        `sprite row ${String(row)} is ${String(lineWidth)} glyphs wide, expected ${String(width)}`,
      );
    }
  }
  return width;
}

function renderRow(
  glyphs: readonly string[],
  spriteWidth: number,
  screenWidth: number,
  background: string,
  position: number,
): string {
  let line = "";
  for (let x = 0; x < screenWidth; x++) {
    const spriteX = x - position;
    line += spriteX >= 0 && spriteX < spriteWidth ? (glyphs[spriteX] ?? background) : background;
  }
  return line;
}

/**
 * Generate the scroll frames for `sprite`.
 *
 * @throws CommwheelError INVALID_PROPS when rows differ in width, the sprite is
 *   wider than the screen, or the geometry is malformed.
 */
export function generateScrollFrames(sprite: Sprite, geometry: ScrollGeometry = {}): ScrollFrames {
  const screenWidth = resolveScreenWidth(geometry.screenWidth);
  const background = resolveBackground(geometry.background);
  const spriteWidth = measureSprite(sprite);
  if (spriteWidth > screenWidth) {
    throw new CommwheelError(
      "INVALID_PROPS",
      `sprite is ${String(spriteWidth)} glyphs wide but the screen is ${String(screenWidth)}`,
    );
  }

  const rows: readonly (readonly string[])[] = Object.freeze(
    sprite.map((line) => Object.freeze(Array.from(line))),
  );

  const frameAt = (position: number): Frame =>
    Object.freeze(
      rows.map((glyphs) => renderRow(glyphs, spriteWidth, screenWidth, background, position)),
    );

  return Object.freeze({
    length: scrollFrameCount(spriteWidth, screenWidth),
    spriteWidth,
    screenWidth,
    frameAt,
    *[Symbol.iterator](): Iterator<Frame> {
      for (let position = -spriteWidth; position <= screenWidth; position++) {
        yield frameAt(position);
      }
    },
  });
}
