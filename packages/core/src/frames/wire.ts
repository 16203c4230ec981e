/**
 * packages/core/src/frames/wire.ts — Chat payload formatting.
 *
 * The target chat collapses characters in fixed-size groups unless they are
 * broken up, so a payload carries one delimiter after every W-glyph run.
 */

import { DEFAULT_SCREEN_WIDTH, type Frame } from "./types.js";

export const WIRE_DELIMITER = " ";

/**
 * Concatenate the frame's lines into a single payload, inserting
 * `WIRE_DELIMITER` after every `width` glyphs. Trailing whitespace is trimmed,
 * so a frame that renders as nothing but spaces yields "".
 */
export function formatFramePayload(frame: Frame, width: number = DEFAULT_SCREEN_WIDTH): string {
  let out = "";
  let run = 0;
  for (const line of frame) {
    for (const glyph of line) {
      out += glyph;
      run++;
      if (run === width) {
        out += WIRE_DELIMITER;
        run = 0;
      }
    }
  }
  return out.trimEnd();
}
