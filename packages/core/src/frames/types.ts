/**
 * packages/core/src/frames/types.ts — Frame and sprite representations.
 *
 * A frame is what one chat message shows: an ordered list of text lines. Widths
 * are measured in glyphs (code points), not UTF-16 units, so block-drawing
 * characters outside the BMP count as one column.
 */

/** Immutable ordered list of text lines. */
export type Frame = readonly string[];

/** Unscrolled source bitmap; all lines share one glyph width. */
export type Sprite = readonly string[];

/** Screen width of the chat line the frames are laid out for. */
export const DEFAULT_SCREEN_WIDTH = 26;

/** Glyph drawn wherever the sprite does not cover a column. */
export const DEFAULT_BACKGROUND_GLYPH = "▒";

export type ScrollGeometry = Readonly<{
  /** Screen width W in glyphs (default: 26). */
  screenWidth?: number;
  /** Single background glyph (default: "▒"). */
  background?: string;
}>;

/** Number of glyphs in `text`. */
export function glyphWidth(text: string): number {
  return Array.from(text).length;
}
