/**
 * Fixed layout of a banner font file.
 *
 * A banner font has no header: every character of the printable ASCII range is
 * stored in ascending code-point order as `height` rows followed by a single
 * separator row.
 */

export const GLYPH_HEIGHT = 8;
export const FIRST_PRINTABLE = 32;
export const LAST_PRINTABLE = 126;

export type FontLayout = {
  height: number;
  firstCode: number; // inclusive
  lastCode: number; // inclusive
};

export const DEFAULT_LAYOUT: FontLayout = {
  height: GLYPH_HEIGHT,
  firstCode: FIRST_PRINTABLE,
  lastCode: LAST_PRINTABLE,
};

/** One horizontal slice per entry, top to bottom. */
export type Glyph = readonly string[];

export type GlyphTable = {
  readonly height: number;
  readonly glyphs: ReadonlyMap<string, Glyph>;
};

export function glyphCount(layout: FontLayout): number {
  return layout.lastCode - layout.firstCode + 1;
}

/** Rows a well-formed font file carries for the layout, separators included. */
export function rowsPerFont(layout: FontLayout): number {
  return glyphCount(layout) * (layout.height + 1);
}

export function describeCharCode(code: number): string {
  return `'${String.fromCharCode(code)}' (${code})`;
}
