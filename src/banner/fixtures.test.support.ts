import type { FontLayout } from "./layout";

export const TINY_LAYOUT: FontLayout = { height: 2, firstCode: 65, lastCode: 67 }; // A..C

/**
 * Font text for `layout` where each glyph's rows come from `rowsFor`, each glyph
 * followed by an empty separator row.
 */
export function buildFontText(layout: FontLayout, rowsFor: (ch: string) => string[]): string {
  const rows: string[] = [];
  for (let code = layout.firstCode; code <= layout.lastCode; code++) {
    const ch = String.fromCharCode(code);
    const glyph = rowsFor(ch);
    if (glyph.length !== layout.height) {
      throw new Error(`fixture glyph for ${ch} has ${glyph.length} rows`);
    }
    rows.push(...glyph, "");
  }
  return rows.join("\n") + "\n";
}

/** Each glyph is its own character repeated on every row. */
export function repeatedCharFont(layout: FontLayout): string {
  return buildFontText(layout, (ch) => Array.from({ length: layout.height }, () => ch));
}
