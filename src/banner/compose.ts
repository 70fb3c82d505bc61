import type { GlyphTable } from "./layout";

const MISSING_GLYPH_ROW = " ";

/**
 * Splits caller text into the lines rendered one below the other.
 * A trailing line break yields a trailing empty line.
 */
export function splitInputLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Lays out each input line as `table.height` rows of glyph fragments, followed
 * by a blank row. Characters without a glyph take one column of space.
 */
export function compose(table: GlyphTable, lines: readonly string[]): string {
  const out: string[] = [];
  for (const line of lines) {
    const chars = Array.from(line);
    for (let row = 0; row < table.height; row++) {
      for (const ch of chars) {
        out.push(table.glyphs.get(ch)?.[row] ?? MISSING_GLYPH_ROW);
      }
      out.push("\n");
    }
    out.push("\n");
  }
  return out.join("");
}
