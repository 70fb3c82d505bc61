import { StringDecoder } from "node:string_decoder";
import type { Readable } from "node:stream";
import { DEFAULT_LAYOUT, type FontLayout, type Glyph, type GlyphTable } from "./layout";
import { FontFormatError } from "./errors";

/**
 * Accumulates font rows into a glyph table.
 *
 * Rows are taken verbatim. The row after each glyph is the separator and is
 * dropped without looking at it.
 */
export class GlyphTableBuilder {
  private readonly glyphs = new Map<string, Glyph>();
  private code: number;
  private rows: string[] = [];
  private awaitingSeparator = false;

  constructor(private readonly layout: FontLayout = DEFAULT_LAYOUT) {
    this.code = layout.firstCode;
  }

  get complete(): boolean {
    return this.code > this.layout.lastCode;
  }

  /**
   * Feeds the next row. Returns false once the last separator has been read and
   * no further rows are wanted.
   */
  push(row: string): boolean {
    if (this.complete) return false;

    if (this.awaitingSeparator) {
      this.awaitingSeparator = false;
      this.rows = [];
      this.code++;
      return !this.complete;
    }

    this.rows.push(row);
    if (this.rows.length === this.layout.height) {
      this.glyphs.set(String.fromCharCode(this.code), Object.freeze([...this.rows]));
      this.awaitingSeparator = true;
    }
    return true;
  }

  finish(): GlyphTable {
    if (!this.complete) {
      const rowsRead = this.awaitingSeparator ? this.layout.height : this.rows.length;
      throw new FontFormatError(this.code, rowsRead, this.layout.height + 1);
    }
    return { height: this.layout.height, glyphs: this.glyphs };
  }
}

/** `\n` or `\r\n`. A lone `\r` belongs to the row. */
const ROW_TERMINATOR = /\r?\n/;

/**
 * Splits a whole font text into rows the same way the stream reader does:
 * `\n` and `\r\n` terminate a row, and a terminator at the very end does not
 * start another one.
 */
export function splitRows(text: string): string[] {
  const rows = text.split(ROW_TERMINATOR);
  if (rows[rows.length - 1] === "") rows.pop();
  return rows;
}

export function loadGlyphTable(rows: Iterable<string>, layout: FontLayout = DEFAULT_LAYOUT): GlyphTable {
  const builder = new GlyphTableBuilder(layout);
  for (const row of rows) {
    if (!builder.push(row)) break;
  }
  return builder.finish();
}

/**
 * Reads a font from a byte or text stream, splitting rows with the same rule as
 * `splitRows`. Reading stops once the last separator has arrived; the stream is
 * paused but left open, and releasing it is up to whoever opened it.
 */
export function loadGlyphTableFromStream(input: Readable, layout: FontLayout = DEFAULT_LAYOUT): Promise<GlyphTable> {
  const builder = new GlyphTableBuilder(layout);
  const decoder = new StringDecoder("utf8");
  let pending = "";

  // Returns false once the builder wants no more rows.
  function feed(text: string): boolean {
    const rows = (pending + text).split(ROW_TERMINATOR);
    pending = rows.pop() ?? "";
    for (const row of rows) {
      if (!builder.push(row)) return false;
    }
    return true;
  }

  return new Promise<GlyphTable>((resolve, reject) => {
    function detach(): void {
      input.off("data", onData);
      input.off("end", onEnd);
      input.off("error", onError);
      input.pause();
    }

    function settle(): void {
      detach();
      try {
        resolve(builder.finish());
      } catch (error) {
        reject(error);
      }
    }

    function onData(chunk: unknown): void {
      let text: string;
      if (typeof chunk === "string") {
        text = chunk;
      } else if (Buffer.isBuffer(chunk)) {
        text = decoder.write(chunk);
      } else {
        detach();
        reject(new TypeError("Font stream must yield strings or buffers"));
        return;
      }
      if (!feed(text)) settle();
    }

    function onEnd(): void {
      // A last row without a terminator still counts.
      const rest = pending + decoder.end();
      pending = "";
      if (rest !== "") builder.push(rest);
      settle();
    }

    function onError(error: unknown): void {
      detach();
      reject(error);
    }

    input.on("data", onData);
    input.on("end", onEnd);
    input.on("error", onError);
  });
}
