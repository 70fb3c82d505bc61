import type { Readable } from "node:stream";

/**
 * Where banner fonts come from. Implementations map a banner id to a stream of
 * font rows.
 */
export interface FontSource {
  /**
   * Opens the font named `fontId`. The caller owns the returned stream and must
   * destroy it. Throws FontNotFoundError for ids that name no font.
   */
  open(fontId: string): Promise<Readable>;
  /** Available banner ids, sorted. */
  list(): Promise<string[]>;
}

const FONT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidFontId(fontId: string): boolean {
  return FONT_ID_PATTERN.test(fontId);
}
