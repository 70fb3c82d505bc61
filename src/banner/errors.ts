import { describeCharCode } from "./layout";

export type BannerErrorCode = "font_format" | "font_not_found";

export class BannerError extends Error {
  readonly code: BannerErrorCode;

  constructor(code: BannerErrorCode, message: string) {
    super(message);
    this.name = "BannerError";
    this.code = code;
  }
}

/**
 * The font stream ended before every glyph was read. Nothing of the font is usable.
 */
export class FontFormatError extends BannerError {
  readonly charCode: number;
  readonly rowsRead: number;
  readonly rowsExpected: number;

  constructor(charCode: number, rowsRead: number, rowsExpected: number) {
    super(
      "font_format",
      `Banner font ended early: glyph ${describeCharCode(charCode)} has ${rowsRead} of ${rowsExpected} rows`
    );
    this.name = "FontFormatError";
    this.charCode = charCode;
    this.rowsRead = rowsRead;
    this.rowsExpected = rowsExpected;
  }
}

export class FontNotFoundError extends BannerError {
  readonly fontId: string;

  constructor(fontId: string) {
    super("font_not_found", `Banner not found: ${fontId}`);
    this.name = "FontNotFoundError";
    this.fontId = fontId;
  }
}
