import { describe, it, expect } from "vitest";
import { colorizeRow, getStartupBanner } from "./banner";
import { createRenderer } from "../../banner/render";
import { createMemoryFontSource } from "../../adapters/fonts/memory-source";
import { TINY_LAYOUT, buildFontText } from "../../banner/fixtures.test.support";

const renderer = createRenderer({
  source: createMemoryFontSource({ tiny: buildFontText(TINY_LAYOUT, (ch) => [`${ch} `, ` ${ch}`]) }),
  layout: TINY_LAYOUT,
});

describe("colorizeRow", () => {
  it("wraps each visible character and leaves spaces bare", () => {
    expect(colorizeRow("A B", "green")).toBe("\x1b[32mA\x1b[0m \x1b[32mB\x1b[0m");
  });
});

describe("getStartupBanner", () => {
  it("renders the text with the banner font", async () => {
    const out = await getStartupBanner(renderer, "tiny", "AB", "cyan", 200);
    expect(out).toBe(
      ["\x1b[36mA\x1b[0m \x1b[36mB\x1b[0m ", " \x1b[36mA\x1b[0m \x1b[36mB\x1b[0m"].join("\n")
    );
  });

  it("falls back to plain text when the terminal is too narrow", async () => {
    expect(await getStartupBanner(renderer, "tiny", "ABC", "cyan", 4)).toBe("\x1b[36mABC\x1b[0m");
  });

  it("falls back to plain text when the banner is missing", async () => {
    expect(await getStartupBanner(renderer, "missing", "AB", "yellow", 200)).toBe("\x1b[33mAB\x1b[0m");
  });
});
