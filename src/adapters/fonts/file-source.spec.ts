import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, writeFileSync, mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createFileFontSource } from "./file-source";
import { FontNotFoundError } from "../../banner/errors";
import { loadGlyphTableFromStream } from "../../banner/loader";
import { TINY_LAYOUT, repeatedCharFont } from "../../banner/fixtures.test.support";

let ROOT: string;

beforeAll(() => {
  ROOT = mkdtempSync(join(tmpdir(), "font-source-"));
  writeFileSync(join(ROOT, "tiny.txt"), repeatedCharFont(TINY_LAYOUT));
  writeFileSync(join(ROOT, "block.txt"), repeatedCharFont(TINY_LAYOUT));
  writeFileSync(join(ROOT, "notes.md"), "not a font");
  mkdirSync(join(ROOT, "nested"));
});

afterAll(() => {
  rmSync(ROOT, { recursive: true, force: true });
});

describe("createFileFontSource", () => {
  it("opens <dir>/<id>.txt as a stream of font rows", async () => {
    const source = createFileFontSource(ROOT);
    const stream = await source.open("tiny");
    try {
      const table = await loadGlyphTableFromStream(stream, TINY_LAYOUT);
      expect(table.glyphs.get("B")).toEqual(["B", "B"]);
    } finally {
      stream.destroy();
    }
  });

  it("reports a missing file as FontNotFoundError", async () => {
    const source = createFileFontSource(ROOT);
    await expect(source.open("shadow")).rejects.toBeInstanceOf(FontNotFoundError);
  });

  it("never maps path-like ids to files", async () => {
    const source = createFileFontSource(join(ROOT, "nested"));
    await expect(source.open("../tiny")).rejects.toBeInstanceOf(FontNotFoundError);
    await expect(source.open("")).rejects.toBeInstanceOf(FontNotFoundError);
  });

  it("lists .txt fonts sorted by id", async () => {
    const source = createFileFontSource(ROOT);
    expect(await source.list()).toEqual(["block", "tiny"]);
  });

  it("lists nothing for a missing directory", async () => {
    const source = createFileFontSource(join(ROOT, "does-not-exist"));
    expect(await source.list()).toEqual([]);
  });
});
