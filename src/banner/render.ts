import { DEFAULT_LAYOUT, type FontLayout, type GlyphTable } from "./layout";
import { loadGlyphTableFromStream } from "./loader";
import { compose, splitInputLines } from "./compose";
import type { FontCache } from "./cache";
import type { FontSource } from "./types";

export type RendererOptions = {
  source: FontSource;
  cache?: FontCache;
  layout?: FontLayout;
};

export interface Renderer {
  /**
   * Renders `text` with the banner `fontId`.
   * Rejects with FontNotFoundError or FontFormatError.
   */
  render(fontId: string, text: string): Promise<string>;
  loadFont(fontId: string): Promise<GlyphTable>;
  listFonts(): Promise<string[]>;
}

export function createRenderer(options: RendererOptions): Renderer {
  const { source, cache } = options;
  const layout = options.layout ?? DEFAULT_LAYOUT;

  async function readFont(fontId: string): Promise<GlyphTable> {
    const stream = await source.open(fontId);
    try {
      return await loadGlyphTableFromStream(stream, layout);
    } finally {
      stream.destroy();
    }
  }

  function loadFont(fontId: string): Promise<GlyphTable> {
    return cache ? cache.get(fontId, () => readFont(fontId)) : readFont(fontId);
  }

  async function render(fontId: string, text: string): Promise<string> {
    const table = await loadFont(fontId);
    return compose(table, splitInputLines(text));
  }

  return { render, loadFont, listFonts: () => source.list() };
}
