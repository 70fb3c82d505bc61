import type { GlyphTable } from "./layout";

export interface FontCache {
  /**
   * Returns the table for `fontId`, calling `build` only when no table for it is
   * cached or being built. A rejected build is evicted so the next call retries.
   */
  get(fontId: string, build: () => Promise<GlyphTable>): Promise<GlyphTable>;
  delete(fontId: string): boolean;
  clear(): void;
  readonly size: number;
}

export function createFontCache(): FontCache {
  const entries = new Map<string, Promise<GlyphTable>>();

  function get(fontId: string, build: () => Promise<GlyphTable>): Promise<GlyphTable> {
    const existing = entries.get(fontId);
    if (existing) return existing;

    const pending: Promise<GlyphTable> = Promise.resolve()
      .then(build)
      .catch((error: unknown) => {
        if (entries.get(fontId) === pending) entries.delete(fontId);
        throw error;
      });
    entries.set(fontId, pending);
    return pending;
  }

  return {
    get,
    delete: (fontId) => entries.delete(fontId),
    clear: () => entries.clear(),
    get size() {
      return entries.size;
    },
  };
}
