import { Readable } from "node:stream";
import { FontNotFoundError } from "../../banner/errors";
import type { FontSource } from "../../banner/types";

/**
 * Fonts held as whole texts, keyed by banner id.
 */
export function createMemoryFontSource(fonts: Record<string, string>): FontSource {
  const mem = new Map(Object.entries(fonts));

  async function open(fontId: string): Promise<Readable> {
    const text = mem.get(fontId);
    if (typeof text !== "string") throw new FontNotFoundError(fontId);
    return Readable.from([Buffer.from(text, "utf8")]);
  }

  async function list(): Promise<string[]> {
    return [...mem.keys()].sort();
  }

  return { open, list };
}
