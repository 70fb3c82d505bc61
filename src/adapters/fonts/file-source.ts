import { open, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Readable } from "node:stream";
import { FontNotFoundError } from "../../banner/errors";
import { isValidFontId, type FontSource } from "../../banner/types";
import { hasErrorCode } from "../../utils/guards/node-error";

export const FONT_FILE_EXTENSION = ".txt";

/**
 * Banner fonts stored as `<dir>/<id>.txt`.
 */
export function createFileFontSource(dir: string): FontSource {
  const root = resolve(process.cwd(), dir);

  async function openFont(fontId: string): Promise<Readable> {
    if (!isValidFontId(fontId)) throw new FontNotFoundError(fontId);
    const filePath = join(root, `${fontId}${FONT_FILE_EXTENSION}`);
    try {
      const handle = await open(filePath, "r");
      return handle.createReadStream({ encoding: "utf8" });
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new FontNotFoundError(fontId);
      }
      throw error;
    }
  }

  async function list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(root);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw error;
    }
    return entries
      .filter((name) => name.endsWith(FONT_FILE_EXTENSION))
      .map((name) => name.slice(0, -FONT_FILE_EXTENSION.length))
      .filter(isValidFontId)
      .sort();
  }

  return { open: openFont, list };
}
