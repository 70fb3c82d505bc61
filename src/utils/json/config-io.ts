import { readFile, writeFile } from "node:fs/promises";
import type { BannerConfig } from "../../config/types";

type UnknownRecord = Record<string, unknown>;

/**
 * Reads a config file as plain JSON, without expansion or defaults.
 *
 * @throws If the file cannot be read, is not JSON, or is not a JSON object
 */
export async function readConfigRaw(filePath: string): Promise<UnknownRecord> {
  const raw = await readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file is not a JSON object: ${filePath}`);
  }
  return { ...parsed };
}

export async function writeConfigRaw(filePath: string, data: UnknownRecord | BannerConfig): Promise<void> {
  const json = JSON.stringify(data, null, 2) + "\n";
  await writeFile(filePath, json, "utf8");
}
