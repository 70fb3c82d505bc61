import { readFile } from "node:fs/promises";
import { resolveConfigPath } from "./paths";
import { expandConfig } from "./expansion";
import { parseBannerConfig } from "./validate";
import { withDefaults } from "./defaults";
import type { ResolvedBannerConfig } from "./types";
import { hasErrorCode } from "../utils/guards/node-error";

export type LoadedConfig = {
  config: ResolvedBannerConfig;
  path: string;
  fromFile: boolean;
};

/**
 * Reads, expands and validates the config at `configPath`. A missing file yields
 * the defaults; any other read or parse failure is thrown.
 */
export async function loadConfig(configPath: string = resolveConfigPath()): Promise<LoadedConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return { config: withDefaults({}), path: configPath, fromFile: false };
    }
    throw error;
  }
  const json: unknown = JSON.parse(raw);
  const config = withDefaults(parseBannerConfig(expandConfig(json)));
  return { config, path: configPath, fromFile: true };
}

let cachedConfig: LoadedConfig | null = null;
let loadingPromise: Promise<LoadedConfig> | null = null;

export async function loadConfigOnce(configPath?: string): Promise<LoadedConfig> {
  if (cachedConfig) return cachedConfig;
  if (loadingPromise) return loadingPromise;

  loadingPromise = (async () => {
    try {
      const loaded = await loadConfig(configPath);
      cachedConfig = loaded;
      return loaded;
    } finally {
      loadingPromise = null;
    }
  })();

  return loadingPromise;
}

export function resetConfigCache(): void {
  cachedConfig = null;
  loadingPromise = null;
}
