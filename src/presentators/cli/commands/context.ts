import { resolve } from "node:path";
import { createRenderer, type Renderer } from "../../../banner/render";
import { createFontCache } from "../../../banner/cache";
import { createFileFontSource } from "../../../adapters/fonts/file-source";
import { loadConfigOnce, type LoadedConfig } from "../../../config/loader";
import { ConfigError } from "../../../config/validate";
import { configureLogger } from "../../../utils/logging/logger";
import { exitWithError } from "../utils/errors";

export type CommandContext = {
  loaded: LoadedConfig;
  fontsDir: string;
  renderer: Renderer;
};

async function loadConfigOrExit(configPath: string): Promise<LoadedConfig> {
  try {
    return await loadConfigOnce(configPath);
  } catch (error) {
    if (error instanceof ConfigError) exitWithError(`Invalid config ${configPath}: ${error.message}`);
    throw error;
  }
}

/**
 * Loads the config and builds the renderer every command shares. A `--fonts`
 * flag takes precedence over `fonts.dir`.
 */
export async function createCommandContext(configPath: string, fontsDirFlag?: string): Promise<CommandContext> {
  const loaded = await loadConfigOrExit(configPath);
  configureLogger({ debug: loaded.config.logging.debug });

  const fontsDir = resolve(process.cwd(), fontsDirFlag || loaded.config.fonts.dir);
  const renderer = createRenderer({
    source: createFileFontSource(fontsDir),
    cache: loaded.config.fonts.cache ? createFontCache() : undefined,
  });
  return { loaded, fontsDir, renderer };
}
