import type { BannerConfig, ResolvedBannerConfig } from "./types";

export const DEFAULT_PORT = 8080;
export const DEFAULT_FONTS_DIR = "./fonts";
export const DEFAULT_BANNER = "standard";

export const DEFAULT_CONFIG: ResolvedBannerConfig = {
  server: { port: DEFAULT_PORT },
  fonts: { dir: DEFAULT_FONTS_DIR, default: DEFAULT_BANNER, cache: false },
  logging: { debug: false },
};

export function withDefaults(config: BannerConfig): ResolvedBannerConfig {
  return {
    server: { port: config.server?.port ?? DEFAULT_CONFIG.server.port },
    fonts: {
      dir: config.fonts?.dir || DEFAULT_CONFIG.fonts.dir,
      default: config.fonts?.default || DEFAULT_CONFIG.fonts.default,
      cache: config.fonts?.cache ?? DEFAULT_CONFIG.fonts.cache,
    },
    logging: { debug: config.logging?.debug ?? DEFAULT_CONFIG.logging.debug },
  };
}
