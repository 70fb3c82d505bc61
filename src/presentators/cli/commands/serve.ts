import { startHonoServer } from "../../http/server";
import { createBannerApp } from "../../http/app";
import { extractEndpoints } from "../../../utils/info/hono-endpoints";
import { printStartupInfo } from "../../../utils/info/startup-info";
import { logWarn } from "../../../utils/logging/logger";
import { printBanner } from "../banner";
import { createCommandContext } from "./context";
import type { ServeOptions } from "../types";

export async function cmdServe(options: ServeOptions): Promise<void> {
  const { loaded, fontsDir, renderer } = await createCommandContext(options.config, options.fontsDir);
  const { config } = loaded;

  const banners = await renderer.listFonts();
  if (!banners.includes(config.fonts.default)) {
    logWarn(`Default banner '${config.fonts.default}' not found in ${fontsDir}`);
  }

  const app = createBannerApp({ renderer, defaultBanner: config.fonts.default });

  const server = startHonoServer(app, {
    port: options.port,
    defaultPort: config.server.port,
    onListening: async (port) => {
      await printBanner(renderer, config.fonts.default, "BANNER", "cyan");
      console.log();
      printStartupInfo({
        port,
        config,
        configPath: loaded.path,
        configFromFile: loaded.fromFile,
        fontsDir,
        banners,
        endpoints: extractEndpoints(app),
      });
    },
  });

  const shutdown = () => {
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}
