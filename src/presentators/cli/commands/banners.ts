import { createCommandContext } from "./context";
import type { RenderOptions } from "../types";

export async function cmdBanners(options: Pick<RenderOptions, "config" | "fontsDir">): Promise<void> {
  const { loaded, fontsDir, renderer } = await createCommandContext(options.config, options.fontsDir);
  const banners = await renderer.listFonts();
  if (banners.length === 0) {
    console.log(`No banners found in ${fontsDir}`);
    return;
  }
  for (const banner of banners) {
    console.log(banner === loaded.config.fonts.default ? `${banner} (default)` : banner);
  }
}
