import { FontFormatError, FontNotFoundError } from "../../../banner/errors";
import { exitWithError } from "../utils/errors";
import { createCommandContext } from "./context";
import type { RenderOptions } from "../types";

/** Shells pass "\n" literally; treat it as a line break like the web form does. */
export function unescapeLineBreaks(text: string): string {
  return text.replace(/\\n/g, "\n");
}

export async function cmdRender(text: string | undefined, options: RenderOptions): Promise<void> {
  if (!text) {
    exitWithError('Usage: banner-art render <text> [--banner <id>]. Example: banner-art render "Hello\\nThere"');
  }
  const { loaded, renderer } = await createCommandContext(options.config, options.fontsDir);
  const banner = options.banner || loaded.config.fonts.default;

  try {
    process.stdout.write(await renderer.render(banner, unescapeLineBreaks(text)));
  } catch (error) {
    if (error instanceof FontNotFoundError) {
      const available = await renderer.listFonts();
      exitWithError(`Banner not found: ${banner} (available: ${available.join(", ") || "none"})`);
    }
    if (error instanceof FontFormatError) {
      exitWithError(`Banner '${banner}' is malformed: ${error.message}`);
    }
    throw error;
  }
}
