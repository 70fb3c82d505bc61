import { getArgFlag, getConfigPath, hasFlag } from "./commands/utils";
import type { ServeOptions, RenderOptions, ConfigOptions } from "./types";

export function parseServeOptions(argv: string[] = process.argv): ServeOptions {
  return {
    port: getArgFlag("port", argv),
    config: getConfigPath(argv),
    fontsDir: getArgFlag("fonts", argv),
  };
}

export function parseRenderOptions(argv: string[] = process.argv): RenderOptions {
  return {
    banner: getArgFlag("banner", argv),
    config: getConfigPath(argv),
    fontsDir: getArgFlag("fonts", argv),
  };
}

export function parseConfigOptions(argv: string[] = process.argv): ConfigOptions {
  return {
    config: getConfigPath(argv),
    expanded: hasFlag("expanded", argv),
    force: hasFlag("force", argv),
  };
}
