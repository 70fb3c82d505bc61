import { existsSync } from "node:fs";
import path from "node:path";

export const CONFIG_FILE_NAME = "banner.config.json";

export function resolveConfigPath(cwd: string = process.cwd()): string {
  if (process.env.BANNER_CONFIG_PATH) {
    return path.resolve(cwd, process.env.BANNER_CONFIG_PATH);
  }
  const candidates = [path.join(cwd, CONFIG_FILE_NAME), path.join(cwd, "config", CONFIG_FILE_NAME)];
  for (const p of candidates) {
    if (existsSync(p)) {
      return p;
    }
  }
  return candidates[0];
}
