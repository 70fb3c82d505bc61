import { expandConfig } from "../../../../config/expansion";
import { parseBannerConfig, ConfigError } from "../../../../config/validate";
import { readConfigRaw, writeConfigRaw } from "../../../../utils/json/config-io";
import { parseValueLiteral } from "../../../../utils/json/parse";
import { setByPath } from "../../../../utils/path/object-path";
import type { ConfigOptions } from "../../types";
import { ensureArgument, ensureConfigExists, exitWithError } from "../../utils/errors";

export async function cmdConfigSet(pathArg: string | undefined, valueArg: string | undefined, options: ConfigOptions): Promise<void> {
  ensureArgument(pathArg, "Usage: config set <path> <value>");
  ensureArgument(valueArg, "Usage: config set <path> <value>");
  const filePath = options.config;
  ensureConfigExists(filePath);
  const raw = await readConfigRaw(filePath);
  setByPath(raw, pathArg, parseValueLiteral(valueArg));
  try {
    parseBannerConfig(expandConfig(raw));
  } catch (error) {
    if (error instanceof ConfigError) exitWithError(`Invalid value for ${pathArg}: ${error.message}`);
    throw error;
  }
  await writeConfigRaw(filePath, raw);
  console.log(`Updated ${pathArg} in ${filePath}`);
}
