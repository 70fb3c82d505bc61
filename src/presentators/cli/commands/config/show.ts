import { expandConfig } from "../../../../config/expansion";
import { ConfigError } from "../../../../config/validate";
import { readConfigRaw } from "../../../../utils/json/config-io";
import type { ConfigOptions } from "../../types";
import { ensureConfigExists, exitWithError } from "../../utils/errors";

function expandOrExit(raw: Record<string, unknown>, filePath: string): unknown {
  try {
    return expandConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) exitWithError(`Cannot expand ${filePath}: ${error.message}`);
    throw error;
  }
}

export async function cmdConfigShow(options: ConfigOptions): Promise<void> {
  const filePath = options.config;
  ensureConfigExists(filePath);
  const raw = await readConfigRaw(filePath);
  const output = options.expanded ? expandOrExit(raw, filePath) : raw;
  console.log(JSON.stringify(output, null, 2));
}
