import { existsSync } from "node:fs";

/**
 * Exits the process with an error message
 */
export function exitWithError(message: string, code: number = 1): never {
  console.error(message);
  process.exit(code);
}

export function ensureConfigExists(filePath: string): void {
  if (!existsSync(filePath)) {
    exitWithError(`Config file not found: ${filePath}`);
  }
}

export function ensureArgument<T>(arg: T | undefined, errorMessage: string): asserts arg is T {
  if (arg === undefined || arg === null) {
    exitWithError(errorMessage);
  }
}

export function checkFileExistsWithForce(filePath: string, force: boolean = false, errorMessage?: string): void {
  if (existsSync(filePath) && !force) {
    exitWithError(errorMessage || `File already exists: ${filePath} (use --force to overwrite)`);
  }
}
