import path from "node:path";
import { resolveConfigPath } from "../../../config/paths";

/** Flags that take a value, so their value is not mistaken for a positional argument. */
export const VALUE_FLAGS = ["port", "config", "fonts", "banner"] as const;

export function getArgFlag(name: string, argv: string[] = process.argv): string | undefined {
  const flag = `--${name}`;
  const idx = argv.indexOf(flag);
  if (idx >= 0 && idx + 1 < argv.length) return argv[idx + 1];
  return undefined;
}

export function hasFlag(name: string, argv: string[] = process.argv): boolean {
  return argv.includes(`--${name}`);
}

export function positionalArgs(args: string[], valueFlags: readonly string[] = VALUE_FLAGS): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (valueFlags.includes(arg.slice(2))) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

export function getConfigPath(argv: string[] = process.argv): string {
  const cfgArg = getArgFlag("config", argv);
  if (cfgArg) return path.resolve(cfgArg);
  return resolveConfigPath();
}
