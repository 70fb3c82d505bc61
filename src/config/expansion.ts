import { ConfigError } from "./validate";

/**
 * `${NAME}` references in string values of banner.config.json.
 *
 * - `${NAME}` is replaced when NAME is set, and kept as written otherwise.
 * - `${NAME:-fallback}` uses `fallback` when NAME is unset or empty.
 * - `${NAME:?hint}` makes NAME required; loading fails with a ConfigError
 *   naming the key and the variable.
 */
const REFERENCE = /\$\{([^}]+)\}/g;

type Reference =
  | { kind: "plain"; name: string }
  | { kind: "fallback"; name: string; fallback: string }
  | { kind: "required"; name: string; hint: string };

function parseReference(body: string): Reference {
  const op = body.search(/:[-?]/);
  if (op < 0) return { kind: "plain", name: body.trim() };
  const name = body.slice(0, op).trim();
  const argument = body.slice(op + 2);
  return body[op + 1] === "-" ? { kind: "fallback", name, fallback: argument } : { kind: "required", name, hint: argument };
}

/**
 * Expands the references in one string. `at` is the dotted config key the value
 * came from and only shows up in errors.
 */
export function expandValue(value: string, env: NodeJS.ProcessEnv = process.env, at = "value"): string {
  return value.replace(REFERENCE, (written: string, body: string) => {
    const ref = parseReference(body);
    const current = env[ref.name];
    if (current !== undefined && current !== "") return current;

    if (ref.kind === "fallback") return ref.fallback;
    if (ref.kind === "required") {
      const detail = ref.hint ? `: ${ref.hint}` : "";
      throw new ConfigError(`"${at}" needs environment variable ${ref.name}${detail}`);
    }
    return written;
  });
}

function childPath(parent: string, key: string | number): string {
  if (typeof key === "number") return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
}

/**
 * Expands every string found in a parsed config, keeping its shape.
 */
export function expandConfig(config: unknown, env: NodeJS.ProcessEnv = process.env, path = ""): unknown {
  if (typeof config === "string") {
    return expandValue(config, env, path || "value");
  }
  if (Array.isArray(config)) {
    return config.map((item: unknown, index) => expandConfig(item, env, childPath(path, index)));
  }
  if (typeof config === "object" && config !== null) {
    return Object.fromEntries(
      Object.entries(config).map(([key, value]) => [key, expandConfig(value, env, childPath(path, key))])
    );
  }
  return config;
}
