type UnknownRecord = Record<string, unknown>;

function isRecord(v: unknown): v is UnknownRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Reads a value by dot-notation path, e.g. `getByPath(cfg, "fonts.dir")`.
 * Returns undefined when any segment is missing.
 */
export function getByPath(obj: UnknownRecord, dotPath: string): unknown {
  return dotPath.split(".").reduce<unknown>((acc, key) => (isRecord(acc) ? acc[key] : undefined), obj);
}

/**
 * Sets a value by dot-notation path, creating intermediate objects as needed.
 */
export function setByPath(obj: UnknownRecord, dotPath: string, value: unknown): void {
  const parts = dotPath.split(".");
  let cur = obj;
  for (const key of parts.slice(0, -1)) {
    const next = cur[key];
    if (isRecord(next)) {
      cur = next;
    } else {
      const created: UnknownRecord = {};
      cur[key] = created;
      cur = created;
    }
  }
  cur[parts[parts.length - 1]] = value;
}
