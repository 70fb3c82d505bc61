import type { BannerConfig } from "./types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type UnknownRecord = Record<string, unknown>;

function isRecord(v: unknown): v is UnknownRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(root: UnknownRecord, key: string): UnknownRecord | undefined {
  const value = root[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigError(`"${key}" must be an object`);
  return value;
}

// Values may arrive as strings after ${VAR} expansion.
function optionalInteger(value: unknown, at: string): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 0) {
    throw new ConfigError(`"${at}" must be a non-negative integer`);
  }
  return n;
}

function optionalBoolean(value: unknown, at: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ConfigError(`"${at}" must be a boolean`);
}

function optionalString(value: unknown, at: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ConfigError(`"${at}" must be a string`);
  return value;
}

export function parseBannerConfig(value: unknown): BannerConfig {
  if (!isRecord(value)) throw new ConfigError("config must be a JSON object");

  const config: BannerConfig = {};
  const server = section(value, "server");
  if (server) {
    config.server = { port: optionalInteger(server.port, "server.port") };
  }
  const fonts = section(value, "fonts");
  if (fonts) {
    config.fonts = {
      dir: optionalString(fonts.dir, "fonts.dir"),
      default: optionalString(fonts.default, "fonts.default"),
      cache: optionalBoolean(fonts.cache, "fonts.cache"),
    };
  }
  const logging = section(value, "logging");
  if (logging) {
    config.logging = { debug: optionalBoolean(logging.debug, "logging.debug") };
  }
  return config;
}
