import { serve, type ServerType } from "@hono/node-server";
import type { Hono } from "hono";

export function resolvePort(portFromArg?: string | number, fallback = 8080): number {
  if (typeof portFromArg === "number") return portFromArg;
  if (typeof portFromArg === "string" && portFromArg.trim()) {
    const n = parseInt(portFromArg, 10);
    if (!Number.isNaN(n)) return n;
  }
  const env = parseInt(process.env.PORT || "", 10);
  return Number.isNaN(env) ? fallback : env;
}

export interface ServerOptions {
  port?: number | string;
  defaultPort?: number;
  onListening?: (port: number) => void | Promise<void>;
}

/**
 * Starts a Node server for the Hono app. Startup output is left to `onListening`.
 */
export function startHonoServer(app: Hono, opts?: ServerOptions): ServerType {
  const port = resolvePort(opts?.port, opts?.defaultPort);

  return serve({ fetch: app.fetch, port }, (info) => {
    if (!opts?.onListening) return;
    Promise.resolve(opts.onListening(info.port)).catch((error: unknown) => {
      console.error("Failed to print startup info:", error);
    });
  });
}
