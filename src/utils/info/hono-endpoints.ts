import type { Hono } from "hono";

/**
 * Routes registered on the app as "METHOD /path", sorted. Middleware
 * registrations (method ALL on wildcard paths) are left out.
 */
export function extractEndpoints(app: Hono): string[] {
  const endpoints = app.routes
    .filter((r) => !(r.method === "ALL" && r.path.endsWith("*")))
    .map((r) => `${r.method} ${r.path}`);
  return Array.from(new Set(endpoints)).sort();
}
