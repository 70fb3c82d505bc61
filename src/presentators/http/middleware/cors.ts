import type { Context, Next } from "hono";

export async function corsMiddleware(c: Context, next: Next) {
  if (c.req.method === "OPTIONS") {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    c.header("Access-Control-Allow-Headers", "Content-Type, X-Request-Id");
    return c.body(null, 204);
  }
  await next();
  c.header("Access-Control-Allow-Origin", "*");
}
