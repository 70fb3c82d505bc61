import type { Context, Next } from "hono";
import { logDebug } from "../../../utils/logging/logger";

export async function requestLoggerMiddleware(c: Context, next: Next) {
  const started = Date.now();
  await next();
  logDebug(`${c.req.method} ${c.req.path} -> ${c.res.status} (${Date.now() - started}ms)`, undefined, {
    requestId: c.get("requestId"),
  });
}
