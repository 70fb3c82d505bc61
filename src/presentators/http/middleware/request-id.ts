import type { Context, Next } from "hono";

export const REQUEST_ID_HEADER = "X-Request-Id";

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = c.req.header(REQUEST_ID_HEADER) || Math.random().toString(36).substring(2, 9);
  c.set("requestId", requestId);
  await next();
  c.header(REQUEST_ID_HEADER, requestId);
}

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
