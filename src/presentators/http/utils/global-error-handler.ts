import type { Context, ErrorHandler } from "hono";
import { HttpError, toErrorBody, toHttpError } from "../../../adapters/errors/http-error";
import { logDebug, logError } from "../../../utils/logging/logger";
import { errorPage } from "../views/error";

export const API_PREFIX = "/api";

export function wantsJson(c: Context): boolean {
  return c.req.path === API_PREFIX || c.req.path.startsWith(`${API_PREFIX}/`);
}

export function respondWithError(c: Context, err: HttpError): Response | Promise<Response> {
  if (wantsJson(c)) {
    return c.json(toErrorBody(err), err.status);
  }
  return c.html(errorPage(err.status, err.message), err.status);
}

export function createGlobalErrorHandler(): ErrorHandler {
  return (err, c) => {
    const requestId = c.get("requestId");
    const httpError = toHttpError(err);
    if (httpError.status >= 500) {
      logError("Global error handler:", err, { requestId });
    } else {
      logDebug(`${c.req.method} ${c.req.path} failed: ${httpError.status} ${httpError.message}`, undefined, {
        requestId,
      });
    }
    return respondWithError(c, httpError);
  };
}
