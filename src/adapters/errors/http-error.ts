import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { FontFormatError, FontNotFoundError } from "../../banner/errors";

export class HttpError extends Error {
  status: ContentfulStatusCode;
  code?: string;

  constructor(status: ContentfulStatusCode, message: string, code?: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    if (code) this.code = code;
  }
}

function normalizeErrorCode(status: number, fallback?: string): string | undefined {
  if (status === 400) return "bad_request";
  if (status === 404) return "not_found";
  if (status === 405) return "method_not_allowed";
  if (status >= 500) return "internal_error";
  if (status >= 400) return "bad_request";
  return fallback;
}

/**
 * Maps anything thrown while handling a request to the status and message shown
 * to the client. Unknown errors become a 500 without leaking their message.
 */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  if (err instanceof FontNotFoundError) {
    return new HttpError(404, "Banner file not found", "not_found");
  }
  if (err instanceof FontFormatError) {
    return new HttpError(500, "Internal Server Error: Failed to read banner file", "font_format");
  }
  if (err instanceof HTTPException) {
    return new HttpError(err.status, err.message || "Request failed", normalizeErrorCode(err.status));
  }
  return new HttpError(500, "Internal Server Error", "internal_error");
}

export type ErrorBody = {
  type: "error";
  error: { type: string; message: string };
};

export function toErrorBody(err: HttpError): ErrorBody {
  return {
    type: "error",
    error: { type: err.code ?? normalizeErrorCode(err.status, "error") ?? "error", message: err.message },
  };
}
