import { Hono } from "hono";
import type { Renderer } from "../../banner/render";
import { HttpError } from "../../adapters/errors/http-error";
import { requestIdMiddleware } from "./middleware/request-id";
import { corsMiddleware } from "./middleware/cors";
import { requestLoggerMiddleware } from "./middleware/request-logger";
import { createGlobalErrorHandler, respondWithError, API_PREFIX } from "./utils/global-error-handler";
import { createPagesRouter } from "./routes/pages/router";
import { createApiRouter } from "./routes/api/router";

export type BannerAppOptions = {
  renderer: Renderer;
  defaultBanner: string;
};

export function createBannerApp(opts: BannerAppOptions): Hono {
  const app = new Hono();

  // Global middlewares
  app.use("*", requestIdMiddleware);
  app.use("*", requestLoggerMiddleware);
  app.use("*", corsMiddleware);

  app.onError(createGlobalErrorHandler());
  app.notFound((c) => respondWithError(c, new HttpError(404, "Page not found", "not_found")));

  // Health
  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.route(API_PREFIX, createApiRouter(opts));
  app.route("/", createPagesRouter(opts));

  return app;
}
