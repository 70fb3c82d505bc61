import { Hono } from "hono";
import type { Renderer } from "../../../../banner/render";
import { HttpError } from "../../../../adapters/errors/http-error";
import { logInfo } from "../../../../utils/logging/logger";
import { isRenderRequest } from "./guards";

export type ApiRouterDeps = {
  renderer: Renderer;
  defaultBanner: string;
};

export function createApiRouter({ renderer, defaultBanner }: ApiRouterDeps): Hono {
  const router = new Hono();

  router.get("/banners", async (c) => {
    const banners = await renderer.listFonts();
    return c.json({ banners });
  });

  router.post("/render", async (c) => {
    const requestId = c.get("requestId");
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      throw new HttpError(400, "Request body must be JSON", "bad_request");
    }
    if (!isRenderRequest(payload)) {
      throw new HttpError(400, 'Expected a JSON object with a string "text" and an optional string "banner"', "bad_request");
    }

    const banner = payload.banner || defaultBanner;
    const result = await renderer.render(banner, payload.text);
    logInfo(`Rendered ${payload.text.length} chars with banner '${banner}' (api)`, { requestId });
    return c.json({ banner, result });
  });

  return router;
}
