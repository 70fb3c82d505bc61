import { Hono } from "hono";
import type { Renderer } from "../../../../banner/render";
import { HttpError } from "../../../../adapters/errors/http-error";
import { logInfo } from "../../../../utils/logging/logger";
import { homePage } from "../../views/home";
import { STYLESHEET } from "../../views/style";

export type PagesRouterDeps = {
  renderer: Renderer;
  defaultBanner: string;
};

export const PAGE_PATHS = ["/", "/ascii-art", "/style.css"] as const;

function formField(body: Record<string, unknown>, name: string): string {
  const value = body[name];
  return typeof value === "string" ? value : "";
}

export function createPagesRouter({ renderer, defaultBanner }: PagesRouterDeps): Hono {
  const router = new Hono();

  router.get("/", async (c) => {
    const banners = await renderer.listFonts();
    return c.html(homePage({ banners, selected: defaultBanner, text: "", result: "" }));
  });

  router.post("/ascii-art", async (c) => {
    const requestId = c.get("requestId");
    const body = await c.req.parseBody();
    const text = formField(body, "text");
    const banner = formField(body, "banner");
    if (!text) {
      throw new HttpError(400, "Missing text: please provide the text for ASCII art generation.");
    }
    if (!banner) {
      throw new HttpError(400, "Missing banner: please select a banner for ASCII art generation.");
    }

    const result = await renderer.render(banner, text);
    logInfo(`Rendered ${text.length} chars with banner '${banner}'`, { requestId });

    const banners = await renderer.listFonts();
    return c.html(homePage({ banners, selected: banner, text, result }));
  });

  router.get("/style.css", (c) => {
    c.header("Content-Type", "text/css; charset=utf-8");
    return c.body(STYLESHEET);
  });

  // Known pages reached with any other method.
  for (const path of PAGE_PATHS) {
    router.all(path, () => {
      throw new HttpError(405, "Method not allowed");
    });
  }

  return router;
}
