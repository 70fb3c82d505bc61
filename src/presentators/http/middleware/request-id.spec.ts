import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id";
import { corsMiddleware } from "./cors";

function createTestApp(): Hono {
  const app = new Hono();
  app.use("*", requestIdMiddleware);
  app.use("*", corsMiddleware);
  app.get("/id", (c) => c.text(c.get("requestId")));
  return app;
}

describe("requestIdMiddleware", () => {
  it("generates an id and echoes it in the response header", async () => {
    const res = await createTestApp().request("/id");
    const id = await res.text();
    expect(id).toMatch(/^[a-z0-9]+$/);
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe(id);
  });

  it("keeps an id supplied by the client", async () => {
    const res = await createTestApp().request("/id", { headers: { [REQUEST_ID_HEADER]: "client-42" } });
    expect(await res.text()).toBe("client-42");
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("client-42");
  });
});

describe("corsMiddleware", () => {
  it("answers preflight requests with 204", async () => {
    const res = await createTestApp().request("/id", { method: "OPTIONS" });
    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET, POST, OPTIONS");
  });

  it("allows any origin on regular responses", async () => {
    const res = await createTestApp().request("/id");
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });
});
