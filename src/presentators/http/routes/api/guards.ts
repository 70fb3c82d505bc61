export type RenderRequest = {
  text: string;
  banner?: string;
};

export function isRenderRequest(v: unknown): v is RenderRequest {
  if (typeof v !== "object" || v === null || !("text" in v)) return false;
  const banner = "banner" in v ? v.banner : undefined;
  return typeof v.text === "string" && (banner === undefined || typeof banner === "string");
}
