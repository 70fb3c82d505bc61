import { describe, it, expect } from "vitest";
import { formatStartupInfo } from "./startup-info";
import { DEFAULT_CONFIG } from "../../config/defaults";

describe("formatStartupInfo", () => {
  it("aligns labels and lists endpoints", () => {
    const lines = formatStartupInfo({
      port: 8080,
      config: DEFAULT_CONFIG,
      configPath: "/srv/banner.config.json",
      configFromFile: false,
      fontsDir: "/srv/fonts",
      banners: ["shadow", "standard"],
      endpoints: ["GET /health"],
    });

    expect(lines[0]).toBe("🚀 Server is running  http://localhost:8080");
    expect(lines[1]).toBe("📦 Config file        /srv/banner.config.json (defaults)");
    expect(lines[3]).toBe("🏳 Banners            2 (shadow, standard)");
    expect(lines[5]).toBe("🗂 Font cache         disabled");
    expect(lines.slice(-3)).toEqual(["", "📝 Endpoints:", "   - GET /health"]);
  });

  it("summarises long banner lists", () => {
    const banners = ["a", "b", "c", "d", "e", "f", "g", "h"];
    const lines = formatStartupInfo({
      port: 1,
      config: DEFAULT_CONFIG,
      configPath: "x",
      configFromFile: true,
      fontsDir: "y",
      banners,
    });
    expect(lines[3]).toBe("🏳 Banners            8 (a, b, c, d, e, f, +2 more)");
    expect(lines).toHaveLength(6);
  });
});
