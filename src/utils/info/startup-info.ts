import type { ResolvedBannerConfig } from "../../config/types";

export type StartupInfo = {
  port: number;
  config: ResolvedBannerConfig;
  configPath: string;
  configFromFile: boolean;
  fontsDir: string;
  banners: string[];
  endpoints?: string[];
};

function formatList(items: string[], max = 6): string {
  if (items.length === 0) return "-";
  const head = items.slice(0, max);
  const tail = items.length > max ? `, +${items.length - max} more` : "";
  return head.join(", ") + tail;
}

export function formatStartupInfo(info: StartupInfo): string[] {
  const { config } = info;
  const sections = [
    { icon: "🚀", label: "Server is running", body: `http://localhost:${info.port}` },
    { icon: "📦", label: "Config file", body: info.configFromFile ? info.configPath : `${info.configPath} (defaults)` },
    { icon: "🔤", label: "Fonts dir", body: info.fontsDir },
    { icon: "🏳", label: "Banners", body: `${info.banners.length} (${formatList(info.banners)})` },
    { icon: "⭐", label: "Default banner", body: config.fonts.default },
    { icon: "🗂", label: "Font cache", body: config.fonts.cache ? "enabled" : "disabled" },
  ];

  const lines: string[] = [];
  const maxLabelLength = Math.max(...sections.map((s) => s.label.length));
  for (const section of sections) {
    lines.push(`${section.icon} ${section.label.padEnd(maxLabelLength)}  ${section.body}`);
  }

  if (info.endpoints && info.endpoints.length > 0) {
    lines.push("", "📝 Endpoints:");
    for (const e of info.endpoints) lines.push(`   - ${e}`);
  }
  return lines;
}

export function printStartupInfo(info: StartupInfo): void {
  for (const line of formatStartupInfo(info)) console.log(line);
}
