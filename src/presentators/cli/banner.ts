import type { Renderer } from "../../banner/render";

const COLORS = {
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  magenta: "\x1b[35m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  reset: "\x1b[0m",
} as const;

export type BannerColor = keyof Omit<typeof COLORS, "reset">;

// helper to colorize a single rendered row, leaving spaces bare
export function colorizeRow(row: string, color: BannerColor): string {
  let out = "";
  for (const ch of row) {
    out += ch !== " " ? `${COLORS[color]}${ch}${COLORS.reset}` : ch;
  }
  return out;
}

function visibleWidth(rows: string[]): number {
  return Math.max(0, ...rows.map((row) => row.length));
}

/**
 * Renders `text` as a colored startup banner. Falls back to the plain text when
 * the banner cannot be loaded or is wider than the terminal.
 */
export async function getStartupBanner(
  renderer: Renderer,
  fontId: string,
  text: string,
  color: BannerColor = "cyan",
  columns: number = process.stdout.columns ?? 80
): Promise<string> {
  let rendered: string;
  try {
    rendered = await renderer.render(fontId, text);
  } catch {
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }
  const rows = rendered.replace(/\n+$/, "").split("\n");
  if (visibleWidth(rows) > columns - 1) {
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }
  return rows.map((row) => colorizeRow(row, color)).join("\n");
}

export async function printBanner(renderer: Renderer, fontId: string, text = "BANNER", color: BannerColor = "cyan"): Promise<void> {
  console.log(await getStartupBanner(renderer, fontId, text, color));
}
