import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { cmdRender, unescapeLineBreaks } from "./render";
import { resetConfigCache } from "../../../config/loader";
import { DEFAULT_LAYOUT } from "../../../banner/layout";
import { buildFontText, repeatedCharFont } from "../../../banner/fixtures.test.support";

let ROOT: string;
let CONFIG: string;

beforeAll(() => {
  ROOT = mkdtempSync(join(tmpdir(), "render-cmd-"));
  CONFIG = join(ROOT, "missing.config.json");
  writeFileSync(join(ROOT, "echo.txt"), repeatedCharFont(DEFAULT_LAYOUT));
  writeFileSync(join(ROOT, "short.txt"), buildFontText({ ...DEFAULT_LAYOUT, lastCode: 40 }, () => Array(8).fill("#")));
});

afterAll(() => {
  rmSync(ROOT, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
  resetConfigCache();
});

function captureStdout() {
  return vi.spyOn(process.stdout, "write").mockImplementation(() => true);
}

function trapExit() {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const exit = vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new Error(`exit ${String(code)}`);
  });
  return { error, exit };
}

describe("unescapeLineBreaks", () => {
  it("turns literal \\n sequences into line breaks", () => {
    expect(unescapeLineBreaks("Hello\\nThere")).toBe("Hello\nThere");
  });
});

describe("cmdRender", () => {
  it("writes the rendering to stdout", async () => {
    const write = captureStdout();
    await cmdRender("Z", { config: CONFIG, fontsDir: ROOT, banner: "echo" });
    expect(write).toHaveBeenCalledWith("Z\n".repeat(8) + "\n");
  });

  it("renders escaped line breaks as separate blocks", async () => {
    const write = captureStdout();
    await cmdRender("a\\nb", { config: CONFIG, fontsDir: ROOT, banner: "echo" });
    expect(write).toHaveBeenCalledWith("a\n".repeat(8) + "\n" + "b\n".repeat(8) + "\n");
  });

  it("exits with the available banners when the banner is unknown", async () => {
    const { error, exit } = trapExit();
    await expect(cmdRender("Hi", { config: CONFIG, fontsDir: ROOT, banner: "nope" })).rejects.toThrow("exit 1");
    expect(exit).toHaveBeenCalledWith(1);
    expect(error).toHaveBeenCalledWith("Banner not found: nope (available: echo, short)");
  });

  it("exits when the banner is malformed", async () => {
    const { error } = trapExit();
    await expect(cmdRender("Hi", { config: CONFIG, fontsDir: ROOT, banner: "short" })).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      "Banner 'short' is malformed: Banner font ended early: glyph ')' (41) has 0 of 9 rows"
    );
  });

  it("exits when the config needs an unset variable", async () => {
    delete process.env.BANNER_SPEC_DIR;
    const configPath = join(ROOT, "needs-env.json");
    writeFileSync(configPath, JSON.stringify({ fonts: { dir: "${BANNER_SPEC_DIR:?fonts}" } }));
    const { error } = trapExit();
    await expect(cmdRender("Hi", { config: configPath, banner: "echo" })).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      `Invalid config ${configPath}: "fonts.dir" needs environment variable BANNER_SPEC_DIR: fonts`
    );
  });

  it("exits with usage when no text is given", async () => {
    const { exit } = trapExit();
    await expect(cmdRender("", { config: CONFIG, fontsDir: ROOT })).rejects.toThrow("exit 1");
    expect(exit).toHaveBeenCalledWith(1);
  });
});
