import { describe, it, expect } from "vitest";
import path from "node:path";
import { parseConfigOptions, parseRenderOptions, parseServeOptions } from "./parse-options";
import { getArgFlag, hasFlag, positionalArgs } from "./commands/utils";

const node = ["node", "cli.ts"];

describe("parse-options", () => {
  it("reads serve flags", () => {
    const opts = parseServeOptions([...node, "serve", "--port", "9000", "--config", "cfg/banner.json", "--fonts", "./art"]);
    expect(opts).toEqual({ port: "9000", config: path.resolve("cfg/banner.json"), fontsDir: "./art" });
  });

  it("reads render flags", () => {
    const opts = parseRenderOptions([...node, "render", "Hi", "--banner", "shadow", "--config", "x.json"]);
    expect(opts.banner).toBe("shadow");
    expect(opts.fontsDir).toBeUndefined();
    expect(opts.config).toBe(path.resolve("x.json"));
  });

  it("reads config switches", () => {
    const opts = parseConfigOptions([...node, "config", "show", "--expanded", "--config", "a.json"]);
    expect(opts).toEqual({ config: path.resolve("a.json"), expanded: true, force: false });
  });
});

describe("command utils", () => {
  it("returns undefined for a flag without a value", () => {
    expect(getArgFlag("port", ["serve", "--port"])).toBeUndefined();
    expect(hasFlag("force", ["init"])).toBe(false);
  });

  it("skips flags and their values when collecting positionals", () => {
    expect(positionalArgs(["Hello", "--banner", "shadow", "World", "--expanded"])).toEqual(["Hello", "World"]);
  });
});
