import { describe, it, expect } from "vitest";
import { expandConfig, expandValue } from "./expansion";
import { ConfigError } from "./validate";

const env = { FONT_DIR: "/srv/fonts", EMPTY: "" };

describe("expandValue", () => {
  it("replaces set variables", () => {
    expect(expandValue("${FONT_DIR}/extra", env)).toBe("/srv/fonts/extra");
  });

  it("leaves unset plain references untouched", () => {
    expect(expandValue("${NOPE}", env)).toBe("${NOPE}");
  });

  it("falls back for unset or empty variables", () => {
    expect(expandValue("${NOPE:-./fonts}", env)).toBe("./fonts");
    expect(expandValue("${EMPTY:-standard}", env)).toBe("standard");
    expect(expandValue("${FONT_DIR:-./fonts}", env)).toBe("/srv/fonts");
  });

  it("reports a required variable that is unset", () => {
    expect(() => expandValue("${NOPE:?where the fonts live}", env, "fonts.dir")).toThrow(
      new ConfigError('"fonts.dir" needs environment variable NOPE: where the fonts live')
    );
    expect(() => expandValue("${NOPE:?}", env)).toThrow('"value" needs environment variable NOPE');
  });
});

describe("expandConfig", () => {
  it("expands strings nested in objects and arrays", () => {
    const input = { fonts: { dir: "${FONT_DIR}", list: ["${NOPE:-a}", 3] }, logging: { debug: true } };
    expect(expandConfig(input, env)).toEqual({
      fonts: { dir: "/srv/fonts", list: ["a", 3] },
      logging: { debug: true },
    });
  });

  it("names the key holding a missing required variable", () => {
    const input = { fonts: { list: ["ok", "${BANNER_HOME:?}"] } };
    expect(() => expandConfig(input, env)).toThrow(ConfigError);
    expect(() => expandConfig(input, env)).toThrow('"fonts.list[1]" needs environment variable BANNER_HOME');
  });
});
