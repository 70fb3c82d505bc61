import { cmdServe } from "./commands/serve";
import { cmdRender } from "./commands/render";
import { cmdBanners } from "./commands/banners";
import { cmdConfigInit } from "./commands/config/init";
import { cmdConfigShow } from "./commands/config/show";
import { cmdConfigGet } from "./commands/config/get";
import { cmdConfigSet } from "./commands/config/set";
import { positionalArgs } from "./commands/utils";
import { parseServeOptions, parseRenderOptions, parseConfigOptions } from "./parse-options";

export function usage(): string {
  const base = "banner-art";
  return `
banner-art CLI

Usage:
  ${base} serve [--port <number>] [--config <path>] [--fonts <dir>]
  ${base} render <text...> [--banner <id>] [--fonts <dir>] [--config <path>]
  ${base} banners [--fonts <dir>] [--config <path>]
  ${base} config init [--config ./banner.config.json] [--force]
  ${base} config show [--config ./banner.config.json] [--expanded]
  ${base} config get <path> [--config ./banner.config.json]
  ${base} config set <path> <value> [--config ./banner.config.json]

Options:
  --port <number>     Port to listen on (default: PORT env, then server.port, then 8080)
  --config <path>     Path to banner config JSON (auto-detected if omitted)
  --fonts <dir>       Directory holding <banner>.txt font files (default: fonts.dir or ./fonts)
  --banner <id>       Banner to render with (default: fonts.default or "standard")
  --expanded          Expand env vars in config output (for "config show")
  --force             Overwrite existing config (for "config init")

Examples:
  ${base} serve --port 9000
  ${base} render "Hello\\nThere" --banner standard
  ${base} banners
  ${base} config set fonts.cache true
`;
}

export async function runCli(argv: string[]): Promise<void> {
  const [, , cmd, subcmd, ...rest] = argv;
  switch (cmd) {
    case "serve": {
      await cmdServe(parseServeOptions(argv));
      return;
    }
    case "render": {
      const text = positionalArgs(argv.slice(3)).join(" ");
      await cmdRender(text, parseRenderOptions(argv));
      return;
    }
    case "banners": {
      await cmdBanners(parseRenderOptions(argv));
      return;
    }
    case "config": {
      const configOptions = parseConfigOptions(argv);
      const args = positionalArgs(rest);
      switch (subcmd) {
        case "init":
          await cmdConfigInit(configOptions);
          return;
        case "show":
          await cmdConfigShow(configOptions);
          return;
        case "get":
          await cmdConfigGet(args[0], configOptions);
          return;
        case "set":
          await cmdConfigSet(args[0], args[1], configOptions);
          return;
        default:
          console.log(usage());
          process.exit(1);
      }
    }
    default:
      console.log(usage());
      process.exit(cmd && cmd !== "help" ? 1 : 0);
  }
}
