// CLI command options types

export interface ServeOptions {
  port?: string;
  config: string; // Always resolved to a path
  fontsDir?: string;
}

export interface RenderOptions {
  banner?: string;
  config: string;
  fontsDir?: string;
}

export interface ConfigOptions {
  config: string;
  expanded?: boolean;
  force?: boolean;
}
