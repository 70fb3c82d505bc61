export type BannerConfig = {
  server?: {
    port?: number;
  };
  fonts?: {
    dir?: string; // resolved against the working directory
    default?: string;
    cache?: boolean;
  };
  logging?: {
    debug?: boolean;
  };
};

export type ResolvedBannerConfig = {
  server: { port: number };
  fonts: { dir: string; default: string; cache: boolean };
  logging: { debug: boolean };
};
