#!/usr/bin/env tsx
import { runCli } from "./presentators/cli/cli";

runCli(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
