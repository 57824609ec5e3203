#!/usr/bin/env node

import { runCli } from "./program";

runCli(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
