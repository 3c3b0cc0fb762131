#!/usr/bin/env node

import { runCli } from "./run";

runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(JSON.stringify({ error: message }) + "\n");
    process.exitCode = 1;
  });
