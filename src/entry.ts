#!/usr/bin/env node

import { runCli } from "./cli/run.js";

process.exitCode = await runCli(process.argv.slice(2), {
  io: {
    out: (line) => process.stdout.write(line + "\n"),
    err: (chunk) => process.stderr.write(chunk),
  },
});
