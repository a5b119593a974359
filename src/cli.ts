#!/usr/bin/env node

import { run } from "./program.js";
import { logger } from "./logger.js";

run(process.argv.slice(2), {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ error: err }, "pam-manager crashed");
    process.exitCode = 1;
  });
