#!/usr/bin/env node
import process from 'node:process';

import { runCli } from './cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    const text = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(text);
    process.exit(1);
  });
