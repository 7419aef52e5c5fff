#!/usr/bin/env node

import { run, EXIT_FATAL } from '../src/cli.js';

run(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exitCode = EXIT_FATAL;
  });
