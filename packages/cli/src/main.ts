#!/usr/bin/env node
// neoscope command-line entry point
import { run } from './cli.js';

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
