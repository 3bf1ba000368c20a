#!/usr/bin/env node
/**
 * Entry point for the stitchwalk CLI.
 */

import { main } from './app.js';

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
);
