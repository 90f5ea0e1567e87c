#!/usr/bin/env tsx
/**
 * onboard CLI entry point
 *
 * Usage:
 *   tsx src/onboard.ts --version
 *   tsx src/onboard.ts run "I need a new NodeJS service called inventory-api"
 *   tsx src/onboard.ts cleanup inventory-api --yes
 */

import { runCommand } from './cli';

process.on('unhandledRejection', reason => {
  const msg = reason instanceof Error ? reason.message : String(reason);
  process.stderr.write(`Unhandled promise rejection: ${msg}\n`);
  process.exitCode = 1;
});

process.on('uncaughtException', error => {
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  if (error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exitCode = 1;
});

runCommand(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
