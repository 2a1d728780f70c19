#!/usr/bin/env node
/**
 * @fileoverview tidal-relay entry point.
 *
 * Installs last-resort error handlers that stop ghci before exiting, and
 * runs the CLI.
 *
 * @module index
 */

import { program, shutdownActiveSession } from './cli.js';

/** Kill ghci, then exit with a failure code */
function fail(): void {
  void shutdownActiveSession()
    .catch((err: unknown) => console.error('[tidal-relay] Shutdown failed:', err))
    .finally(() => process.exit(1));
}

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err.message);
  fail();
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  fail();
});

program.parseAsync().catch((err: unknown) => {
  console.error('[tidal-relay] Fatal:', err);
  fail();
});
