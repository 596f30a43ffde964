#!/usr/bin/env node
/**
 * msgate — Main Entry Point
 *
 * Launches the Commander CLI. Channel senders are lazy-loaded by the
 * commands that send.
 */

import { createProgram } from './cli/program.js';
import { ExitCode } from './utils/output.js';

// ── EPIPE handler ─────────────────────────────────────────────────────────
// A downstream reader such as `head` may close the pipe before output ends.

function handlePipeError(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    process.exit(0);
  }
  throw err;
}

process.stdout.on('error', handlePipeError);
process.stderr.on('error', handlePipeError);

// ── Unhandled rejection safety net ──────────────────────────────────────────

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  process.stderr.write(`\n  Fatal: ${message}\n\n`);
  process.exitCode = ExitCode.GENERAL_ERROR;
});

// ── SIGINT ──────────────────────────────────────────────────────────────────

process.on('SIGINT', () => {
  process.stderr.write('\n');
  process.exit(ExitCode.SIGINT);
});

// ── CLI ──────────────────────────────────────────────────────────────────────

const program = createProgram();
program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`\n  Fatal: ${message}\n\n`);
  process.exitCode = ExitCode.GENERAL_ERROR;
});
