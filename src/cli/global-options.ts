/**
 * msgate — Global Options
 *
 * Applies global flags (--no-color, --json, --quiet, --verbose, --debug)
 * to the root Commander program. These are inherited by all subcommands.
 */

import type { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { setLogLevel } from '../utils/logger.js';
import { setOutputMode } from '../utils/output.js';

export interface GlobalOptions {
  color?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

let verboseEnabled = false;

/** Whether --verbose or --debug was set (print channel logs in full). */
export function isVerbose(): boolean {
  return verboseEnabled;
}

/**
 * Register global flags and a preAction hook that applies them
 * before any subcommand runs.
 */
export function applyGlobalOptions(program: Command): void {
  program
    .option('--no-color', 'Disable colored output')
    .option('--json', 'Output results as JSON')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show request and response bodies')
    .option('--debug', 'Show debug-level diagnostics');

  program.hook('preAction', () => {
    const opts = program.opts<GlobalOptions>();

    // Commander stores --no-color as color: false
    if (opts.color === false || isColorDisabled()) {
      process.env.NO_COLOR = '1';
    }

    if (opts.json) {
      setOutputMode('json');
      process.env.NO_COLOR = '1';
    } else if (opts.quiet) {
      setOutputMode('quiet');
    }

    // The configured level applies unless --debug asks for more
    setLogLevel(opts.debug ? 'debug' : loadConfig().logging.level);
    verboseEnabled = Boolean(opts.debug || opts.verbose);
  });
}

function isColorDisabled(): boolean {
  // https://no-color.org
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  return !process.stdout.isTTY;
}
