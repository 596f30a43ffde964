/**
 * msgate — Program Definition
 *
 * Commander-based CLI: compile, send, status-event, config.
 */

import { Command } from 'commander';
import { VERSION_STRING } from '../config/defaults.js';
import { registerCompileCommand } from './compile.js';
import { registerConfigCommands } from './config.js';
import { registerSendCommand } from './send.js';
import { registerStatusEventCommand } from './status-event.js';
import { applyGlobalOptions } from './global-options.js';
import { didYouMean } from './helpers.js';
import { ExitCode } from '../utils/output.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('msgate')
    .description('msgate — compile and deliver messages through WhatsApp Cloud channels')
    .version(VERSION_STRING, '-V, --version', 'Show version information');

  // ── Global Options ────────────────────────────────────────────────────

  applyGlobalOptions(program);

  // ── Messages ──────────────────────────────────────────────────────────

  registerCompileCommand(program);
  registerSendCommand(program);

  // ── Provider Callbacks ────────────────────────────────────────────────

  registerStatusEventCommand(program);

  // ── Configuration ─────────────────────────────────────────────────────

  registerConfigCommands(program);

  // ── Unknown Command Handler (did you mean?) ─────────────────────────────

  program.on('command:*', (operands: string[]) => {
    const unknown = operands[0];
    const commands = program.commands.map((c) => c.name());
    const suggestion = didYouMean(unknown, commands);

    process.stderr.write(`\n  Error: Unknown command "${unknown}".`);
    if (suggestion) {
      process.stderr.write(` Did you mean "${suggestion}"?`);
    }
    process.stderr.write(`\n  Run \`msgate --help\` for available commands.\n\n`);
    process.exitCode = ExitCode.USAGE_ERROR;
  });

  return program;
}
