/**
 * msgate — Config Commands
 *
 *   msgate config show    — effective configuration, tokens masked
 *   msgate config init    — write the defaults to ~/.msgate/config.json
 */

import { existsSync } from 'node:fs';
import type { Command } from 'commander';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { getConfigPath, loadConfig, maskSecrets, saveConfig } from '../config/loader.js';
import { ExitCode, printFailure, printResult, printNote } from '../utils/output.js';
import { printError } from './helpers.js';

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Show or initialize the gateway configuration');

  config
    .command('show')
    .description('Print the effective configuration')
    .action(() => {
      try {
        const effective = maskSecrets(loadConfig());
        printResult(effective, () => {
          console.log(`\n  ${getConfigPath()}\n`);
          console.log(JSON.stringify(effective, null, 2));
          console.log('');
        });
      } catch (error) {
        printError('Failed to load config', error);
      }
    });

  config
    .command('init')
    .description('Write the default configuration')
    .option('-f, --force', 'Overwrite an existing config file')
    .action((opts: { force?: boolean }) => {
      const path = getConfigPath();
      if (existsSync(path) && !opts.force) {
        printFailure({
          code: 'CONFIG_EXISTS',
          message: `Config already exists: ${path}`,
          hint: 'Pass --force to overwrite it.',
        });
        process.exitCode = ExitCode.USAGE_ERROR;
        return;
      }

      try {
        saveConfig(DEFAULT_CONFIG);
        printResult({ path }, () => printNote(`Wrote ${path}`), path);
      } catch (error) {
        printError('Failed to write config', error);
      }
    });
}
