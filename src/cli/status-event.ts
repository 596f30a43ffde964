/**
 * msgate — Status Event Command
 *
 * Feeds a provider status webhook body through the status mapper.
 * Billing notifications go to the configured outbox, if any.
 */

import type { Command } from 'commander';
import { BillingNotifier } from '../billing/notifier.js';
import { JsonLinesOutbox } from '../billing/outbox.js';
import { processStatusEvent, type StatusOutcome } from '../channels/whatsapp-cloud/status.js';
import { getChannelConfig, loadConfig } from '../config/loader.js';
import { ExitCode, printResult } from '../utils/output.js';
import { handleCommandError, readJsonFile } from './helpers.js';

interface StatusEventOptions {
  channel: string;
}

export function registerStatusEventCommand(program: Command): void {
  program
    .command('status-event <file>')
    .description('Process a WhatsApp Cloud status webhook body')
    .requiredOption('-c, --channel <id>', 'Channel the webhook was received on')
    .action(async (file: string, opts: StatusEventOptions) => {
      try {
        const config = loadConfig();
        const channel = getChannelConfig(config, opts.channel);
        const body = readJsonFile(file);

        const outboxPath = config.billing.outboxPath;
        const billing = outboxPath ? new BillingNotifier(new JsonLinesOutbox(outboxPath)) : undefined;

        const outcomes = processStatusEvent(body, channel, { billing });
        await billing?.drain();

        printResult(outcomes, () => {
          if (outcomes.length === 0) {
            console.log('\n  No status updates.\n');
            return;
          }
          console.log('');
          for (const outcome of outcomes) console.log(`  ${formatOutcome(outcome)}`);
          console.log('');
        });

        if (outcomes.some((o) => o.kind === 'error')) {
          process.exitCode = ExitCode.GENERAL_ERROR;
        }
      } catch (error) {
        handleCommandError('Failed to process status event', error);
      }
    });
}

export function formatOutcome(outcome: StatusOutcome): string {
  switch (outcome.kind) {
    case 'status':
      return `${outcome.externalId}  ${outcome.status.padEnd(9)}  ${outcome.recipient}`;
    case 'ignored':
      return `${outcome.externalId}  ${outcome.info}`;
    case 'error':
      return `${outcome.externalId}  error: ${outcome.error}`;
  }
}
