/**
 * msgate — Send Command
 *
 * Compiles and delivers one message through a configured channel, then
 * prints the delivery status record.
 */

import type { Command } from 'commander';
import { ensureChannelsLoaded, getSenderFactory } from '../channels/registry.js';
import { truncate } from '../channels/whatsapp-cloud/format.js';
import { getChannelConfig, loadConfig } from '../config/loader.js';
import type { DeliveryStatusRecord } from '../status/types.js';
import { ExitCode, printFailure, printResult } from '../utils/output.js';
import { isVerbose } from './global-options.js';
import { buildSenderDeps, handleCommandError, loadMessage } from './helpers.js';

interface SendOptions {
  channel: string;
}

export function registerSendCommand(program: Command): void {
  program
    .command('send <file>')
    .description('Compile and deliver an outbound message JSON file')
    .requiredOption('-c, --channel <id>', 'Channel to send through')
    .action(async (file: string, opts: SendOptions) => {
      try {
        const config = loadConfig();
        const channel = getChannelConfig(config, opts.channel);
        const message = loadMessage(file);

        await ensureChannelsLoaded();
        const factory = getSenderFactory(channel.type);
        if (!factory) {
          printFailure({
            code: 'UNSUPPORTED_CHANNEL',
            message: `No sender for channel type: ${channel.type}`,
          });
          process.exitCode = ExitCode.GENERAL_ERROR;
          return;
        }

        const record = await factory(buildSenderDeps(config)).send(message, channel);

        printResult(record, () => printRecord(record), record.externalId);
        if (record.state === 'errored') {
          process.exitCode = ExitCode.GENERAL_ERROR;
        }
      } catch (error) {
        handleCommandError('Failed to send message', error);
      }
    });
}

function printRecord(record: DeliveryStatusRecord): void {
  const verbose = isVerbose();

  console.log('');
  console.log(
    record.state === 'wired'
      ? `  Delivered: ${record.externalId ?? '(no id)'}`
      : '  Not delivered'
  );
  console.log(`  Channel: ${record.channelId}${record.messageId ? `  Message: ${record.messageId}` : ''}`);
  if (record.remap) {
    console.log(`  Contact: ${record.remap.from} -> ${record.remap.to}`);
  }
  if (record.error) {
    console.log(`  Error:   ${record.error}`);
  }

  if (record.logs.length > 0) {
    console.log('\n  Requests:');
    for (const entry of record.logs) {
      console.log(`    ${entry.method} ${entry.url}  ${entry.statusCode} ${entry.status} (${entry.elapsedMs}ms)  ${entry.description}`);
      if (entry.error) console.log(`      ${entry.error}`);
      if (verbose) {
        console.log(`      > ${truncate(entry.request, 2000)}`);
        console.log(`      < ${truncate(entry.response, 2000)}`);
      }
    }
  }
  console.log('');
}
