/**
 * msgate — Compile Command
 *
 * Offline preview of the payloads a message compiles to. Media is
 * referenced by link; nothing is fetched or sent.
 */

import type { Command } from 'commander';
import { compile } from '../channels/whatsapp-cloud/compiler.js';
import type { WirePayload } from '../channels/whatsapp-cloud/wire.js';
import { getChannelConfig, loadConfig } from '../config/loader.js';
import { ChannelConfigSchema, type ChannelConfig } from '../config/types.js';
import { handleCommandError, loadMessage } from './helpers.js';
import { printResult } from '../utils/output.js';

interface CompileOptions {
  channel?: string;
}

/** Stand-in channel used when no --channel is given. */
export const PREVIEW_CHANNEL: ChannelConfig = ChannelConfigSchema.parse({
  id: 'preview',
  address: 'PHONE_NUMBER_ID',
});

export function registerCompileCommand(program: Command): void {
  program
    .command('compile <file>')
    .description('Compile an outbound message JSON file into WhatsApp Cloud payloads')
    .option('-c, --channel <id>', 'Compile for a configured channel (catalog id, address)')
    .action(async (file: string, opts: CompileOptions) => {
      try {
        const config = loadConfig();
        const channel = opts.channel ? getChannelConfig(config, opts.channel) : PREVIEW_CHANNEL;
        const message = loadMessage(file);

        const payloads = await compile(message, { channel, limits: config.limits });

        printResult(payloads, () => {
          console.log(`\n  ${payloads.length} payload${payloads.length === 1 ? '' : 's'} for ${message.urn}\n`);
          payloads.forEach((payload, index) => {
            console.log(`  ${index + 1}. ${describePayload(payload)}  ${payload.method} ${payload.path}`);
            console.log(indent(JSON.stringify(payload.body, null, 2), 5));
          });
          console.log('');
        });
      } catch (error) {
        handleCommandError('Failed to compile message', error);
      }
    });
}

/** Short label such as `interactive/button` or `image (captioned)`. */
export function describePayload(payload: WirePayload): string {
  switch (payload.kind) {
    case 'text':
      return payload.group === 'catalog' ? 'text [catalog]' : 'text';
    case 'media':
      return payload.captioned ? `${payload.category} (captioned)` : payload.category;
    case 'template':
      return payload.hasMediaHeader ? 'template (media header)' : 'template';
    case 'interactive': {
      const label = `interactive/${payload.shape}`;
      return payload.group === 'catalog' ? `${label} [catalog]` : label;
    }
    default: {
      const exhaustive: never = payload;
      return exhaustive;
    }
  }
}

function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}
