/**
 * msgate — WhatsApp Cloud Sender
 *
 * Compile, resolve media, deliver. Registers itself with the channel
 * registry on import.
 */

import { ConfigError } from '../../config/loader.js';
import type { ChannelConfig } from '../../config/types.js';
import { MediaResolutionError } from '../../media/resolver.js';
import { CompilationError } from '../../messages/errors.js';
import { urnPath, type OutboundMessage } from '../../messages/types.js';
import { DeliveryStatus } from '../../status/record.js';
import type { DeliveryStatusRecord } from '../../status/types.js';
import { createLogger } from '../../utils/logger.js';
import { registerChannel } from '../registry.js';
import type { ChannelSender, DeliverOptions, SenderDeps } from '../types.js';
import { compile } from './compiler.js';
import { deliver } from './orchestrator.js';
import type { WirePayload } from './wire.js';

const log = createLogger('WhatsAppCloud');

export class WhatsAppCloudSender implements ChannelSender {
  readonly type = 'WAC' as const;
  readonly displayName = 'WhatsApp Cloud';

  constructor(private readonly deps: SenderDeps) {}

  async send(
    message: OutboundMessage,
    channel: ChannelConfig,
    options: DeliverOptions = {}
  ): Promise<DeliveryStatusRecord> {
    const { config, transport, media } = this.deps;
    const status = new DeliveryStatus(channel.id, message.uuid);

    const { sendToken, uploadToken } = accessTokens(channel, config.provider.systemUserToken);
    if (!sendToken || !uploadToken) {
      const error = new ConfigError(`No access token for channel: ${channel.id}`, 'MISSING_TOKEN');
      log.error('Cannot send', { channel: channel.id, error: error.message });
      return status.setError(error).finish();
    }

    let payloads: WirePayload[];
    try {
      payloads = await compile(message, {
        channel,
        limits: config.limits,
        flowToken: this.deps.flowToken,
        resolveMedia: async (attachment) => {
          const resolution = await media.resolve({
            channelId: channel.id,
            address: channel.address,
            url: attachment.url,
            mimeHint: attachment.mimeType,
            token: uploadToken,
            signal: options.signal,
          });
          status.addLog(...resolution.logs);
          return resolution;
        },
      });
    } catch (error) {
      if (error instanceof CompilationError || error instanceof MediaResolutionError) {
        log.warn('Message not sent', { channel: channel.id, code: error.code, error: error.message });
        return status.setError(error).finish();
      }
      throw error;
    }

    log.debug('Compiled message', { channel: channel.id, payloads: payloads.length });

    return deliver(payloads, {
      transport,
      status,
      graphUrl: config.provider.graphUrl,
      token: sendToken,
      authMode: channel.authMode,
      recipient: urnPath(message.urn),
      retry: config.retry,
      idempotencyKey: message.uuid,
      signal: options.signal,
    });
  }
}

/**
 * Sends use the channel's own token when it has one; uploads prefer the
 * system user token.
 */
export function accessTokens(
  channel: ChannelConfig,
  systemUserToken: string | undefined
): { sendToken: string | undefined; uploadToken: string | undefined } {
  return {
    sendToken: channel.userToken || systemUserToken || undefined,
    uploadToken: systemUserToken || channel.userToken || undefined,
  };
}

registerChannel('WAC', (deps) => new WhatsAppCloudSender(deps));
