/**
 * msgate — Channel Sender Interface
 *
 * Each provider type implements this interface. A sender turns one
 * Outbound Message into a finished Delivery Status Record and never
 * throws for provider or shape failures: those end up on the record.
 */

import type { ChannelConfig, GatewayConfig } from '../config/types.js';
import type { MediaResolver } from '../media/resolver.js';
import type { OutboundMessage } from '../messages/types.js';
import type { DeliveryStatusRecord } from '../status/types.js';
import type { HttpTransport } from '../transport/http.js';

export type ChannelType = ChannelConfig['type'];

export interface DeliverOptions {
  /** Cancels media resolution and every provider call of this send. */
  signal?: AbortSignal;
}

export interface ChannelSender {
  readonly type: ChannelType;

  /** Human-readable display name */
  readonly displayName: string;

  send(
    message: OutboundMessage,
    channel: ChannelConfig,
    options?: DeliverOptions
  ): Promise<DeliveryStatusRecord>;
}

/** Shared collaborators handed to every sender. */
export interface SenderDeps {
  config: GatewayConfig;
  transport: HttpTransport;
  media: MediaResolver;
  /** Token for flow messages; a random UUID by default. */
  flowToken?: () => string;
}

export type SenderFactory = (deps: SenderDeps) => ChannelSender;
