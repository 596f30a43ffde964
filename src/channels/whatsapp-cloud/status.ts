/**
 * msgate — WhatsApp Cloud Status Callbacks
 *
 * Maps the `statuses` of a provider webhook body onto message statuses.
 * Delivered and read confirmations notify billing.
 */

import { z } from 'zod';
import type { BillingNotifier } from '../../billing/notifier.js';
import type { ChannelConfig } from '../../config/types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('WhatsAppCloud:Status');

// ============================================================================
// WEBHOOK SCHEMA
// ============================================================================

export const StatusUpdateSchema = z.object({
  id: z.string().min(1),
  status: z.string().min(1),
  recipient_id: z.string().min(1),
  timestamp: z.string().optional(),
});

export const StatusWebhookSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              value: z.object({ statuses: z.array(StatusUpdateSchema).default([]) }),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

export type StatusUpdate = z.infer<typeof StatusUpdateSchema>;
export type StatusWebhook = z.infer<typeof StatusWebhookSchema>;

// ============================================================================
// MAPPING
// ============================================================================

export type MessageStatus = 'sent' | 'delivered' | 'read' | 'failed';

const STATUS_MAPPING: Record<string, MessageStatus> = {
  sent: 'sent',
  delivered: 'delivered',
  read: 'read',
  failed: 'failed',
};

const IGNORED_STATUSES: ReadonlySet<string> = new Set(['deleted']);

export type StatusOutcome =
  | { kind: 'status'; externalId: string; status: MessageStatus; recipient: string }
  | { kind: 'ignored'; externalId: string; info: string }
  | { kind: 'error'; externalId: string; error: string };

export interface StatusEventOptions {
  billing?: BillingNotifier;
  now?: () => Date;
}

/**
 * Process every status update in `body`, in order.
 *
 * @throws ZodError when the body is not a status webhook.
 */
export function processStatusEvent(
  body: unknown,
  channel: ChannelConfig,
  options: StatusEventOptions = {}
): StatusOutcome[] {
  const webhook = StatusWebhookSchema.parse(body);
  const outcomes: StatusOutcome[] = [];

  for (const entry of webhook.entry) {
    for (const change of entry.changes) {
      for (const update of change.value.statuses) {
        outcomes.push(mapUpdate(update, channel, options));
      }
    }
  }
  return outcomes;
}

function mapUpdate(update: StatusUpdate, channel: ChannelConfig, options: StatusEventOptions): StatusOutcome {
  const status = Object.hasOwn(STATUS_MAPPING, update.status) ? STATUS_MAPPING[update.status] : undefined;

  if (status === undefined) {
    if (IGNORED_STATUSES.has(update.status)) {
      return { kind: 'ignored', externalId: update.id, info: `ignoring status: ${update.status}` };
    }
    log.warn('Unknown status', { channel: channel.id, status: update.status, message: update.id });
    return { kind: 'error', externalId: update.id, error: `unknown status: ${update.status}` };
  }

  if ((status === 'delivered' || status === 'read') && options.billing) {
    notifyBilling(update, channel, options.billing, options.now ?? (() => new Date()));
  }

  return { kind: 'status', externalId: update.id, status, recipient: update.recipient_id };
}

function notifyBilling(update: StatusUpdate, channel: ChannelConfig, billing: BillingNotifier, now: () => Date): void {
  if (!/^\+?\d+$/.test(update.recipient_id)) {
    log.error('Invalid recipient for billing', { channel: channel.id, recipient: update.recipient_id });
    return;
  }

  billing.notify(
    {
      contact_urn: `whatsapp:${update.recipient_id.replace(/^\+/, '')}`,
      channel_uuid: channel.id,
      message_id: update.id,
      message_date: now().toISOString(),
      channel_type: channel.type,
    },
    'update'
  );
}
