/**
 * msgate — Billing Notifier
 *
 * Fire-and-forget front for a BillingPublisher. Publishing failures are
 * logged and never reach the caller.
 */

import { createLogger } from '../utils/logger.js';
import type { BillingMessage, BillingPublisher, RoutingKey } from './types.js';

const log = createLogger('Billing');

export class BillingNotifier {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly publisher: BillingPublisher) {}

  notify(message: BillingMessage, routingKey: RoutingKey): void {
    const task = this.publisher
      .publish(message, routingKey)
      .then(() => {
        log.debug('Billing notification published', { message: message.message_id, routingKey });
      })
      .catch((error: unknown) => {
        log.warn('Billing notification failed', {
          message: message.message_id,
          channel: message.channel_uuid,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /** Resolves once every notification made so far has settled. */
  async drain(): Promise<void> {
    await Promise.all(this.pending);
  }
}
