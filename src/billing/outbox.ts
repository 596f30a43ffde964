/**
 * msgate — JSON-Lines Billing Outbox
 *
 * Appends each notification as one JSON line, for a broker relay to
 * pick up.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BillingMessage, BillingPublisher, RoutingKey } from './types.js';

export class JsonLinesOutbox implements BillingPublisher {
  constructor(readonly path: string) {}

  async publish(message: BillingMessage, routingKey: RoutingKey): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, JSON.stringify({ routing_key: routingKey, ...message }) + '\n', 'utf-8');
  }
}
