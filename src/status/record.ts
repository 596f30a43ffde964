/**
 * msgate — Delivery Status Builder
 *
 * Owned by a single delivery. Starts errored, becomes wired once any
 * payload succeeds, and is frozen by finish().
 */

import type { RequestTrace } from '../transport/types.js';
import type {
  ChannelLogEntry,
  DeliveryState,
  DeliveryStatusRecord,
  IdentityRemap,
} from './types.js';

export function channelLogFromTrace(
  description: string,
  trace: RequestTrace,
  error?: Error,
  now: () => Date = () => new Date()
): ChannelLogEntry {
  return Object.freeze({
    description,
    method: trace.method,
    url: trace.url,
    status: trace.status,
    statusCode: trace.statusCode,
    request: trace.request,
    response: trace.response,
    elapsedMs: trace.elapsedMs,
    ...(error ? { error: error.message } : {}),
    createdAt: now().toISOString(),
  });
}

export class DeliveryStatus {
  private state: DeliveryState = 'errored';
  private externalId: string | undefined;
  private remap: IdentityRemap | undefined;
  private error: string | undefined;
  private readonly logs: ChannelLogEntry[] = [];
  private finished = false;

  constructor(
    readonly channelId: string,
    readonly messageId?: string
  ) {}

  get hasRemap(): boolean {
    return this.remap !== undefined;
  }

  addLog(...entries: ChannelLogEntry[]): this {
    this.assertOpen();
    this.logs.push(...entries);
    return this;
  }

  /** Only the first id set is kept. */
  setExternalId(id: string): this {
    this.assertOpen();
    this.externalId ??= id;
    return this;
  }

  /** Records the first remap only; returns whether this call recorded it. */
  recordRemap(from: string, to: string): boolean {
    this.assertOpen();
    if (this.remap) return false;
    this.remap = Object.freeze({ from, to });
    return true;
  }

  markWired(): this {
    this.assertOpen();
    this.state = 'wired';
    return this;
  }

  setError(error: Error): this {
    this.assertOpen();
    this.error = error.message;
    return this;
  }

  finish(): DeliveryStatusRecord {
    this.assertOpen();
    this.finished = true;
    return Object.freeze({
      channelId: this.channelId,
      ...(this.messageId !== undefined ? { messageId: this.messageId } : {}),
      state: this.state,
      ...(this.externalId !== undefined ? { externalId: this.externalId } : {}),
      logs: Object.freeze([...this.logs]),
      ...(this.remap ? { remap: this.remap } : {}),
      ...(this.error !== undefined ? { error: this.error } : {}),
    });
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('delivery status already finished');
    }
  }
}
