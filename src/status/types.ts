/**
 * msgate — Delivery Status & Channel Log Types
 *
 * Records handed to the persistence collaborator after a send. Both are
 * frozen once built.
 */

import type { HttpMethod, TraceStatus } from '../transport/types.js';

// ============================================================================
// CHANNEL LOG
// ============================================================================

/** One HTTP exchange (the last attempt of a retried send). */
export interface ChannelLogEntry {
  readonly description: string;
  readonly method: HttpMethod;
  readonly url: string;
  readonly status: TraceStatus;
  readonly statusCode: number;
  readonly request: string;
  readonly response: string;
  readonly elapsedMs: number;
  readonly error?: string;
  /** ISO 8601. */
  readonly createdAt: string;
}

// ============================================================================
// DELIVERY STATUS
// ============================================================================

export type DeliveryState = 'wired' | 'errored';

/** Rewrite of a contact address to the provider's canonical form. */
export interface IdentityRemap {
  readonly from: string;
  readonly to: string;
}

export interface DeliveryStatusRecord {
  readonly channelId: string;
  readonly messageId?: string;
  readonly state: DeliveryState;
  /** Provider id of the first payload sent. */
  readonly externalId?: string;
  readonly logs: readonly ChannelLogEntry[];
  readonly remap?: IdentityRemap;
  /** Message of the error that ended the send, if any. */
  readonly error?: string;
}
