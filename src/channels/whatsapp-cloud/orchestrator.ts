/**
 * msgate — WhatsApp Cloud Delivery Orchestrator
 *
 * Posts compiled payloads in order through the transport, one log entry
 * per payload, and fills the Delivery Status Record. The first failure
 * ends the sequence; logs gathered so far are kept.
 */

import { z } from 'zod';
import type { RetryConfig } from '../../config/types.js';
import { channelLogFromTrace, type DeliveryStatus } from '../../status/record.js';
import type { DeliveryStatusRecord } from '../../status/types.js';
import { malformedResponse, type HttpTransport } from '../../transport/http.js';
import type { HttpRequest } from '../../transport/types.js';
import { createLogger } from '../../utils/logger.js';
import type { WirePayload } from './wire.js';

const log = createLogger('WhatsAppCloud');

// ============================================================================
// TYPES
// ============================================================================

export interface DeliveryContext {
  transport: HttpTransport;
  /** Builder for this delivery; finished before deliver() returns. */
  status: DeliveryStatus;
  /** Provider API base, e.g. https://graph.facebook.com/v12.0 */
  graphUrl: string;
  token: string;
  /** `header` sends a bearer token; `query` an access_token parameter. */
  authMode: 'header' | 'query';
  /** Address the payloads were compiled for. */
  recipient: string;
  retry: RetryConfig;
  /** Suffixed with the payload index to form each Idempotency-Key. */
  idempotencyKey?: string;
  signal?: AbortSignal;
}

export const SendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string().min(1) })).min(1),
  contacts: z
    .array(z.object({ input: z.string().optional(), wa_id: z.string().optional() }))
    .optional(),
});

export type SendResponse = z.infer<typeof SendResponseSchema>;

// ============================================================================
// DELIVER
// ============================================================================

export async function deliver(payloads: WirePayload[], ctx: DeliveryContext): Promise<DeliveryStatusRecord> {
  const { status } = ctx;
  const scoped = log.child({ channel: status.channelId, message: status.messageId });

  let closed = false;
  let remapChecked = false;

  for (const [index, payload] of payloads.entries()) {
    if (closed && payload.group === 'message') {
      scoped.debug('Skipping payload after a complete message', { index, kind: payload.kind });
      continue;
    }

    const result = await ctx.transport.send(request(payload, ctx), {
      maxAttempts: ctx.retry.maxAttempts,
      baseBackoffMs: ctx.retry.baseBackoffMs,
      idempotencyKey: ctx.idempotencyKey ? `${ctx.idempotencyKey}-${index}` : undefined,
      signal: ctx.signal,
    });

    let response: SendResponse | undefined;
    let error = result.error;
    if (!error) {
      response = parseSendResponse(result.trace.body);
      if (!response) error = malformedResponse(result.trace, 'missing message id');
    }

    status.addLog(channelLogFromTrace('Message Sent', result.trace, error));

    if (error || !response) {
      scoped.warn('Payload failed, stopping sequence', {
        index,
        attempts: result.attempts,
        status: result.trace.statusCode,
        error: error?.message,
      });
      if (error) status.setError(error);
      break;
    }

    status.markWired();
    const [sent] = response.messages;
    if (sent) status.setExternalId(sent.id);

    if (!remapChecked) {
      remapChecked = true;
      const canonical = response.contacts?.[0]?.wa_id;
      if (canonical && canonical !== ctx.recipient && status.recordRemap(ctx.recipient, canonical)) {
        scoped.info('Provider reported a canonical address', { from: ctx.recipient, to: canonical });
      }
    }

    scoped.debug('Payload sent', { index, kind: payload.kind, attempts: result.attempts });

    if (payload.group === 'message' && completesMessage(payload)) {
      closed = true;
    }
  }

  return status.finish();
}

/**
 * Payloads that carry the whole message by themselves: a template with
 * a media header, a captioned attachment, or an interactive message with
 * a media header. Remaining message payloads are not sent after one.
 */
export function completesMessage(payload: WirePayload): boolean {
  switch (payload.kind) {
    case 'text':
      return false;
    case 'media':
      return payload.captioned;
    case 'template':
      return payload.hasMediaHeader;
    case 'interactive':
      return payload.mediaHeader;
    default: {
      const unreachable: never = payload;
      throw new Error(`unhandled payload: ${JSON.stringify(unreachable)}`);
    }
  }
}

// ── Internal ──────────────────────────────────────────────────────────────

function request(payload: WirePayload, ctx: DeliveryContext): HttpRequest {
  const base = ctx.graphUrl.replace(/\/$/, '');
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };

  let url = `${base}${payload.path}`;
  if (ctx.authMode === 'query') {
    url += `?access_token=${encodeURIComponent(ctx.token)}`;
  } else {
    headers['Authorization'] = `Bearer ${ctx.token}`;
  }

  return { method: payload.method, url, headers, body: JSON.stringify(payload.body) };
}

function parseSendResponse(body: Uint8Array): SendResponse | undefined {
  try {
    const result = SendResponseSchema.safeParse(JSON.parse(new TextDecoder().decode(body)));
    return result.success ? result.data : undefined;
  } catch {
    return undefined;
  }
}
