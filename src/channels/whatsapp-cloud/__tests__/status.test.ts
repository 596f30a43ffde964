import { describe, it, expect, vi } from 'vitest';

// ── Mock logger ─────────────────────────────────────────────────────────────

vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { processStatusEvent } from '../status.js';
import { BillingNotifier } from '../../../billing/notifier.js';
import type { BillingPublisher } from '../../../billing/types.js';
import { ChannelConfigSchema } from '../../../config/types.js';

const channel = ChannelConfigSchema.parse({ id: 'wac-1', address: '12345' });
const now = () => new Date('2026-03-08T19:08:19.000Z');

function webhook(...statuses: Array<{ id: string; status: string; recipient_id?: string }>) {
  return {
    object: 'whatsapp_business_account',
    entry: [
      {
        id: '8856996819413533',
        changes: [
          {
            field: 'messages',
            value: {
              messaging_product: 'whatsapp',
              statuses: statuses.map((s) => ({
                recipient_id: '5678',
                timestamp: '1620000000',
                ...s,
              })),
            },
          },
        ],
      },
    ],
  };
}

function recordingBilling() {
  const publish = vi.fn<BillingPublisher['publish']>().mockResolvedValue(undefined);
  return { publish, notifier: new BillingNotifier({ publish }) };
}

describe('processStatusEvent', () => {
  it('maps provider statuses', () => {
    const outcomes = processStatusEvent(
      webhook(
        { id: 'wamid-1', status: 'sent' },
        { id: 'wamid-2', status: 'delivered' },
        { id: 'wamid-3', status: 'read' },
        { id: 'wamid-4', status: 'failed' }
      ),
      channel
    );

    expect(outcomes).toEqual([
      { kind: 'status', externalId: 'wamid-1', status: 'sent', recipient: '5678' },
      { kind: 'status', externalId: 'wamid-2', status: 'delivered', recipient: '5678' },
      { kind: 'status', externalId: 'wamid-3', status: 'read', recipient: '5678' },
      { kind: 'status', externalId: 'wamid-4', status: 'failed', recipient: '5678' },
    ]);
  });

  it('ignores deleted and reports unknown statuses', () => {
    const outcomes = processStatusEvent(
      webhook({ id: 'wamid-1', status: 'deleted' }, { id: 'wamid-2', status: 'in_transit' }),
      channel
    );

    expect(outcomes).toEqual([
      { kind: 'ignored', externalId: 'wamid-1', info: 'ignoring status: deleted' },
      { kind: 'error', externalId: 'wamid-2', error: 'unknown status: in_transit' },
    ]);
  });

  it('notifies billing for delivered and read only', async () => {
    const { publish, notifier } = recordingBilling();

    processStatusEvent(
      webhook(
        { id: 'wamid-1', status: 'sent' },
        { id: 'wamid-2', status: 'delivered' },
        { id: 'wamid-3', status: 'read' },
        { id: 'wamid-4', status: 'failed' }
      ),
      channel,
      { billing: notifier, now }
    );
    await notifier.drain();

    expect(publish).toHaveBeenCalledTimes(2);
    expect(publish).toHaveBeenNthCalledWith(
      1,
      {
        contact_urn: 'whatsapp:5678',
        channel_uuid: 'wac-1',
        message_id: 'wamid-2',
        message_date: '2026-03-08T19:08:19.000Z',
        channel_type: 'WAC',
      },
      'update'
    );
    expect(publish.mock.calls[1]?.[0].message_id).toBe('wamid-3');
  });

  it('skips billing for a recipient that is not a phone number', async () => {
    const { publish, notifier } = recordingBilling();

    const outcomes = processStatusEvent(
      webhook({ id: 'wamid-1', status: 'read', recipient_id: 'not-a-number' }),
      channel,
      { billing: notifier, now }
    );
    await notifier.drain();

    expect(outcomes[0]).toMatchObject({ kind: 'status', status: 'read' });
    expect(publish).not.toHaveBeenCalled();
  });

  it('treats a body without statuses as empty', () => {
    expect(processStatusEvent({ entry: [{ changes: [{ value: { messages: [] } }] }] }, channel)).toEqual([]);
    expect(processStatusEvent({}, channel)).toEqual([]);
  });

  it('rejects a malformed body', () => {
    expect(() => processStatusEvent({ entry: 'nope' }, channel)).toThrow();
  });
});
