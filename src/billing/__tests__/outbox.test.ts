import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonLinesOutbox } from '../outbox.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'msgate-outbox-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('JsonLinesOutbox', () => {
  it('appends one JSON line per notification, creating directories', async () => {
    const path = join(dir, 'nested', 'billing.jsonl');
    const outbox = new JsonLinesOutbox(path);

    await outbox.publish(
      {
        contact_urn: 'whatsapp:5678',
        channel_uuid: 'wac-1',
        message_id: 'wamid-1',
        message_date: '2026-03-08T19:08:19.000Z',
        channel_type: 'WAC',
      },
      'update'
    );
    await outbox.publish(
      {
        contact_urn: 'whatsapp:5678',
        channel_uuid: 'wac-1',
        message_id: 'wamid-2',
        message_date: '2026-03-08T19:09:00.000Z',
        channel_type: 'WAC',
      },
      'create'
    );

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      routing_key: 'update',
      contact_urn: 'whatsapp:5678',
      channel_uuid: 'wac-1',
      message_id: 'wamid-1',
      message_date: '2026-03-08T19:08:19.000Z',
      channel_type: 'WAC',
    });
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ routing_key: 'create', message_id: 'wamid-2' });
  });
});
