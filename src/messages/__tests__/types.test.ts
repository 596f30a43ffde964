import { describe, it, expect } from 'vitest';
import { OutboundMessageSchema, urnPath } from '../types.js';

describe('OutboundMessageSchema', () => {
  it('fills defaults for a minimal message', () => {
    const message = OutboundMessageSchema.parse({ urn: 'whatsapp:250788123123', text: 'Hi' });

    expect(message).toEqual({
      urn: 'whatsapp:250788123123',
      text: 'Hi',
      attachments: [],
      quickReplies: [],
      templateButtons: [],
      products: [],
      sendCatalog: false,
    });
  });

  it('normalizes attachment strings and keeps objects', () => {
    const message = OutboundMessageSchema.parse({
      urn: 'whatsapp:250788123123',
      attachments: [
        'image/jpeg:https://foo.bar/image.jpg',
        { mimeType: 'application/pdf', url: 'https://foo.bar/doc.pdf' },
      ],
    });

    expect(message.attachments).toEqual([
      { mimeType: 'image/jpeg', url: 'https://foo.bar/image.jpg' },
      { mimeType: 'application/pdf', url: 'https://foo.bar/doc.pdf' },
    ]);
  });

  it('rejects attachment strings without a mime type', () => {
    const result = OutboundMessageSchema.safeParse({
      urn: 'whatsapp:250788123123',
      attachments: ['https://foo.bar/image.jpg'],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        'attachment must look like "mime/type:url": https://foo.bar/image.jpg'
      );
    }
  });

  it('rejects a URN without a scheme', () => {
    expect(OutboundMessageSchema.safeParse({ urn: '250788123123' }).success).toBe(false);
  });

  it('defaults order amounts and payment fields', () => {
    const message = OutboundMessageSchema.parse({
      urn: 'whatsapp:250788123123',
      interactionType: 'order_details',
      orderDetails: {
        referenceId: 'ref-1',
        type: 'digital-goods',
        totalAmount: 1000,
        order: {
          items: [{ retailerId: 'sku-1', name: 'Mug', quantity: 1, amount: { value: 1000 } }],
          subtotal: 1000,
        },
      },
    });

    expect(message.orderDetails?.currency).toBe('BRL');
    expect(message.orderDetails?.paymentType).toBe('br');
    expect(message.orderDetails?.paymentSettings).toEqual({});
    expect(message.orderDetails?.order.tax).toEqual({ value: 0 });
    expect(message.orderDetails?.order.items[0].amount).toEqual({ value: 1000, offset: 100 });
  });
});

describe('urnPath', () => {
  it('drops the scheme', () => {
    expect(urnPath('whatsapp:250788123123')).toBe('250788123123');
  });
});
