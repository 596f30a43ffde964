/**
 * msgate — Product & Catalog Payloads
 */

import type { ChannelConfig, LimitsConfig } from '../../config/types.js';
import { CompilationError } from '../../messages/errors.js';
import type { OutboundMessage } from '../../messages/types.js';
import { truncate, unescapeLabel } from './format.js';
import type { Interactive, ProductSection, WirePayload } from './wire.js';

/** Shown instead of the raw field name some upstream editors emit as a title. */
const RETAILER_ID_TITLE = 'product_retailer_id';

/**
 * Compile the product part of a message: the whole catalog, a single
 * product, or product lists chunked by the section limit. Returns no
 * payloads when the message names no products.
 *
 * @throws CompilationError when the channel has no catalog, or a list
 *   send has no body.
 */
export function compileProducts(
  message: OutboundMessage,
  channel: ChannelConfig,
  limits: LimitsConfig,
  to: string
): WirePayload[] {
  if (message.products.length === 0 && !message.sendCatalog) {
    return [];
  }

  const catalogId = channel.catalogId;
  if (!catalogId) {
    throw new CompilationError('catalog id not found in channel config', 'MISSING_CATALOG');
  }

  const body = message.body ? { text: unescapeLabel(message.body) } : undefined;
  const footer = message.footer ? { text: unescapeLabel(message.footer) } : undefined;
  const name = message.action;

  const [first] = message.products;
  const unitary = message.products.length === 1 && first?.retailerIds.length === 1;

  if (message.sendCatalog) {
    requireBody(body, 'catalog_message');
    return [payload(to, channel, { type: 'catalog_message', body, footer, action: { name: 'catalog_message' } })];
  }

  if (unitary && first) {
    return [
      payload(to, channel, {
        type: 'product',
        body,
        footer,
        action: {
          catalog_id: catalogId,
          product_retailer_id: first.retailerIds[0] ?? '',
          ...(name ? { name } : {}),
        },
      }),
    ];
  }

  requireBody(body, 'product_list');
  const header = message.headerText
    ? { type: 'text' as const, text: unescapeLabel(message.headerText) }
    : undefined;

  const sections: ProductSection[] = message.products.map((product) => ({
    title: truncate(
      product.title === RETAILER_ID_TITLE ? 'items' : product.title,
      limits.maxSectionTitleLength
    ),
    product_items: product.retailerIds.map((id) => ({ product_retailer_id: id })),
  }));

  const payloads: WirePayload[] = [];
  for (let i = 0; i < sections.length; i += limits.maxProductSections) {
    payloads.push(
      payload(to, channel, {
        type: 'product_list',
        header,
        body,
        footer,
        action: {
          catalog_id: catalogId,
          sections: sections.slice(i, i + limits.maxProductSections),
          ...(name ? { name } : {}),
        },
      })
    );
  }
  return payloads;
}

function requireBody(body: { text: string } | undefined, shape: string): void {
  if (!body) {
    throw new CompilationError(`${shape} message body cannot be empty`, 'EMPTY_BODY');
  }
}

function payload(to: string, channel: ChannelConfig, interactive: Interactive): WirePayload {
  return {
    kind: 'interactive',
    shape: interactive.type,
    mediaHeader: false,
    group: 'catalog',
    method: 'POST',
    path: `/${channel.address}/messages`,
    body: {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to,
      type: 'interactive',
      interactive,
    },
  };
}

