/**
 * msgate — WhatsApp Cloud Wire Shapes
 *
 * JSON bodies posted to `/{phone-number-id}/messages`, and the compiled
 * payload variants the orchestrator sequences.
 */

import type { MediaCategory } from '../../messages/attachments.js';

// ============================================================================
// MEDIA
// ============================================================================

/** Either an uploaded media id or a direct link. */
export interface WireMedia {
  id?: string;
  link?: string;
  caption?: string;
  filename?: string;
}

// ============================================================================
// INTERACTIVE
// ============================================================================

export type InteractiveHeader =
  | { type: 'text'; text: string }
  | { type: 'image'; image: WireMedia }
  | { type: 'video'; video: WireMedia }
  | { type: 'document'; document: WireMedia };

/** Shared shape of every interactive message; only the action varies. */
export interface InteractiveEnvelope<T extends string, A> {
  type: T;
  header?: InteractiveHeader;
  body?: { text: string };
  footer?: { text: string };
  action: A;
}

export interface ReplyButton {
  type: 'reply';
  reply: { id: string; title: string };
}

export interface ListRow {
  id: string;
  title: string;
  description?: string;
}

export interface ProductSection {
  title: string;
  product_items: Array<{ product_retailer_id: string }>;
}

export interface FlowParameters {
  mode: string;
  flow_message_version: '3';
  flow_token: string;
  flow_id: string;
  flow_cta: string;
  flow_action: 'navigate';
  flow_action_payload: { screen: string; data?: Record<string, unknown> };
}

export interface WireAmount {
  value: number;
  offset: number;
  description?: string;
  discount_program_name?: string;
}

export type WirePaymentSetting =
  | { type: 'payment_link'; payment_link: { uri: string } }
  | {
      type: 'pix_dynamic_code';
      pix_dynamic_code: { code: string; merchant_name: string; key: string; key_type: string };
    };

export interface WireOrderItem {
  retailer_id: string;
  name: string;
  quantity: number;
  amount: WireAmount;
  sale_amount?: WireAmount;
}

export interface WireOrderDetails {
  reference_id: string;
  type: string;
  payment_type: string;
  payment_settings: WirePaymentSetting[];
  currency: string;
  total_amount: WireAmount;
  order: {
    status: 'pending';
    catalog_id?: string;
    items: WireOrderItem[];
    subtotal: WireAmount;
    tax: WireAmount;
    shipping?: WireAmount;
    discount?: WireAmount;
  };
}

export type Interactive =
  | InteractiveEnvelope<'button', { buttons: ReplyButton[] }>
  | InteractiveEnvelope<'list', { button: string; sections: Array<{ title?: string; rows: ListRow[] }> }>
  | InteractiveEnvelope<'location_request_message', { name: 'send_location' }>
  | InteractiveEnvelope<'cta_url', { name: 'cta_url'; parameters: { display_text: string; url: string } }>
  | InteractiveEnvelope<'flow', { name: 'flow'; parameters: FlowParameters }>
  | InteractiveEnvelope<'order_details', { name: 'review_and_pay'; parameters: WireOrderDetails }>
  | InteractiveEnvelope<'product', { catalog_id: string; product_retailer_id: string; name?: string }>
  | InteractiveEnvelope<'product_list', { catalog_id: string; sections: ProductSection[]; name?: string }>
  | InteractiveEnvelope<'catalog_message', { name: 'catalog_message' }>;

export type InteractiveShape = Interactive['type'];

// ============================================================================
// TEMPLATE
// ============================================================================

export type TemplateParameter =
  | { type: 'text'; text: string }
  | { type: 'image'; image: WireMedia }
  | { type: 'video'; video: WireMedia }
  | { type: 'document'; document: WireMedia }
  | { type: 'action'; action: { order_details: WireOrderDetails } }
  | { type: string; text: string };

export interface TemplateComponent {
  type: 'body' | 'header' | 'button';
  sub_type?: string;
  index?: number;
  parameters: TemplateParameter[];
}

export interface WireTemplate {
  name: string;
  language: { policy: 'deterministic'; code: string };
  components?: TemplateComponent[];
}

// ============================================================================
// MESSAGE BODY
// ============================================================================

interface Envelope {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
}

export type MediaBody =
  | { type: 'image'; image: WireMedia }
  | { type: 'sticker'; sticker: WireMedia }
  | { type: 'audio'; audio: WireMedia }
  | { type: 'video'; video: WireMedia }
  | { type: 'document'; document: WireMedia };

export type MessageBody = Envelope &
  (
    | { type: 'text'; text: { body: string; preview_url?: boolean } }
    | MediaBody
    | { type: 'template'; template: WireTemplate }
    | { type: 'interactive'; interactive: Interactive }
  );

// ============================================================================
// COMPILED PAYLOADS
// ============================================================================

/**
 * `message` payloads carry the text and attachments; `catalog` payloads
 * are product sends made after them in the same call.
 */
export type PayloadGroup = 'message' | 'catalog';

interface PayloadBase {
  method: 'POST';
  /** Relative to the provider API base. */
  path: string;
  group: PayloadGroup;
  body: MessageBody;
}

export type WirePayload =
  | (PayloadBase & { kind: 'text' })
  | (PayloadBase & { kind: 'media'; category: MediaCategory; captioned: boolean })
  | (PayloadBase & { kind: 'template'; hasMediaHeader: boolean })
  | (PayloadBase & { kind: 'interactive'; shape: InteractiveShape; mediaHeader: boolean });

export function mediaBody(category: MediaCategory, media: WireMedia): MediaBody {
  switch (category) {
    case 'image':
      return { type: 'image', image: media };
    case 'sticker':
      return { type: 'sticker', sticker: media };
    case 'audio':
      return { type: 'audio', audio: media };
    case 'video':
      return { type: 'video', video: media };
    case 'document':
      return { type: 'document', document: media };
  }
}
