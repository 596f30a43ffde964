/**
 * msgate — WhatsApp Cloud Payload Compiler
 *
 * Turns one Outbound Message into the ordered Wire Payloads that
 * represent it. Every shape check runs before the first media
 * resolution, so a CompilationError never follows network I/O.
 *
 * Precedence: template > explicit interaction type > quick replies or
 * list items > plain text and attachments. Product sends compile
 * independently and come last.
 */

import { randomUUID } from 'node:crypto';
import type { ChannelConfig, LimitsConfig } from '../../config/types.js';
import { MediaResolutionError, urlBaseName, type MediaResolution } from '../../media/resolver.js';
import {
  acceptsCaption,
  mediaCategory,
  type Attachment,
  type MediaCategory,
} from '../../messages/attachments.js';
import { CompilationError } from '../../messages/errors.js';
import { splitText } from '../../messages/split.js';
import { listButtonLabel, templateLanguageCode } from '../../messages/templates.js';
import {
  urnPath,
  type Cta,
  type Flow,
  type OrderDetails,
  type OutboundMessage,
  type Template,
} from '../../messages/types.js';
import { hasLink, unescapeLabel } from './format.js';
import { mountOrderDetails } from './order-details.js';
import { compileProducts } from './products.js';
import {
  mediaBody,
  type Interactive,
  type InteractiveHeader,
  type ListRow,
  type TemplateComponent,
  type WireMedia,
  type WirePayload,
} from './wire.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CompileContext {
  channel: ChannelConfig;
  limits: LimitsConfig;
  /** Uploads an attachment. Without it, media is referenced by link. */
  resolveMedia?: (attachment: Attachment) => Promise<MediaResolution>;
  /** Token for flow messages; a random UUID by default. */
  flowToken?: () => string;
}

type Mode =
  | { kind: 'none' }
  | { kind: 'button'; replies: string[] }
  | { kind: 'list'; rows: ListRow[] }
  | { kind: 'location' }
  | { kind: 'cta_url'; cta: Cta }
  | { kind: 'flow_msg'; flow: Flow }
  | { kind: 'order_details'; details: OrderDetails };

type InteractiveMode = Exclude<Mode, { kind: 'none' }>;

type HeaderCategory = 'image' | 'video' | 'document';

interface PlannedAttachment {
  attachment: Attachment;
  category: MediaCategory;
}

interface HeaderAttachment extends PlannedAttachment {
  category: HeaderCategory;
}

/** Per-call state shared by the builders below. */
interface Compilation {
  message: OutboundMessage;
  ctx: CompileContext;
  to: string;
  path: string;
}

// ============================================================================
// COMPILE
// ============================================================================

/**
 * Compile `message` for `ctx.channel`.
 *
 * @throws CompilationError when the message cannot be expressed within
 *   the channel limits.
 * @throws MediaResolutionError when a template header needs an uploaded
 *   handle and none could be obtained.
 */
export async function compile(message: OutboundMessage, ctx: CompileContext): Promise<WirePayload[]> {
  validateChoices(message, ctx.limits);

  const to = urnPath(message.urn);
  const c: Compilation = { message, ctx, to, path: `/${ctx.channel.address}/messages` };

  const products = compileProducts(message, ctx.channel, ctx.limits, to);
  const payloads = message.template
    ? [await compileTemplate(message.template, c)]
    : await compileMessage(c);

  return [...payloads, ...products];
}

function validateChoices(message: OutboundMessage, limits: LimitsConfig): void {
  const replies = message.quickReplies.length;
  if (replies > limits.maxQuickReplies) {
    throw new CompilationError(
      `too many quick replies, WhatsApp Cloud supports only up to ${limits.maxQuickReplies} quick replies`,
      'TOO_MANY_QUICK_REPLIES'
    );
  }
  if (replies > 0 && (message.listMessage?.items.length ?? 0) > 0) {
    throw new CompilationError('quick replies and list items cannot be combined', 'INVALID_MESSAGE');
  }
}

// ============================================================================
// TEMPLATE
// ============================================================================

async function compileTemplate(template: Template, c: Compilation): Promise<WirePayload> {
  const { message } = c;
  const code = templateLanguageCode(template);

  const [first] = message.attachments;
  const headerType = first ? templateHeaderType(first) : undefined;

  const components: TemplateComponent[] = [];

  if (template.variables.length > 0) {
    components.push({
      type: 'body',
      parameters: template.variables.map((text) => ({ type: 'text', text })),
    });
  }

  if (first && headerType) {
    const media = await templateMedia(first, c);
    components.push({
      type: 'header',
      parameters: [headerParameter(headerType, headerType === 'document' ? withFilename(media, first) : media)],
    });
  }

  if (message.orderDetails) {
    components.push({
      type: 'button',
      sub_type: 'order_details',
      index: 0,
      parameters: [
        {
          type: 'action',
          action: { order_details: mountOrderDetails(message.orderDetails, orderCatalogId(c)) },
        },
      ],
    });
  }

  message.templateButtons.forEach((button, index) => {
    components.push({
      type: 'button',
      sub_type: button.subType,
      index,
      parameters: button.parameters.map((p) => ({ type: p.type, text: p.text })),
    });
  });

  return {
    kind: 'template',
    hasMediaHeader: first !== undefined,
    group: 'message',
    method: 'POST',
    path: c.path,
    body: {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: c.to,
      type: 'template',
      template: {
        name: template.name,
        language: { policy: 'deterministic', code },
        ...(components.length > 0 ? { components } : {}),
      },
    },
  };
}

/** Template headers take the top-level mime type; stickers go as images. */
function templateHeaderType(attachment: Attachment): HeaderCategory {
  const type = attachment.mimeType.toLowerCase().split('/')[0];
  switch (type) {
    case 'image':
    case 'video':
      return type;
    case 'application':
      return 'document';
    default:
      throw new CompilationError(`unknown attachment mime type: ${attachment.mimeType}`, 'UNSUPPORTED_MEDIA');
  }
}

function headerParameter(type: HeaderCategory, media: WireMedia): InteractiveHeader {
  switch (type) {
    case 'image':
      return { type: 'image', image: media };
    case 'video':
      return { type: 'video', video: media };
    case 'document':
      return { type: 'document', document: media };
  }
}

async function templateMedia(attachment: Attachment, c: Compilation): Promise<WireMedia> {
  const { resolveMedia, channel } = c.ctx;
  if (!resolveMedia) return { link: attachment.url };

  const resolution = await resolveMedia(attachment);
  if (resolution.handle) return { id: resolution.handle };

  if (channel.templateMediaRequiresHandle) {
    throw (
      resolution.error ??
      new MediaResolutionError(`template header requires an uploaded media: ${attachment.url}`, 'UPLOAD_FAILED')
    );
  }
  return { link: attachment.url };
}

// ============================================================================
// TEXT, ATTACHMENTS & INTERACTIVE
// ============================================================================

async function compileMessage(c: Compilation): Promise<WirePayload[]> {
  const { message, ctx } = c;
  const mode = interactionMode(message, ctx.limits);

  const parts = splitText(message.text, textLimit(message, ctx.limits));
  if (mode.kind !== 'none' && parts.length === 0) {
    throw new CompilationError('message body cannot be empty', 'EMPTY_BODY');
  }

  // unknown categories still travel, as documents
  const attachments: PlannedAttachment[] = message.attachments.map((attachment) => ({
    attachment,
    category: mediaCategory(attachment.mimeType) ?? 'document',
  }));

  // ── Caption fusion ──

  const [only] = attachments;
  const [caption] = parts;
  if (
    mode.kind === 'none' &&
    only &&
    attachments.length === 1 &&
    caption !== undefined &&
    parts.length === 1 &&
    acceptsCaption(only.category)
  ) {
    return [await mediaPayload(only, c, caption)];
  }

  // ── Media header fusion ──

  const fused = headerAttachment(mode, attachments);

  const payloads: WirePayload[] = [];
  for (const planned of attachments) {
    if (planned !== fused) {
      payloads.push(await mediaPayload(planned, c));
    }
  }
  const mediaHeader = fused ? await interactiveMediaHeader(fused, c) : undefined;

  if (mode.kind === 'none') {
    for (const part of parts) payloads.push(textPayload(part, c));
    return payloads;
  }

  // interactive content rides on the last part
  const last = parts.length - 1;
  for (const part of parts.slice(0, last)) payloads.push(textPayload(part, c));
  payloads.push(interactivePayload(mode, parts[last] ?? '', mediaHeader, c));
  return payloads;
}

function interactionMode(message: OutboundMessage, limits: LimitsConfig): Mode {
  switch (message.interactionType) {
    case 'location':
      return { kind: 'location' };
    case 'cta_url':
      if (!message.cta) {
        throw new CompilationError('cta_url interaction requires a call to action', 'INVALID_MESSAGE');
      }
      return { kind: 'cta_url', cta: message.cta };
    case 'flow_msg':
      if (!message.flow) {
        throw new CompilationError('flow_msg interaction requires a flow', 'INVALID_MESSAGE');
      }
      return { kind: 'flow_msg', flow: message.flow };
    case 'order_details':
      if (!message.orderDetails) {
        throw new CompilationError('order_details interaction requires order details', 'INVALID_MESSAGE');
      }
      return { kind: 'order_details', details: message.orderDetails };
    case undefined:
      break;
  }

  const replies = message.quickReplies;
  if (replies.length > 0 && replies.length <= limits.maxButtons) {
    return { kind: 'button', replies };
  }
  if (replies.length > 0) {
    return {
      kind: 'list',
      rows: replies.map((title, i) => ({ id: String(i), title: unescapeLabel(title) })),
    };
  }

  const items = message.listMessage?.items ?? [];
  if (items.length > 0) {
    return {
      kind: 'list',
      rows: items.map((item) => ({
        id: item.id,
        title: unescapeLabel(item.title),
        ...(item.description ? { description: unescapeLabel(item.description) } : {}),
      })),
    };
  }

  return { kind: 'none' };
}

/** Quick replies, list items and location requests need room for their own content. */
function textLimit(message: OutboundMessage, limits: LimitsConfig): number {
  const interactive =
    message.quickReplies.length > 0 ||
    (message.listMessage?.items.length ?? 0) > 0 ||
    message.interactionType === 'location';
  return interactive ? limits.maxInteractiveLength : limits.maxMessageLength;
}

/**
 * The attachment shown as the interactive header, if any. Buttons take
 * the first image, video or document; order details take the first
 * attachment, which must be an image.
 */
function headerAttachment(mode: Mode, attachments: PlannedAttachment[]): HeaderAttachment | undefined {
  if (mode.kind === 'button') {
    return attachments.find((a): a is HeaderAttachment => isHeaderCategory(a.category));
  }

  const [first] = attachments;
  if (mode.kind === 'order_details' && first) {
    if (!first.attachment.mimeType.toLowerCase().startsWith('image/')) {
      throw new CompilationError(
        'interactive order details message does not support attachments other than images',
        'UNSUPPORTED_MEDIA'
      );
    }
    return { attachment: first.attachment, category: 'image' };
  }
  return undefined;
}

function isHeaderCategory(category: MediaCategory): category is HeaderCategory {
  return category === 'image' || category === 'video' || category === 'document';
}

function interactivePayload(
  mode: InteractiveMode,
  text: string,
  mediaHeader: InteractiveHeader | undefined,
  c: Compilation
): WirePayload {
  const { message } = c;
  const body = { text };
  const footer = message.footer ? { text: unescapeLabel(message.footer) } : undefined;
  const header: InteractiveHeader | undefined = message.headerText
    ? { type: 'text', text: unescapeLabel(message.headerText) }
    : undefined;

  let interactive: Interactive;
  switch (mode.kind) {
    case 'button':
      interactive = {
        type: 'button',
        header: mediaHeader ?? header,
        body,
        footer,
        action: {
          buttons: mode.replies.map((title, i) => ({
            type: 'reply',
            reply: { id: String(i), title: unescapeLabel(title) },
          })),
        },
      };
      break;
    case 'list':
      interactive = {
        type: 'list',
        header,
        body,
        footer,
        action: {
          button: message.listMessage?.buttonText || listButtonLabel(message.textLanguage),
          sections: [{ rows: mode.rows }],
        },
      };
      break;
    case 'location':
      interactive = { type: 'location_request_message', body, action: { name: 'send_location' } };
      break;
    case 'cta_url':
      interactive = {
        type: 'cta_url',
        header,
        body,
        footer,
        action: {
          name: 'cta_url',
          parameters: { display_text: unescapeLabel(mode.cta.displayText), url: mode.cta.url },
        },
      };
      break;
    case 'flow_msg':
      interactive = {
        type: 'flow',
        header,
        body,
        footer,
        action: {
          name: 'flow',
          parameters: {
            mode: mode.flow.mode,
            flow_message_version: '3',
            flow_token: (c.ctx.flowToken ?? randomUUID)(),
            flow_id: mode.flow.id,
            flow_cta: unescapeLabel(mode.flow.cta),
            flow_action: 'navigate',
            flow_action_payload: {
              screen: mode.flow.screen,
              ...(mode.flow.data ? { data: mode.flow.data } : {}),
            },
          },
        },
      };
      break;
    case 'order_details':
      interactive = {
        type: 'order_details',
        header: mediaHeader,
        body,
        footer,
        action: {
          name: 'review_and_pay',
          parameters: mountOrderDetails(mode.details, orderCatalogId(c)),
        },
      };
      break;
    default: {
      const unreachable: never = mode;
      throw new Error(`unhandled interaction mode: ${JSON.stringify(unreachable)}`);
    }
  }

  return {
    kind: 'interactive',
    shape: interactive.type,
    mediaHeader: mediaHeader !== undefined,
    group: 'message',
    method: 'POST',
    path: c.path,
    body: {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: c.to,
      type: 'interactive',
      interactive,
    },
  };
}

// ============================================================================
// PAYLOAD BUILDERS
// ============================================================================

function textPayload(part: string, c: Compilation): WirePayload {
  return {
    kind: 'text',
    group: 'message',
    method: 'POST',
    path: c.path,
    body: {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: c.to,
      type: 'text',
      text: { body: part, ...(hasLink(part) ? { preview_url: true } : {}) },
    },
  };
}

async function mediaPayload(planned: PlannedAttachment, c: Compilation, caption?: string): Promise<WirePayload> {
  const { attachment, category } = planned;
  let media = await mediaRef(attachment, c);
  if (category === 'document') media = withFilename(media, attachment);
  if (caption !== undefined) media = { ...media, caption };

  return {
    kind: 'media',
    category,
    captioned: caption !== undefined,
    group: 'message',
    method: 'POST',
    path: c.path,
    body: {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: c.to,
      ...mediaBody(category, media),
    },
  };
}

async function interactiveMediaHeader(fused: HeaderAttachment, c: Compilation): Promise<InteractiveHeader> {
  const media = await mediaRef(fused.attachment, c);
  return headerParameter(
    fused.category,
    fused.category === 'document' ? withFilename(media, fused.attachment) : media
  );
}

/** An uploaded handle when one resolves, else the source URL. */
async function mediaRef(attachment: Attachment, c: Compilation): Promise<WireMedia> {
  const { resolveMedia } = c.ctx;
  if (!resolveMedia) return { link: attachment.url };

  const resolution = await resolveMedia(attachment);
  return resolution.handle ? { id: resolution.handle } : { link: attachment.url };
}

function withFilename(media: WireMedia, attachment: Attachment): WireMedia {
  const filename = urlBaseName(attachment.url);
  return filename ? { ...media, filename } : media;
}

/** The channel catalog wins over the one carried by the order. */
function orderCatalogId(c: Compilation): string | undefined {
  return c.ctx.channel.catalogId ?? c.message.orderDetails?.catalogId;
}
