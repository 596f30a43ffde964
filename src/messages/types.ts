/**
 * msgate — Outbound Message Model
 *
 * The provider-neutral description of what to send. Parsed from JSON with
 * zod; attachments given as `mime/type:url` strings are normalized to
 * objects at parse time.
 */

import { z } from 'zod';
import { splitAttachment, type Attachment } from './attachments.js';

// ============================================================================
// ATTACHMENTS
// ============================================================================

const AttachmentObjectSchema = z.object({
  mimeType: z.string().min(1),
  url: z.string().min(1),
});

export const AttachmentSchema = z.union([
  AttachmentObjectSchema,
  z.string().transform((value, ctx): Attachment => {
    const attachment = splitAttachment(value);
    if (!attachment) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `attachment must look like "mime/type:url": ${value}`,
      });
      return z.NEVER;
    }
    return attachment;
  }),
]);

// ============================================================================
// STRUCTURED CONTENT
// ============================================================================

export const ListItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string().optional(),
});

export const ListMessageSchema = z.object({
  buttonText: z.string().optional(),
  items: z.array(ListItemSchema).default([]),
});

export const TemplateSchema = z.object({
  name: z.string().min(1),
  uuid: z.string().optional(),
  /** ISO 639-3, e.g. "eng". */
  language: z.string().min(1),
  /** ISO 3166-1 alpha-2, e.g. "US". */
  country: z.string().optional(),
  namespace: z.string().optional(),
  variables: z.array(z.string()).default([]),
});

export const TemplateButtonSchema = z.object({
  subType: z.string().min(1),
  parameters: z
    .array(z.object({ type: z.string().min(1), text: z.string() }))
    .default([]),
});

const AmountSchema = z.object({
  value: z.number().int(),
  offset: z.number().int().positive().default(100),
});

const AmountWithDescriptionSchema = z.object({
  value: z.number().int().nonnegative().default(0),
  description: z.string().optional(),
});

export const OrderItemSchema = z.object({
  retailerId: z.string().min(1),
  name: z.string().min(1),
  quantity: z.number().int().positive(),
  amount: AmountSchema,
  saleAmount: AmountSchema.optional(),
});

export const OrderDetailsSchema = z.object({
  referenceId: z.string().min(1),
  /** Order type, e.g. "digital-goods". */
  type: z.string().min(1),
  currency: z.string().default('BRL'),
  paymentType: z.string().default('br'),
  /** Amounts below are in units of 1/100. */
  totalAmount: z.number().int().nonnegative(),
  catalogId: z.string().optional(),
  paymentSettings: z
    .object({
      paymentLink: z.string().url().optional(),
      pix: z
        .object({
          code: z.string().min(1),
          merchantName: z.string(),
          key: z.string(),
          keyType: z.string(),
        })
        .optional(),
    })
    .default({}),
  order: z.object({
    items: z.array(OrderItemSchema).min(1),
    subtotal: z.number().int().nonnegative(),
    tax: AmountWithDescriptionSchema.default({}),
    shipping: AmountWithDescriptionSchema.optional(),
    discount: AmountWithDescriptionSchema.extend({ programName: z.string().optional() }).optional(),
  }),
});

export const CtaSchema = z.object({
  url: z.string().url(),
  displayText: z.string().min(1),
});

export const FlowSchema = z.object({
  id: z.string().min(1),
  screen: z.string().min(1),
  cta: z.string().min(1),
  mode: z.enum(['draft', 'published']).default('published'),
  data: z.record(z.unknown()).optional(),
});

export const ProductSchema = z.object({
  /** Section title; "product_retailer_id" is shown as "items". */
  title: z.string().min(1),
  retailerIds: z.array(z.string().min(1)).min(1),
});

export const InteractionTypeSchema = z.enum(['location', 'cta_url', 'flow_msg', 'order_details']);

// ============================================================================
// OUTBOUND MESSAGE
// ============================================================================

export const OutboundMessageSchema = z.object({
  uuid: z.string().optional(),
  /** Contact address with scheme, e.g. "whatsapp:250788123123". */
  urn: z.string().regex(/^[a-z][a-z0-9-]*:.+$/, 'urn must look like "scheme:path"'),
  text: z.string().default(''),
  /** BCP 47, e.g. "pt-BR". Picks the localized list button label. */
  textLanguage: z.string().optional(),
  attachments: z.array(AttachmentSchema).default([]),
  quickReplies: z.array(z.string().min(1)).default([]),
  listMessage: ListMessageSchema.optional(),
  headerText: z.string().optional(),
  footer: z.string().optional(),
  /** Body of product and catalog sends. */
  body: z.string().optional(),
  /** Action label of product sends, e.g. "View Products". */
  action: z.string().optional(),
  template: TemplateSchema.optional(),
  templateButtons: z.array(TemplateButtonSchema).default([]),
  orderDetails: OrderDetailsSchema.optional(),
  cta: CtaSchema.optional(),
  flow: FlowSchema.optional(),
  interactionType: InteractionTypeSchema.optional(),
  products: z.array(ProductSchema).default([]),
  sendCatalog: z.boolean().default(false),
});

export type { Attachment };
export type OutboundMessage = z.infer<typeof OutboundMessageSchema>;
export type OutboundMessageInput = z.input<typeof OutboundMessageSchema>;
export type ListItem = z.infer<typeof ListItemSchema>;
export type Template = z.infer<typeof TemplateSchema>;
export type TemplateButton = z.infer<typeof TemplateButtonSchema>;
export type OrderDetails = z.infer<typeof OrderDetailsSchema>;
export type OrderItem = z.infer<typeof OrderItemSchema>;
export type Cta = z.infer<typeof CtaSchema>;
export type Flow = z.infer<typeof FlowSchema>;
export type Product = z.infer<typeof ProductSchema>;
export type InteractionType = z.infer<typeof InteractionTypeSchema>;

/** Path part of the message URN: the recipient address. */
export function urnPath(urn: string): string {
  return urn.slice(urn.indexOf(':') + 1);
}
