/**
 * msgate — Configuration Types & Schema
 */

import { z } from 'zod';

// ============================================================================
// ZOD SCHEMA
// ============================================================================

export const ProviderConfigSchema = z.object({
  graphUrl: z.string().url().default('https://graph.facebook.com/v12.0'),
  systemUserToken: z.string().optional(),
  userAgent: z.string().default('msgate/0.1.0'),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseBackoffMs: z.number().int().nonnegative().default(500),
});

export const MediaConfigSchema = z.object({
  failureTtlSeconds: z.number().int().positive().default(15 * 60),
  maxCachedHandles: z.number().int().positive().default(10_000),
});

export const LimitsConfigSchema = z.object({
  maxMessageLength: z.number().int().positive().default(4096),
  maxInteractiveLength: z.number().int().positive().default(1024),
  maxButtons: z.number().int().positive().default(3),
  maxQuickReplies: z.number().int().positive().default(10),
  maxProductSections: z.number().int().positive().default(6),
  maxSectionTitleLength: z.number().int().positive().default(24),
});

export const ChannelConfigSchema = z.object({
  id: z.string().min(1),
  /** Provider phone-number id the channel sends from. */
  address: z.string().min(1),
  type: z.literal('WAC').default('WAC'),
  userToken: z.string().optional(),
  catalogId: z.string().optional(),
  authMode: z.enum(['header', 'query']).default('header'),
  templateMediaRequiresHandle: z.boolean().default(false),
});

export const BillingConfigSchema = z.object({
  outboxPath: z.string().optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const GatewayConfigSchema = z.object({
  provider: ProviderConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  media: MediaConfigSchema.default({}),
  limits: LimitsConfigSchema.default({}),
  channels: z.array(ChannelConfigSchema).default([]),
  billing: BillingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type MediaConfig = z.infer<typeof MediaConfigSchema>;
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
export type ChannelConfig = z.infer<typeof ChannelConfigSchema>;
export type BillingConfig = z.infer<typeof BillingConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
