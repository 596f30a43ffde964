/**
 * msgate — Channel Registry
 *
 * Maps channel types to sender factories. Senders register themselves
 * at import time and the registry provides lookup by type.
 *
 * Senders are lazy-loaded on first access via `ensureChannelsLoaded()`
 * to keep startup fast for commands that never send.
 */

import type { ChannelType, SenderFactory } from './types.js';

const factories = new Map<ChannelType, SenderFactory>();
let loadPromise: Promise<void> | null = null;

export function registerChannel(type: ChannelType, factory: SenderFactory): void {
  factories.set(type, factory);
}

/**
 * Lazy-load all senders. Idempotent — safe to call concurrently.
 * This triggers the side-effect imports that register each sender.
 */
export async function ensureChannelsLoaded(): Promise<void> {
  if (loadPromise) return loadPromise;

  loadPromise = Promise.all([import('./whatsapp-cloud/index.js')]).then(() => {});

  return loadPromise;
}

export function getSenderFactory(type: ChannelType): SenderFactory | undefined {
  return factories.get(type);
}

export function listChannelTypes(): ChannelType[] {
  return Array.from(factories.keys());
}
