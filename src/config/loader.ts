/**
 * msgate — Configuration Loader
 *
 * Reads/writes config from ~/.msgate/config.json, with environment overrides.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  GatewayConfigSchema,
  type ChannelConfig,
  type GatewayConfig,
} from './types.js';

// ============================================================================
// PATHS
// ============================================================================

const CLI_DIR_NAME = '.msgate';

export function getCliDir(): string {
  return join(homedir(), CLI_DIR_NAME);
}

export function getConfigPath(): string {
  return join(getCliDir(), 'config.json');
}

export function ensureCliDir(): void {
  const dir = getCliDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

// ============================================================================
// LOAD / SAVE
// ============================================================================

/**
 * Load config from disk. Returns defaults if file doesn't exist.
 * Environment variables override the file for the provider URL, the
 * system user token and the log level.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return applyEnvOverrides(readConfigFile(), env);
}

function readConfigFile(): GatewayConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return GatewayConfigSchema.parse({});
  }

  try {
    const raw = readFileSync(configPath, 'utf-8');
    const json: unknown = JSON.parse(raw);
    return GatewayConfigSchema.parse(json);
  } catch (error) {
    // Config file is corrupted — warn so the user knows
    process.stderr.write(
      `Warning: Config file corrupted (${error instanceof Error ? error.message : 'parse error'}), using defaults.\n`
    );
    return GatewayConfigSchema.parse({});
  }
}

function applyEnvOverrides(config: GatewayConfig, env: NodeJS.ProcessEnv): GatewayConfig {
  const level = env.MSGATE_LOG_LEVEL;
  return GatewayConfigSchema.parse({
    ...config,
    provider: {
      ...config.provider,
      ...(env.MSGATE_GRAPH_URL ? { graphUrl: env.MSGATE_GRAPH_URL } : {}),
      ...(env.MSGATE_SYSTEM_USER_TOKEN ? { systemUserToken: env.MSGATE_SYSTEM_USER_TOKEN } : {}),
    },
    logging: level ? { ...config.logging, level } : config.logging,
  });
}

/**
 * Save config to disk. Creates directory if needed.
 */
export function saveConfig(config: GatewayConfig): void {
  ensureCliDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), { mode: 0o600 });
}

// ============================================================================
// CHANNEL LOOKUP
// ============================================================================

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: 'CHANNEL_NOT_FOUND' | 'MISSING_TOKEN'
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function getChannelConfig(config: GatewayConfig, channelId: string): ChannelConfig {
  const channel = config.channels.find((c) => c.id === channelId);
  if (!channel) {
    throw new ConfigError(`Channel not configured: ${channelId}`, 'CHANNEL_NOT_FOUND');
  }
  return channel;
}

/**
 * Copy of the config with every token replaced by a short mask,
 * for display.
 */
export function maskSecrets(config: GatewayConfig): GatewayConfig {
  return {
    ...config,
    provider: {
      ...config.provider,
      systemUserToken: mask(config.provider.systemUserToken),
    },
    channels: config.channels.map((c) => ({ ...c, userToken: mask(c.userToken) })),
  };
}

function mask(secret: string | undefined): string | undefined {
  if (!secret) return secret;
  return secret.length <= 4 ? '****' : `${secret.slice(0, 4)}****`;
}
