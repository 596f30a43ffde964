/**
 * msgate — Default Configuration
 */

import { GatewayConfigSchema, type GatewayConfig } from './types.js';

export const DEFAULT_CONFIG: GatewayConfig = GatewayConfigSchema.parse({});

export const CLI_VERSION = '0.1.0';

/**
 * Full version string for --version output.
 * Example: msgate/0.1.0 linux-x64 node-v20.11.0
 */
export const VERSION_STRING =
  `msgate/${CLI_VERSION} ${process.platform}-${process.arch} node-${process.version}`;
