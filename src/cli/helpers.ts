/**
 * msgate — Shared CLI Helpers
 *
 * Common utilities used across CLI command files.
 */

import { readFileSync } from 'node:fs';
import { ZodError } from 'zod';
import type { SenderDeps } from '../channels/types.js';
import { ConfigError } from '../config/loader.js';
import type { GatewayConfig } from '../config/types.js';
import { InMemoryMediaCache } from '../media/cache.js';
import { MediaResolver } from '../media/resolver.js';
import { CompilationError } from '../messages/errors.js';
import { OutboundMessageSchema, type OutboundMessage } from '../messages/types.js';
import { HttpTransport } from '../transport/http.js';
import { ExitCode, printFailure } from '../utils/output.js';

// ============================================================================
// INPUT FILES
// ============================================================================

/** Read and parse a JSON file. */
export function readJsonFile(path: string): unknown {
  const raw = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** @throws ZodError when the file is not an outbound message. */
export function loadMessage(path: string): OutboundMessage {
  return OutboundMessageSchema.parse(readJsonFile(path));
}

// ============================================================================
// SENDER WIRING
// ============================================================================

export function buildSenderDeps(config: GatewayConfig): SenderDeps {
  const transport = new HttpTransport({
    userAgent: config.provider.userAgent,
    timeoutMs: config.provider.timeoutMs,
  });
  const media = new MediaResolver({
    transport,
    cache: new InMemoryMediaCache({ maxEntriesPerChannel: config.media.maxCachedHandles }),
    graphUrl: config.provider.graphUrl,
    failureTtlMs: config.media.failureTtlSeconds * 1000,
  });
  return { config, transport, media };
}

// ============================================================================
// ERROR OUTPUT
// ============================================================================

/**
 * Print a structured error message and set process exit code.
 */
export function printError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  printFailure({
    code: 'COMMAND_ERROR',
    message: `${context}: ${message}`,
  });
  process.exitCode = ExitCode.GENERAL_ERROR;
}

/**
 * Report a command failure with the exit code its kind calls for.
 */
export function handleCommandError(context: string, error: unknown): void {
  if (error instanceof ZodError) {
    printFailure({
      code: 'INVALID_INPUT',
      message: `${context}: invalid input`,
      hint: formatIssues(error),
    });
    process.exitCode = ExitCode.USAGE_ERROR;
    return;
  }

  if (error instanceof ConfigError) {
    printFailure({
      code: error.code,
      message: error.message,
      hint:
        error.code === 'CHANNEL_NOT_FOUND'
          ? 'Add the channel to ~/.msgate/config.json (see `msgate config show`).'
          : 'Set a channel userToken or MSGATE_SYSTEM_USER_TOKEN.',
    });
    process.exitCode = error.code === 'CHANNEL_NOT_FOUND' ? ExitCode.CHANNEL_NOT_FOUND : ExitCode.MISSING_TOKEN;
    return;
  }

  if (error instanceof CompilationError) {
    printFailure({ code: error.code, message: `${context}: ${error.message}` });
    process.exitCode = ExitCode.GENERAL_ERROR;
    return;
  }

  printError(context, error);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n  ');
}

// ============================================================================
// DID-YOU-MEAN
// ============================================================================

/**
 * Simple Levenshtein distance for "did you mean?" suggestions.
 */
function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/**
 * Find the closest match from a list of candidates.
 * Returns the candidate if the distance is <= maxDistance, otherwise undefined.
 */
export function didYouMean(
  input: string,
  candidates: string[],
  maxDistance = 3
): string | undefined {
  let best: string | undefined;
  let bestDist = maxDistance + 1;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist) {
      bestDist = dist;
      best = candidate;
    }
  }

  return bestDist <= maxDistance ? best : undefined;
}
