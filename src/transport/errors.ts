/**
 * msgate — Transport Errors
 */

export type TransportErrorCode =
  | 'RETRYABLE_STATUS'
  | 'HTTP_STATUS'
  | 'CONNECTION_RESET'
  | 'TIMEOUT'
  | 'TLS'
  | 'NETWORK'
  | 'ABORTED'
  | 'MALFORMED_RESPONSE';

export class TransportError extends Error {
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly code: TransportErrorCode,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** Network failures, 429 and gateway errors. Retried. */
export class TransientTransportError extends TransportError {
  override readonly retryable = true;

  constructor(
    message: string,
    code: TransportErrorCode,
    statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, code, statusCode, options);
    this.name = 'TransientTransportError';
  }
}

/** Any other failure, including a response the caller cannot parse. Never retried. */
export class TerminalTransportError extends TransportError {
  constructor(
    message: string,
    code: TransportErrorCode,
    statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, code, statusCode, options);
    this.name = 'TerminalTransportError';
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

const RESET_CODES = new Set(['ECONNRESET', 'UND_ERR_SOCKET', 'EPIPE']);
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TEMPORARY_CODES = new Set(['EAI_AGAIN']);
const TLS_RECORD_CODES = new Set(['ERR_SSL_WRONG_VERSION_NUMBER', 'EPROTO']);

export function statusError(statusCode: number): TransportError {
  const message = `received non-2xx status: ${statusCode}`;
  return RETRYABLE_STATUS_CODES.has(statusCode)
    ? new TransientTransportError(message, 'RETRYABLE_STATUS', statusCode)
    : new TerminalTransportError(message, 'HTTP_STATUS', statusCode);
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

function errorName(value: unknown): string | undefined {
  return value instanceof Error ? value.name : undefined;
}

/** Errors along the `cause` chain, outermost first. */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < 8) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

/**
 * Map an error thrown by fetch (or by reading the body) onto the
 * transient/terminal split. undici wraps socket errors in
 * `TypeError('fetch failed')` with the system error as `cause`.
 */
export function classifyFetchError(error: unknown, aborted: boolean): TransportError {
  const message = `unable to connect to server: ${innermostMessage(error)}`;

  if (aborted) {
    return new TerminalTransportError(message, 'ABORTED', undefined, { cause: error });
  }

  for (const link of causeChain(error)) {
    const name = errorName(link);
    if (name === 'TimeoutError') {
      return new TransientTransportError(message, 'TIMEOUT', undefined, { cause: error });
    }

    const code = errorCode(link);
    if (code === undefined) continue;
    if (RESET_CODES.has(code)) {
      return new TransientTransportError(message, 'CONNECTION_RESET', undefined, { cause: error });
    }
    if (TIMEOUT_CODES.has(code)) {
      return new TransientTransportError(message, 'TIMEOUT', undefined, { cause: error });
    }
    if (TEMPORARY_CODES.has(code)) {
      return new TransientTransportError(message, 'NETWORK', undefined, { cause: error });
    }
    if (TLS_RECORD_CODES.has(code)) {
      return new TransientTransportError(message, 'TLS', undefined, { cause: error });
    }
  }

  return new TerminalTransportError(message, 'NETWORK', undefined, { cause: error });
}

function innermostMessage(error: unknown): string {
  const chain = causeChain(error);
  const innermost = chain[chain.length - 1];
  if (innermost instanceof Error) return innermost.message;
  return String(innermost ?? error);
}
