/**
 * msgate — HTTP Transport & Retry Engine
 *
 * Sends a re-sendable request with bounded retries. Transient failures
 * (429, 502-504, resets, timeouts, TLS record errors) are retried with
 * jittered exponential backoff; anything else ends the loop. Every
 * attempt is traced; nothing is logged here.
 */

import { computeBackoff, sleep as defaultSleep, type RandomSource } from '../utils/backoff.js';
import {
  TerminalTransportError,
  classifyFetchError,
  statusError,
  type TransportError,
} from './errors.js';
import type {
  HttpMethod,
  HttpRequest,
  RequestTrace,
  SendOptions,
  TraceStatus,
  TransportResult,
} from './types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEFAULT_TIMEOUT_MS = 60_000;

const IDEMPOTENT_KEY_METHODS: ReadonlySet<HttpMethod> = new Set(['POST', 'PUT', 'PATCH']);

const TEXT_CONTENT_TYPE = /^(text\/|application\/(json|xml|x-www-form-urlencoded)|[^;]*\+json)/i;

export interface HttpTransportConfig {
  /** Sent as `User-Agent` unless the request sets its own. */
  userAgent?: string;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Defaults to the global fetch, looked up on each call. */
  fetch?: typeof fetch;
  random?: RandomSource;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface Snapshot {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body: string | Uint8Array | undefined;
}

interface Attempt {
  trace: RequestTrace;
  error?: TransportError;
}

// ============================================================================
// TRANSPORT
// ============================================================================

export class HttpTransport {
  private readonly userAgent: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly random: RandomSource | undefined;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(config: HttpTransportConfig = {}) {
    this.userAgent = config.userAgent;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch;
    this.random = config.random;
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Send `request`, retrying transient failures.
   *
   * Returns on the first 2xx. Otherwise returns the trace and error of the
   * last attempt made, after at most `maxAttempts` requests (at least one).
   * A caller abort stops the loop without waiting out the backoff.
   */
  async send(request: HttpRequest, options: SendOptions = {}): Promise<TransportResult> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? 1);
    const baseBackoffMs = options.baseBackoffMs ?? 0;
    const { idempotencyKey, signal } = options;

    const snapshot = this.snapshot(request);

    for (let attempts = 1; ; attempts++) {
      const headers: Record<string, string> = { ...snapshot.headers };
      if (idempotencyKey && IDEMPOTENT_KEY_METHODS.has(snapshot.method)) {
        headers['Idempotency-Key'] = idempotencyKey;
      }
      // no connection reuse across attempts
      headers['Connection'] = 'close';

      const { trace, error } = await this.attempt(snapshot, headers, signal);

      if (!error) {
        return { trace, attempts };
      }
      if (!error.retryable || attempts >= maxAttempts || signal?.aborted) {
        return { trace, error, attempts };
      }

      try {
        await this.sleep(computeBackoff(baseBackoffMs, attempts - 1, this.random), signal);
      } catch {
        // aborted while waiting: keep the last attempt's outcome
        return { trace, error, attempts };
      }
    }
  }

  // ── Internal ──────────────────────────────────────────────────────────────

  private snapshot(request: HttpRequest): Snapshot {
    const headers: Record<string, string> = {};
    if (this.userAgent) headers['User-Agent'] = this.userAgent;
    Object.assign(headers, request.headers);

    return {
      method: request.method,
      url: request.url,
      headers,
      body: request.body instanceof Uint8Array ? request.body.slice() : request.body,
    };
  }

  private async attempt(
    snapshot: Snapshot,
    headers: Record<string, string>,
    signal: AbortSignal | undefined
  ): Promise<Attempt> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const attemptSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;
    const requestDump = dumpRequest(snapshot, headers);
    const fetchImpl = this.fetchImpl ?? fetch;
    const started = performance.now();

    let response: Response;
    let body: Uint8Array;
    try {
      response = await fetchImpl(snapshot.url, {
        method: snapshot.method,
        headers,
        body: snapshot.body,
        signal: attemptSignal,
      });
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      return {
        trace: {
          method: snapshot.method,
          url: redactUrl(snapshot.url),
          status: 'connection_failure',
          statusCode: 0,
          request: requestDump,
          response: '',
          body: new Uint8Array(),
          contentType: undefined,
          elapsedMs: Math.round(performance.now() - started),
        },
        error: classifyFetchError(error, signal?.aborted === true),
      };
    }

    const ok = response.status >= 200 && response.status < 300;
    const status: TraceStatus = ok ? 'success' : 'status_failure';
    const contentType = response.headers.get('content-type') ?? undefined;

    return {
      trace: {
        method: snapshot.method,
        url: redactUrl(snapshot.url),
        status,
        statusCode: response.status,
        request: requestDump,
        response: dumpResponse(response, body, contentType),
        body,
        contentType,
        elapsedMs: Math.round(performance.now() - started),
      },
      error: ok ? undefined : statusError(response.status),
    };
  }
}

/**
 * Failure for a 2xx response whose body the caller could not use.
 * Never retried.
 */
export function malformedResponse(trace: RequestTrace, reason: string): TransportError {
  return new TerminalTransportError(
    `malformed response: ${reason}`,
    'MALFORMED_RESPONSE',
    trace.statusCode
  );
}

// ============================================================================
// TRACE FORMATTING
// ============================================================================

const decoder = new TextDecoder();

/** Mask `access_token` query values. */
export function redactUrl(url: string): string {
  return url.replace(/([?&]access_token=)[^&#]*/g, '$1****');
}

function dumpRequest(snapshot: Snapshot, headers: Record<string, string>): string {
  const lines = [`${snapshot.method} ${redactUrl(snapshot.url)}`];
  for (const [name, value] of Object.entries(headers)) {
    lines.push(`${name}: ${name.toLowerCase() === 'authorization' ? redactAuthorization(value) : value}`);
  }

  let text = lines.join('\r\n') + '\r\n\r\n';
  if (typeof snapshot.body === 'string') {
    text += snapshot.body;
  } else if (snapshot.body) {
    text += bodyText(snapshot.body, headers['Content-Type'] ?? headers['content-type']);
  }
  return text;
}

function dumpResponse(response: Response, body: Uint8Array, contentType: string | undefined): string {
  const lines = [`HTTP ${response.status} ${response.statusText}`.trimEnd()];
  response.headers.forEach((value, name) => {
    lines.push(`${name}: ${value}`);
  });
  return lines.join('\r\n') + '\r\n\r\n' + bodyText(body, contentType);
}

function bodyText(body: Uint8Array, contentType: string | undefined): string {
  if (body.byteLength === 0) return '';
  if (contentType && TEXT_CONTENT_TYPE.test(contentType)) {
    return decoder.decode(body);
  }
  return `[${body.byteLength} bytes]`;
}

function redactAuthorization(value: string): string {
  const space = value.indexOf(' ');
  return space > 0 ? `${value.slice(0, space)} ****` : '****';
}
