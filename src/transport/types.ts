/**
 * msgate — Transport Types
 */

import type { TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A request the engine can send any number of times. The body is a
 * string or a byte buffer, never a stream.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

/**
 * How an exchange ended: `success` (2xx), `status_failure` (a response
 * outside 2xx) or `connection_failure` (no usable response).
 */
export type TraceStatus = 'success' | 'status_failure' | 'connection_failure';

/** Request/response pair captured for one physical attempt. */
export interface RequestTrace {
  method: HttpMethod;
  url: string;
  status: TraceStatus;
  /** 0 when no response was received. */
  statusCode: number;
  /** Wire-like dump of the request, credentials redacted. */
  request: string;
  /** Wire-like dump of the response, empty on connection failure. */
  response: string;
  /** Raw response body bytes. */
  body: Uint8Array;
  contentType: string | undefined;
  elapsedMs: number;
}

export interface SendOptions {
  /** Values below 1 still make one attempt. Default 1. */
  maxAttempts?: number;
  /** Base of the exponential backoff. Default 0. */
  baseBackoffMs?: number;
  /** Sent as `Idempotency-Key` on POST, PUT and PATCH. */
  idempotencyKey?: string;
  signal?: AbortSignal;
}

export interface TransportResult {
  /** Trace of the last attempt made. */
  trace: RequestTrace;
  /** Error of the last attempt; absent on success. */
  error?: TransportError;
  /** Physical requests made. */
  attempts: number;
}
