/**
 * msgate — Media Resolver
 *
 * Turns an attachment URL into a provider media handle: cache lookup,
 * download, content sniffing, multipart upload. Failures are returned,
 * not thrown, and leave an empty handle so callers can fall back to
 * sending the URL itself.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import type { TransportError } from '../transport/errors.js';
import { HttpTransport, malformedResponse } from '../transport/http.js';
import { channelLogFromTrace } from '../status/record.js';
import type { ChannelLogEntry } from '../status/types.js';
import type { CacheLookup, MediaHandleCache } from './cache.js';
import { sniffContentType } from './sniff.js';

const log = createLogger('Media');

// ============================================================================
// TYPES
// ============================================================================

export type MediaResolutionErrorCode =
  | 'RECENT_FAILURE'
  | 'FETCH_FAILED'
  | 'UPLOAD_FAILED'
  | 'MALFORMED_RESPONSE'
  | 'CACHE_FAILED';

export class MediaResolutionError extends Error {
  constructor(
    message: string,
    public readonly code: MediaResolutionErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MediaResolutionError';
  }
}

export interface MediaRequest {
  /** Channel the handle is uploaded under (cache scope). */
  channelId: string;
  /** Provider phone-number id owning the media endpoint. */
  address: string;
  url: string;
  mimeHint?: string;
  token: string;
  signal?: AbortSignal;
}

export interface MediaResolution {
  /** Empty when resolution failed. */
  handle: string;
  logs: ChannelLogEntry[];
  error?: MediaResolutionError;
}

export interface MediaResolverConfig {
  transport: HttpTransport;
  cache: MediaHandleCache;
  /** Provider API base, e.g. https://graph.facebook.com/v12.0 */
  graphUrl: string;
  /** How long a failed URL is skipped. */
  failureTtlMs: number;
  /** Value of the upload's `messaging_product` field. */
  messagingProduct?: string;
}

const UploadResponseSchema = z.object({ id: z.string().min(1) });

// ============================================================================
// RESOLVER
// ============================================================================

export class MediaResolver {
  private readonly transport: HttpTransport;
  private readonly cache: MediaHandleCache;
  private readonly graphUrl: string;
  private readonly failureTtlMs: number;
  private readonly messagingProduct: string;

  constructor(config: MediaResolverConfig) {
    this.transport = config.transport;
    this.cache = config.cache;
    this.graphUrl = config.graphUrl.replace(/\/$/, '');
    this.failureTtlMs = config.failureTtlMs;
    this.messagingProduct = config.messagingProduct ?? 'whatsapp';
  }

  async resolve(request: MediaRequest): Promise<MediaResolution> {
    const { channelId, url } = request;
    const logs: ChannelLogEntry[] = [];

    let cached: CacheLookup;
    try {
      cached = await this.cache.get(channelId, url);
    } catch (error) {
      return this.fail(request, logs, new MediaResolutionError(
        `error reading media handle from cache: ${url}`,
        'CACHE_FAILED',
        { cause: error }
      ), false);
    }

    if (cached.state === 'hit') {
      log.debug('Media handle cache hit', { channel: channelId, url });
      return { handle: cached.handle, logs };
    }
    if (cached.state === 'failed') {
      log.debug('Skipping recently failed media', { channel: channelId, url });
      return {
        handle: '',
        logs,
        error: new MediaResolutionError(`media recently failed to resolve: ${url}`, 'RECENT_FAILURE'),
      };
    }

    // ── Download ──

    const download = await this.transport.send({ method: 'GET', url }, { signal: request.signal });
    logs.push(channelLogFromTrace('Fetching media', download.trace, download.error));
    if (download.error) {
      return this.fail(request, logs, new MediaResolutionError(
        `error fetching media: ${download.error.message}`,
        'FETCH_FAILED',
        { cause: download.error }
      ), !cancelled(request, download.error));
    }

    // ── Upload ──

    const contentType = await sniffContentType(
      download.trace.body,
      request.mimeHint ?? download.trace.contentType
    );
    const multipart = await this.encodeUpload(download.trace.body, contentType, url);

    const upload = await this.transport.send(
      {
        method: 'POST',
        url: `${this.graphUrl}/${request.address}/media`,
        headers: {
          'Content-Type': multipart.contentType,
          Authorization: `Bearer ${request.token}`,
        },
        body: multipart.body,
      },
      { signal: request.signal }
    );

    const parsed = upload.error ? undefined : parseUploadId(upload.trace.body);
    const uploadError =
      upload.error ?? (parsed === undefined ? malformedResponse(upload.trace, 'missing media id') : undefined);
    logs.push(channelLogFromTrace('Uploading media', upload.trace, uploadError));

    if (uploadError || parsed === undefined) {
      return this.fail(request, logs, new MediaResolutionError(
        `error uploading media: ${uploadError?.message ?? 'missing media id'}`,
        upload.error ? 'UPLOAD_FAILED' : 'MALFORMED_RESPONSE',
        { cause: uploadError }
      ), !cancelled(request, upload.error));
    }

    try {
      await this.cache.putSuccess(channelId, url, parsed);
    } catch (error) {
      // the handle is still usable for this send
      log.warn('Failed to cache media handle', {
        channel: channelId,
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    log.info('Uploaded media', { channel: channelId, url, contentType });
    return { handle: parsed, logs };
  }

  // ── Internal ──────────────────────────────────────────────────────────────

  private async fail(
    request: MediaRequest,
    logs: ChannelLogEntry[],
    error: MediaResolutionError,
    remember = true
  ): Promise<MediaResolution> {
    log.warn('Media resolution failed', { channel: request.channelId, url: request.url, code: error.code });

    if (remember) {
      try {
        await this.cache.putFailure(request.channelId, request.url, this.failureTtlMs);
      } catch (cacheError) {
        log.warn('Failed to record media failure', {
          channel: request.channelId,
          error: cacheError instanceof Error ? cacheError.message : String(cacheError),
        });
      }
    }

    return { handle: '', logs, error };
  }

  private async encodeUpload(
    bytes: Uint8Array,
    contentType: string,
    sourceUrl: string
  ): Promise<{ body: Uint8Array; contentType: string }> {
    const form = new FormData();
    form.append('file', new Blob([bytes], { type: contentType }), urlBaseName(sourceUrl) || 'file');
    form.append('messaging_product', this.messagingProduct);

    // serialize once so retries and traces see the same bytes
    const encoded = new Response(form);
    const header = encoded.headers.get('content-type');
    if (!header) {
      throw new Error('multipart encoding produced no content type');
    }
    return { body: new Uint8Array(await encoded.arrayBuffer()), contentType: header };
  }
}

/** A caller abort says nothing about the URL, so it is not remembered as a failure. */
function cancelled(request: MediaRequest, error: TransportError | undefined): boolean {
  return request.signal?.aborted === true || error?.code === 'ABORTED';
}

function parseUploadId(body: Uint8Array): string | undefined {
  try {
    const result = UploadResponseSchema.safeParse(JSON.parse(new TextDecoder().decode(body)));
    return result.success ? result.data.id : undefined;
  } catch {
    return undefined;
  }
}

/** Last path segment of a URL, without query or fragment. */
export function urlBaseName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  const segments = pathname.split('/').filter((s) => s.length > 0);
  const last = segments[segments.length - 1] ?? '';
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
