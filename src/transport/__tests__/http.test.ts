import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HttpTransport, malformedResponse, redactUrl } from '../http.js';
import {
  TerminalTransportError,
  TransientTransportError,
  classifyFetchError,
  statusError,
} from '../errors.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function systemError(code: string, message = code): Error {
  return new TypeError('fetch failed', { cause: Object.assign(new Error(message), { code }) });
}

const fetchMock = vi.fn();
const sleepMock = vi.fn();

function transport(): HttpTransport {
  return new HttpTransport({ userAgent: 'msgate-test', random: () => 0, sleep: sleepMock });
}

const POST = {
  method: 'POST' as const,
  url: 'https://graph.test/v1/12345/messages',
  headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
  body: '{"to":"250788123123"}',
};

beforeEach(() => {
  fetchMock.mockReset();
  sleepMock.mockReset();
  sleepMock.mockResolvedValue(undefined);
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ============================================================================
// HttpTransport.send
// ============================================================================

describe('HttpTransport.send', () => {
  it('returns immediately on the first 2xx', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ messages: [{ id: 'm1' }] }, 201));

    const result = await transport().send(POST, { maxAttempts: 3, baseBackoffMs: 100 });

    expect(result.error).toBeUndefined();
    expect(result.attempts).toBe(1);
    expect(result.trace.status).toBe('success');
    expect(result.trace.statusCode).toBe(201);
    expect(new TextDecoder().decode(result.trace.body)).toBe('{"messages":[{"id":"m1"}]}');
    expect(fetchMock).toHaveBeenCalledOnce();
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it('retries a connection reset and succeeds on the second attempt', async () => {
    fetchMock
      .mockRejectedValueOnce(systemError('ECONNRESET', 'read ECONNRESET'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    const result = await transport().send(POST, {
      maxAttempts: 3,
      baseBackoffMs: 100,
      idempotencyKey: 'msg-1-0',
    });

    expect(result.error).toBeUndefined();
    expect(result.attempts).toBe(2);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    const [firstUrl, first] = fetchMock.mock.calls[0];
    const [secondUrl, second] = fetchMock.mock.calls[1];
    expect(firstUrl).toBe(secondUrl);
    expect(first.headers['Idempotency-Key']).toBe('msg-1-0');
    expect(second.headers['Idempotency-Key']).toBe('msg-1-0');
    expect(first.body).toBe('{"to":"250788123123"}');
    expect(second.body).toBe(first.body);
  });

  it('sends a fresh header object per attempt', async () => {
    fetchMock
      .mockRejectedValueOnce(systemError('ECONNRESET'))
      .mockResolvedValueOnce(jsonResponse({}));

    await transport().send(POST, { maxAttempts: 2 });

    expect(fetchMock.mock.calls[0][1].headers).not.toBe(fetchMock.mock.calls[1][1].headers);
    expect(fetchMock.mock.calls[0][1].headers).toEqual(fetchMock.mock.calls[1][1].headers);
  });

  it('does not retry a 400', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: 'bad' } }, 400));

    const result = await transport().send(POST, { maxAttempts: 5, baseBackoffMs: 100 });

    expect(fetchMock).toHaveBeenCalledOnce();
    expect(result.attempts).toBe(1);
    expect(result.error).toBeInstanceOf(TerminalTransportError);
    expect(result.error?.statusCode).toBe(400);
    expect(result.error?.message).toBe('received non-2xx status: 400');
    expect(result.trace.status).toBe('status_failure');
  });

  it('makes one attempt when maxAttempts is below 1', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 503));

    const zero = await transport().send(POST, { maxAttempts: 0 });
    const negative = await transport().send(POST, { maxAttempts: -2 });

    expect(zero.attempts).toBe(1);
    expect(negative.attempts).toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(zero.error).toBeInstanceOf(TransientTransportError);
  });

  it('returns the last error after exhausting attempts on 503', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 503));

    const result = await transport().send(POST, { maxAttempts: 3, baseBackoffMs: 100 });

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(result.attempts).toBe(3);
    expect(result.error?.code).toBe('RETRYABLE_STATUS');
    expect(result.error?.statusCode).toBe(503);
    // floor of 100<<0 and 100<<1, jitter 0
    expect(sleepMock.mock.calls.map((call) => call[0])).toEqual([50, 100]);
  });

  it.each([429, 502, 504])('retries status %i', async (status) => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}, status))
      .mockResolvedValueOnce(jsonResponse({}, 200));

    const result = await transport().send(POST, { maxAttempts: 2 });

    expect(result.error).toBeUndefined();
    expect(result.attempts).toBe(2);
  });

  it.each([401, 404, 500])('does not retry status %i', async (status) => {
    fetchMock.mockResolvedValue(jsonResponse({}, status));

    const result = await transport().send(POST, { maxAttempts: 3 });

    expect(result.attempts).toBe(1);
    expect(result.error?.code).toBe('HTTP_STATUS');
  });

  it('does not retry a refused connection', async () => {
    fetchMock.mockRejectedValue(systemError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:443'));

    const result = await transport().send(POST, { maxAttempts: 3 });

    expect(result.attempts).toBe(1);
    expect(result.error).toBeInstanceOf(TerminalTransportError);
    expect(result.error?.message).toBe(
      'unable to connect to server: connect ECONNREFUSED 127.0.0.1:443'
    );
    expect(result.trace.status).toBe('connection_failure');
    expect(result.trace.statusCode).toBe(0);
    expect(result.trace.response).toBe('');
  });

  it('adds Idempotency-Key only to POST, PUT and PATCH', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}));
    const t = transport();

    await t.send({ method: 'GET', url: 'https://cdn.test/a.jpg' }, { idempotencyKey: 'k' });
    await t.send({ ...POST, method: 'PUT' }, { idempotencyKey: 'k' });
    await t.send({ ...POST, method: 'PATCH' }, { idempotencyKey: 'k' });
    await t.send({ ...POST, method: 'DELETE' }, { idempotencyKey: 'k' });

    const keys = fetchMock.mock.calls.map((call) => call[1].headers['Idempotency-Key']);
    expect(keys).toEqual([undefined, 'k', 'k', undefined]);
  });

  it('omits Idempotency-Key when the key is empty', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    await transport().send(POST, { idempotencyKey: '' });

    expect(fetchMock.mock.calls[0][1].headers).not.toHaveProperty('Idempotency-Key');
  });

  it('marks every attempt Connection: close and sets the user agent', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    await transport().send(POST);

    const headers = fetchMock.mock.calls[0][1].headers;
    expect(headers['Connection']).toBe('close');
    expect(headers['User-Agent']).toBe('msgate-test');
  });

  it('resends the body bytes captured at the start of the send', async () => {
    const bytes = new Uint8Array([1, 2, 3]);
    fetchMock
      .mockImplementationOnce(async () => {
        bytes[0] = 99;
        throw systemError('ECONNRESET');
      })
      .mockResolvedValueOnce(jsonResponse({}));

    await transport().send({ method: 'POST', url: 'https://graph.test/media', body: bytes }, { maxAttempts: 2 });

    expect(Array.from(fetchMock.mock.calls[1][1].body)).toEqual([1, 2, 3]);
  });

  it('stops without sleeping out the backoff when aborted mid-retry', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementation(async () => jsonResponse({}, 503));
    sleepMock.mockImplementationOnce(async () => {
      controller.abort(new Error('cancelled'));
      throw new Error('cancelled');
    });

    const result = await transport().send(POST, {
      maxAttempts: 5,
      baseBackoffMs: 1_000,
      signal: controller.signal,
    });

    expect(fetchMock).toHaveBeenCalledOnce();
    expect(result.attempts).toBe(1);
    expect(result.error?.statusCode).toBe(503);
  });

  it('does not sleep when the signal is already aborted after an attempt', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementationOnce(async () => {
      controller.abort();
      return jsonResponse({}, 502);
    });

    const result = await transport().send(POST, { maxAttempts: 3, signal: controller.signal });

    expect(result.attempts).toBe(1);
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it('uses an injected fetch over the global one', async () => {
    const injected = vi.fn(async () => jsonResponse({}));
    const t = new HttpTransport({ fetch: injected });

    await t.send(POST);

    expect(injected).toHaveBeenCalledOnce();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ============================================================================
// Traces
// ============================================================================

describe('request traces', () => {
  it('redacts the Authorization header', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'x' }));

    const { trace } = await transport().send(POST);

    expect(trace.request).toContain('Authorization: Bearer ****');
    expect(trace.request).not.toContain('test-secret');
    expect(trace.request.startsWith('POST https://graph.test/v1/12345/messages\r\n')).toBe(true);
    expect(trace.request.endsWith('\r\n\r\n{"to":"250788123123"}')).toBe(true);
  });

  it('redacts access_token query parameters', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    const { trace } = await transport().send({
      method: 'POST',
      url: 'https://graph.test/12345/messages?access_token=test-secret',
    });

    expect(trace.url).toBe('https://graph.test/12345/messages?access_token=****');
    expect(trace.request).not.toContain('test-secret');
  });

  it('includes textual response bodies and summarizes binary ones', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ id: 'x' }))
      .mockResolvedValueOnce(
        new Response(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]), {
          status: 200,
          headers: { 'content-type': 'image/jpeg' },
        })
      );
    const t = transport();

    const json = await t.send(POST);
    const binary = await t.send({ method: 'GET', url: 'https://cdn.test/a.jpg' });

    expect(json.trace.response.startsWith('HTTP 200')).toBe(true);
    expect(json.trace.response.endsWith('\r\n\r\n{"id":"x"}')).toBe(true);
    expect(binary.trace.response.endsWith('\r\n\r\n[4 bytes]')).toBe(true);
    expect(binary.trace.contentType).toBe('image/jpeg');
  });
});

// ============================================================================
// Classification
// ============================================================================

describe('classifyFetchError', () => {
  it.each([
    ['ECONNRESET', 'CONNECTION_RESET'],
    ['UND_ERR_SOCKET', 'CONNECTION_RESET'],
    ['ETIMEDOUT', 'TIMEOUT'],
    ['UND_ERR_HEADERS_TIMEOUT', 'TIMEOUT'],
    ['EAI_AGAIN', 'NETWORK'],
    ['ERR_SSL_WRONG_VERSION_NUMBER', 'TLS'],
  ])('treats %s as transient (%s)', (code, expected) => {
    const error = classifyFetchError(systemError(code), false);
    expect(error).toBeInstanceOf(TransientTransportError);
    expect(error.code).toBe(expected);
  });

  it('treats a per-attempt timeout as transient', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    expect(classifyFetchError(timeout, false).retryable).toBe(true);
  });

  it('treats a caller abort as terminal', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    const error = classifyFetchError(abort, true);
    expect(error.retryable).toBe(false);
    expect(error.code).toBe('ABORTED');
  });

  it('treats unknown errors as terminal', () => {
    expect(classifyFetchError(new Error('boom'), false).retryable).toBe(false);
    expect(classifyFetchError('boom', false).message).toBe('unable to connect to server: boom');
  });
});

describe('statusError', () => {
  it('splits retryable and terminal statuses', () => {
    expect(statusError(429).retryable).toBe(true);
    expect(statusError(503).retryable).toBe(true);
    expect(statusError(400).retryable).toBe(false);
    expect(statusError(500).retryable).toBe(false);
  });
});

describe('malformedResponse', () => {
  it('is terminal and keeps the status code', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 201));
    const { trace } = await transport().send(POST);

    const error = malformedResponse(trace, 'missing message id');
    expect(error).toBeInstanceOf(TerminalTransportError);
    expect(error.code).toBe('MALFORMED_RESPONSE');
    expect(error.statusCode).toBe(201);
    expect(error.message).toBe('malformed response: missing message id');
  });
});

describe('redactUrl', () => {
  it('leaves other parameters alone', () => {
    expect(redactUrl('https://x.test/p?a=1&access_token=abc&b=2')).toBe(
      'https://x.test/p?a=1&access_token=****&b=2'
    );
  });
});
