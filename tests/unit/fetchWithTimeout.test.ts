import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTimeoutError, fetchWithTimeout } from '../../src/utils/fetchWithTimeout.js';

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * fetch that never answers and rejects once its signal aborts
 */
function hangingFetch() {
  return vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(abortError()));
      })
  );
}

describe('fetchWithTimeout', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve fetch without timeout', async () => {
    const response = new Response('ok', { status: 200 });
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(response));

    await expect(fetchWithTimeout('http://backend.test/health')).resolves.toBe(response);
  });

  it('should pass request options through with its own signal', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('ok'));
    vi.stubGlobal('fetch', fetchMock);

    await fetchWithTimeout('http://backend.test/invoke', { method: 'POST', body: '{}' });

    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{}');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should throw FetchTimeoutError when the timeout fires', async () => {
    vi.stubGlobal('fetch', hangingFetch());

    const error = await fetchWithTimeout('http://backend.test/slow', { timeout: 10 }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(FetchTimeoutError);
    if (error instanceof FetchTimeoutError) {
      expect(error.message).toBe('Request timeout after 10ms: http://backend.test/slow');
    }
  });

  it('should propagate a caller abort unchanged', async () => {
    vi.stubGlobal('fetch', hangingFetch());
    const controller = new AbortController();

    const pending = fetchWithTimeout('http://backend.test/slow', {
      timeout: 5000,
      signal: controller.signal,
    }).catch((e: unknown) => e);
    controller.abort();
    const error = await pending;

    expect(error).not.toBeInstanceOf(FetchTimeoutError);
    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) {
      expect(error.name).toBe('AbortError');
    }
  });

  it('should wrap network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>().mockRejectedValue(new Error('connect ECONNREFUSED'))
    );

    await expect(fetchWithTimeout('http://backend.test/down')).rejects.toThrow(
      'Fetch failed: connect ECONNREFUSED'
    );
  });
});

/**
 * 200 response whose JSON body starts but never finishes
 */
function stalledBody(): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"text":'));
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('fetchWithTimeout with a body reader', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return what the reader produces', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(new Response('{"ok":true}')));

    const body = await fetchWithTimeout('http://backend.test/invoke', {}, response =>
      response.json()
    );

    expect(body).toEqual({ ok: true });
  });

  it('should pass reader errors through unchanged', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>')));
    const failure = new RangeError('unexpected body');

    await expect(
      fetchWithTimeout('http://backend.test/invoke', {}, () => Promise.reject(failure))
    ).rejects.toBe(failure);
  });

  it('should time out a body that stops arriving', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(stalledBody()));

    const error = await fetchWithTimeout('http://backend.test/invoke', { timeout: 20 }, response =>
      response.json()
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchTimeoutError);
    if (error instanceof FetchTimeoutError) {
      expect(error.message).toBe('Request timeout after 20ms: http://backend.test/invoke');
    }
  });

  it('should stop reading when the caller aborts', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(stalledBody()));
    const controller = new AbortController();

    const pending = fetchWithTimeout(
      'http://backend.test/invoke',
      { timeout: 5000, signal: controller.signal },
      response => response.json()
    ).catch((e: unknown) => e);
    setTimeout(() => controller.abort(), 10);
    const error = await pending;

    expect(error).not.toBeInstanceOf(FetchTimeoutError);
    expect(error).toMatchObject({ name: 'AbortError' });
  });
});
