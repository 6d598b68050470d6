/**
 * fetchWithTimeout.ts
 * Wrapper around fetch with a timeout and an optional caller cancellation signal
 */

export interface FetchWithTimeoutOptions extends RequestInit {
  timeout?: number;
}

export class FetchTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeout: number
  ) {
    super(`Request timeout after ${timeout}ms: ${url}`);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Fetch with timeout support. A `signal` passed in the options aborts the request
 * as well; in that case the abort propagates unchanged.
 *
 * Without `read` the timeout covers the response headers only. With it, the
 * timeout and the caller's signal stay bound until `read` settles, so a body
 * that stalls mid-stream fails the same way a silent server does.
 */
export function fetchWithTimeout(url: string, options?: FetchWithTimeoutOptions): Promise<Response>;
export function fetchWithTimeout<T>(
  url: string,
  options: FetchWithTimeoutOptions,
  read: (response: Response) => Promise<T>
): Promise<T>;
export async function fetchWithTimeout<T>(
  url: string,
  options: FetchWithTimeoutOptions = {},
  read?: (response: Response) => Promise<T>
): Promise<Response | T> {
  const { timeout = 30000, signal: callerSignal, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeout);
  const onCallerAbort = (): void => controller.abort(callerSignal?.reason);
  callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        ...fetchOptions,
        signal: controller.signal,
      });
    } catch (error) {
      if (!controller.signal.aborted && error instanceof Error) {
        throw new Error(`Fetch failed: ${error.message}`);
      }
      throw error;
    }
    if (!read) {
      return response;
    }
    controller.signal.throwIfAborted();
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });
    return await Promise.race([read(response), aborted]);
  } catch (error) {
    if (callerSignal?.aborted) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new FetchTimeoutError(url, timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  }
}
