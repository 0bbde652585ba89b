import { DeadlineExceededError, UpstreamError } from '../../utils/errors';

const USER_AGENT = 'stack-pulse/1.0';

export interface FetchJsonOptions {
  timeoutMs: number;
  /** Cycle-level signal; aborting it cancels the request immediately */
  signal?: AbortSignal;
}

/**
 * GET a JSON document with a per-request timeout.
 * Throws UpstreamError for non-2xx, unparseable bodies and timeouts, and
 * DeadlineExceededError when the cycle signal aborted the request.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    throw new DeadlineExceededError();
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onCycleAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onCycleAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          'Accept': 'application/json',
          'User-Agent': USER_AGENT,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) throw new DeadlineExceededError();
      if (controller.signal.aborted) throw new UpstreamError(`Request timed out after ${timeoutMs}ms`, url);
      throw error;
    }

    if (!response.ok) {
      throw new UpstreamError(`HTTP ${response.status}: ${response.statusText}`, url);
    }

    try {
      return await response.json();
    } catch {
      if (signal?.aborted) throw new DeadlineExceededError();
      throw new UpstreamError('Invalid response: body is not JSON', url);
    }
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', onCycleAbort);
  }
}
