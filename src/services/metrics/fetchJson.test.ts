import { fetchJson } from './fetchJson';
import { DeadlineExceededError, UpstreamError } from '../../utils/errors';

const mockFetch = jest.fn();
const originalFetch = global.fetch;

/** A fetch that only settles when its signal aborts. */
const hangingFetch = (_url: string, init: RequestInit): Promise<never> =>
  new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });

describe('fetchJson', () => {
  beforeAll(() => {
    global.fetch = mockFetch;
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should return the parsed body on 2xx', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      statusText: 'OK',
      json: jest.fn().mockResolvedValue({ status: 'ok' }),
    });

    await expect(fetchJson('http://localhost:8091/health', { timeoutMs: 1000 })).resolves.toEqual({ status: 'ok' });
    expect(mockFetch).toHaveBeenCalledWith('http://localhost:8091/health', expect.objectContaining({
      method: 'GET',
      headers: { 'Accept': 'application/json', 'User-Agent': 'stack-pulse/1.0' },
    }));
  });

  it('should reject non-2xx responses', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 503, statusText: 'Service Unavailable' });

    await expect(fetchJson('http://localhost:8091/health', { timeoutMs: 1000 }))
      .rejects.toThrow(new UpstreamError('HTTP 503: Service Unavailable', 'http://localhost:8091/health'));
  });

  it('should reject unparseable bodies', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      statusText: 'OK',
      json: jest.fn().mockRejectedValue(new SyntaxError('Unexpected token')),
    });

    await expect(fetchJson('http://localhost:8091/health', { timeoutMs: 1000 }))
      .rejects.toThrow('Invalid response: body is not JSON');
  });

  it('should time out slow requests', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);

    const error = await fetchJson('http://localhost:8091/health', { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toHaveProperty('message', 'Request timed out after 20ms');
  });

  it('should abort when the cycle signal fires', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);
    const cycle = new AbortController();

    const pending = fetchJson('http://localhost:8091/health', { timeoutMs: 10000, signal: cycle.signal });
    cycle.abort();

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
  });

  it('should not issue a request when the cycle already ended', async () => {
    const cycle = new AbortController();
    cycle.abort();

    await expect(fetchJson('http://localhost:8091/health', { timeoutMs: 1000, signal: cycle.signal }))
      .rejects.toBeInstanceOf(DeadlineExceededError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should pass through other network errors', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(fetchJson('http://localhost:8091/health', { timeoutMs: 1000 })).rejects.toThrow('fetch failed');
  });
});
