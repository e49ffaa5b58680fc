import { describe, expect, it, vi } from 'vitest';
import {
  ApiClient,
  ApiRequestError,
  retryDelayMs,
  type FetchFn
} from '../src/prtg/apiClient.js';

function recordingSleep() {
  const delays: number[] = [];
  const sleep = vi.fn(async (ms: number) => {
    delays.push(ms);
  });
  return { delays, sleep };
}

const makeRequest = () => new Request('https://prtg.test.local/api/table.json');

describe('ApiClient', () => {
  it('waits 250ms then 500ms before succeeding on the third attempt', async () => {
    const { delays, sleep } = recordingSleep();
    const fetch = vi
      .fn<FetchFn>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('{}', { status: 200 }));

    const client = new ApiClient({ fetch, sleep });
    const response = await client.send(makeRequest);

    expect(response.status).toBe(200);
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([250, 500]);
  });

  it('gives up after four attempts and rethrows the last failure', async () => {
    const { delays, sleep } = recordingSleep();
    const fetch = vi.fn<FetchFn>(async () => new Response('down', { status: 502 }));

    const client = new ApiClient({ fetch, sleep });
    const failure = await client.send(makeRequest).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ApiRequestError);
    expect(failure).toMatchObject({ status: 502 });
    expect(fetch).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([250, 500, 1000]);
  });

  it('propagates the final transport error unchanged', async () => {
    const { sleep } = recordingSleep();
    const lastError = new TypeError('connection reset');
    const fetch = vi
      .fn<FetchFn>()
      .mockRejectedValueOnce(new TypeError('first'))
      .mockRejectedValueOnce(new TypeError('second'))
      .mockRejectedValueOnce(new TypeError('third'))
      .mockRejectedValueOnce(lastError);

    const client = new ApiClient({ fetch, sleep });
    await expect(client.send(makeRequest)).rejects.toBe(lastError);
    expect(fetch).toHaveBeenCalledTimes(4);
  });

  it('returns client errors without retrying or throwing', async () => {
    const { sleep } = recordingSleep();
    const fetch = vi.fn<FetchFn>(async () => new Response('unauthorized', { status: 401 }));

    const client = new ApiClient({ fetch, sleep });
    const response = await client.send(makeRequest);

    expect(response.status).toBe(401);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('builds a fresh request for every attempt', async () => {
    const { sleep } = recordingSleep();
    const factory = vi.fn(makeRequest);
    const seen: Request[] = [];
    const fetch = vi.fn<FetchFn>(async request => {
      seen.push(request);
      return seen.length < 2
        ? new Response('busy', { status: 500 })
        : new Response('{}', { status: 200 });
    });

    const client = new ApiClient({ fetch, sleep });
    await client.send(factory);

    expect(factory).toHaveBeenCalledTimes(2);
    expect(seen[0]).not.toBe(seen[1]);
  });

  it('does not attempt a request once the signal is aborted', async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response('{}'));
    const controller = new AbortController();
    const reason = new Error('shutting down');
    controller.abort(reason);

    const client = new ApiClient({ fetch });
    await expect(client.send(makeRequest, controller.signal)).rejects.toBe(reason);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('stops retrying when cancelled during a failed attempt', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    const { sleep } = recordingSleep();
    const fetch = vi.fn<FetchFn>(async () => {
      controller.abort(reason);
      throw new TypeError('aborted mid-flight');
    });

    const client = new ApiClient({ fetch, sleep });
    await expect(client.send(makeRequest, controller.signal)).rejects.toBe(reason);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('aborts a pending retry wait', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const reason = new Error('cancelled while waiting');
      const fetch = vi.fn<FetchFn>(async () => new Response('busy', { status: 503 }));

      const client = new ApiClient({ fetch });
      const pending = client.send(makeRequest, controller.signal).catch((error: unknown) => error);

      await vi.advanceTimersByTimeAsync(100);
      controller.abort(reason);

      await expect(pending).resolves.toBe(reason);
      expect(fetch).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('passes an abort signal to every attempt', async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response('{}'));
    const client = new ApiClient({ fetch, timeoutMs: 5000 });

    await client.send(makeRequest);

    const init = fetch.mock.calls[0]?.[1];
    expect(init?.signal).toBeInstanceOf(AbortSignal);
    expect(init?.signal?.aborted).toBe(false);
  });
});

describe('retryDelayMs', () => {
  it('doubles from the 250ms base', () => {
    expect([0, 1, 2].map(attempt => retryDelayMs(attempt))).toEqual([250, 500, 1000]);
  });
});
