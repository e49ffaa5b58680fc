import loggerModule from '../logger.js';
import { abortReason, delay, type SleepFn } from '../utils/delay.js';

export const MAX_RETRIES = 3;
export const RETRY_BASE_DELAY_MS = 250;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type FetchFn = (request: Request, init?: RequestInit) => Promise<Response>;

export type RequestFactory = () => Request;

type ApiClientLogger = Pick<typeof loggerModule, 'debug'>;

export interface ApiClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  fetch?: FetchFn;
  sleep?: SleepFn;
  logger?: ApiClientLogger;
}

export class ApiRequestError extends Error {
  readonly status: number;
  readonly content: string | null;

  constructor(status: number, content: string | null = null, message?: string) {
    super(message ?? `PRTG API responded with status ${status}`);
    this.name = 'ApiRequestError';
    this.status = status;
    this.content = content;
  }
}

export class ResponseParseError extends Error {
  readonly content: string | null;

  constructor(content: string | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to parse PRTG ${content ?? 'table'} response: ${reason}`, { cause });
    this.name = 'ResponseParseError';
    this.content = content;
  }
}

export function retryDelayMs(attempt: number, baseDelayMs = RETRY_BASE_DELAY_MS): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * Sends requests to the PRTG API with bounded exponential backoff.
 *
 * Transport errors and 5xx responses are retried; anything below 500 is
 * handed back untouched so callers can inspect the status.
 */
export class ApiClient {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: SleepFn;
  private readonly logger: ApiClientLogger;

  constructor(options: ApiClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? RETRY_BASE_DELAY_MS;
    this.fetchImpl = options.fetch ?? ((request, init) => fetch(request, init));
    this.sleep = options.sleep ?? delay;
    this.logger = options.logger ?? loggerModule;
  }

  async send(requestFactory: RequestFactory, signal?: AbortSignal): Promise<Response> {
    for (let attempt = 0; ; attempt += 1) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }

      const request = requestFactory();
      try {
        const response = await this.fetchImpl(request, { signal: this.attemptSignal(signal) });
        if (response.status >= 500) {
          await response.body?.cancel();
          throw new ApiRequestError(response.status);
        }
        return response;
      } catch (error) {
        if (signal?.aborted) {
          throw abortReason(signal);
        }
        if (attempt >= this.maxRetries) {
          throw error;
        }

        const delayMs = retryDelayMs(attempt, this.retryBaseDelayMs);
        this.logger.debug(
          { err: error, attempt: attempt + 1, delayMs },
          'PRTG request failed, retrying'
        );
        await this.sleep(delayMs, signal);
      }
    }
  }

  private attemptSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}
