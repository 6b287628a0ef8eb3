import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';
import type { FetchFailure, RawFetch } from './types.js';
import type { RobotsCache } from './robots.js';

export interface FetchOptions {
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryJitter: boolean;
  robots?: RobotsCache;
  accept?: string;
}

const DEFAULT_ACCEPT =
  'text/html,application/xhtml+xml,application/rss+xml,application/atom+xml,application/xml;q=0.9,*/*;q=0.8';

export function fetchOptionsFromConfig(scrape: Config['scrape'], robots?: RobotsCache): FetchOptions {
  return {
    userAgent: scrape.user_agent,
    timeoutMs: scrape.fetch_timeout_ms,
    maxRetries: scrape.max_retries,
    retryBaseMs: scrape.retry_base_ms,
    retryJitter: scrape.retry_jitter,
    robots,
  };
}

type AttemptResult = { status: 'success'; body: string } | FetchFailure;

export function isRetryable(result: AttemptResult): boolean {
  switch (result.status) {
    case 'timeout':
    case 'network_error':
      return true;
    case 'http_error':
      return result.code === 429 || result.code >= 500;
    default:
      return false;
  }
}

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), plus up to
 * 25% jitter when enabled.
 */
export function backoffDelay(retry: number, baseMs: number, jitter: boolean): number {
  const delay = baseMs * 2 ** (retry - 1);
  return jitter ? delay + Math.floor(Math.random() * delay * 0.25) : delay;
}

async function attemptFetch(
  url: string,
  options: FetchOptions,
  signal?: AbortSignal,
): Promise<AttemptResult> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? DEFAULT_ACCEPT,
        'Accept-Language': 'en-US,en;q=0.9',
      },
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      // Drain so the connection goes back to the pool.
      await response.body?.cancel().catch(() => undefined);
      return { status: 'http_error', code: response.status };
    }

    return { status: 'success', body: await response.text() };
  } catch (err) {
    if (signal?.aborted) return { status: 'cancelled' };
    if (timedOut) return { status: 'timeout' };
    return { status: 'network_error', message: err instanceof Error ? err.message : String(err) };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * GET one URL on behalf of a source. Transient failures (timeout, network
 * error, 429, 5xx) are retried up to `maxRetries` times; everything else is
 * final. Never throws: the outcome is always a RawFetch.
 */
export async function fetchSource(
  sourceName: string,
  url: string,
  options: FetchOptions,
  signal?: AbortSignal,
): Promise<RawFetch> {
  const base = { source_name: sourceName, url };

  if (signal?.aborted) {
    return { ...base, attempts: 0, status: 'cancelled' };
  }

  if (options.robots && !(await options.robots.isAllowed(url, signal))) {
    logger.warn({ source: sourceName, url }, 'Skipping source disallowed by robots.txt');
    return { ...base, attempts: 0, status: 'disallowed' };
  }

  let attempts = 0;
  while (true) {
    attempts++;
    const result = await attemptFetch(url, options, signal);

    if (result.status === 'success' || !isRetryable(result) || attempts > options.maxRetries) {
      return { ...base, attempts, ...result };
    }

    const delay = backoffDelay(attempts, options.retryBaseMs, options.retryJitter);
    logger.debug(
      { source: sourceName, url, attempt: attempts, status: result.status, delayMs: delay },
      'Fetch failed, retrying',
    );

    try {
      await sleep(delay, signal);
    } catch {
      return { ...base, attempts, status: 'cancelled' };
    }
  }
}
