/**
 * Resilient Fetch
 *
 * Network resilience for provider requests:
 * - per-attempt timeout so a hung upstream cannot stall the loop forever
 * - retry with exponential backoff on 429/5xx and network failures
 * - Retry-After honoured for rate limits
 */

import { ProviderError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface NetworkConfig {
  /** Per-attempt timeout in ms (default: 60000) */
  timeout?: number;
  /** Maximum attempts (default: 3) */
  maxRetries?: number;
  /** Base delay between attempts in ms (default: 1000) */
  baseRetryDelay?: number;
  /** Upper bound on a single delay in ms (default: 30000) */
  maxRetryDelay?: number;
  retryableStatusCodes?: number[];
}

export interface ResilientFetchOptions {
  url: string;
  init: RequestInit;
  providerName: string;
  networkConfig?: NetworkConfig;
  onRetry?: (attempt: number, delay: number, error: Error) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface ResilientFetchResult {
  response: Response;
  attempts: number;
  duration: number;
}

const DEFAULT_CONFIG: Required<NetworkConfig> = {
  timeout: 60000,
  maxRetries: 3,
  baseRetryDelay: 1000,
  maxRetryDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

// =============================================================================
// RESILIENT FETCH
// =============================================================================

/**
 * Fetch with timeout and retry. Non-retryable HTTP errors are returned to the
 * caller as responses; exhausted retries throw a ProviderError.
 */
export async function resilientFetch(options: ResilientFetchOptions): Promise<ResilientFetchResult> {
  const { url, init, providerName, networkConfig = {}, onRetry, sleep = defaultSleep } = options;
  const config = { ...DEFAULT_CONFIG, ...networkConfig };
  const startTime = Date.now();
  let lastError: Error | undefined;
  let attempts = 0;

  while (attempts < config.maxRetries) {
    attempts++;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);

    let delay = 0;
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      clearTimeout(timeoutId);

      if (!config.retryableStatusCodes.includes(response.status)) {
        return { response, attempts, duration: Date.now() - startTime };
      }

      lastError = new Error(`HTTP ${response.status}`);
      if (attempts >= config.maxRetries) {
        const body = await response.text();
        throw ProviderError.fromStatus(providerName, response.status, body);
      }
      const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
      delay = retryAfter === null ? calculateBackoff(attempts, config) : Math.min(retryAfter, config.maxRetryDelay);
    } catch (error) {
      clearTimeout(timeoutId);
      if (error instanceof ProviderError) throw error;

      const isTimeout = error instanceof Error && error.name === 'AbortError';
      lastError = isTimeout
        ? new Error(`Request timeout after ${config.timeout}ms`)
        : error instanceof Error
          ? error
          : new Error(String(error));

      if (attempts >= config.maxRetries) {
        throw new ProviderError(
          `${providerName} ${isTimeout ? 'timed out' : 'network error'} after ${attempts} attempts: ${lastError.message}`,
          providerName,
          'NETWORK_ERROR',
          undefined,
          lastError,
        );
      }
      delay = calculateBackoff(attempts, config);
    }

    onRetry?.(attempts, delay, lastError ?? new Error('retry'));
    await sleep(delay);
  }

  throw new ProviderError(
    `${providerName} request failed after ${attempts} attempts`,
    providerName,
    'NETWORK_ERROR',
    undefined,
    lastError,
  );
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Retry-After is either seconds or an HTTP date.
 */
function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;

  const seconds = parseInt(header, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = new Date(header).getTime();
  if (isNaN(date)) return null;
  const delay = date - Date.now();
  return delay > 0 ? delay : null;
}

/**
 * baseDelay * 2^(attempt-1), ±25% jitter, capped.
 */
function calculateBackoff(attempt: number, config: Required<NetworkConfig>): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(2, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
