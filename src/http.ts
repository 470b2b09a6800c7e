// ============================================================================
// FILE: src/http.ts
// PURPOSE: JSON POST helper for provider APIs with timeout and retry/backoff
// ============================================================================

import type { HttpPolicy } from './config.js';
import { ProviderError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Statuses worth retrying: rate limiting and transient gateway failures */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface PostJsonOptions {
  /** Short name used in error messages and logs, e.g. "OpenAI embeddings" */
  label: string;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * postJson - POST a JSON body and return the parsed JSON response
 *
 * Each attempt is bounded by `policy.timeoutMs`. HTTP 429/5xx and network
 * failures are retried up to `policy.maxRetries` times with exponential
 * backoff (`backoffMs`, then doubling). Timeouts and other statuses fail at once.
 *
 * @throws ProviderError on any failure
 */
export async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  policy: HttpPolicy,
  options: PostJsonOptions
): Promise<unknown> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? createLogger('HTTP');
  const payload = JSON.stringify(body);

  let lastError: ProviderError | null = null;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = policy.backoffMs * 2 ** (attempt - 1);
      logger.warn(`${options.label}: retry ${attempt}/${policy.maxRetries} in ${delay}ms (${lastError?.message})`);
      await sleep(delay);
    }

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: payload,
        signal: AbortSignal.timeout(policy.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new ProviderError(`${options.label} timed out after ${policy.timeoutMs}ms`, null, error);
      }
      lastError = new ProviderError(
        `${options.label} request failed: ${error instanceof Error ? error.message : String(error)}`,
        null,
        error
      );
      continue;
    }

    if (!response.ok) {
      let error: ProviderError;
      try {
        const text = await response.text();
        error = new ProviderError(
          `${options.label} error: ${response.status} ${response.statusText} - ${text.slice(0, 500)}`,
          response.status
        );
      } catch (readError) {
        error = new ProviderError(
          `${options.label} error: ${response.status} ${response.statusText} (body unreadable)`,
          response.status,
          readError
        );
      }
      if (!RETRYABLE_STATUSES.has(response.status)) {
        throw error;
      }
      lastError = error;
      continue;
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ProviderError(`${options.label} returned invalid JSON`, response.status, error);
    }
  }

  throw lastError ?? new ProviderError(`${options.label} failed`);
}
