import { HttpError, type LLMRequestError } from '../errors';

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BASE_DELAY_MS = 0;
const DEFAULT_MAX_DELAY_MS = 8000;

const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404]);

const FAIL_FAST_KINDS = new Set(['missing_credential', 'invalid_url', 'invalid_input']);

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  nonRetryableStatuses: Set<number>;
}

export function getDefaultRetryPolicy(): RetryPolicy {
  return {
    maxRetries: DEFAULT_MAX_RETRIES,
    baseDelayMs: DEFAULT_BASE_DELAY_MS,
    maxDelayMs: DEFAULT_MAX_DELAY_MS,
    nonRetryableStatuses: new Set(NON_RETRYABLE_STATUSES),
  };
}

export function isRetryable(error: LLMRequestError, policy: RetryPolicy): boolean {
  if (FAIL_FAST_KINDS.has(error.kind)) {
    return false;
  }
  if (error instanceof HttpError) {
    return !policy.nonRetryableStatuses.has(error.statusCode);
  }
  return true;
}

/**
 * Wait before retry number `retry` (1-based): base * 2^(retry - 1), capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  if (policy.baseDelayMs <= 0) {
    return 0;
  }
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
