import { StructuredRequestClient } from './client/structured-request-client';
import { getEnv, type Env } from './config/env';
import { createRequestPresets } from './presets';
import { getDefaultRetryPolicy } from './retry/retry-policy';
import { AxiosTransport } from './transport/axios-transport';
import type { Transport } from './transport/transport.interface';
import { createChildLogger, logger, type Logger } from './utils/logger';

export interface TutorClientOverrides {
  env?: Env;
  transport?: Transport;
  /** Parent of the client's logger; the client logs at `LOG_LEVEL`. */
  logger?: Logger;
}

/**
 * Wires a StructuredRequestClient from validated environment configuration
 */
export function createTutorClient(overrides: TutorClientOverrides = {}): StructuredRequestClient {
  const env = overrides.env ?? getEnv();

  return new StructuredRequestClient({
    transport: overrides.transport ?? new AxiosTransport(),
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    presets: createRequestPresets(env.OPENAI_MODEL),
    timeoutMs: env.LLM_TIMEOUT_MS,
    retry: {
      ...getDefaultRetryPolicy(),
      maxRetries: env.LLM_MAX_RETRIES,
      baseDelayMs: env.LLM_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.LLM_RETRY_MAX_DELAY_MS,
    },
    cache: {
      ttlMs: env.LLM_CACHE_TTL_MS,
      maxEntries: env.LLM_CACHE_MAX_ENTRIES,
    },
    logger: createChildLogger(
      { component: 'structured-request-client' },
      overrides.logger ?? logger,
      env.LOG_LEVEL
    ),
  });
}
