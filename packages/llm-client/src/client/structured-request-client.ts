import {
  FeedbackSchema,
  SentencePayloadSchema,
  createSentence,
  toValidationIssues,
  type Feedback,
  type Schema,
  type Sentence,
} from '@rephrase/core';
import { DEFAULT_CACHE_OPTIONS, ResponseCache, type ResponseCacheOptions } from '../cache/response-cache';
import {
  HttpError,
  InvalidInputError,
  InvalidJsonError,
  InvalidUrlError,
  MissingCredentialError,
  SchemaMismatchError,
  toRequestError,
  type LLMRequestError,
} from '../errors';
import { DEFAULT_HISTORY_SIZE, SentenceHistory } from '../history/sentence-history';
import { RequestKind, type RequestConfig, type RequestPresets } from '../presets';
import { withCorrection } from '../prompts/corrective';
import { buildFeedbackRequest } from '../prompts/feedback.prompt';
import { renderPrompt } from '../prompts/generation-request';
import { buildSentenceRequest } from '../prompts/sentence.prompt';
import {
  backoffDelay,
  getDefaultRetryPolicy,
  isRetryable,
  sleep,
  type RetryPolicy,
} from '../retry/retry-policy';
import { cleanJsonResponse } from '../sanitizer';
import { consumeSse } from '../streaming/sse';
import { decodeErrorEnvelope } from '../transport/error-envelope';
import type { Transport, TransportRequest } from '../transport/transport.interface';
import { createChildLogger, logError, logPerformance, type Logger } from '../utils/logger';
import { buildChatCompletionBody, extractAssistantContent } from './chat-completions';

export interface StructuredRequestClientOptions {
  transport: Transport;
  apiKey?: string;
  baseUrl: string;
  presets: RequestPresets;
  timeoutMs: number;
  retry?: RetryPolicy;
  cache?: ResponseCacheOptions;
  historySize?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface RequestOptions {
  /** Serve and store the sanitized payload through the response cache. */
  cache?: boolean;
  signal?: AbortSignal;
  /** Name used in logs. */
  operation?: string;
}

interface PrefetchSlot {
  key: string;
  task: Promise<Sentence | null>;
  controller: AbortController;
}

interface Decoded<T> {
  text: string;
  value: T;
}

type Decoder<T> = (text: string) => T;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidJsonError(text, 'Response is not valid JSON', { cause: error });
  }
}

function decodeWith<T>(schema: Schema<T>): Decoder<T> {
  return (text) => {
    const result = schema.safeParse(parseJson(text));
    if (!result.success) {
      throw new SchemaMismatchError(text, toValidationIssues(result.error));
    }
    return result.data;
  };
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidInputError(field);
  }
  return trimmed;
}

export function prefetchKey(topic: string, targetBand: string): string {
  return `${topic}|${targetBand}`;
}

/**
 * Chat-completions client for JSON-shaped answers.
 *
 * Every request retries transient failures, re-asks with a corrective instruction
 * after unparsable output, and validates the answer against a schema. Sentence
 * generation keeps a short history to avoid repeats and can be prefetched;
 * evaluations are cached by prompt.
 */
export class StructuredRequestClient {
  private readonly transport: Transport;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly presets: RequestPresets;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly cache: ResponseCache;
  private readonly history: SentenceHistory;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private prefetchSlot: PrefetchSlot | null = null;

  constructor(options: StructuredRequestClientOptions) {
    this.transport = options.transport;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.presets = options.presets;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry ?? getDefaultRetryPolicy();
    this.now = options.now ?? Date.now;
    this.cache = new ResponseCache(options.cache ?? DEFAULT_CACHE_OPTIONS, this.now);
    this.history = new SentenceHistory(options.historySize ?? DEFAULT_HISTORY_SIZE);
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createChildLogger({ component: 'structured-request-client' });
  }

  /**
   * Send one prompt and return the sanitized JSON text of the answer
   */
  async request(prompt: string, config: RequestConfig, options: RequestOptions = {}): Promise<string> {
    const { text } = await this.execute(prompt, config, (raw) => parseJson(raw), options);
    return text;
  }

  /**
   * Send one prompt and return the answer validated against a schema
   */
  async requestStructured<T>(
    prompt: string,
    config: RequestConfig,
    schema: Schema<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const { value } = await this.execute(prompt, config, decodeWith(schema), options);
    return value;
  }

  /**
   * Generate a practice sentence, serving a matching prefetch when one is ready
   */
  async generate(topic: string, targetBand: string): Promise<Sentence> {
    const key = prefetchKey(requireText('topic', topic), requireText('targetBand', targetBand));
    const slot = this.prefetchSlot;

    if (slot) {
      this.prefetchSlot = null;

      if (slot.key === key) {
        const prefetched = await slot.task;
        if (prefetched) {
          this.logger.debug({ key }, 'Serving prefetched sentence');
          this.history.add(prefetched.vietnamese);
          return prefetched;
        }
        this.logger.debug({ key }, 'Prefetch produced no sentence, requesting a fresh one');
      } else {
        slot.controller.abort();
        this.logger.debug({ key: slot.key, requested: key }, 'Discarding prefetch for another topic');
      }
    }

    const sentence = await this.fetchSentence(topic, targetBand);
    this.history.add(sentence.vietnamese);
    return sentence;
  }

  /**
   * Start generating the next sentence in the background. Returns immediately.
   */
  prefetch(topic: string, targetBand: string): void {
    const key = prefetchKey(topic.trim(), targetBand.trim());
    if (this.prefetchSlot?.key === key) {
      return;
    }

    this.cancelPrefetch();

    const controller = new AbortController();
    const task = this.fetchSentence(topic, targetBand, controller.signal).catch((error: unknown) => {
      if (!controller.signal.aborted) {
        const failure = toRequestError(error);
        this.logger.warn({ key, kind: failure.kind, err: failure.message }, 'Prefetch failed');
      }
      return null;
    });

    this.prefetchSlot = { key, task, controller };
  }

  cancelPrefetch(): void {
    if (this.prefetchSlot) {
      this.prefetchSlot.controller.abort();
      this.logger.debug({ key: this.prefetchSlot.key }, 'Prefetch superseded');
      this.prefetchSlot = null;
    }
  }

  /**
   * Grade a translation. Identical submissions within the cache TTL are answered from cache.
   */
  async evaluate(sourceText: string, candidateTranslation: string, targetBand: string): Promise<Feedback> {
    const request = buildFeedbackRequest(
      requireText('sourceText', sourceText),
      requireText('candidateTranslation', candidateTranslation),
      requireText('targetBand', targetBand)
    );

    const { value } = await this.execute(
      renderPrompt(request),
      this.presets[RequestKind.EVALUATE],
      decodeWith(FeedbackSchema),
      { cache: true, operation: 'evaluate' }
    );
    return value;
  }

  /**
   * Stream an answer, calling `onChunk` with each text delta in arrival order
   * @returns The concatenated text
   */
  async stream(prompt: string, config: RequestConfig, onChunk: (chunk: string) => void): Promise<string> {
    let text = '';
    for await (const chunk of this.streamText(prompt, config)) {
      text += chunk;
      onChunk(chunk);
    }
    return text;
  }

  /**
   * Lazily opens a streaming request. Leaving the loop early aborts the underlying call.
   */
  async *streamText(prompt: string, config: RequestConfig): AsyncGenerator<string> {
    const controller = new AbortController();
    const request = this.buildRequest(prompt, config, true, controller.signal);

    try {
      const response = await this.transport.openStream(request);

      if (response.statusCode < 200 || response.statusCode >= 300) {
        const chunks: Buffer[] = [];
        for await (const chunk of response.body) {
          chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        }
        throw new HttpError(response.statusCode, decodeErrorEnvelope(Buffer.concat(chunks)));
      }

      yield* consumeSse(response.body);
    } finally {
      controller.abort();
    }
  }

  getHistory(): readonly string[] {
    return this.history.snapshot();
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async fetchSentence(topic: string, targetBand: string, signal?: AbortSignal): Promise<Sentence> {
    const request = buildSentenceRequest(
      requireText('topic', topic),
      requireText('targetBand', targetBand),
      this.history.snapshot()
    );

    const { value } = await this.execute(
      renderPrompt(request),
      this.presets[RequestKind.GENERATE],
      decodeWith(SentencePayloadSchema),
      { signal, operation: 'generate' }
    );
    return createSentence(value);
  }

  private async execute<T>(
    prompt: string,
    config: RequestConfig,
    decode: Decoder<T>,
    options: RequestOptions
  ): Promise<Decoded<T>> {
    const operation = options.operation ?? 'request';
    const cacheKey = options.cache ? ResponseCache.keyFor(config.model, prompt) : undefined;

    // Configuration errors surface before the cache or the network is touched.
    this.assertConfigured();

    if (cacheKey) {
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) {
        try {
          const value = decode(cached);
          this.logger.debug({ operation, model: config.model }, 'Response cache hit');
          return { text: cached, value };
        } catch (error) {
          // Stored by a caller with a different schema; treat as a miss.
          this.cache.delete(cacheKey);
          this.logger.debug(
            { operation, model: config.model, err: toRequestError(error).message },
            'Cached response does not decode, requesting again'
          );
        }
      }
    }

    const startedAt = this.now();
    const maxAttempts = this.retry.maxRetries + 1;
    let lastParseError: InvalidJsonError | undefined;
    let lastOtherError: LLMRequestError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = backoffDelay(this.retry, attempt - 1);
        if (delay > 0) {
          await this.sleep(delay);
        }
      }

      const attemptPrompt = lastParseError ? withCorrection(prompt) : prompt;

      try {
        const text = await this.attempt(attemptPrompt, config, options.signal);
        const value = decode(text);

        if (cacheKey) {
          this.cache.set(cacheKey, text);
        }
        logPerformance(
          {
            operation,
            durationMs: this.now() - startedAt,
            success: true,
            metadata: { attempts: attempt, model: config.model },
          },
          this.logger
        );
        return { text, value };
      } catch (error) {
        const failure = toRequestError(error);
        if (failure instanceof InvalidJsonError) {
          lastParseError = failure;
        } else {
          lastOtherError = failure;
        }

        this.logger.warn(
          { operation, attempt, maxAttempts, kind: failure.kind, err: failure.message },
          'LLM request attempt failed'
        );

        if (options.signal?.aborted || !isRetryable(failure, this.retry)) {
          break;
        }
      }
    }

    const finalError = lastOtherError ?? lastParseError ?? toRequestError(new Error('Request failed'));
    logError(finalError, { operation, model: config.model }, this.logger);
    throw finalError;
  }

  private async attempt(prompt: string, config: RequestConfig, signal?: AbortSignal): Promise<string> {
    const response = await this.transport.send(this.buildRequest(prompt, config, false, signal));

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new HttpError(response.statusCode, decodeErrorEnvelope(response.body));
    }

    return cleanJsonResponse(extractAssistantContent(response.body));
  }

  private buildRequest(
    prompt: string,
    config: RequestConfig,
    stream: boolean,
    signal?: AbortSignal
  ): TransportRequest {
    const apiKey = this.assertConfigured();

    return {
      url: this.baseUrl,
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(buildChatCompletionBody(prompt, config, stream)),
      timeoutMs: this.timeoutMs,
      signal,
    };
  }

  /** Returns the API key once both it and the base URL are usable. */
  private assertConfigured(): string {
    if (!this.apiKey) {
      throw new MissingCredentialError();
    }

    let url: URL;
    try {
      url = new URL(this.baseUrl);
    } catch {
      throw new InvalidUrlError(this.baseUrl);
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new InvalidUrlError(this.baseUrl);
    }
    return this.apiKey;
  }
}
