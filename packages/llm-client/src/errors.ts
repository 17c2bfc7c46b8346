import type { ValidationIssue } from '@rephrase/core';

export type LLMErrorKind =
  | 'missing_credential'
  | 'invalid_url'
  | 'invalid_input'
  | 'network'
  | 'timeout'
  | 'http'
  | 'empty_response'
  | 'invalid_json'
  | 'schema_mismatch';

export abstract class LLMRequestError extends Error {
  public abstract readonly kind: LLMErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends LLMRequestError {
  public readonly kind = 'missing_credential';

  constructor() {
    super('API key not configured. Set OPENAI_API_KEY or pass apiKey to the client.');
  }
}

export class InvalidUrlError extends LLMRequestError {
  public readonly kind = 'invalid_url';

  constructor(public readonly url: string) {
    super(`Invalid API URL: ${url}`);
  }
}

export class InvalidInputError extends LLMRequestError {
  public readonly kind = 'invalid_input';

  constructor(public readonly field: string) {
    super(`${field} must not be empty`);
  }
}

export class NetworkError extends LLMRequestError {
  public readonly kind: LLMErrorKind = 'network';
}

export class TimeoutError extends NetworkError {
  public readonly kind: LLMErrorKind = 'timeout';

  constructor(
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Request timed out after ${timeoutMs}ms`, options);
  }
}

const STATUS_MESSAGES: Record<number, string> = {
  400: 'Bad request - check model name or parameters',
  401: 'Invalid API key',
  403: 'Access forbidden - check API key permissions',
  404: 'API endpoint not found',
  429: 'Rate limit exceeded - please wait and try again',
  500: 'Server error - please try again',
  502: 'Service temporarily unavailable',
  503: 'Service temporarily unavailable',
  504: 'Service temporarily unavailable',
};

export function describeStatus(statusCode: number): string {
  return STATUS_MESSAGES[statusCode] ?? `HTTP Error ${statusCode}`;
}

export class HttpError extends LLMRequestError {
  public readonly kind = 'http';

  constructor(
    public readonly statusCode: number,
    public readonly detail?: string
  ) {
    const summary = describeStatus(statusCode);
    super(detail ? `${summary}: ${detail}` : summary);
  }
}

export class EmptyResponseError extends LLMRequestError {
  public readonly kind = 'empty_response';

  constructor(message: string = 'Response contained no assistant content') {
    super(message);
  }
}

export class InvalidJsonError extends LLMRequestError {
  public readonly kind: LLMErrorKind = 'invalid_json';

  constructor(
    public readonly raw: string,
    message: string = 'Response is not valid JSON',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SchemaMismatchError extends InvalidJsonError {
  public readonly kind: LLMErrorKind = 'schema_mismatch';

  constructor(
    raw: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(
      raw,
      `Response does not match the expected format: ${issues
        .map((issue) => `${issue.field || '(root)'}: ${issue.message}`)
        .join('; ')}`
    );
  }
}

/**
 * Wraps anything thrown during an attempt so callers only ever see LLMRequestError.
 */
export function toRequestError(error: unknown): LLMRequestError {
  if (error instanceof LLMRequestError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, { cause: error });
}
