export const VERSION = '0.1.0';

export * from './errors';
export * from './presets';
export * from './sanitizer';
export * from './prompts';
export * from './cache/response-cache';
export * from './history/sentence-history';
export * from './retry/retry-policy';
export * from './streaming/sse';
export * from './transport/transport.interface';
export * from './transport/axios-transport';
export * from './transport/error-envelope';
export * from './client/chat-completions';
export * from './client/structured-request-client';
export * from './config/env';
export * from './factory';
export { logger, createChildLogger, type Logger } from './utils/logger';
