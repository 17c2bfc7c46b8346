import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  logger,
  loggerOptions,
  logError,
  logPerformance,
  createChildLogger,
  type Logger,
} from '../../src/utils/logger';
import { HttpError } from '../../src/errors';

function capture(): { log: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const log = pino(
    { ...loggerOptions, transport: undefined, level: 'debug' },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    }
  );
  return { log, lines };
}

describe('Logger Utilities', () => {
  describe('logger', () => {
    it('should carry the service binding', () => {
      expect(logger.bindings().service).toBe('llm-client');
    });

    it('should label levels and redact credentials', () => {
      const { log, lines } = capture();

      log.info({ headers: { Authorization: 'Bearer test-secret' } }, 'sending');

      expect(lines[0].level).toBe('info');
      expect(lines[0].msg).toBe('sending');
      expect(lines[0].headers).toEqual({ Authorization: '[redacted]' });
    });
  });

  describe('logError', () => {
    it('should log the error name, kind and context', () => {
      const { log, lines } = capture();

      logError(new HttpError(503), { operation: 'evaluate', model: 'gpt-4o', attempt: 3 }, log);

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 'error',
        msg: 'evaluate failed: Service temporarily unavailable',
        operation: 'evaluate',
        model: 'gpt-4o',
        attempt: 3,
        error: { name: 'HttpError', kind: 'http', message: 'Service temporarily unavailable' },
      });
    });

    it('should fall back to a generic operation name', () => {
      const { log, lines } = capture();

      logError(new Error('boom'), undefined, log);

      expect(lines[0].msg).toBe('request failed: boom');
    });
  });

  describe('logPerformance', () => {
    it('should log successes at info and failures at warn', () => {
      const { log, lines } = capture();

      logPerformance({ operation: 'generate', durationMs: 420, success: true }, log);
      logPerformance(
        { operation: 'evaluate', durationMs: 900, success: false, metadata: { attempts: 3 } },
        log
      );

      expect(lines[0]).toMatchObject({
        level: 'info',
        msg: 'generate completed in 420ms',
        performance: { operation: 'generate', durationMs: 420, success: true },
      });
      expect(lines[1]).toMatchObject({
        level: 'warn',
        performance: { operation: 'evaluate', attempts: 3, success: false },
      });
    });
  });

  describe('createChildLogger', () => {
    it('should add bindings to the parent', () => {
      const { log, lines } = capture();

      createChildLogger({ component: 'prefetch' }, log).debug('started');

      expect(lines[0]).toMatchObject({ service: 'llm-client', component: 'prefetch', msg: 'started' });
    });

    it('should apply its own level when given one', () => {
      const { log, lines } = capture();
      const child = createChildLogger({ component: 'client' }, log, 'warn');

      child.info('hidden');
      child.warn('shown');

      expect(child.level).toBe('warn');
      expect(lines).toHaveLength(1);
      expect(lines[0].msg).toBe('shown');
    });
  });
});
