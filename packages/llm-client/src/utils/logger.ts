import pino from 'pino';

const logLevel = process.env.LOG_LEVEL ?? 'info';

export const loggerOptions: pino.LoggerOptions = {
  level: logLevel,
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    service: 'llm-client',
  },
  redact: {
    paths: ['apiKey', 'headers.Authorization', 'request.headers.Authorization'],
    censor: '[redacted]',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = pino(loggerOptions);

export type Logger = pino.Logger;

export interface ErrorContext {
  operation?: string;
  model?: string;
  attempt?: number;
  [key: string]: unknown;
}

export interface PerformanceMetrics {
  operation: string;
  durationMs: number;
  success: boolean;
  metadata?: Record<string, unknown>;
}

function errorKind(error: Error): string | undefined {
  return 'kind' in error && typeof error.kind === 'string' ? error.kind : undefined;
}

export function logError(error: Error, context?: ErrorContext, customLogger?: Logger): void {
  const log = customLogger ?? logger;
  log.error(
    {
      error: {
        name: error.name,
        kind: errorKind(error),
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    `${context?.operation ?? 'request'} failed: ${error.message}`
  );
}

export function logPerformance(metrics: PerformanceMetrics, customLogger?: Logger): void {
  const log = customLogger ?? logger;
  const level = metrics.success ? 'info' : 'warn';

  log[level](
    {
      performance: {
        operation: metrics.operation,
        durationMs: metrics.durationMs,
        success: metrics.success,
        ...metrics.metadata,
      },
    },
    `${metrics.operation} completed in ${metrics.durationMs}ms`
  );
}

export function createChildLogger(
  bindings: Record<string, unknown>,
  parent: Logger = logger,
  level?: pino.LevelWithSilent
): Logger {
  return parent.child(bindings, level ? { level } : undefined);
}
