import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogLevel } from './config';

// Context for request correlation
export const requestContext = new AsyncLocalStorage<{ requestId: string }>();

export type Logger = PinoLogger;

export interface LogSettings {
  level: LogLevel;
  pretty: boolean;
}

const buildOptions = (settings: LogSettings): LoggerOptions => ({
  level: settings.level,
  ...(settings.pretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        singleLine: false,
      },
    },
  }),
  formatters: {
    level: (label: string) => {
      return { level: label.toUpperCase() };
    },
    log: (object: Record<string, unknown>) => {
      const context = requestContext.getStore();
      if (context?.requestId) {
        return { ...object, requestId: context.requestId };
      }
      return object;
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create the root logger for a process. Components receive a child of it
 * tagged with their name.
 */
export const createLogger = (settings: LogSettings, context?: Record<string, unknown>): Logger => {
  const baseLogger = pino(buildOptions(settings));
  return context ? baseLogger.child(context) : baseLogger;
};

export const createComponentLogger = (parent: Logger, component: string): Logger =>
  parent.child({ component });

// Logger that drops everything; handy for tests and tooling
export const createSilentLogger = (): Logger => createLogger({ level: 'silent', pretty: false });

// Request ID middleware helper
export const withRequestId = <T>(requestId: string, fn: () => T): T => {
  return requestContext.run({ requestId }, fn);
};

export const createPerformanceLogger = (logger: Logger, operation: string) => {
  const start = Date.now();

  return {
    end: (context?: Record<string, unknown>): number => {
      const duration = Date.now() - start;
      logger.info({ operation, duration, ...context }, 'Operation completed');
      return duration;
    },
    error: (error: unknown, context?: Record<string, unknown>): number => {
      const duration = Date.now() - start;
      logger.error({ operation, duration, err: error, ...context }, 'Operation failed');
      return duration;
    },
  };
};
