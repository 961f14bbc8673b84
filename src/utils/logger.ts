import pino from 'pino';

let correlationId: string | undefined;

function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function resolveLevel(): string {
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.LOG_LEVEL || 'info';
}

const loggerOptions: pino.LoggerOptions =
  process.env.NODE_ENV === 'development'
    ? {
        level: resolveLevel(),
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {
        level: resolveLevel(),
        timestamp: pino.stdTimeFunctions.isoTime,
      };

const baseLogger = pino(loggerOptions);

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const correlationIdValue = correlationId || generateCorrelationId();
  if (!correlationId) {
    setCorrelationId(correlationIdValue);
  }

  return baseLogger.child({
    correlationId: correlationIdValue,
    ...context,
  });
}
