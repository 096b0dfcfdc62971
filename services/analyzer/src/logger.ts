import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  'password',
  'secret',
];

export const redact = {
  paths: REDACT_PATHS,
  censor: '[REDACTED]',
};

export function createRootLogger(destination?: DestinationStream, level = process.env.LOG_LEVEL || 'info'): Logger {
  const options: LoggerOptions = {
    level,
    redact,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
