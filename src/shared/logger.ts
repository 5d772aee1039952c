import pino, { type Logger, type DestinationStream } from 'pino';

const REDACT_PATHS = [
  'token',
  'apiKey',
  'password',
  'secret',
  'headers.authorization',
  'headers["x-api-key"]',
];

/**
 * Logs go to stderr so the rendered report on stdout stays clean.
 */
export function createRootLogger(destination?: DestinationStream): Logger {
  return pino(
    {
      level: process.env.LOG_LEVEL || 'info',
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    destination ?? pino.destination(2),
  );
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;
