import pino, { type Logger, type DestinationStream, type LoggerOptions } from 'pino';

const REDACT_PATHS = ['token', 'password', 'secret'];

/** Logs go to stderr so that `--json` output on stdout stays parseable. */
export function createRootLogger(destination: DestinationStream = pino.destination(2)): Logger {
  const options: LoggerOptions = {
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
  };
  return pino(options, destination);
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export default logger;
