import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

// Request bodies and headers end up in some log lines
const REDACTED_PATHS = [
  'password',
  'passwordConfirm',
  'currentPassword',
  'newPassword',
  'token',
  '*.password',
  '*.token',
  'headers.authorization',
];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * The root logger exists before config is loaded, so it reads LOG_LEVEL itself. An unknown
 * value logs at info until loadConfig rejects it.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

function rootOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: resolveLogLevel(process.env.LOG_LEVEL),
    redact: REDACTED_PATHS,
  };
  if (process.env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }
  return options;
}

const rootLogger = pino(rootOptions());

/**
 * Child of the process-wide logger. Pass `component`, `service` or `adapter` to say where a line
 * comes from; HTTP handlers add a `correlationId` per request.
 */
export function createLogger(context: Record<string, unknown> = {}): Logger {
  return rootLogger.child(context);
}
