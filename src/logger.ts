import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'identity-sync',
    level,
    redact: {
      paths: ['password', 'token', '*.password', '*.token', 'config.*.password', 'config.*.token'],
      censor: '***REDACTED***',
    },
  });
}

/** Logger for tests and library callers that want no output. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
