import { pino, destination, type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export const APP_NAME = 'mock-metrics';

/** Root logger: JSON lines on stderr, tagged with the app name. */
export function createLogger(level: LogLevel = 'info', stream?: DestinationStream): Logger {
  return pino(
    {
      level,
      base: { app: APP_NAME },
      redact: { paths: ['req.headers.authorization', 'authToken'], censor: '[redacted]' },
    },
    stream ?? destination(2),
  );
}
