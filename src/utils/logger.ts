import pino from 'pino';

export type { Logger } from 'pino';

// signed request headers and client options must never reach the log sink
const REDACT_PATHS = [
  'apiKey',
  'apiSecret',
  '*.apiSecret',
  'headers["X-AUTH-APIKEY"]',
  'headers["X-AUTH-SIGNATURE"]',
];

export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: undefined,
  redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  transport:
    process.env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true, singleLine: true } }
      : undefined,
});

/** Child logger tagged with the component that owns it. */
export function componentLogger(component: string) {
  return logger.child({ component });
}
