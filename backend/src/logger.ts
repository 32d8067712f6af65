import { pino, type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'identity-portal' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'res.headers["set-cookie"]',
      '*.token',
      '*.password',
      '*.clientSecret',
      '*.refreshToken',
    ],
    censor: '[redacted]',
  },
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
