import { pinoHttp } from 'pino-http';
import { v4 as uuid } from 'uuid';
import { logger as rootLogger, type Logger } from '../logger.js';

const QUIET_PATHS = new Set(['/healthz', '/readyz']);

export function httpLogger(logger: Logger = rootLogger) {
  return pinoHttp({
    logger,
    // requestId() has already set the response header
    genReqId: (_req, res) => {
      const id = res.getHeader('x-request-id');
      return typeof id === 'string' ? id : uuid();
    },
    autoLogging: { ignore: (req) => QUIET_PATHS.has((req.url ?? '').split('?')[0]) },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
    customErrorMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
  });
}
