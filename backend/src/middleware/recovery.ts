import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { AppError, toErrorBody } from '../errors.js';
import { logger } from '../logger.js';

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Express 4 does not await handlers; forward rejections to the error handler. */
export function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

const bodyParserError = z.object({ type: z.string(), status: z.number() });

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof z.ZodError) {
    return new AppError('InvalidRequest', 'request validation failed', {
      cause: err,
      details: { issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
    });
  }
  const parsed = bodyParserError.safeParse(err);
  if (parsed.success && parsed.data.status < 500) {
    const message = parsed.data.type === 'entity.too.large' ? 'request body too large' : 'malformed request body';
    return new AppError('InvalidRequest', message, { cause: err });
  }
  return new AppError('Internal', 'internal server error', { cause: err });
}

export function notFound(): RequestHandler {
  return (req, _res, next) => next(new AppError('NotFound', `no route for ${req.method} ${req.path}`));
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);
    const appErr = toAppError(err);
    const log = req.log ?? logger;
    if (appErr.status >= 500) log.error({ err, requestId: req.requestId, code: appErr.code }, appErr.message);
    else log.debug({ requestId: req.requestId, code: appErr.code }, appErr.message);
    if (appErr.retryAfterSeconds !== undefined) res.setHeader('Retry-After', String(appErr.retryAfterSeconds));
    res.status(appErr.status).json(toErrorBody(appErr, req.requestId));
  };
}
