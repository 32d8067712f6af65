import { RequestHandler } from 'express';
import { AppError } from '../errors.js';

/** Gives each request an AbortSignal that fires if the client disconnects before the response is sent. */
export function cancellation(): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    req.abortSignal = controller.signal;
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new AppError('UpstreamUnavailable', 'client disconnected'));
    });
    next();
  };
}
