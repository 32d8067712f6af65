import { RequestHandler } from 'express';
import { v4 as uuid } from 'uuid';

const VALID_REQUEST_ID = /^[A-Za-z0-9_-]{1,64}$/;

// Reuses a well-formed inbound X-Request-ID, otherwise mints one; always echoed back.
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const inbound = req.header('x-request-id');
    const id = inbound && VALID_REQUEST_ID.test(inbound) ? inbound : uuid();
    req.requestId = id;
    res.setHeader('X-Request-ID', id);
    next();
  };
}
