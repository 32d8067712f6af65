import { Request, RequestHandler } from 'express';
import { AppError, errorMessage, isAppError } from '../errors.js';
import type { AuditLog } from '../services/audit.js';
import type { RoleTable } from '../services/groupResolver.js';
import { bearerToken, unverifiedSubject, type Principal } from '../services/tokenValidator.js';
import { asyncRoute } from './recovery.js';

export interface PrincipalValidator {
  validate(rawToken: string): Promise<Principal>;
}

/**
 * Validates the bearer token and attaches the principal (and its role, if any)
 * to the request. A presented token that fails is audited as `auth.token`;
 * a request without credentials is not.
 */
export function authenticate(validator: PrincipalValidator, roles: RoleTable, audit: AuditLog): RequestHandler {
  return asyncRoute(async (req, _res, next) => {
    const header = req.header('authorization');
    let principal: Principal;
    try {
      principal = await validator.validate(bearerToken(header));
    } catch (err) {
      if (header) {
        const token = /^Bearer\s+(\S+)/i.exec(header)?.[1];
        const subject = token ? unverifiedSubject(token) : undefined;
        const code = isAppError(err) ? err.code : 'Internal';
        audit.tryRecord({
          actor: subject ?? 'anonymous',
          action: 'auth.token',
          result: code === 'UpstreamUnavailable' || code === 'Internal' ? 'failure' : 'denied',
          targetType: 'session',
          requestId: req.requestId,
          details: { code, reason: errorMessage(err), method: req.method, path: req.originalUrl.split('?')[0] },
        });
      }
      throw err;
    }
    req.principal = principal;
    req.role = roles.tryResolve(principal.groups);
    next();
  });
}

export function principalOf(req: Request): Principal {
  if (!req.principal) throw new AppError('Unauthenticated', 'authentication required');
  return req.principal;
}
