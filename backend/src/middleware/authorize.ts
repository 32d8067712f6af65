import { RequestHandler } from 'express';
import { AppError } from '../errors.js';
import type { RoleTable } from '../services/groupResolver.js';

// Admin = the top-ranked role of the table.
export function requireAdmin(roles: RoleTable): RequestHandler {
  return (req, _res, next) => {
    if (!req.principal) return next(new AppError('Unauthenticated', 'authentication required'));
    if (!roles.isAdmin(req.role)) return next(new AppError('Forbidden', 'administrator role required'));
    next();
  };
}
