import { RequestHandler, Router } from 'express';
import { z } from 'zod';
import { AppError, errorMessage, isAppError } from '../errors.js';
import { principalOf } from '../middleware/authenticate.js';
import { asyncRoute } from '../middleware/recovery.js';
import type { AuditLog } from '../services/audit.js';
import type { Role, RoleTable } from '../services/groupResolver.js';
import { LOGIN_COOKIE, safeReturnTo, type LoginStateSigner, type TokenSet } from '../services/oidc.js';
import type { Principal } from '../services/tokenValidator.js';
import type { PrincipalValidator } from '../middleware/authenticate.js';

/** The parts of the OIDC client the login routes use. */
export interface LoginClient {
  authorizationUrl(state: string, codeChallenge: string): Promise<string>;
  exchangeCode(code: string, codeVerifier: string, signal?: AbortSignal): Promise<TokenSet>;
  logout(refreshToken: string, signal?: AbortSignal): Promise<void>;
  endSessionUrl(postLogoutRedirectUri?: string): Promise<string | undefined>;
}

export interface AuthRouterDeps {
  oidc: LoginClient;
  loginState: LoginStateSigner;
  validator: PrincipalValidator;
  roles: RoleTable;
  audit: AuditLog;
  requireAuth: RequestHandler;
}

const callbackQuery = z.object({
  code: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

const logoutBody = z.object({
  refreshToken: z.string().min(1).optional(),
  postLogoutRedirectUri: z.string().url().optional(),
});

/** Login failures the caller caused, as opposed to provider outages. */
const DENIED_LOGIN_CODES = ['Unauthenticated', 'Forbidden', 'InvalidRequest', 'MalformedToken'] as const;

function failureCode(err: unknown): string {
  if (isAppError(err)) return err.code;
  return err instanceof z.ZodError ? 'InvalidRequest' : 'Internal';
}

export function userSummary(principal: Principal, role: Role | undefined, roles: RoleTable) {
  return {
    subject: principal.subject,
    username: principal.username,
    email: principal.email ?? null,
    name: principal.name ?? null,
    groups: principal.groups,
    role: role?.name ?? null,
    isAdmin: roles.isAdmin(role),
    expiresAt: principal.expiresAt.toISOString(),
  };
}

export function authRouter(deps: AuthRouterDeps): Router {
  const { oidc, loginState, validator, roles, audit, requireAuth } = deps;
  const router = Router();

  // GET /api/v1/auth/login?returnTo=/path
  router.get('/login', asyncRoute(async (req, res) => {
    const attempt = loginState.begin(safeReturnTo(req.query.returnTo));
    const url = await oidc.authorizationUrl(attempt.state, attempt.codeChallenge);
    res.cookie(LOGIN_COOKIE, attempt.cookie, loginState.cookieOptions);
    res.redirect(302, url);
  }));

  router.get('/callback', asyncRoute(async (req, res) => {
    // one attempt per cookie, whatever the outcome
    const cookie: unknown = req.cookies?.[LOGIN_COOKIE];
    res.clearCookie(LOGIN_COOKIE, { path: loginState.cookieOptions.path });
    let completed: { tokens: TokenSet; principal: Principal; returnTo: string };
    try {
      const query = callbackQuery.parse(req.query);
      if (query.error) throw new AppError('Unauthenticated', `login failed: ${query.error_description ?? query.error}`);
      if (!query.code || !query.state) throw new AppError('InvalidRequest', 'code and state are required');
      const { returnTo, codeVerifier } = loginState.complete(query.state, typeof cookie === 'string' ? cookie : undefined);
      const tokens = await oidc.exchangeCode(query.code, codeVerifier, req.abortSignal);
      completed = { tokens, principal: await validator.validate(tokens.access_token), returnTo };
    } catch (err) {
      const code = failureCode(err);
      const denied = DENIED_LOGIN_CODES.some((c) => c === code);
      audit.tryRecord({
        actor: 'anonymous',
        action: 'auth.login',
        result: denied ? 'denied' : 'failure',
        targetType: 'session',
        requestId: req.requestId,
        details: { code, reason: errorMessage(err) },
      });
      throw err;
    }
    const { tokens, principal, returnTo } = completed;
    const role = roles.tryResolve(principal.groups);
    audit.record({
      actor: principal.username,
      action: 'auth.login',
      result: 'success',
      targetType: 'session',
      requestId: req.requestId,
      details: { role: role?.name ?? null },
    });
    res.json({
      accessToken: tokens.access_token,
      idToken: tokens.id_token ?? null,
      refreshToken: tokens.refresh_token ?? null,
      expiresIn: tokens.expires_in,
      tokenType: tokens.token_type,
      returnTo,
      user: userSummary(principal, role, roles),
    });
  }));

  router.post('/logout', requireAuth, asyncRoute(async (req, res) => {
    const principal = principalOf(req);
    const body = logoutBody.parse(req.body ?? {});
    if (body.refreshToken) await oidc.logout(body.refreshToken, req.abortSignal);
    audit.record({
      actor: principal.username,
      action: 'auth.logout',
      result: 'success',
      targetType: 'session',
      requestId: req.requestId,
      details: { sessionRevoked: body.refreshToken !== undefined },
    });
    res.json({ endSessionUrl: (await oidc.endSessionUrl(body.postLogoutRedirectUri)) ?? null });
  }));

  router.get('/userinfo', requireAuth, (req, res) => {
    res.json(userSummary(principalOf(req), req.role, roles));
  });

  return router;
}
