import { Request, RequestHandler, Router } from 'express';
import { z } from 'zod';
import { AppError } from '../errors.js';
import { principalOf } from '../middleware/authenticate.js';
import { asyncRoute } from '../middleware/recovery.js';
import { formatDuration, parseDuration } from '../services/groupResolver.js';
import type { SshCertificateIssuer } from '../services/sshIssuer.js';
import type { SelfContext, SshKeyRegistry } from '../services/sshKeyRegistry.js';

export interface SshRouterDeps {
  issuer: SshCertificateIssuer;
  keyRegistry: SshKeyRegistry;
  requireAuth: RequestHandler;
  /** Optional per-principal limiter for signing. */
  signLimiter?: RequestHandler;
}

const signBody = z.object({
  publicKey: z.string(),
  role: z.string().min(1).optional(),
  // seconds, or a duration such as "30m"
  ttl: z.union([z.number(), z.string()]).optional(),
});

const registerKeyBody = z.object({ publicKey: z.string() }).strict();

function selfContext(req: Request): SelfContext {
  return { principal: principalOf(req), requestId: req.requestId, signal: req.abortSignal };
}

function requestedTtl(ttl: number | string | undefined): number | undefined {
  if (ttl === undefined || typeof ttl === 'number') return ttl;
  try {
    return parseDuration(ttl);
  } catch (err) {
    throw new AppError('InvalidRequest', `invalid ttl ${JSON.stringify(ttl)}`, { cause: err });
  }
}

export function sshRouter(deps: SshRouterDeps): Router {
  const { issuer, keyRegistry, requireAuth } = deps;
  const router = Router();
  const signChain: RequestHandler[] = deps.signLimiter ? [requireAuth, deps.signLimiter] : [requireAuth];

  router.post('/sign', signChain, asyncRoute(async (req, res) => {
    const body = signBody.parse(req.body ?? {});
    const issued = await issuer.issue({
      principal: principalOf(req),
      publicKey: body.publicKey,
      role: body.role,
      ttlSeconds: requestedTtl(body.ttl),
      requestId: req.requestId,
      signal: req.abortSignal,
    });
    res.status(201).json(issued);
  }));

  router.get('/roles', requireAuth, (req, res) => {
    const roles = issuer.availableRoles(principalOf(req));
    res.json({
      current: roles[0].name,
      items: roles.map((r) => ({
        name: r.name,
        maxTtl: formatDuration(r.maxTtlSeconds),
        maxTtlSeconds: r.maxTtlSeconds,
        principals: r.principals,
        precedence: r.precedence,
      })),
    });
  });

  // the caller's pinned key; once set, only that key is signed
  router.get('/public-key', requireAuth, asyncRoute(async (req, res) => {
    res.json(await keyRegistry.get(selfContext(req)));
  }));

  router.put('/public-key', requireAuth, asyncRoute(async (req, res) => {
    const body = registerKeyBody.parse(req.body ?? {});
    res.json(await keyRegistry.register(selfContext(req), body.publicKey));
  }));

  router.delete('/public-key', requireAuth, asyncRoute(async (req, res) => {
    await keyRegistry.remove(selfContext(req));
    res.status(204).end();
  }));

  router.get('/ca-public-key', asyncRoute(async (req, res) => {
    const publicKey = await issuer.caPublicKey(req.abortSignal);
    if (req.query.format === 'text') {
      res.type('text/plain').send(`${publicKey}\n`);
      return;
    }
    res.json({ publicKey });
  }));

  return router;
}
