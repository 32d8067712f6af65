import { Router } from 'express';
import { errorMessage } from '../errors.js';
import { asyncRoute } from '../middleware/recovery.js';
import type { CredentialHealth, TokenLookup } from '../services/credentialStore.js';

export interface ReadinessSource {
  health(): CredentialHealth;
  isReady(): boolean;
  lookupSelf(signal?: AbortSignal): Promise<TokenLookup>;
}

export function healthRouter(credentials: ReadinessSource): Router {
  const router = Router();

  router.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // GET /readyz?verify=true also asks the PKI backend to confirm the token
  router.get('/readyz', asyncRoute(async (req, res) => {
    let ready = credentials.isReady();
    let verifyError: string | undefined;
    if (ready && req.query.verify === 'true') {
      try {
        await credentials.lookupSelf(req.abortSignal);
      } catch (err) {
        ready = false;
        verifyError = errorMessage(err);
      }
    }
    const credential = credentials.health();
    res.status(ready ? 200 : 503).json({
      status: ready ? 'ready' : 'not_ready',
      credential: verifyError ? { ...credential, lastError: verifyError } : credential,
    });
  }));

  return router;
}
