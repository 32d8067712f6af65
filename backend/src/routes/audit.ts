import { RequestHandler, Router } from 'express';
import { z } from 'zod';
import type { AuditLog } from '../services/audit.js';

const auditQuery = z.object({
  limit: z.coerce.number().int().optional(),
  cursor: z.string().optional(),
  actor: z.string().optional(),
  action: z.string().optional(),
  result: z.enum(['success', 'failure', 'denied']).optional(),
  sort: z.string().optional(),
  dir: z.enum(['asc', 'desc']).optional(),
});

export function auditRouter(audit: AuditLog, guard: RequestHandler[]): Router {
  const router = Router();
  router.use(guard);

  // GET /api/v1/audit?cursor=<id>&limit=50&actor=alice&action=ssh.sign&result=success&sort=ts&dir=desc
  router.get('/', (req, res) => {
    res.json(audit.query(auditQuery.parse(req.query)));
  });

  router.get('/stats', (_req, res) => {
    res.json(audit.stats());
  });

  return router;
}
