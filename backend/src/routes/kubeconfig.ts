import { RequestHandler, Router } from 'express';
import type { Metrics } from '../metrics.js';
import { principalOf } from '../middleware/authenticate.js';
import type { AuditLog } from '../services/audit.js';
import { buildKubeconfig, kubeconfigFilename, type ClusterAccessConfig } from '../services/kubeconfig.js';

export function kubeconfigRouter(
  cluster: ClusterAccessConfig,
  audit: AuditLog,
  metrics: Pick<Metrics, 'kubeconfigGenerated'>,
  requireAuth: RequestHandler,
): Router {
  const router = Router();

  router.get('/', requireAuth, (req, res) => {
    const principal = principalOf(req);
    const body = buildKubeconfig(principal, cluster);
    audit.record({
      actor: principal.username,
      action: 'kubeconfig.generate',
      result: 'success',
      targetType: 'cluster',
      targetId: cluster.clusterName,
      requestId: req.requestId,
    });
    metrics.kubeconfigGenerated();
    res.setHeader('Content-Type', 'application/x-yaml');
    res.setHeader('Content-Disposition', `attachment; filename=${kubeconfigFilename(cluster)}`);
    res.send(body);
  });

  return router;
}
