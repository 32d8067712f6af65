import express, { Express, RequestHandler } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { logger as rootLogger, type Logger } from './logger.js';
import type { Metrics } from './metrics.js';
import { authenticate, type PrincipalValidator } from './middleware/authenticate.js';
import { requireAdmin } from './middleware/authorize.js';
import { cancellation } from './middleware/cancellation.js';
import { httpLogger } from './middleware/httpLogger.js';
import { httpMetrics } from './middleware/httpMetrics.js';
import { createRateLimiter } from './middleware/rateLimit.js';
import { asyncRoute, errorHandler, notFound } from './middleware/recovery.js';
import { requestId } from './middleware/requestId.js';
import { openapiSpec } from './openapi.js';
import { auditRouter } from './routes/audit.js';
import { authRouter, type LoginClient } from './routes/auth.js';
import { healthRouter, type ReadinessSource } from './routes/health.js';
import { kubeconfigRouter } from './routes/kubeconfig.js';
import { sshRouter } from './routes/ssh.js';
import { groupsRouter, usersRouter } from './routes/users.js';
import type { AuditLog } from './services/audit.js';
import type { DirectoryAdminGateway } from './services/directory.js';
import type { RoleTable } from './services/groupResolver.js';
import type { ClusterAccessConfig } from './services/kubeconfig.js';
import type { LoginStateSigner } from './services/oidc.js';
import type { SshCertificateIssuer } from './services/sshIssuer.js';
import type { SshKeyRegistry } from './services/sshKeyRegistry.js';

/** Unauthenticated bootstrap settings for the web UI. */
export interface PublicConfig {
  issuerUrl: string;
  clientId: string;
  keycloakUrl: string;
  realm: string;
  clusterName: string;
}

export interface AppDependencies {
  roles: RoleTable;
  cluster: ClusterAccessConfig;
  validator: PrincipalValidator;
  issuer: SshCertificateIssuer;
  credentials: ReadinessSource;
  directory: DirectoryAdminGateway;
  audit: AuditLog;
  oidc: LoginClient;
  loginState: LoginStateSigner;
  keyRegistry: SshKeyRegistry;
  metrics: Metrics;
  publicConfig: PublicConfig;
  corsOrigin?: string;
  /** Per-principal signing limit; max 0 disables it. */
  signRateLimit?: { max: number; windowMs: number };
  logger?: Logger;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestId());
  app.use(httpLogger(deps.logger ?? rootLogger));
  app.use(httpMetrics(deps.metrics));
  app.use(cancellation());
  app.use(cors(deps.corsOrigin ? { origin: deps.corsOrigin.split(',').map((o) => o.trim()) } : undefined));
  app.use(express.json({ limit: '1mb' }));
  app.use(cookieParser());

  const requireAuth = authenticate(deps.validator, deps.roles, deps.audit);
  const adminOnly: RequestHandler[] = [requireAuth, requireAdmin(deps.roles)];
  const limit = deps.signRateLimit;
  const signLimiter =
    limit && limit.max > 0 ? createRateLimiter({ windowMs: limit.windowMs, max: limit.max, action: 'ssh signing' }) : undefined;

  app.use(healthRouter(deps.credentials));
  app.get('/metrics', asyncRoute(async (_req, res) => {
    res.type(deps.metrics.contentType).send(await deps.metrics.render());
  }));
  app.get('/api/v1/config', (_req, res) => res.json(deps.publicConfig));
  // OpenAPI spec & docs
  app.get('/api/docs.json', (_req, res) => res.json(openapiSpec));
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec, { explorer: true }));

  app.use('/api/v1/auth', authRouter({ ...deps, requireAuth }));
  app.use('/api/v1/ssh', sshRouter({ issuer: deps.issuer, keyRegistry: deps.keyRegistry, requireAuth, signLimiter }));
  app.use('/api/v1/kubeconfig', kubeconfigRouter(deps.cluster, deps.audit, deps.metrics, requireAuth));
  app.use('/api/v1/users', usersRouter(deps.directory, adminOnly));
  app.use('/api/v1/groups', groupsRouter(deps.directory, adminOnly));
  app.use('/api/v1/audit', auditRouter(deps.audit, adminOnly));

  app.use(notFound());
  app.use(errorHandler());
  return app;
}
