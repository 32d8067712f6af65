import type { Express } from 'express';
import { createApp } from './app.js';
import type { AppConfig } from './config.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { Metrics } from './metrics.js';
import { startServer, type RunningServer } from './server.js';
import { AuditLog, PinoAuditSink } from './services/audit.js';
import { CredentialStoreClient, ServiceAccountTokenFile } from './services/credentialStore.js';
import { DirectoryAdminGateway } from './services/directory.js';
import { KeycloakAdminClient } from './services/keycloakAdmin.js';
import { createHttpClient, LoginStateSigner, OidcClient, OidcDiscovery } from './services/oidc.js';
import { JwksKeySource, SigningKeyCache } from './services/signingKeys.js';
import { SshCertificateIssuer } from './services/sshIssuer.js';
import { SshKeyRegistry } from './services/sshKeyRegistry.js';
import { TokenValidator } from './services/tokenValidator.js';
import { VaultHttpBackend } from './services/vaultBackend.js';

export interface Runtime {
  app: Express;
  credentials: CredentialStoreClient;
  signingKeys: SigningKeyCache;
  audit: AuditLog;
  metrics: Metrics;
  /** Logs in to the PKI backend, starts the background tasks and listens. */
  start(): Promise<RunningServer>;
}

/** Wires every service from configuration. Nothing touches the network until start(). */
export function buildRuntime(config: AppConfig, logger: Logger = rootLogger): Runtime {
  const http = createHttpClient(config.upstreamTimeoutMs);
  const discovery = new OidcDiscovery(config.oidc.issuerUrl, http);
  const signingKeys = new SigningKeyCache(new JwksKeySource(discovery, config.upstreamTimeoutMs), {
    ttlMs: config.oidc.jwksCacheTtlMs,
    maxStaleMs: config.oidc.jwksMaxStaleMs,
    refreshIntervalMs: config.oidc.jwksCacheTtlMs,
  });
  const validator = new TokenValidator(signingKeys, {
    issuer: config.oidc.issuerUrl,
    audience: config.oidc.audience,
    usernameClaim: config.oidc.usernameClaim,
    groupsClaim: config.oidc.groupsClaim,
  });
  const audit = new AuditLog(new PinoAuditSink(config.audit.logPath ?? 1), config.audit.bufferSize);

  const credentials = new CredentialStoreClient(
    new VaultHttpBackend({
      address: config.vault.address,
      sshMount: config.vault.sshMount,
      authPath: config.vault.authPath,
      authRole: config.vault.authRole,
      timeoutMs: config.upstreamTimeoutMs,
      caCert: config.vault.caCert,
    }),
    new ServiceAccountTokenFile(config.vault.serviceAccountTokenPath),
    {
      renewFraction: config.vault.renewFraction,
      renewRetries: config.vault.renewRetries,
      backoffBaseMs: config.vault.backoffBaseMs,
      backoffMaxMs: config.vault.backoffMaxMs,
    },
  );
  const metrics = new Metrics({ defaultMetrics: config.metrics.defaultCollectors });
  metrics.watchCredential(() => credentials.isReady());
  const keycloak = new KeycloakAdminClient({
    url: config.keycloak.url,
    realm: config.keycloak.realm,
    clientId: config.keycloak.adminClientId,
    clientSecret: config.keycloak.adminClientSecret,
    timeoutMs: config.upstreamTimeoutMs,
  });
  const keyRegistry = new SshKeyRegistry(keycloak, audit);
  const issuer = new SshCertificateIssuer(config.roles, credentials, audit, {
    backdateSeconds: config.ssh.backdateSeconds,
    registeredKeys: config.ssh.enforceRegisteredKey ? keyRegistry : undefined,
    metrics,
  });
  const directory = new DirectoryAdminGateway(keycloak, config.roles, audit);
  const oidc = new OidcClient(discovery, http, {
    clientId: config.oidc.clientId,
    clientSecret: config.oidc.clientSecret,
    redirectUrl: config.oidc.redirectUrl,
  });

  const app = createApp({
    roles: config.roles,
    cluster: config.cluster,
    validator,
    issuer,
    credentials,
    directory,
    audit,
    oidc,
    loginState: new LoginStateSigner(config.oidc.clientSecret, { secureCookie: config.oidc.redirectUrl.startsWith('https:') }),
    keyRegistry,
    metrics,
    publicConfig: {
      issuerUrl: config.oidc.issuerUrl,
      clientId: config.oidc.clientId,
      keycloakUrl: config.keycloak.url,
      realm: config.keycloak.realm,
      clusterName: config.cluster.clusterName,
    },
    corsOrigin: config.corsOrigin,
    signRateLimit: config.signRateLimit,
    logger,
  });

  return {
    app,
    credentials,
    signingKeys,
    audit,
    metrics,
    async start() {
      await credentials.start();
      signingKeys.start();
      return startServer(app, {
        host: config.listen.host,
        port: config.listen.port,
        shutdownTimeoutMs: config.shutdownTimeoutMs,
        onStop: [() => credentials.stop(), () => signingKeys.stop()],
        logger: logger.child({ component: 'server' }),
      });
    },
  };
}
