import fs from 'fs';
import path from 'path';
import forge from 'node-forge';
import { z } from 'zod';
import { RoleTable } from './services/groupResolver.js';
import type { ClusterAccessConfig } from './services/kubeconfig.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LISTEN_HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  OIDC_ISSUER_URL: z.string().url(),
  OIDC_CLIENT_ID: z.string().min(1),
  OIDC_CLIENT_SECRET: z.string().min(1),
  OIDC_REDIRECT_URL: z.string().url().optional(),
  OIDC_AUDIENCE: z.string().min(1).optional(),
  OIDC_USERNAME_CLAIM: z.string().min(1).default('preferred_username'),
  OIDC_GROUPS_CLAIM: z.string().min(1).default('groups'),
  JWKS_CACHE_TTL_MS: positiveInt(10 * 60 * 1000),
  JWKS_MAX_STALE_MS: positiveInt(60 * 60 * 1000),

  KEYCLOAK_URL: z.string().url(),
  KEYCLOAK_REALM: z.string().min(1).default('master'),
  KEYCLOAK_ADMIN_CLIENT_ID: z.string().min(1).default('identity-portal'),
  KEYCLOAK_ADMIN_CLIENT_SECRET: z.string().min(1),

  VAULT_ADDR: z.string().url(),
  VAULT_SSH_MOUNT: z.string().min(1).default('ssh-client-signer'),
  VAULT_AUTH_PATH: z.string().min(1).default('auth/kubernetes'),
  VAULT_AUTH_ROLE: z.string().min(1).default('identity-portal'),
  VAULT_SA_TOKEN_PATH: z.string().min(1).default('/var/run/secrets/kubernetes.io/serviceaccount/token'),
  VAULT_CA_CERT_PATH: z.string().min(1).optional(),
  VAULT_RENEW_FRACTION: z.coerce.number().gt(0).lt(1).default(2 / 3),
  VAULT_RENEW_RETRIES: z.coerce.number().int().min(0).default(5),
  VAULT_BACKOFF_BASE_MS: positiveInt(1000),
  VAULT_BACKOFF_MAX_MS: positiveInt(30_000),
  UPSTREAM_TIMEOUT_MS: positiveInt(8000),

  CLUSTER_NAME: z.string().min(1),
  KUBE_API_SERVER: z.string().url(),
  CLUSTER_CA_PATH: z.string().min(1),
  ROLES_CONFIG_PATH: z.string().min(1).default('config/roles.json'),

  SSH_CERT_BACKDATE_SECONDS: z.coerce.number().int().min(0).default(30),
  SSH_REQUIRE_REGISTERED_KEY: z.enum(['true', 'false']).default('true'),
  METRICS_DEFAULT_COLLECTORS: z.enum(['true', 'false']).default('true'),

  CORS_ORIGIN: z.string().min(1).optional(),
  SIGN_RATE_LIMIT_MAX: z.coerce.number().int().min(0).default(0),
  SIGN_RATE_LIMIT_WINDOW_MS: positiveInt(60 * 60 * 1000),
  AUDIT_LOG_PATH: z.string().min(1).optional(),
  AUDIT_BUFFER_SIZE: positiveInt(1000),
  SHUTDOWN_TIMEOUT_MS: positiveInt(30_000),
});

type EnvValues = z.infer<typeof envSchema>;

export type LogLevel = EnvValues['LOG_LEVEL'];

export interface AppConfig {
  readonly listen: { readonly host: string; readonly port: number };
  readonly logLevel: LogLevel;
  readonly oidc: {
    readonly issuerUrl: string;
    readonly clientId: string;
    readonly clientSecret: string;
    readonly redirectUrl: string;
    readonly audience: string;
    readonly usernameClaim: string;
    readonly groupsClaim: string;
    readonly jwksCacheTtlMs: number;
    readonly jwksMaxStaleMs: number;
  };
  readonly keycloak: {
    readonly url: string;
    readonly realm: string;
    readonly adminClientId: string;
    readonly adminClientSecret: string;
  };
  readonly vault: {
    readonly address: string;
    readonly sshMount: string;
    readonly authPath: string;
    readonly authRole: string;
    readonly serviceAccountTokenPath: string;
    readonly caCert?: Buffer;
    readonly renewFraction: number;
    readonly renewRetries: number;
    readonly backoffBaseMs: number;
    readonly backoffMaxMs: number;
  };
  readonly upstreamTimeoutMs: number;
  readonly cluster: ClusterAccessConfig;
  readonly roles: RoleTable;
  readonly ssh: {
    /** The signer's valid-after backdate (Vault's not_before_duration). */
    readonly backdateSeconds: number;
    /** Enforce a user's registered key when signing. */
    readonly enforceRegisteredKey: boolean;
  };
  readonly metrics: { readonly defaultCollectors: boolean };
  readonly corsOrigin?: string;
  readonly signRateLimit: { readonly max: number; readonly windowMs: number };
  readonly audit: { readonly logPath?: string; readonly bufferSize: number };
  readonly shutdownTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type FileReader = (file: string) => Buffer;

const readFromDisk: FileReader = (file) => fs.readFileSync(path.resolve(process.cwd(), file));

/** Only the variables the schema owns; blank values count as unset. */
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    out[key] = value ? value : undefined;
  }
  return out;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Splits a PEM bundle and checks every block parses as an X.509 certificate. */
export function validateCertificateBundle(pem: string): number {
  const blocks = pem.match(/-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g) ?? [];
  if (blocks.length === 0) throw new Error('no PEM certificate found');
  for (const block of blocks) forge.pki.certificateFromPem(block);
  return blocks.length;
}

export function loadRoleTable(file: string, readFile: FileReader = readFromDisk): RoleTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFile(file).toString('utf8'));
  } catch (err) {
    throw new ConfigError([`ROLES_CONFIG_PATH: cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  try {
    return new RoleTable(raw);
  } catch (err) {
    if (err instanceof z.ZodError) throw new ConfigError(formatIssues(err).map((p) => `roles table ${p}`));
    throw err;
  }
}

/**
 * Reads the process configuration once. Files referenced by the environment
 * (cluster CA, Vault CA, roles table) are read and validated here so that a
 * bad deployment fails at startup rather than on the first request.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, readFile: FileReader = readFromDisk): AppConfig {
  const parsed = envSchema.safeParse(pickEnv(env));
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  const v = parsed.data;

  let clusterCa: Buffer;
  try {
    clusterCa = readFile(v.CLUSTER_CA_PATH);
    validateCertificateBundle(clusterCa.toString('utf8'));
  } catch (err) {
    throw new ConfigError([`CLUSTER_CA_PATH: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let vaultCa: Buffer | undefined;
  if (v.VAULT_CA_CERT_PATH) {
    try {
      vaultCa = readFile(v.VAULT_CA_CERT_PATH);
      validateCertificateBundle(vaultCa.toString('utf8'));
    } catch (err) {
      throw new ConfigError([`VAULT_CA_CERT_PATH: ${err instanceof Error ? err.message : String(err)}`]);
    }
  }

  const roles = loadRoleTable(v.ROLES_CONFIG_PATH, readFile);
  const issuerUrl = v.OIDC_ISSUER_URL.replace(/\/+$/, '');

  return Object.freeze({
    listen: { host: v.LISTEN_HOST, port: v.PORT },
    logLevel: v.LOG_LEVEL,
    oidc: {
      issuerUrl,
      clientId: v.OIDC_CLIENT_ID,
      clientSecret: v.OIDC_CLIENT_SECRET,
      redirectUrl: v.OIDC_REDIRECT_URL ?? `http://localhost:${v.PORT}/api/v1/auth/callback`,
      audience: v.OIDC_AUDIENCE ?? v.OIDC_CLIENT_ID,
      usernameClaim: v.OIDC_USERNAME_CLAIM,
      groupsClaim: v.OIDC_GROUPS_CLAIM,
      jwksCacheTtlMs: v.JWKS_CACHE_TTL_MS,
      jwksMaxStaleMs: v.JWKS_MAX_STALE_MS,
    },
    keycloak: {
      url: v.KEYCLOAK_URL.replace(/\/+$/, ''),
      realm: v.KEYCLOAK_REALM,
      adminClientId: v.KEYCLOAK_ADMIN_CLIENT_ID,
      adminClientSecret: v.KEYCLOAK_ADMIN_CLIENT_SECRET,
    },
    vault: {
      address: v.VAULT_ADDR.replace(/\/+$/, ''),
      sshMount: v.VAULT_SSH_MOUNT,
      authPath: v.VAULT_AUTH_PATH.replace(/^\/+|\/+$/g, ''),
      authRole: v.VAULT_AUTH_ROLE,
      serviceAccountTokenPath: v.VAULT_SA_TOKEN_PATH,
      caCert: vaultCa,
      renewFraction: v.VAULT_RENEW_FRACTION,
      renewRetries: v.VAULT_RENEW_RETRIES,
      backoffBaseMs: v.VAULT_BACKOFF_BASE_MS,
      backoffMaxMs: v.VAULT_BACKOFF_MAX_MS,
    },
    upstreamTimeoutMs: v.UPSTREAM_TIMEOUT_MS,
    cluster: {
      clusterName: v.CLUSTER_NAME,
      apiServer: v.KUBE_API_SERVER,
      caCert: clusterCa,
      oidcIssuerUrl: issuerUrl,
      oidcClientId: v.OIDC_CLIENT_ID,
    },
    roles,
    ssh: { backdateSeconds: v.SSH_CERT_BACKDATE_SECONDS, enforceRegisteredKey: v.SSH_REQUIRE_REGISTERED_KEY === 'true' },
    metrics: { defaultCollectors: v.METRICS_DEFAULT_COLLECTORS === 'true' },
    corsOrigin: v.CORS_ORIGIN,
    signRateLimit: { max: v.SIGN_RATE_LIMIT_MAX, windowMs: v.SIGN_RATE_LIMIT_WINDOW_MS },
    audit: { logPath: v.AUDIT_LOG_PATH, bufferSize: v.AUDIT_BUFFER_SIZE },
    shutdownTimeoutMs: v.SHUTDOWN_TIMEOUT_MS,
  });
}
