import { generateKeyPairSync } from 'crypto';
import { fileURLToPath } from 'url';
import forge from 'node-forge';
import type { Express } from 'express';
import jwt from 'jsonwebtoken';
import { createApp, type PublicConfig } from '../app.js';
import { AppError } from '../errors.js';
import { loadRoleTable } from '../config.js';
import { Metrics } from '../metrics.js';
import type { LoginClient } from '../routes/auth.js';
import { AuditLog, type AuditEvent, type AuditSink } from '../services/audit.js';
import {
  CredentialStoreClient,
  type LoginResult,
  type PkiBackend,
  type PlatformIdentity,
  type SignRequest,
  type SignResult,
  type TokenLookup,
} from '../services/credentialStore.js';
import {
  DirectoryAdminGateway,
  type CreateUserInput,
  type DirectoryGroup,
  type DirectoryProvider,
  type DirectoryUser,
  type ListUsersQuery,
  type PageQuery,
  type RegisteredSshKey,
  type ResetPasswordInput,
  type UpdateUserInput,
  type UserSession,
} from '../services/directory.js';
import type { RoleTable } from '../services/groupResolver.js';
import type { ClusterAccessConfig } from '../services/kubeconfig.js';
import { LoginStateSigner, pkceChallenge, type TokenSet } from '../services/oidc.js';
import { SigningKeyCache, type KeySet, type SigningKeySource } from '../services/signingKeys.js';
import { SshCertificateIssuer } from '../services/sshIssuer.js';
import { SshKeyRegistry } from '../services/sshKeyRegistry.js';
import { TokenValidator } from '../services/tokenValidator.js';
import { buildCertificate, TEST_CA_PUBLIC_KEY } from './ssh.js';

export const TEST_ISSUER = 'https://sso.test.local/realms/platform';
export const TEST_AUDIENCE = 'identity-portal';
export const TEST_KID = 'test-key-1';

export function shippedRoles(): RoleTable {
  return loadRoleTable(fileURLToPath(new URL('../../config/roles.json', import.meta.url)));
}

export interface RsaKeyPair {
  publicKey: string;
  privateKey: string;
}

export function rsaKeyPair(): RsaKeyPair {
  return generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  });
}

let idpKeys: RsaKeyPair | undefined;

/** The identity provider's signing key for this test process. */
export function idpKeyPair(): RsaKeyPair {
  idpKeys ??= rsaKeyPair();
  return idpKeys;
}

export interface MintOptions {
  kid?: string;
  privateKey?: string;
  issuer?: string;
  audience?: string;
  expiresInSeconds?: number;
}

export function mintToken(claims: Record<string, unknown>, opts: MintOptions = {}): string {
  return jwt.sign(claims, opts.privateKey ?? idpKeyPair().privateKey, {
    algorithm: 'RS256',
    keyid: opts.kid ?? TEST_KID,
    issuer: opts.issuer ?? TEST_ISSUER,
    audience: opts.audience ?? TEST_AUDIENCE,
    expiresIn: opts.expiresInSeconds ?? 300,
  });
}

/** Token for a user in the given groups. */
export function userToken(username: string, groups: string[], opts: MintOptions = {}): string {
  return mintToken({ sub: `sub-${username}`, preferred_username: username, email: `${username}@example.test`, groups }, opts);
}

export class StaticKeySource implements SigningKeySource {
  fetches = 0;
  failing = false;

  constructor(public keys: Map<string, string> = new Map([[TEST_KID, idpKeyPair().publicKey]])) {}

  async fetchKeys(): Promise<KeySet> {
    this.fetches++;
    if (this.failing) throw new AppError('UpstreamUnavailable', 'identity provider unreachable');
    return new Map(this.keys);
  }
}

/** Self-signed CA certificate PEM, built with forge. */
export function selfSignedCaPem(commonName = 'Test Cluster CA'): string {
  const keys = forge.pki.rsa.generateKeyPair(1024);
  const cert = forge.pki.createCertificate();
  cert.publicKey = keys.publicKey;
  cert.serialNumber = '01';
  cert.validity.notBefore = new Date(Date.UTC(2024, 0, 1));
  cert.validity.notAfter = new Date(Date.UTC(2034, 0, 1));
  const subject = [{ name: 'commonName', value: commonName }];
  cert.setSubject(subject);
  cert.setIssuer(subject);
  cert.setExtensions([{ name: 'basicConstraints', cA: true }]);
  cert.sign(keys.privateKey, forge.md.sha256.create());
  return forge.pki.certificateToPem(cert);
}

export class StaticIdentity implements PlatformIdentity {
  reads = 0;

  constructor(private readonly token = 'test-service-account-token') {}

  async readToken(): Promise<string> {
    this.reads++;
    return this.token;
  }
}

export interface FakePkiOptions {
  leaseSeconds?: number;
  now?: () => number;
}

/**
 * In-process PKI backend. Tokens are opaque strings; signing produces a real
 * OpenSSH certificate encoding with a dummy signature.
 */
export class FakePkiBackend implements PkiBackend {
  leaseSeconds: number;
  /** Every sign/login/renew fails as if the backend were unreachable. */
  down = false;
  sealed = false;
  /** Remaining renew-self calls to fail. */
  failRenewals = 0;
  /** Adds this many seconds to every certificate's validity. */
  extraValiditySeconds = 0;
  /** Policy denies signing entirely. */
  denySigning = false;
  /** Lease granted by renew-self when set; login keeps using leaseSeconds. */
  renewLeaseSeconds?: number;
  loginCalls = 0;
  renewCalls = 0;
  lookupCalls = 0;
  signCalls = 0;
  /** Sign calls refused because the token was not valid. */
  rejectedSigns = 0;
  readonly requests: Array<{ token: string; request: SignRequest }> = [];
  private readonly valid = new Set<string>();
  private serial = 1000n;
  private tokenCounter = 0;
  private readonly now: () => number;

  constructor(opts: FakePkiOptions = {}) {
    this.leaseSeconds = opts.leaseSeconds ?? 3600;
    this.now = opts.now ?? Date.now;
  }

  /** Invalidate every issued token, as a backend restart or revocation would. */
  revokeAll(): void {
    this.valid.clear();
  }

  async login(identityToken: string): Promise<LoginResult> {
    this.loginCalls++;
    this.checkAvailable();
    if (!identityToken) throw new AppError('Forbidden', 'permission denied');
    const token = `hvs.test-${++this.tokenCounter}`;
    this.valid.add(token);
    return { token, leaseDurationSeconds: this.leaseSeconds, renewable: true };
  }

  async renewSelf(token: string): Promise<LoginResult> {
    this.renewCalls++;
    this.checkAvailable();
    if (this.failRenewals > 0) {
      this.failRenewals--;
      throw new AppError('UpstreamUnavailable', 'PKI backend returned 500');
    }
    if (!this.valid.has(token)) throw new AppError('Forbidden', 'permission denied');
    return { token, leaseDurationSeconds: this.renewLeaseSeconds ?? this.leaseSeconds, renewable: true };
  }

  async lookupSelf(token: string): Promise<TokenLookup> {
    this.lookupCalls++;
    this.checkAvailable();
    if (!this.valid.has(token)) throw new AppError('Forbidden', 'permission denied');
    return { ttlSeconds: this.leaseSeconds, renewable: true };
  }

  async sign(token: string, request: SignRequest): Promise<SignResult> {
    this.signCalls++;
    this.checkAvailable();
    if (!this.valid.has(token)) {
      this.rejectedSigns++;
      throw new AppError('Forbidden', 'permission denied');
    }
    if (this.denySigning) throw new AppError('Forbidden', 'permission denied');
    this.requests.push({ token, request });
    const serial = ++this.serial;
    const nowSeconds = BigInt(Math.floor(this.now() / 1000));
    const signedKey = buildCertificate({
      publicKey: request.publicKey,
      serial,
      keyId: request.keyId,
      principals: request.validPrincipals,
      validAfter: nowSeconds - 30n,
      validBefore: nowSeconds + BigInt(request.ttlSeconds + this.extraValiditySeconds),
    });
    return { serial: serial.toString(16), signedKey };
  }

  async readCaPublicKey(): Promise<string> {
    this.checkAvailable();
    return TEST_CA_PUBLIC_KEY;
  }

  private checkAvailable(): void {
    if (this.sealed) throw new AppError('UpstreamUnavailable', 'PKI backend is sealed', { details: { sealed: true } });
    if (this.down) throw new AppError('UpstreamUnavailable', 'PKI backend unreachable: ECONNREFUSED');
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];
  failing = false;

  write(event: AuditEvent): void {
    if (this.failing) throw new Error('disk full');
    this.events.push(event);
  }
}

/** In-memory directory with Keycloak-like error behavior. */
export class FakeDirectory implements DirectoryProvider {
  readonly users = new Map<string, DirectoryUser>();
  readonly groups = new Map<string, DirectoryGroup>();
  readonly memberships = new Map<string, Set<string>>();
  readonly passwords = new Map<string, { password: string; temporary: boolean }>();
  readonly sessions = new Map<string, UserSession[]>();
  readonly sshKeys = new Map<string, RegisteredSshKey>();
  private counter = 0;

  constructor() {
    for (const name of ['platform-admins', 'infra-engineers', 'developers']) {
      this.groups.set(`grp-${name}`, { id: `grp-${name}`, name, path: `/${name}` });
    }
  }

  async listUsers(query: ListUsersQuery): Promise<DirectoryUser[]> {
    const term = query.search?.toLowerCase();
    const all = [...this.users.values()].filter((u) => !term || u.username.includes(term) || (u.email ?? '').includes(term));
    return all.slice(query.first, query.first + query.max);
  }

  async getUser(id: string): Promise<DirectoryUser> {
    const user = this.users.get(id);
    if (!user) throw new AppError('NotFound', 'directory: not found: User not found');
    return user;
  }

  async createUser(input: CreateUserInput): Promise<string> {
    if ([...this.users.values()].some((u) => u.username === input.username)) {
      throw new AppError('Conflict', 'directory: conflict: User exists with same username');
    }
    const id = `user-${++this.counter}`;
    this.users.set(id, {
      id,
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      enabled: input.enabled,
      emailVerified: false,
    });
    if (input.password) this.passwords.set(id, { password: input.password, temporary: input.temporaryPassword });
    return id;
  }

  async updateUser(id: string, input: UpdateUserInput): Promise<void> {
    const user = await this.getUser(id);
    this.users.set(id, {
      ...user,
      email: input.email ?? user.email,
      firstName: input.firstName ?? user.firstName,
      lastName: input.lastName ?? user.lastName,
      enabled: input.enabled ?? user.enabled,
    });
  }

  async deleteUser(id: string): Promise<void> {
    await this.getUser(id);
    this.users.delete(id);
    this.memberships.delete(id);
  }

  async resetPassword(id: string, input: ResetPasswordInput): Promise<void> {
    await this.getUser(id);
    this.passwords.set(id, { password: input.password, temporary: input.temporary });
  }

  async userGroups(id: string): Promise<DirectoryGroup[]> {
    await this.getUser(id);
    return [...(this.memberships.get(id) ?? [])].flatMap((gid) => {
      const group = this.groups.get(gid);
      return group ? [group] : [];
    });
  }

  async addUserToGroup(userId: string, groupId: string): Promise<void> {
    await this.getUser(userId);
    if (!this.groups.has(groupId)) throw new AppError('NotFound', 'directory: not found: Could not find group by id');
    const set = this.memberships.get(userId) ?? new Set<string>();
    set.add(groupId);
    this.memberships.set(userId, set);
  }

  async removeUserFromGroup(userId: string, groupId: string): Promise<void> {
    await this.getUser(userId);
    this.memberships.get(userId)?.delete(groupId);
  }

  async listGroups(): Promise<DirectoryGroup[]> {
    return [...this.groups.values()];
  }

  async groupMembers(groupId: string, page: PageQuery): Promise<DirectoryUser[]> {
    if (!this.groups.has(groupId)) throw new AppError('NotFound', 'directory: not found: Could not find group by id');
    const members = [...this.users.values()].filter((u) => this.memberships.get(u.id)?.has(groupId));
    return members.slice(page.first, page.first + page.max);
  }

  async findUserByUsername(username: string): Promise<DirectoryUser | undefined> {
    const wanted = username.toLowerCase();
    return [...this.users.values()].find((u) => u.username.toLowerCase() === wanted);
  }

  async userSessions(id: string): Promise<UserSession[]> {
    await this.getUser(id);
    return this.sessions.get(id) ?? [];
  }

  async logoutUser(id: string): Promise<void> {
    await this.getUser(id);
    this.sessions.delete(id);
  }

  async getSshKey(userId: string): Promise<RegisteredSshKey | undefined> {
    await this.getUser(userId);
    return this.sshKeys.get(userId);
  }

  async setSshKey(userId: string, key: RegisteredSshKey | undefined): Promise<void> {
    await this.getUser(userId);
    if (key) this.sshKeys.set(userId, key);
    else this.sshKeys.delete(userId);
  }
}

/** Login client that hands out tokens registered per authorization code. */
export class FakeLoginClient implements LoginClient {
  readonly codes = new Map<string, TokenSet>();
  readonly revoked: string[] = [];
  /** Challenge of the most recent authorization request; codes are redeemed against it. */
  challenge?: string;

  async authorizationUrl(state: string, codeChallenge: string): Promise<string> {
    this.challenge = codeChallenge;
    const query = new URLSearchParams({ client_id: TEST_AUDIENCE, state, code_challenge: codeChallenge, code_challenge_method: 'S256' });
    return `${TEST_ISSUER}/protocol/openid-connect/auth?${query}`;
  }

  async exchangeCode(code: string, codeVerifier: string): Promise<TokenSet> {
    const tokens = this.codes.get(code);
    if (!tokens) throw new AppError('Unauthenticated', 'authorization code rejected');
    if (pkceChallenge(codeVerifier) !== this.challenge) throw new AppError('Unauthenticated', 'authorization code was rejected');
    this.codes.delete(code);
    return tokens;
  }

  async logout(refreshToken: string): Promise<void> {
    this.revoked.push(refreshToken);
  }

  async endSessionUrl(postLogoutRedirectUri?: string): Promise<string | undefined> {
    const base = `${TEST_ISSUER}/protocol/openid-connect/logout`;
    return postLogoutRedirectUri ? `${base}?post_logout_redirect_uri=${encodeURIComponent(postLogoutRedirectUri)}` : base;
  }
}

export const TEST_CLUSTER: ClusterAccessConfig = {
  clusterName: 'staging',
  apiServer: 'https://k8s.staging.test:6443',
  caCert: Buffer.from('-----BEGIN CERTIFICATE-----\nMIIBdGVzdA==\n-----END CERTIFICATE-----\n'),
  oidcIssuerUrl: TEST_ISSUER,
  oidcClientId: 'kubernetes',
};

export function testValidator(source: SigningKeySource = new StaticKeySource()): TokenValidator {
  const keys = new SigningKeyCache(source, { ttlMs: 3_600_000, maxStaleMs: 3_600_000 });
  return new TokenValidator(keys, {
    issuer: TEST_ISSUER,
    audience: TEST_AUDIENCE,
    usernameClaim: 'preferred_username',
    groupsClaim: 'groups',
  });
}

export interface TestApp {
  app: Express;
  roles: RoleTable;
  pki: FakePkiBackend;
  credentials: CredentialStoreClient;
  directory: FakeDirectory;
  sink: MemoryAuditSink;
  audit: AuditLog;
  login: FakeLoginClient;
  loginState: LoginStateSigner;
  metrics: Metrics;
}

export const TEST_PUBLIC_CONFIG: PublicConfig = {
  issuerUrl: TEST_ISSUER,
  clientId: TEST_AUDIENCE,
  keycloakUrl: 'https://sso.test.local',
  realm: 'platform',
  clusterName: 'staging',
};

export interface TestAppOptions {
  signRateLimit?: { max: number; windowMs: number };
  /** Log the service in to the PKI backend before returning. */
  loggedIn?: boolean;
}

/** Full application wired to in-process fakes. */
export async function buildTestApp(opts: TestAppOptions = {}): Promise<TestApp> {
  const roles = shippedRoles();
  const pki = new FakePkiBackend();
  const credentials = new CredentialStoreClient(pki, new StaticIdentity(), { backoffBaseMs: 1, backoffMaxMs: 5 });
  if (opts.loggedIn ?? true) await credentials.login();
  const directory = new FakeDirectory();
  const sink = new MemoryAuditSink();
  const audit = new AuditLog(sink);
  const login = new FakeLoginClient();
  const loginState = new LoginStateSigner('test-secret', { secureCookie: false });
  const metrics = new Metrics();
  const keyRegistry = new SshKeyRegistry(directory, audit);
  const app = createApp({
    roles,
    cluster: TEST_CLUSTER,
    validator: testValidator(),
    issuer: new SshCertificateIssuer(roles, credentials, audit, { registeredKeys: keyRegistry, metrics }),
    credentials,
    directory: new DirectoryAdminGateway(directory, roles, audit),
    audit,
    oidc: login,
    loginState,
    keyRegistry,
    metrics,
    publicConfig: TEST_PUBLIC_CONFIG,
    signRateLimit: opts.signRateLimit,
  });
  return { app, roles, pki, credentials, directory, sink, audit, login, loginState, metrics };
}
