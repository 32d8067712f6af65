import { v4 as uuid } from 'uuid';
import { AppError, errorMessage, hasCode, isAppError } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';
import type { AuditLog } from './audit.js';
import type { SignRequest, SignResult } from './credentialStore.js';
import type { Role, RoleTable } from './groupResolver.js';
import { parseAuthorizedKey, parseCertificate, SSH_FOREVER, type SshCertificate, type SshPublicKey } from './sshKey.js';
import type { Principal } from './tokenValidator.js';

export interface SshSigner {
  sign(request: SignRequest, signal?: AbortSignal): Promise<SignResult>;
  caPublicKey(signal?: AbortSignal): Promise<string>;
}

export interface IssueRequest {
  principal: Principal;
  publicKey: string;
  /** Optional downgrade to a role ranked at or below the caller's own. */
  role?: string;
  ttlSeconds?: number;
  requestId?: string;
  signal?: AbortSignal;
}

export interface IssuedCertificate {
  signedCertificate: string;
  serial: string;
  keyId: string;
  principals: string[];
  role: string;
  ttlSeconds: number;
  issuedAt: string;
  validAfter: string;
  validUntil: string;
  extensions: string[];
  fingerprint: string;
}

/** Looks up the public key a user registered, if any. */
export interface RegisteredKeySource {
  registeredKey(username: string, signal?: AbortSignal): Promise<string | undefined>;
}

export interface IssuerOptions {
  /** Tolerance between our clock and the signer's when checking validity. */
  clockSkewSeconds?: number;
  /**
   * How far the signer moves valid-after into the past. The TTL asked of the
   * signer is shortened by this much so the whole window fits the role.
   */
  backdateSeconds?: number;
  /** When set, users with a registered key may only have that key signed. */
  registeredKeys?: RegisteredKeySource;
  metrics?: IssuanceMetrics;
  now?: () => number;
}

export interface IssuanceMetrics {
  certIssued(role: string): void;
  certFailed(role: string, code: string): void;
}

/** `20261019T101500Z` */
function compactUtc(ms: number): string {
  return new Date(ms).toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

export function buildKeyId(username: string, role: string, issuedAtMs: number): string {
  return `${username}-${role}-${compactUtc(issuedAtMs)}-${uuid().slice(0, 8)}`;
}

export class SshCertificateIssuer {
  private readonly now: () => number;
  private readonly clockSkewSeconds: number;
  private readonly backdateSeconds: number;
  private readonly registeredKeys?: RegisteredKeySource;
  private readonly metrics?: IssuanceMetrics;

  constructor(
    private readonly roles: RoleTable,
    private readonly signer: SshSigner,
    private readonly audit: AuditLog,
    opts: IssuerOptions = {},
    private readonly log: Logger = componentLogger('ssh-issuer'),
  ) {
    this.now = opts.now ?? Date.now;
    this.clockSkewSeconds = opts.clockSkewSeconds ?? 60;
    this.backdateSeconds = opts.backdateSeconds ?? 30;
    this.registeredKeys = opts.registeredKeys;
    this.metrics = opts.metrics;
  }

  /** Roles the caller may request, highest first. */
  availableRoles(principal: Principal): Role[] {
    return this.roles.rolesAtOrBelow(this.roles.resolve(principal.groups));
  }

  caPublicKey(signal?: AbortSignal): Promise<string> {
    return this.signer.caPublicKey(signal);
  }

  async issue(req: IssueRequest): Promise<IssuedCertificate> {
    const { principal } = req;
    let role: Role | undefined;
    try {
      role = this.selectRole(principal, req.role);
      const key = parseAuthorizedKey(req.publicKey);
      const grantedSeconds = this.grantedTtl(role, req.ttlSeconds);
      await this.checkRegisteredKey(principal.username, key, req.signal);
      const issuedAtMs = this.now();
      const keyId = buildKeyId(principal.username, role.name, issuedAtMs);

      const signed = await this.signer.sign(
        {
          signingRole: role.signingRole,
          publicKey: `${key.type} ${key.blob.toString('base64')}`,
          validPrincipals: role.principals,
          ttlSeconds: Math.max(grantedSeconds - this.backdateSeconds, 1),
          keyId,
        },
        req.signal,
      );
      const cert = this.checkCertificate(signed.signedKey, key, role, issuedAtMs);
      const ttlSeconds = Number(cert.validBefore - cert.validAfter);

      const issued: IssuedCertificate = {
        signedCertificate: signed.signedKey,
        serial: signed.serial,
        keyId: cert.keyId,
        principals: cert.principals,
        role: role.name,
        ttlSeconds,
        issuedAt: new Date(issuedAtMs).toISOString(),
        validAfter: new Date(Number(cert.validAfter) * 1000).toISOString(),
        validUntil: new Date(Number(cert.validBefore) * 1000).toISOString(),
        extensions: cert.extensions,
        fingerprint: key.fingerprint,
      };
      this.audit.record({
        actor: principal.username,
        action: 'ssh.sign',
        result: 'success',
        targetType: 'ssh-certificate',
        targetId: signed.serial,
        requestId: req.requestId,
        details: { role: role.name, keyId: issued.keyId, fingerprint: key.fingerprint, ttlSeconds, principals: issued.principals },
      });
      this.metrics?.certIssued(role.name);
      this.log.info({ user: principal.username, role: role.name, serial: signed.serial, requestId: req.requestId }, 'ssh certificate issued');
      return issued;
    } catch (err) {
      this.metrics?.certFailed(role?.name ?? 'none', isAppError(err) ? err.code : 'Internal');
      if (!hasCode(err, 'AuditWriteFailed')) {
        const denied = hasCode(err, 'Forbidden') || hasCode(err, 'NoEligibleRole');
        this.audit.tryRecord({
          actor: principal.username,
          action: 'ssh.sign',
          result: denied ? 'denied' : 'failure',
          targetType: 'ssh-certificate',
          requestId: req.requestId,
          details: { role: role?.name ?? req.role, code: isAppError(err) ? err.code : 'Internal', reason: errorMessage(err) },
        });
      }
      throw err;
    }
  }

  private selectRole(principal: Principal, requested: string | undefined): Role {
    const granted = this.roles.resolve(principal.groups);
    if (requested === undefined || requested === granted.name) return granted;
    const candidate = this.roles.get(requested);
    if (!candidate || !this.roles.permits(granted, candidate)) {
      throw new AppError('Forbidden', `role ${requested} is not available to ${principal.username}`);
    }
    return candidate;
  }

  private grantedTtl(role: Role, requested: number | undefined): number {
    if (requested === undefined) return role.maxTtlSeconds;
    if (!Number.isInteger(requested) || requested <= 0) {
      throw new AppError('InvalidRequest', 'ttl must be a positive number of seconds');
    }
    return Math.min(requested, role.maxTtlSeconds);
  }

  private async checkRegisteredKey(username: string, key: SshPublicKey, signal?: AbortSignal): Promise<void> {
    if (!this.registeredKeys) return;
    const registered = await this.registeredKeys.registeredKey(username, signal);
    if (registered === undefined) return;
    let fingerprint: string;
    try {
      fingerprint = parseAuthorizedKey(registered).fingerprint;
    } catch (err) {
      this.log.warn({ user: username, err }, 'registered ssh key is unreadable');
      throw new AppError('Forbidden', 'your registered SSH key is unreadable; register it again');
    }
    if (fingerprint !== key.fingerprint) {
      throw new AppError('Forbidden', 'submitted public key does not match your registered SSH key');
    }
  }

  /** The signer is trusted only as far as what it returns can be checked. */
  private checkCertificate(signedKey: string, key: SshPublicKey, role: Role, issuedAtMs: number): SshCertificate {
    let cert: SshCertificate;
    try {
      cert = parseCertificate(signedKey);
    } catch (err) {
      throw new AppError('Internal', `PKI backend returned an unreadable certificate: ${errorMessage(err)}`, { cause: err });
    }
    if (!cert.publicKey.equals(key.blob)) {
      throw new AppError('Internal', 'PKI backend certified a different key than the one submitted');
    }
    if (cert.certType !== 'user') throw new AppError('Internal', 'PKI backend returned a host certificate');
    if (cert.validBefore <= cert.validAfter) {
      throw new AppError('Internal', 'PKI backend returned a certificate with an empty validity window');
    }
    const limit = BigInt(Math.floor(issuedAtMs / 1000) + role.maxTtlSeconds + this.clockSkewSeconds);
    if (
      cert.validBefore === SSH_FOREVER ||
      cert.validBefore > limit ||
      cert.validBefore - cert.validAfter > BigInt(role.maxTtlSeconds)
    ) {
      throw new AppError('Internal', `PKI backend returned a certificate outliving the ${role.name} maximum TTL`);
    }
    return cert;
  }
}
