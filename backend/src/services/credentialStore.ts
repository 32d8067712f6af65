import { readFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { AppError, errorMessage, hasCode, isAppError } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';

export interface LoginResult {
  token: string;
  leaseDurationSeconds: number;
  renewable: boolean;
}

export interface SignRequest {
  signingRole: string;
  /** authorized_keys line */
  publicKey: string;
  validPrincipals: readonly string[];
  ttlSeconds: number;
  keyId: string;
}

export interface SignResult {
  signedKey: string;
  serial: string;
}

export interface TokenLookup {
  ttlSeconds: number;
  renewable: boolean;
}

/** The operations this service needs from the secrets/PKI engine. */
export interface PkiBackend {
  login(identityToken: string, signal?: AbortSignal): Promise<LoginResult>;
  renewSelf(token: string, signal?: AbortSignal): Promise<LoginResult>;
  lookupSelf(token: string, signal?: AbortSignal): Promise<TokenLookup>;
  sign(token: string, request: SignRequest, signal?: AbortSignal): Promise<SignResult>;
  readCaPublicKey(signal?: AbortSignal): Promise<string>;
}

/** Source of the workload's own identity token. */
export interface PlatformIdentity {
  readToken(): Promise<string>;
}

/** Projected service-account token; re-read on every login since the kubelet rotates it. */
export class ServiceAccountTokenFile implements PlatformIdentity {
  constructor(private readonly path: string) {}

  async readToken(): Promise<string> {
    const token = (await readFile(this.path, 'utf8')).trim();
    if (!token) throw new AppError('UpstreamUnavailable', `service account token at ${this.path} is empty`);
    return token;
  }
}

export type CredentialState = 'initializing' | 'ready' | 'degraded' | 'sealed' | 'stopped';

/** Replaced as a whole, never mutated. Times are epoch milliseconds; a zero lease never expires. */
export interface ServiceCredential {
  readonly token: string;
  readonly leaseDurationMs: number;
  readonly renewable: boolean;
  readonly acquiredAt: number;
  readonly renewAt: number;
  readonly expiresAt: number;
  readonly generation: number;
}

export interface CredentialHealth {
  state: CredentialState;
  generation: number;
  expiresAt?: string;
  renewAt?: string;
  lastError?: string;
}

export interface CredentialStoreOptions {
  /** Fraction of the lease after which renewal starts. */
  renewFraction?: number;
  /** Failed renewals tolerated before falling back to a fresh login. */
  renewRetries?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  now?: () => number;
}

// timers cap out at 2^31-1 ms
const MAX_SLEEP_MS = 2_147_483_647;

function isSealed(err: unknown): boolean {
  return isAppError(err) && err.details?.sealed === true;
}

function asUnavailable(err: unknown): AppError {
  if (hasCode(err, 'UpstreamUnavailable') && isAppError(err)) return err;
  return new AppError('UpstreamUnavailable', `no valid credential for the PKI backend: ${errorMessage(err)}`, { cause: err });
}

function policyDenied(request: SignRequest, cause: unknown): AppError {
  return new AppError('Forbidden', `signing role ${request.signingRole} is not permitted by backend policy`, { cause });
}

function isoOrUndefined(ms: number | undefined): string | undefined {
  return ms !== undefined && Number.isFinite(ms) ? new Date(ms).toISOString() : undefined;
}

/**
 * Keeps a lease-bound credential for the PKI backend and signs with it.
 *
 * The current credential is one frozen object swapped by reference, so every
 * call sees either the old or the new credential, never a mix. A background
 * loop renews at a fraction of the lease, backs off on failure and falls back
 * to a fresh login once the retry budget is spent.
 */
export class CredentialStoreClient {
  private current?: ServiceCredential;
  private state: CredentialState = 'initializing';
  private generation = 0;
  private lastError?: string;
  private loginInflight?: Promise<ServiceCredential>;
  private loop?: Promise<void>;
  private controller?: AbortController;
  private readonly now: () => number;
  private readonly renewFraction: number;
  private readonly renewRetries: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;

  constructor(
    private readonly backend: PkiBackend,
    private readonly identity: PlatformIdentity,
    opts: CredentialStoreOptions = {},
    private readonly log: Logger = componentLogger('credential-store'),
  ) {
    this.now = opts.now ?? Date.now;
    this.renewFraction = opts.renewFraction ?? 2 / 3;
    this.renewRetries = opts.renewRetries ?? 5;
    this.backoffBaseMs = opts.backoffBaseMs ?? 1000;
    this.backoffMaxMs = opts.backoffMaxMs ?? 30_000;
  }

  /** Logs in (failure is tolerated and retried in the background) and starts the renewal loop. */
  async start(): Promise<void> {
    if (this.loop) return;
    try {
      await this.login();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'initial login failed, retrying in background');
    }
    this.controller = new AbortController();
    this.loop = this.runRenewalLoop(this.controller.signal);
  }

  /** Stops and joins the renewal loop, then drops the credential. */
  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.loop = undefined;
    if (loop) await loop;
    this.current = undefined;
    this.setState('stopped');
  }

  get credential(): ServiceCredential | undefined {
    return this.current;
  }

  health(): CredentialHealth {
    const cred = this.current;
    return {
      state: this.state,
      generation: cred?.generation ?? 0,
      expiresAt: isoOrUndefined(cred?.expiresAt),
      renewAt: isoOrUndefined(cred?.renewAt),
      lastError: this.lastError,
    };
  }

  isReady(): boolean {
    const cred = this.current;
    return this.state === 'ready' && cred !== undefined && this.isValid(cred);
  }

  /** Single-flight fresh login with the platform identity. */
  login(): Promise<ServiceCredential> {
    if (this.state === 'stopped') return Promise.reject(new AppError('UpstreamUnavailable', 'credential store client is stopped'));
    if (!this.loginInflight) {
      this.loginInflight = this.doLogin().finally(() => {
        this.loginInflight = undefined;
      });
    }
    return this.loginInflight;
  }

  async renew(): Promise<ServiceCredential> {
    const cred = this.current;
    if (!cred || !cred.renewable) return this.login();
    let result: LoginResult;
    try {
      result = await this.backend.renewSelf(cred.token);
    } catch (err) {
      this.noteFailure(err);
      throw err;
    }
    // A renewal granting no lease has nothing left to extend.
    if (result.leaseDurationSeconds <= 0) {
      this.log.warn({ generation: cred.generation }, 'renewal returned no lease, logging in again');
      return this.login();
    }
    return this.install({ ...result, token: result.token || cred.token }, 'renewed');
  }

  /** Asks the backend whether the current token is still accepted. */
  async lookupSelf(signal?: AbortSignal): Promise<TokenLookup> {
    const cred = await this.validCredential();
    try {
      return await this.backend.lookupSelf(cred.token, signal);
    } catch (err) {
      this.noteFailure(err);
      throw err;
    }
  }

  async sign(request: SignRequest, signal?: AbortSignal): Promise<SignResult> {
    const cred = await this.validCredential();
    try {
      return await this.backend.sign(cred.token, request, signal);
    } catch (err) {
      if (!hasCode(err, 'Forbidden')) {
        this.noteFailure(err);
        throw err;
      }
      if (await this.stillAccepted(cred, signal)) throw policyDenied(request, err);
      this.log.warn({ generation: cred.generation }, 'backend rejected a locally valid token, logging in again');
    }
    const fresh = await this.replace(cred);
    try {
      return await this.backend.sign(fresh.token, request, signal);
    } catch (err) {
      if (hasCode(err, 'Forbidden')) throw policyDenied(request, err);
      this.noteFailure(err);
      throw err;
    }
  }

  caPublicKey(signal?: AbortSignal): Promise<string> {
    return this.backend.readCaPublicKey(signal);
  }

  private async doLogin(): Promise<ServiceCredential> {
    try {
      const identityToken = await this.identity.readToken();
      const result = await this.backend.login(identityToken);
      return this.install(result, 'logged in');
    } catch (err) {
      this.noteFailure(err);
      throw err;
    }
  }

  private install(result: LoginResult, what: string): ServiceCredential {
    const acquiredAt = this.now();
    const leaseDurationMs = Math.max(0, result.leaseDurationSeconds) * 1000;
    const cred: ServiceCredential = Object.freeze({
      token: result.token,
      leaseDurationMs,
      renewable: result.renewable,
      acquiredAt,
      renewAt: leaseDurationMs > 0 ? acquiredAt + leaseDurationMs * this.renewFraction : Number.POSITIVE_INFINITY,
      expiresAt: leaseDurationMs > 0 ? acquiredAt + leaseDurationMs : Number.POSITIVE_INFINITY,
      generation: ++this.generation,
    });
    if (this.state === 'stopped') return cred;
    this.current = cred;
    this.lastError = undefined;
    this.setState('ready');
    this.log.info({ generation: cred.generation, leaseSeconds: result.leaseDurationSeconds }, `credential ${what}`);
    return cred;
  }

  /** Usable until a safety margin of min(60s, 10% of the lease) before expiry. */
  private isValid(cred: ServiceCredential): boolean {
    const margin = Math.min(60_000, cred.leaseDurationMs * 0.1);
    return this.now() < cred.expiresAt - margin;
  }

  private async validCredential(): Promise<ServiceCredential> {
    const cred = this.current;
    if (cred && this.isValid(cred)) return cred;
    try {
      return await this.login();
    } catch (err) {
      throw asUnavailable(err);
    }
  }

  /**
   * Tells a policy denial apart from a revoked token. A token replaced in the
   * meantime counts as not accepted so the caller retries with its successor.
   */
  private async stillAccepted(cred: ServiceCredential, signal?: AbortSignal): Promise<boolean> {
    if (this.current && this.current.generation !== cred.generation) return false;
    try {
      await this.backend.lookupSelf(cred.token, signal);
      return true;
    } catch (err) {
      if (hasCode(err, 'Forbidden')) return false;
      this.noteFailure(err);
      throw err;
    }
  }

  /** Fresh login unless another caller already replaced the rejected credential. */
  private async replace(rejected: ServiceCredential): Promise<ServiceCredential> {
    const cur = this.current;
    if (cur && cur.generation !== rejected.generation && this.isValid(cur)) return cur;
    try {
      return await this.login();
    } catch (err) {
      throw asUnavailable(err);
    }
  }

  private noteFailure(err: unknown): void {
    this.lastError = errorMessage(err);
    if (this.state === 'stopped') return;
    const cred = this.current;
    if (isSealed(err)) this.setState('sealed');
    else if (!cred || !this.isValid(cred)) this.setState('degraded');
  }

  private setState(next: CredentialState): void {
    if (next === this.state) return;
    this.log.info({ from: this.state, to: next }, 'credential state changed');
    this.state = next;
  }

  private backoff(attempt: number): number {
    return Math.min(this.backoffMaxMs, this.backoffBaseMs * 2 ** Math.max(0, attempt - 1));
  }

  private nextDelay(failures: number): number {
    if (failures > 0) return this.backoff(failures);
    const cred = this.current;
    if (!cred || !this.isValid(cred)) return 0;
    return Math.max(0, cred.renewAt - this.now());
  }

  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await sleep(Math.min(ms, MAX_SLEEP_MS), undefined, { signal });
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }

  private async runRenewalLoop(signal: AbortSignal): Promise<void> {
    let failures = 0;
    try {
      while (await this.pause(this.nextDelay(failures), signal)) {
        const cred = this.current;
        // a non-expiring credential woke up only because of the timer cap
        if (failures === 0 && cred && this.isValid(cred) && cred.renewAt > this.now()) continue;
        const freshLogin = !cred || !cred.renewable || !this.isValid(cred) || failures >= this.renewRetries;
        try {
          if (freshLogin) await this.login();
          else await this.renew();
          failures = 0;
        } catch (err) {
          failures++;
          this.log.warn({ err: errorMessage(err), failures, freshLogin }, 'credential renewal failed');
        }
      }
    } catch (err) {
      this.log.error({ err }, 'renewal loop stopped unexpectedly');
    }
  }
}
