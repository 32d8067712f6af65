import jwksClient from 'jwks-rsa';
import { AppError, errorMessage } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';
import type { OidcDiscovery } from './oidc.js';

/** kid → PEM public key */
export type KeySet = ReadonlyMap<string, string>;

export interface SigningKeySource {
  fetchKeys(): Promise<KeySet>;
}

export interface KeyResolver {
  getKey(kid: string): Promise<string>;
}

/** Loads the issuer's JWKS through the discovery document's `jwks_uri`. */
export class JwksKeySource implements SigningKeySource {
  private client?: { uri: string; jwks: jwksClient.JwksClient };

  constructor(
    private readonly discovery: OidcDiscovery,
    private readonly timeoutMs: number,
  ) {}

  async fetchKeys(): Promise<KeySet> {
    const { jwks_uri: uri } = await this.discovery.get();
    if (!this.client || this.client.uri !== uri) {
      // caching lives in SigningKeyCache
      this.client = { uri, jwks: jwksClient({ jwksUri: uri, cache: false, rateLimit: false, timeout: this.timeoutMs }) };
    }
    let keys: jwksClient.SigningKey[];
    try {
      keys = await this.client.jwks.getSigningKeys();
    } catch (err) {
      throw new AppError('UpstreamUnavailable', `cannot load signing keys: ${errorMessage(err)}`, { cause: err });
    }
    const out = new Map<string, string>();
    for (const key of keys) {
      if (key.kid) out.set(key.kid, key.getPublicKey());
    }
    return out;
  }
}

export interface SigningKeyCacheOptions {
  ttlMs: number;
  /** How long past the TTL keys may still be served while the IdP is unreachable. */
  maxStaleMs: number;
  refreshIntervalMs?: number;
  unknownKidThrottleMs?: number;
  now?: () => number;
}

export class SigningKeyCache implements KeyResolver {
  private keys: KeySet = new Map();
  private fetchedAt?: number;
  private inflight?: Promise<void>;
  private lastUnknownKidFetch = Number.NEGATIVE_INFINITY;
  private timer?: NodeJS.Timeout;
  private readonly now: () => number;
  private readonly unknownKidThrottleMs: number;

  constructor(
    private readonly source: SigningKeySource,
    private readonly opts: SigningKeyCacheOptions,
    private readonly log: Logger = componentLogger('signing-keys'),
  ) {
    this.now = opts.now ?? Date.now;
    this.unknownKidThrottleMs = opts.unknownKidThrottleMs ?? 30_000;
  }

  get size(): number {
    return this.keys.size;
  }

  async getKey(kid: string): Promise<string> {
    let refreshed = false;
    if (!this.isFresh()) {
      try {
        await this.refresh();
        refreshed = true;
      } catch (err) {
        if (!this.isUsable()) throw this.unavailable(err);
        this.log.warn({ err: errorMessage(err) }, 'serving stale signing keys');
      }
    }
    let key = this.keys.get(kid);
    if (key === undefined && !refreshed && this.now() - this.lastUnknownKidFetch >= this.unknownKidThrottleMs) {
      // likely a key rotation
      this.lastUnknownKidFetch = this.now();
      try {
        await this.refresh();
      } catch (err) {
        this.log.warn({ err: errorMessage(err), kid }, 'refetch for unknown kid failed');
      }
      key = this.keys.get(kid);
    }
    if (key === undefined) throw new AppError('Unauthenticated', 'token signed by an unknown key');
    return key;
  }

  /** Single-flight: concurrent callers share one fetch. */
  refresh(): Promise<void> {
    if (!this.inflight) {
      this.inflight = this.source
        .fetchKeys()
        .then((keys) => {
          this.keys = keys;
          this.fetchedAt = this.now();
          this.log.debug({ keys: keys.size }, 'signing keys refreshed');
        })
        .finally(() => {
          this.inflight = undefined;
        });
    }
    return this.inflight;
  }

  start(): void {
    if (this.timer || !this.opts.refreshIntervalMs) return;
    this.timer = setInterval(() => {
      this.refresh().catch((err: unknown) => this.log.warn({ err: errorMessage(err) }, 'background key refresh failed'));
    }, this.opts.refreshIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  private isFresh(): boolean {
    return this.fetchedAt !== undefined && this.now() - this.fetchedAt < this.opts.ttlMs;
  }

  private isUsable(): boolean {
    return this.fetchedAt !== undefined && this.now() - this.fetchedAt < this.opts.ttlMs + this.opts.maxStaleMs;
  }

  private unavailable(err: unknown): AppError {
    if (err instanceof AppError && err.code === 'UpstreamUnavailable') return err;
    return new AppError('UpstreamUnavailable', 'identity provider signing keys unavailable', { cause: err });
  }
}
