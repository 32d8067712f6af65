import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import axios, { type AxiosInstance } from 'axios';
import type { CookieOptions } from 'express';
import jwt from 'jsonwebtoken';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { AppError } from '../errors.js';
import { KUBECONFIG_SCOPES } from './kubeconfig.js';
import { translateUpstreamError } from './upstream.js';

const discoverySchema = z
  .object({
    issuer: z.string(),
    authorization_endpoint: z.string().url(),
    token_endpoint: z.string().url(),
    jwks_uri: z.string().url(),
    end_session_endpoint: z.string().url().optional(),
    userinfo_endpoint: z.string().url().optional(),
  })
  .passthrough();

export type DiscoveryDocument = z.infer<typeof discoverySchema>;

const tokenSetSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  refresh_expires_in: z.number().optional(),
  id_token: z.string().optional(),
  scope: z.string().optional(),
});

export type TokenSet = z.infer<typeof tokenSetSchema>;

export function createHttpClient(timeoutMs: number, baseURL?: string): AxiosInstance {
  return axios.create({ baseURL, timeout: timeoutMs, headers: { Accept: 'application/json' } });
}

/** Cached `/.well-known/openid-configuration` for one issuer. */
export class OidcDiscovery {
  private cached?: { doc: DiscoveryDocument; fetchedAt: number };
  private inflight?: Promise<DiscoveryDocument>;

  constructor(
    readonly issuerUrl: string,
    private readonly http: AxiosInstance,
    private readonly ttlMs = 60 * 60 * 1000,
    private readonly now: () => number = Date.now,
  ) {}

  async get(): Promise<DiscoveryDocument> {
    if (this.cached && this.now() - this.cached.fetchedAt < this.ttlMs) return this.cached.doc;
    if (!this.inflight) {
      this.inflight = this.fetch().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  private async fetch(): Promise<DiscoveryDocument> {
    let data: unknown;
    try {
      ({ data } = await this.http.get(`${this.issuerUrl}/.well-known/openid-configuration`));
    } catch (err) {
      // an expired cache is still better than nothing
      if (this.cached) return this.cached.doc;
      throw translateUpstreamError('identity provider', err);
    }
    const parsed = discoverySchema.safeParse(data);
    if (!parsed.success) throw new AppError('UpstreamUnavailable', 'identity provider returned an invalid discovery document');
    this.cached = { doc: parsed.data, fetchedAt: this.now() };
    return parsed.data;
  }
}

export interface OidcClientOptions {
  clientId: string;
  clientSecret: string;
  redirectUrl: string;
}

export class OidcClient {
  constructor(
    private readonly discovery: OidcDiscovery,
    private readonly http: AxiosInstance,
    private readonly opts: OidcClientOptions,
  ) {}

  async authorizationUrl(state: string, codeChallenge: string): Promise<string> {
    const doc = await this.discovery.get();
    const url = new URL(doc.authorization_endpoint);
    url.searchParams.set('client_id', this.opts.clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('scope', KUBECONFIG_SCOPES.join(' '));
    url.searchParams.set('redirect_uri', this.opts.redirectUrl);
    url.searchParams.set('state', state);
    url.searchParams.set('code_challenge', codeChallenge);
    url.searchParams.set('code_challenge_method', 'S256');
    return url.toString();
  }

  async exchangeCode(code: string, codeVerifier: string, signal?: AbortSignal): Promise<TokenSet> {
    const doc = await this.discovery.get();
    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      code_verifier: codeVerifier,
      redirect_uri: this.opts.redirectUrl,
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
    });
    let data: unknown;
    try {
      ({ data } = await this.http.post(doc.token_endpoint, form, { signal }));
    } catch (err) {
      const translated = translateUpstreamError('identity provider', err);
      // Keycloak answers 400 invalid_grant for stale or replayed codes
      if (translated.code === 'InvalidRequest' || translated.code === 'Forbidden') {
        throw new AppError('Unauthenticated', 'authorization code was rejected', { cause: err });
      }
      throw translated;
    }
    const parsed = tokenSetSchema.safeParse(data);
    if (!parsed.success) throw new AppError('UpstreamUnavailable', 'identity provider returned an invalid token response');
    return parsed.data;
  }

  /** Revokes the session behind a refresh token. No-op when the provider has no end-session endpoint. */
  async logout(refreshToken: string, signal?: AbortSignal): Promise<void> {
    const doc = await this.discovery.get();
    if (!doc.end_session_endpoint) return;
    const form = new URLSearchParams({
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
      refresh_token: refreshToken,
    });
    try {
      await this.http.post(doc.end_session_endpoint, form, { signal });
    } catch (err) {
      throw translateUpstreamError('identity provider', err);
    }
  }

  async endSessionUrl(postLogoutRedirectUri?: string): Promise<string | undefined> {
    const doc = await this.discovery.get();
    if (!doc.end_session_endpoint) return undefined;
    const url = new URL(doc.end_session_endpoint);
    url.searchParams.set('client_id', this.opts.clientId);
    if (postLogoutRedirectUri) url.searchParams.set('post_logout_redirect_uri', postLogoutRedirectUri);
    return url.toString();
  }
}

const loginSessionSchema = z.object({ rt: z.string(), nonce: z.string(), cv: z.string() });

/** Only same-origin paths are allowed as a post-login destination. */
export function safeReturnTo(value: unknown): string {
  if (typeof value !== 'string' || !value.startsWith('/') || value.startsWith('//') || value.includes('\\')) return '/';
  return value;
}

/** RFC 7636 S256 challenge for a code verifier. */
export function pkceChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

export const LOGIN_COOKIE = 'login_session';

export interface LoginAttempt {
  /** Sent to the provider as `state`; echoed back on the callback. */
  state: string;
  codeChallenge: string;
  /** Value for the LOGIN_COOKIE set on the browser that started the login. */
  cookie: string;
}

export interface LoginStateOptions {
  ttlSeconds?: number;
  /** Mark the binding cookie Secure; on whenever the portal is served over https. */
  secureCookie?: boolean;
}

/**
 * Binds a login to the browser that started it. The PKCE verifier, the
 * return path and a nonce travel in a short-lived HS256 cookie; the provider
 * only ever sees the nonce (as `state`) and the verifier's challenge.
 */
export class LoginStateSigner {
  private static readonly AUDIENCE = 'login-session';
  private readonly ttlSeconds: number;
  readonly cookieOptions: CookieOptions;

  constructor(
    private readonly secret: string,
    opts: LoginStateOptions = {},
  ) {
    this.ttlSeconds = opts.ttlSeconds ?? 600;
    this.cookieOptions = {
      httpOnly: true,
      sameSite: 'lax',
      secure: opts.secureCookie ?? true,
      path: '/api/v1/auth',
      maxAge: Math.max(this.ttlSeconds, 0) * 1000,
    };
  }

  begin(returnTo: string): LoginAttempt {
    const state = uuid();
    const verifier = randomBytes(32).toString('base64url');
    const cookie = jwt.sign({ rt: safeReturnTo(returnTo), nonce: state, cv: verifier }, this.secret, {
      algorithm: 'HS256',
      expiresIn: this.ttlSeconds,
      audience: LoginStateSigner.AUDIENCE,
    });
    return { state, codeChallenge: pkceChallenge(verifier), cookie };
  }

  /** Checks the callback's `state` against the cookie of the browser presenting it. */
  complete(state: string, cookie: string | undefined): { returnTo: string; codeVerifier: string } {
    let claims: z.infer<typeof loginSessionSchema>;
    try {
      if (!cookie) throw new Error('no login session cookie');
      const payload = jwt.verify(cookie, this.secret, { algorithms: ['HS256'], audience: LoginStateSigner.AUDIENCE });
      claims = loginSessionSchema.parse(payload);
    } catch (err) {
      throw new AppError('Unauthenticated', 'invalid or expired login state', { cause: err });
    }
    const expected = Buffer.from(claims.nonce);
    const presented = Buffer.from(state);
    if (expected.length !== presented.length || !timingSafeEqual(expected, presented)) {
      throw new AppError('Unauthenticated', 'invalid or expired login state');
    }
    return { returnTo: safeReturnTo(claims.rt), codeVerifier: claims.cv };
  }
}
