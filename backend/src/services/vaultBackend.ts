import https from 'https';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { AppError } from '../errors.js';
import type { LoginResult, PkiBackend, SignRequest, SignResult, TokenLookup } from './credentialStore.js';
import { mountPath, pathSegment, translateUpstreamError } from './upstream.js';

export interface VaultBackendOptions {
  address: string;
  sshMount: string;
  authPath: string;
  authRole: string;
  timeoutMs: number;
  /** PEM bundle to trust for the Vault listener. */
  caCert?: Buffer;
}

const authResponse = z.object({
  auth: z.object({
    client_token: z.string().min(1),
    lease_duration: z.number().int().nonnegative(),
    renewable: z.boolean(),
  }),
});

const lookupResponse = z.object({
  data: z.object({ ttl: z.number().int(), renewable: z.boolean() }),
});

const signResponse = z.object({
  data: z.object({ serial_number: z.string().min(1), signed_key: z.string().min(1) }),
});

const caResponse = z.object({ data: z.object({ public_key: z.string().min(1) }) });

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new AppError('UpstreamUnavailable', `unexpected ${what} response from the PKI backend`);
  return parsed.data;
}

/** PkiBackend over the Vault HTTP API (Kubernetes auth + SSH secrets engine). */
export class VaultHttpBackend implements PkiBackend {
  private readonly http: AxiosInstance;
  private readonly sshMount: string;
  private readonly authPath: string;

  constructor(private readonly opts: VaultBackendOptions) {
    this.sshMount = mountPath(opts.sshMount, 'SSH mount');
    this.authPath = mountPath(opts.authPath, 'auth path');
    this.http = axios.create({
      baseURL: `${opts.address}/v1/`,
      timeout: opts.timeoutMs,
      httpsAgent: opts.caCert ? new https.Agent({ ca: opts.caCert }) : undefined,
      headers: { Accept: 'application/json' },
    });
  }

  async login(identityToken: string, signal?: AbortSignal): Promise<LoginResult> {
    const data = await this.call('post', `${this.authPath}/login`, { role: this.opts.authRole, jwt: identityToken }, undefined, signal);
    const { auth } = parse(authResponse, data, 'login');
    return { token: auth.client_token, leaseDurationSeconds: auth.lease_duration, renewable: auth.renewable };
  }

  async renewSelf(token: string, signal?: AbortSignal): Promise<LoginResult> {
    const data = await this.call('post', 'auth/token/renew-self', {}, token, signal);
    const { auth } = parse(authResponse, data, 'renew');
    return { token: auth.client_token, leaseDurationSeconds: auth.lease_duration, renewable: auth.renewable };
  }

  async lookupSelf(token: string, signal?: AbortSignal): Promise<TokenLookup> {
    const data = await this.call('get', 'auth/token/lookup-self', undefined, token, signal);
    const parsed = parse(lookupResponse, data, 'lookup');
    return { ttlSeconds: parsed.data.ttl, renewable: parsed.data.renewable };
  }

  async sign(token: string, request: SignRequest, signal?: AbortSignal): Promise<SignResult> {
    const role = pathSegment(request.signingRole, 'signing role');
    const body = {
      public_key: request.publicKey,
      valid_principals: request.validPrincipals.join(','),
      cert_type: 'user',
      ttl: `${request.ttlSeconds}s`,
      key_id: request.keyId,
    };
    const data = await this.call('post', `${this.sshMount}/sign/${role}`, body, token, signal);
    const parsed = parse(signResponse, data, 'sign');
    return { serial: parsed.data.serial_number, signedKey: parsed.data.signed_key.trim() };
  }

  async readCaPublicKey(signal?: AbortSignal): Promise<string> {
    const data = await this.call('get', `${this.sshMount}/config/ca`, undefined, undefined, signal);
    return parse(caResponse, data, 'CA').data.public_key.trim();
  }

  private async call(
    method: 'get' | 'post',
    path: string,
    body: unknown,
    token: string | undefined,
    signal: AbortSignal | undefined,
  ): Promise<unknown> {
    try {
      const res = await this.http.request({
        method,
        url: path,
        data: body,
        signal,
        headers: token ? { 'X-Vault-Token': token } : undefined,
      });
      return res.data;
    } catch (err) {
      throw translateUpstreamError('PKI backend', err);
    }
  }
}
