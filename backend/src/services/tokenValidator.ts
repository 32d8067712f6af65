import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AppError, errorMessage } from '../errors.js';
import type { KeyResolver } from './signingKeys.js';

/** The authenticated caller, rebuilt from a validated token on every request. */
export interface Principal {
  readonly subject: string;
  readonly username: string;
  readonly email?: string;
  readonly name?: string;
  readonly groups: readonly string[];
  readonly expiresAt: Date;
}

export interface TokenValidatorOptions {
  issuer: string;
  audience: string;
  usernameClaim: string;
  groupsClaim: string;
  clockToleranceSeconds?: number;
}

const baseClaims = z.object({
  sub: z.string().min(1),
  exp: z.number(),
  email: z.string().optional(),
  name: z.string().optional(),
});

const usernameClaim = z.string().min(1);
const groupsClaim = z.array(z.string()).optional();

export class TokenValidator {
  constructor(
    private readonly keys: KeyResolver,
    private readonly opts: TokenValidatorOptions,
  ) {}

  async validate(raw: string): Promise<Principal> {
    const decoded = jwt.decode(raw, { complete: true });
    if (!decoded || typeof decoded.payload === 'string') {
      throw new AppError('Unauthenticated', 'bearer token is not a JWT');
    }
    if (decoded.header.alg !== 'RS256') throw new AppError('Unauthenticated', 'unsupported token algorithm');
    const kid = decoded.header.kid;
    if (!kid) throw new AppError('Unauthenticated', 'token has no key id');

    const key = await this.keys.getKey(kid);
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(raw, key, {
        algorithms: ['RS256'],
        issuer: this.opts.issuer,
        audience: this.opts.audience,
        clockTolerance: this.opts.clockToleranceSeconds ?? 30,
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new AppError('Unauthenticated', 'token expired', { cause: err });
      throw new AppError('Unauthenticated', `invalid token: ${errorMessage(err)}`, { cause: err });
    }
    if (typeof payload === 'string') throw new AppError('MalformedToken', 'token payload is not a claims object');
    return this.toPrincipal(payload);
  }

  private toPrincipal(payload: Record<string, unknown>): Principal {
    const base = baseClaims.safeParse(payload);
    if (!base.success) throw new AppError('MalformedToken', 'token is missing the subject or expiry claim');
    const username = usernameClaim.safeParse(payload[this.opts.usernameClaim]);
    if (!username.success) throw new AppError('MalformedToken', `token is missing the ${this.opts.usernameClaim} claim`);
    const groups = groupsClaim.safeParse(payload[this.opts.groupsClaim]);
    if (!groups.success) throw new AppError('MalformedToken', `${this.opts.groupsClaim} claim must be a list of strings`);
    return Object.freeze({
      subject: base.data.sub,
      username: username.data,
      email: base.data.email,
      name: base.data.name,
      groups: Object.freeze([...new Set(groups.data ?? [])]),
      expiresAt: new Date(base.data.exp * 1000),
    });
  }
}

/** Pulls the token out of an `Authorization: Bearer` header. */
export function bearerToken(header: string | undefined): string {
  if (!header) throw new AppError('Unauthenticated', 'missing bearer token');
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  if (!match) throw new AppError('Unauthenticated', 'authorization header must use the Bearer scheme');
  return match[1];
}

/** `sub` of a token that has not been verified; only fit for labelling audit records. */
export function unverifiedSubject(raw: string): string | undefined {
  const payload = jwt.decode(raw);
  if (payload === null || typeof payload === 'string') return undefined;
  return typeof payload.sub === 'string' && payload.sub ? payload.sub : undefined;
}
