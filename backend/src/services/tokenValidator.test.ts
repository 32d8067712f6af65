import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { AppError } from '../errors.js';
import { bearerToken } from './tokenValidator.js';
import { idpKeyPair, mintToken, rsaKeyPair, StaticKeySource, TEST_AUDIENCE, TEST_ISSUER, TEST_KID, testValidator, userToken } from '../testing/fixtures.js';

async function rejection(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected the token to be rejected');
}

describe('TokenValidator', () => {
  const validator = testValidator();

  it('builds a principal from a valid token', async () => {
    const token = mintToken({
      sub: 'sub-1',
      preferred_username: 'alice',
      email: 'alice@example.test',
      name: 'Alice Example',
      groups: ['developers', 'developers', '/infra-engineers'],
    });
    const principal = await validator.validate(token);
    expect(principal).toMatchObject({
      subject: 'sub-1',
      username: 'alice',
      email: 'alice@example.test',
      name: 'Alice Example',
      groups: ['developers', '/infra-engineers'],
    });
    const payload = jwt.decode(token, { json: true });
    expect(principal.expiresAt.getTime()).toBe((payload?.exp ?? 0) * 1000);
    expect(Object.isFrozen(principal)).toBe(true);
  });

  it('treats a missing groups claim as no groups', async () => {
    const principal = await validator.validate(mintToken({ sub: 's', preferred_username: 'bob' }));
    expect(principal.groups).toEqual([]);
  });

  it('rejects a token that is not a JWT', async () => {
    const err = await rejection(validator.validate('garbage'));
    expect(err).toMatchObject({ code: 'Unauthenticated', message: 'bearer token is not a JWT' });
  });

  it('rejects algorithms other than RS256', async () => {
    const token = jwt.sign({ sub: 's', preferred_username: 'eve' }, 'test-secret', {
      algorithm: 'HS256',
      keyid: TEST_KID,
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
    });
    expect((await rejection(validator.validate(token))).message).toBe('unsupported token algorithm');
  });

  it('rejects a token without a key id', async () => {
    const token = jwt.sign({ sub: 's' }, idpKeyPair().privateKey, { algorithm: 'RS256', issuer: TEST_ISSUER, audience: TEST_AUDIENCE });
    expect((await rejection(validator.validate(token))).message).toBe('token has no key id');
  });

  it('rejects a token signed by an unknown key', async () => {
    const err = await rejection(validator.validate(userToken('eve', [], { kid: 'rotated-away' })));
    expect(err.message).toBe('token signed by an unknown key');
  });

  it('rejects a forged signature', async () => {
    const forged = userToken('eve', ['platform-admins'], { privateKey: rsaKeyPair().privateKey });
    const err = await rejection(validator.validate(forged));
    expect(err).toMatchObject({ code: 'Unauthenticated', message: 'invalid token: invalid signature' });
  });

  it('checks issuer and audience', async () => {
    expect((await rejection(validator.validate(userToken('a', [], { issuer: 'https://other.test' })))).message).toMatch(
      /^invalid token: jwt issuer invalid/,
    );
    expect((await rejection(validator.validate(userToken('a', [], { audience: 'other' })))).message).toMatch(
      /^invalid token: jwt audience invalid/,
    );
  });

  it('allows small clock skew but rejects expired tokens', async () => {
    await expect(validator.validate(userToken('a', [], { expiresInSeconds: -10 }))).resolves.toMatchObject({ username: 'a' });
    const err = await rejection(validator.validate(userToken('a', [], { expiresInSeconds: -120 })));
    expect(err).toMatchObject({ code: 'Unauthenticated', message: 'token expired' });
  });

  it('flags tokens missing required claims as malformed', async () => {
    expect(await rejection(validator.validate(mintToken({ preferred_username: 'a' })))).toMatchObject({ code: 'MalformedToken' });
    expect(await rejection(validator.validate(mintToken({ sub: 's' })))).toMatchObject({
      code: 'MalformedToken',
      message: 'token is missing the preferred_username claim',
    });
    expect(await rejection(validator.validate(mintToken({ sub: 's', preferred_username: 'a', groups: 'admins' })))).toMatchObject({
      code: 'MalformedToken',
      message: 'groups claim must be a list of strings',
    });
  });

  it('refetches keys once when it meets a new key id', async () => {
    const source = new StaticKeySource();
    const rotating = testValidator(source);
    await rotating.validate(userToken('a', []));
    expect(source.fetches).toBe(1);

    const next = rsaKeyPair();
    source.keys.set('test-key-2', next.publicKey);
    await rotating.validate(userToken('a', [], { kid: 'test-key-2', privateKey: next.privateKey }));
    expect(source.fetches).toBe(2);
  });
});

describe('bearerToken', () => {
  it('extracts the token', () => {
    expect(bearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(bearerToken('bearer   abc ')).toBe('abc');
  });

  it('rejects missing or non-bearer headers', () => {
    expect(() => bearerToken(undefined)).toThrow('missing bearer token');
    expect(() => bearerToken('Basic dXNlcg==')).toThrow('authorization header must use the Bearer scheme');
    expect(() => bearerToken('Bearer a b')).toThrow(AppError);
  });
});
