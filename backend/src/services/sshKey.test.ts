import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { MAX_AUTHORIZED_KEY_LENGTH, parseAuthorizedKey, parseCertificate, sshFingerprint } from './sshKey.js';
import { buildCertificate, ed25519Key, rsaKey, SshWireWriter, TEST_CA_PUBLIC_KEY } from '../testing/ssh.js';

function expectInvalid(text: string, message: string | RegExp) {
  expect(() => parseAuthorizedKey(text)).toThrow(message);
  try {
    parseAuthorizedKey(text);
  } catch (err) {
    expect(err).toMatchObject({ code: 'InvalidPublicKey', status: 400 });
  }
}

describe('parseAuthorizedKey', () => {
  it('accepts an ed25519 key with its comment', () => {
    const key = ed25519Key('alice@laptop');
    const parsed = parseAuthorizedKey(`${key.line}\n`);
    expect(parsed.type).toBe('ssh-ed25519');
    expect(parsed.bits).toBe(256);
    expect(parsed.comment).toBe('alice@laptop');
    expect(parsed.blob.equals(key.blob)).toBe(true);
  });

  it('fingerprints the key blob like ssh-keygen', () => {
    const key = ed25519Key();
    const expected = 'SHA256:' + createHash('sha256').update(key.blob).digest('base64').replace(/=+$/, '');
    expect(parseAuthorizedKey(key.line).fingerprint).toBe(expected);
    expect(sshFingerprint(key.blob)).toBe(expected);
  });

  it('accepts 4096-bit RSA and refuses smaller keys', () => {
    expect(parseAuthorizedKey(rsaKey(4096).line).bits).toBe(4096);
    expectInvalid(rsaKey(2048).line, 'invalid public key: rsa keys must be at least 4096 bits (got 2048)');
  });

  it('ignores blank lines and comments around the key', () => {
    const key = ed25519Key();
    expect(parseAuthorizedKey(`# laptop\n\n${key.line}\n`).type).toBe('ssh-ed25519');
  });

  it('rejects more than one key', () => {
    expectInvalid(`${ed25519Key().line}\n${ed25519Key().line}`, 'invalid public key: expected exactly one key');
  });

  it('rejects empty and oversized input', () => {
    expectInvalid('', 'public key is required');
    expectInvalid(`ssh-ed25519 ${'A'.repeat(MAX_AUTHORIZED_KEY_LENGTH)}`, 'public key exceeds 16 KiB');
  });

  it('rejects malformed base64', () => {
    expectInvalid('ssh-ed25519 not-base64!!', 'invalid public key: key data is not base64');
    expectInvalid('ssh-ed25519', 'invalid public key: missing key data');
  });

  it('rejects unsupported key types', () => {
    const blob = new SshWireWriter().string('ssh-dss').bytes(Buffer.alloc(20, 1)).toBuffer();
    expectInvalid(`ssh-dss ${blob.toString('base64')}`, 'invalid public key: unsupported key type ssh-dss');
  });

  it('rejects certificates submitted as keys', () => {
    const cert = buildCertificate({
      publicKey: ed25519Key().line,
      serial: 1n,
      keyId: 'k',
      principals: ['rocky'],
      validAfter: 0n,
      validBefore: 10n,
    });
    expectInvalid(cert, 'invalid public key: certificates are not accepted');
  });

  it('rejects a blob whose embedded type differs from the label', () => {
    const key = ed25519Key();
    expectInvalid(`ssh-rsa ${key.blob.toString('base64')}`, 'invalid public key: embedded key type does not match');
  });

  it('rejects truncated and padded blobs', () => {
    const short = new SshWireWriter().string('ssh-ed25519').bytes(Buffer.alloc(16, 1)).toBuffer();
    expectInvalid(`ssh-ed25519 ${short.toString('base64')}`, 'invalid public key: ed25519 key must be 32 bytes');
    const padded = Buffer.concat([ed25519Key().blob, Buffer.from([0])]);
    expectInvalid(`ssh-ed25519 ${padded.toString('base64')}`, 'invalid public key: trailing data after key');
  });
});

describe('parseCertificate', () => {
  it('reads back every field', () => {
    const key = ed25519Key();
    const cert = parseCertificate(
      buildCertificate({
        publicKey: key.line,
        serial: 42n,
        keyId: 'alice-developer',
        principals: ['rocky', 'deploy'],
        validAfter: 1_700_000_000n,
        validBefore: 1_700_003_600n,
        criticalOptions: { 'source-address': '10.0.0.0/8' },
        extensions: ['permit-pty', 'permit-agent-forwarding'],
      }),
    );
    expect(cert).toMatchObject({
      type: 'ssh-ed25519-cert-v01@openssh.com',
      keyType: 'ssh-ed25519',
      serial: 42n,
      certType: 'user',
      keyId: 'alice-developer',
      principals: ['rocky', 'deploy'],
      validAfter: 1_700_000_000n,
      validBefore: 1_700_003_600n,
      criticalOptions: { 'source-address': '10.0.0.0/8' },
      extensions: ['permit-agent-forwarding', 'permit-pty'],
    });
    expect(cert.publicKey.equals(key.blob)).toBe(true);
    expect(cert.signatureKey.toString('base64')).toBe(TEST_CA_PUBLIC_KEY.split(' ')[1]);
  });

  it('reads RSA certificates and host certificates', () => {
    const key = rsaKey();
    const cert = parseCertificate(
      buildCertificate({ publicKey: key.line, serial: 7n, keyId: 'h', principals: [], validAfter: 0n, validBefore: 1n, certType: 2 }),
    );
    expect(cert.keyType).toBe('ssh-rsa');
    expect(cert.certType).toBe('host');
    expect(cert.publicKey.equals(key.blob)).toBe(true);
  });

  it('rejects plain keys and truncated certificates', () => {
    expect(() => parseCertificate(ed25519Key().line)).toThrow('unsupported certificate type ssh-ed25519');
    const [type, data] = buildCertificate({
      publicKey: ed25519Key().line,
      serial: 1n,
      keyId: 'k',
      principals: [],
      validAfter: 0n,
      validBefore: 1n,
    }).split(' ');
    const truncated = Buffer.from(data, 'base64').subarray(0, 120).toString('base64');
    expect(() => parseCertificate(`${type} ${truncated}`)).toThrow('truncated SSH data');
  });
});
