import { createHash } from 'crypto';
import { AppError } from '../errors.js';

export const MAX_AUTHORIZED_KEY_LENGTH = 16 * 1024;
export const MIN_RSA_BITS = 4096;
const ED25519_KEY_LENGTH = 32;

/** OpenSSH encodes "valid forever" as the largest uint64. */
export const SSH_FOREVER = 0xffff_ffff_ffff_ffffn;

export type SshKeyType = 'ssh-ed25519' | 'ssh-rsa';

const CERT_TYPES: Record<string, SshKeyType> = {
  'ssh-ed25519-cert-v01@openssh.com': 'ssh-ed25519',
  'ssh-rsa-cert-v01@openssh.com': 'ssh-rsa',
};

export interface SshPublicKey {
  type: SshKeyType;
  /** Wire-format key blob (what the base64 field decodes to). */
  blob: Buffer;
  bits: number;
  comment?: string;
  fingerprint: string;
}

export interface SshCertificate {
  type: string;
  keyType: SshKeyType;
  nonce: Buffer;
  /** The certified key, re-encoded as a plain public key blob. */
  publicKey: Buffer;
  serial: bigint;
  certType: 'user' | 'host';
  keyId: string;
  principals: string[];
  validAfter: bigint;
  validBefore: bigint;
  criticalOptions: Record<string, string>;
  extensions: string[];
  signatureKey: Buffer;
}

export class SshWireReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  readRaw(length: number): Buffer {
    if (length < 0 || length > this.remaining) throw new Error('truncated SSH data');
    const out = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  readUint32(): number {
    return this.readRaw(4).readUInt32BE(0);
  }

  readUint64(): bigint {
    return this.readRaw(8).readBigUInt64BE(0);
  }

  readBytes(): Buffer {
    return this.readRaw(this.readUint32());
  }

  readString(): string {
    return this.readBytes().toString('utf8');
  }

  slice(start: number, end: number): Buffer {
    return this.buf.subarray(start, end);
  }
}

function lengthPrefixed(data: Buffer): Buffer {
  const len = Buffer.alloc(4);
  len.writeUInt32BE(data.length, 0);
  return Buffer.concat([len, data]);
}

/** Bit length of an unsigned big-endian integer. */
function bitLength(magnitude: Buffer): number {
  let i = 0;
  while (i < magnitude.length && magnitude[i] === 0) i++;
  if (i === magnitude.length) return 0;
  return (magnitude.length - i - 1) * 8 + (32 - Math.clz32(magnitude[i]));
}

export function sshFingerprint(blob: Buffer): string {
  return 'SHA256:' + createHash('sha256').update(blob).digest('base64').replace(/=+$/, '');
}

function splitKeyLine(text: string): { type: string; blob: Buffer; comment?: string } {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith('#'));
  if (lines.length !== 1) throw new Error('expected exactly one key');
  const [type, encoded, ...rest] = lines[0].split(/\s+/);
  if (!encoded) throw new Error('missing key data');
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(encoded)) throw new Error('key data is not base64');
  const blob = Buffer.from(encoded, 'base64');
  if (blob.toString('base64').replace(/=+$/, '') !== encoded.replace(/=+$/, '')) {
    throw new Error('key data is not base64');
  }
  return { type, blob, comment: rest.length ? rest.join(' ') : undefined };
}

function readKeyFields(reader: SshWireReader, type: SshKeyType): number {
  if (type === 'ssh-ed25519') {
    const key = reader.readBytes();
    if (key.length !== ED25519_KEY_LENGTH) throw new Error('ed25519 key must be 32 bytes');
    return 256;
  }
  const e = reader.readBytes();
  const n = reader.readBytes();
  if (bitLength(e) === 0) throw new Error('rsa exponent is zero');
  return bitLength(n);
}

/**
 * Parses and vets a single authorized_keys line. Only ed25519 and RSA keys of
 * at least 4096 bits are accepted; certificates are refused.
 */
export function parseAuthorizedKey(text: string): SshPublicKey {
  if (typeof text !== 'string' || text.length === 0) {
    throw new AppError('InvalidPublicKey', 'public key is required');
  }
  if (Buffer.byteLength(text, 'utf8') > MAX_AUTHORIZED_KEY_LENGTH) {
    throw new AppError('InvalidPublicKey', 'public key exceeds 16 KiB');
  }
  try {
    const { type, blob, comment } = splitKeyLine(text);
    if (type in CERT_TYPES || type.includes('-cert-')) throw new Error('certificates are not accepted');
    if (type !== 'ssh-ed25519' && type !== 'ssh-rsa') throw new Error(`unsupported key type ${type}`);
    const reader = new SshWireReader(blob);
    if (reader.readString() !== type) throw new Error('embedded key type does not match');
    const bits = readKeyFields(reader, type);
    if (reader.remaining !== 0) throw new Error('trailing data after key');
    if (type === 'ssh-rsa' && bits < MIN_RSA_BITS) {
      throw new Error(`rsa keys must be at least ${MIN_RSA_BITS} bits (got ${bits})`);
    }
    return { type, blob, bits, comment, fingerprint: sshFingerprint(blob) };
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new AppError('InvalidPublicKey', `invalid public key: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function readNameList(data: Buffer): string[] {
  const reader = new SshWireReader(data);
  const out: string[] = [];
  while (reader.remaining > 0) out.push(reader.readString());
  return out;
}

function readOptions(data: Buffer): Array<[string, string]> {
  const reader = new SshWireReader(data);
  const out: Array<[string, string]> = [];
  while (reader.remaining > 0) {
    const name = reader.readString();
    const value = reader.readBytes();
    out.push([name, value.length ? new SshWireReader(value).readString() : '']);
  }
  return out;
}

/** Parses an OpenSSH user/host certificate line (`<type> <base64> [comment]`). */
export function parseCertificate(text: string): SshCertificate {
  const { type, blob } = splitKeyLine(text);
  const keyType = CERT_TYPES[type];
  if (!keyType) throw new Error(`unsupported certificate type ${type}`);
  const reader = new SshWireReader(blob);
  if (reader.readString() !== type) throw new Error('embedded certificate type does not match');
  const nonce = reader.readBytes();
  const keyStart = reader.position;
  readKeyFields(reader, keyType);
  const publicKey = Buffer.concat([lengthPrefixed(Buffer.from(keyType)), reader.slice(keyStart, reader.position)]);
  const serial = reader.readUint64();
  const rawCertType = reader.readUint32();
  if (rawCertType !== 1 && rawCertType !== 2) throw new Error(`unknown certificate type ${rawCertType}`);
  const keyId = reader.readString();
  const principals = readNameList(reader.readBytes());
  const validAfter = reader.readUint64();
  const validBefore = reader.readUint64();
  const criticalOptions = Object.fromEntries(readOptions(reader.readBytes()));
  const extensions = readOptions(reader.readBytes()).map(([name]) => name);
  reader.readBytes(); // reserved
  const signatureKey = reader.readBytes();
  reader.readBytes(); // signature
  if (reader.remaining !== 0) throw new Error('trailing data after certificate');
  return {
    type,
    keyType,
    nonce,
    publicKey,
    serial,
    certType: rawCertType === 1 ? 'user' : 'host',
    keyId,
    principals,
    validAfter,
    validBefore,
    criticalOptions,
    extensions,
    signatureKey,
  };
}
