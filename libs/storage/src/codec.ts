/**
 * Shrine container codec
 *
 * Layout (big-endian):
 *
 *   magic "shrine"      6
 *   format version      1
 *   uuid               16
 *   cipher id           1   (0 = none, 1 = AES-256-GCM)
 *
 * then, for AES-256-GCM:
 *
 *   kdf id              1   (1 = PBKDF2-HMAC-SHA256)
 *   kdf iterations      4
 *   salt length         1
 *   salt                n
 *   nonce              12
 *   auth tag           16
 *   ciphertext       rest
 *
 * Everything before the nonce is bound as additional authenticated data.
 * An unencrypted container holds the JSON payload right after the cipher id.
 */

import { z } from 'zod';
import {
  FormatError,
  IntegrityError,
  SHRINE_FORMAT_VERSION,
  SHRINE_MAGIC,
  ShrineConfigSchema,
} from '@shrine/ipc';
import type { ShrineConfig } from '@shrine/ipc';
import { AUTH_TAG_LEN, NONCE_LEN, matchesKdfParams, seal, unseal } from './crypto.js';
import type { DerivedKey, EncryptionAlgorithm, KdfAlgorithm, KdfParams } from './crypto.js';
import { SecretStore } from './store.js';

const MAGIC = Buffer.from(SHRINE_MAGIC, 'ascii');
const UUID_LEN = 16;

const KDF_IDS: Record<KdfAlgorithm, number> = {
  'pbkdf2-sha256': 1,
};

const KDF_BY_ID = new Map<number, KdfAlgorithm>([[KDF_IDS['pbkdf2-sha256'], 'pbkdf2-sha256']]);

const CIPHER_IDS: Record<EncryptionAlgorithm, number> = {
  none: 0,
  'aes-256-gcm': 1,
};

const CIPHER_BY_ID = new Map<number, EncryptionAlgorithm>([
  [CIPHER_IDS.none, 'none'],
  [CIPHER_IDS['aes-256-gcm'], 'aes-256-gcm'],
]);

export interface EncryptedHeader {
  version: number;
  uuid: string;
  encryption: 'aes-256-gcm';
  kdf: KdfParams;
}

export interface PlainHeader {
  version: number;
  uuid: string;
  encryption: 'none';
}

export type ShrineHeader = EncryptedHeader | PlainHeader;

export interface DecodedShrine {
  header: ShrineHeader;
  store: SecretStore;
  config: ShrineConfig;
}

const StoredSecretSchema = z.object({
  value: z.string(),
  mode: z.enum(['text', 'binary']),
  createdBy: z.string(),
  createdAt: z.string(),
  updatedBy: z.string().optional(),
  updatedAt: z.string().optional(),
});

const ShrinePayloadSchema = z.object({
  secrets: z.record(z.string(), StoredSecretSchema),
  config: ShrineConfigSchema,
});

export function uuidToBytes(uuid: string): Buffer {
  const hex = uuid.replace(/-/g, '');
  if (!/^[0-9a-fA-F]{32}$/.test(hex)) {
    throw new FormatError(`Invalid uuid "${uuid}"`);
  }
  return Buffer.from(hex, 'hex');
}

export function bytesToUuid(bytes: Buffer): string {
  const hex = bytes.toString('hex');
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

function kdfAlgorithmFor(id: number): KdfAlgorithm {
  const algorithm = KDF_BY_ID.get(id);
  if (!algorithm) {
    throw new FormatError(`Unsupported key derivation function id ${id}`);
  }
  return algorithm;
}

function cipherFor(id: number): EncryptionAlgorithm {
  const algorithm = CIPHER_BY_ID.get(id);
  if (!algorithm) {
    throw new FormatError(`Unsupported cipher id ${id}`);
  }
  return algorithm;
}

export function writeHeader(header: ShrineHeader): Buffer {
  const base = Buffer.alloc(MAGIC.length + 1 + UUID_LEN + 1);
  let offset = MAGIC.copy(base, 0);
  offset = base.writeUInt8(header.version, offset);
  offset += uuidToBytes(header.uuid).copy(base, offset);
  base.writeUInt8(CIPHER_IDS[header.encryption], offset);
  if (header.encryption === 'none') {
    return base;
  }

  const kdf = Buffer.alloc(1 + 4 + 1);
  offset = kdf.writeUInt8(KDF_IDS[header.kdf.algorithm], 0);
  offset = kdf.writeUInt32BE(header.kdf.iterations, offset);
  kdf.writeUInt8(header.kdf.salt.length, offset);
  return Buffer.concat([base, kdf, header.kdf.salt]);
}

/**
 * Parse the cleartext header. Needs no key; `info` and key derivation read
 * the salt and work factor from here.
 */
export function readHeader(blob: Buffer): { header: ShrineHeader; length: number } {
  const truncated = (): FormatError => new FormatError('Not a shrine file: header is truncated');

  if (blob.length < MAGIC.length || !blob.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new FormatError('Not a shrine file: bad magic');
  }
  let offset = MAGIC.length;

  if (blob.length < offset + 1) throw truncated();
  const version = blob.readUInt8(offset);
  offset += 1;
  if (version !== SHRINE_FORMAT_VERSION) {
    throw new FormatError(`Unsupported shrine format version ${version}`);
  }

  if (blob.length < offset + UUID_LEN + 1) throw truncated();
  const uuid = bytesToUuid(blob.subarray(offset, offset + UUID_LEN));
  offset += UUID_LEN;
  const encryption = cipherFor(blob.readUInt8(offset));
  offset += 1;
  if (encryption === 'none') {
    return { header: { version, uuid, encryption }, length: offset };
  }

  if (blob.length < offset + 1 + 4 + 1) throw truncated();
  const algorithm = kdfAlgorithmFor(blob.readUInt8(offset));
  offset += 1;
  const iterations = blob.readUInt32BE(offset);
  offset += 4;
  if (iterations < 1) {
    throw new FormatError('Not a shrine file: key derivation iterations must be at least 1');
  }
  const saltLength = blob.readUInt8(offset);
  offset += 1;

  if (blob.length < offset + saltLength) throw truncated();
  const salt = Buffer.from(blob.subarray(offset, offset + saltLength));
  offset += saltLength;

  return { header: { version, uuid, encryption, kdf: { algorithm, iterations, salt } }, length: offset };
}

/**
 * Serialize the whole store and encrypt it under a fresh nonce. A `null` key
 * writes an unencrypted container.
 */
export function encode(store: SecretStore, config: ShrineConfig, key: DerivedKey | null, uuid: string): Buffer {
  const payload = JSON.stringify({ secrets: store.toStored(), config });
  if (key === null) {
    const header = writeHeader({ version: SHRINE_FORMAT_VERSION, uuid, encryption: 'none' });
    return Buffer.concat([header, Buffer.from(payload, 'utf8')]);
  }

  const header = writeHeader({ version: SHRINE_FORMAT_VERSION, uuid, encryption: 'aes-256-gcm', kdf: key.params });
  const plaintext = Buffer.from(payload, 'utf8');
  try {
    const sealed = seal(plaintext, key.key, header);
    return Buffer.concat([header, sealed.nonce, sealed.tag, sealed.ciphertext]);
  } finally {
    plaintext.fill(0);
  }
}

/**
 * Decrypt and parse a container. A key derived with other parameters than
 * the header names fails the same way as a wrong password. Unencrypted
 * containers ignore `key`.
 */
export function decode(blob: Buffer, key: DerivedKey | null): DecodedShrine {
  const { header, length } = readHeader(blob);
  if (header.encryption === 'none') {
    return parsePayload(header, Buffer.from(blob.subarray(length)));
  }
  if (key === null) {
    throw new IntegrityError('Shrine is encrypted; a password is required');
  }
  if (blob.length < length + NONCE_LEN + AUTH_TAG_LEN) {
    throw new FormatError('Not a shrine file: header is truncated');
  }
  if (!matchesKdfParams(key, header.kdf)) {
    throw new IntegrityError();
  }

  const aad = blob.subarray(0, length);
  const nonce = blob.subarray(length, length + NONCE_LEN);
  const tag = blob.subarray(length + NONCE_LEN, length + NONCE_LEN + AUTH_TAG_LEN);
  const ciphertext = blob.subarray(length + NONCE_LEN + AUTH_TAG_LEN);
  return parsePayload(header, unseal({ nonce, tag, ciphertext }, key.key, aad));
}

/**
 * Parse the JSON payload and zero the buffer it came in.
 */
function parsePayload(header: ShrineHeader, plaintext: Buffer): DecodedShrine {
  let json: unknown;
  try {
    json = JSON.parse(plaintext.toString('utf8'));
  } catch {
    throw new FormatError('Shrine payload is not valid JSON');
  } finally {
    plaintext.fill(0);
  }

  const parsed = ShrinePayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new FormatError(`Shrine payload is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  return {
    header,
    store: SecretStore.fromStored(parsed.data.secrets),
    config: parsed.data.config,
  };
}

/**
 * True when `key` opens `blob`. Never throws.
 */
export function verify(key: DerivedKey, blob: Buffer): boolean {
  try {
    decode(blob, key).store.wipe();
    return true;
  } catch {
    return false;
  }
}
