/**
 * Encryption utilities for shrine storage
 *
 * - PBKDF2-HMAC-SHA256 key derivation from the shrine password
 * - AES-256-GCM authenticated encryption of the whole payload
 */

import * as crypto from 'node:crypto';
import { promisify } from 'node:util';
import { IntegrityError } from '@shrine/ipc';

const pbkdf2 = promisify(crypto.pbkdf2);

export const KEY_LEN = 32;
export const SALT_LEN = 16;
export const NONCE_LEN = 12;
export const AUTH_TAG_LEN = 16;
const KDF_DIGEST = 'sha256';
const AES_ALGORITHM = 'aes-256-gcm' as const;

export type KdfAlgorithm = 'pbkdf2-sha256';

/** Payload ciphers; `none` stores the payload in clear */
export const ENCRYPTION_ALGORITHMS = ['aes-256-gcm', 'none'] as const;
export type EncryptionAlgorithm = (typeof ENCRYPTION_ALGORITHMS)[number];

export interface KdfParams {
  algorithm: KdfAlgorithm;
  iterations: number;
  salt: Buffer;
}

/**
 * A symmetric key together with the parameters it was derived with. The
 * parameters are written into the container header so the same key can be
 * derived again from the password.
 */
export interface DerivedKey {
  readonly key: Buffer;
  readonly params: KdfParams;
}

export interface SealedPayload {
  nonce: Buffer;
  tag: Buffer;
  ciphertext: Buffer;
}

/**
 * Derive a 32-byte AES key from a password + salt.
 */
export async function deriveKey(password: string, salt: Buffer, iterations: number): Promise<DerivedKey> {
  const key = await pbkdf2(password, salt, iterations, KEY_LEN, KDF_DIGEST);
  return {
    key,
    params: { algorithm: 'pbkdf2-sha256', iterations, salt: Buffer.from(salt) },
  };
}

/**
 * Generate a random 16-byte salt.
 */
export function generateSalt(): Buffer {
  return crypto.randomBytes(SALT_LEN);
}

/**
 * Overwrite key material in place.
 */
export function wipeKey(key: DerivedKey): void {
  key.key.fill(0);
}

/**
 * True when the key was derived with the salt and work factor of `params`.
 */
export function matchesKdfParams(key: DerivedKey, params: KdfParams): boolean {
  return (
    key.params.algorithm === params.algorithm &&
    key.params.iterations === params.iterations &&
    key.params.salt.length === params.salt.length &&
    crypto.timingSafeEqual(key.params.salt, params.salt)
  );
}

/**
 * Encrypt with AES-256-GCM under a fresh random nonce. `aad` is
 * authenticated but not encrypted.
 */
export function seal(plaintext: Buffer, key: Buffer, aad: Buffer): SealedPayload {
  const nonce = crypto.randomBytes(NONCE_LEN);
  const cipher = crypto.createCipheriv(AES_ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LEN });
  cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { nonce, tag: cipher.getAuthTag(), ciphertext };
}

/**
 * Decrypt and authenticate. Any failure is an IntegrityError; the caller
 * cannot tell a wrong key from a tampered container.
 */
export function unseal(sealed: SealedPayload, key: Buffer, aad: Buffer): Buffer {
  try {
    const decipher = crypto.createDecipheriv(AES_ALGORITHM, key, sealed.nonce, { authTagLength: AUTH_TAG_LEN });
    decipher.setAAD(aad);
    decipher.setAuthTag(sealed.tag);
    return Buffer.concat([decipher.update(sealed.ciphertext), decipher.final()]);
  } catch {
    throw new IntegrityError();
  }
}
