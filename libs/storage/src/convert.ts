/**
 * Password and cipher change (re-keying)
 */

import { DEFAULT_KDF_ITERATIONS, ValidationError } from '@shrine/ipc';
import { deriveKey, generateSalt, wipeKey } from './crypto.js';
import type { EncryptionAlgorithm } from './crypto.js';
import type { KeySource } from './key-source.js';
import type { ShrineRepository } from './repositories/shrine/shrine.repository.js';
import type { RekeyResult } from './repositories/shrine/shrine.model.js';

export interface ConvertOptions {
  /** Cipher of the rewritten shrine; defaults to the current one */
  encryption?: EncryptionAlgorithm;
  /** Work factor for the new key; defaults to the current one */
  iterations?: number;
}

/**
 * Rewrite the shrine under a new uuid, re-encrypted under `newPassword` with
 * a fresh salt, or in clear when the target cipher is `none`. The old
 * password stops working once this resolves.
 */
export async function convert(
  repository: ShrineRepository,
  oldKeys: KeySource,
  newPassword: string | undefined,
  options: ConvertOptions = {},
): Promise<RekeyResult> {
  const current = await repository.info();
  const encryption = options.encryption ?? current.encryption;

  if (encryption === 'none') {
    return repository.rekey(oldKeys, null);
  }

  if (newPassword === undefined || newPassword.length === 0) {
    throw new ValidationError('New password must not be empty');
  }
  const iterations = options.iterations ?? current.iterations ?? DEFAULT_KDF_ITERATIONS;
  const newKey = await deriveKey(newPassword, generateSalt(), iterations);
  try {
    return await repository.rekey(oldKeys, newKey);
  } finally {
    wipeKey(newKey);
  }
}
