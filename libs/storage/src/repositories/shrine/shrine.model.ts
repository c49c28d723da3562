/**
 * Shrine model: result shapes returned by the repository
 */

import type { MutationResult, ShrineConfig } from '@shrine/ipc';
import type { ShrineHeader } from '../../codec.js';
import type { EncryptionAlgorithm, KdfAlgorithm } from '../../crypto.js';
import type { SecretBytes } from '../../secret-bytes.js';
import type { SecretStore } from '../../store.js';

/**
 * A decrypted shrine. The caller owns `store` and must `wipe()` it.
 */
export interface OpenShrine {
  header: ShrineHeader;
  store: SecretStore;
  config: ShrineConfig;
  /** SHA-256 of the file bytes the shrine was read from */
  fingerprint: string;
}

export interface ShrineInfo {
  path: string;
  version: number;
  uuid: string;
  encryption: EncryptionAlgorithm;
  /** Absent for an unencrypted shrine */
  kdf?: KdfAlgorithm;
  iterations?: number;
}

export interface InitResult extends MutationResult {
  uuid: string;
}

export interface ImportResult extends MutationResult {
  imported: number;
}

export interface RekeyResult extends MutationResult {
  uuid: string;
}

export interface DumpEntry {
  path: string;
  value: SecretBytes;
}

export function toInfo(path: string, header: ShrineHeader): ShrineInfo {
  const info: ShrineInfo = { path, version: header.version, uuid: header.uuid, encryption: header.encryption };
  if (header.encryption === 'aes-256-gcm') {
    info.kdf = header.kdf.algorithm;
    info.iterations = header.kdf.iterations;
  }
  return info;
}
