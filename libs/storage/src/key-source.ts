/**
 * Key sources
 *
 * Repository operations do not take a password; they ask a KeySource for the
 * key matching the header of the encrypted file being opened. Unencrypted
 * shrines never consult it. The CLI cold path derives
 * it from a password, the agent hands out the key of its session.
 */

import { IntegrityError } from '@shrine/ipc';
import { deriveKey, matchesKdfParams, wipeKey } from './crypto.js';
import type { DerivedKey } from './crypto.js';
import type { EncryptedHeader } from './codec.js';

export interface KeySource {
  keyFor(header: EncryptedHeader): Promise<DerivedKey>;
  /** Called once the repository is done with a key obtained from `keyFor` */
  release?(key: DerivedKey): void;
}

export class PasswordKeySource implements KeySource {
  constructor(private readonly password: string) {}

  keyFor(header: EncryptedHeader): Promise<DerivedKey> {
    return deriveKey(this.password, header.kdf.salt, header.kdf.iterations);
  }

  release(key: DerivedKey): void {
    wipeKey(key);
  }
}

/**
 * Serves copies of one already-derived key. Used by the agent, which owns the
 * key and may wipe it while a request still runs on its copy.
 */
export class CachedKeySource implements KeySource {
  constructor(private readonly key: DerivedKey) {}

  async keyFor(header: EncryptedHeader): Promise<DerivedKey> {
    if (!matchesKdfParams(this.key, header.kdf)) {
      throw new IntegrityError();
    }
    return { key: Buffer.from(this.key.key), params: this.key.params };
  }

  release(key: DerivedKey): void {
    wipeKey(key);
  }
}
