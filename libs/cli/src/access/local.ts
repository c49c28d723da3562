/**
 * Cold path: derive the key in this process
 */

import type { ListResult, MutationResult, SecretMode } from '@shrine/ipc';
import { SecretBytes } from '@shrine/storage';
import type { KeySource, ShrineRepository } from '@shrine/storage';
import type { SecretValue, ShrineAccess } from './types.js';

export class LocalAccess implements ShrineAccess {
  readonly kind = 'local';

  constructor(
    private readonly repository: ShrineRepository,
    private readonly keys: () => Promise<KeySource>,
  ) {}

  async get(path: string): Promise<SecretValue> {
    const secret = await this.repository.get(await this.keys(), path);
    const { value, ...metadata } = secret;
    try {
      return { ...metadata, path, value: Buffer.from(value.expose()) };
    } finally {
      value.wipe();
    }
  }

  async set(path: string, value: Buffer, mode: SecretMode): Promise<MutationResult> {
    const bytes = new SecretBytes(value);
    try {
      return await this.repository.set(await this.keys(), path, bytes, mode);
    } finally {
      bytes.wipe();
    }
  }

  async remove(path: string): Promise<MutationResult> {
    return this.repository.remove(await this.keys(), path);
  }

  async list(pattern?: string): Promise<ListResult> {
    return this.repository.list(await this.keys(), pattern);
  }
}
