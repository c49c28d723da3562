/**
 * Warm path: ask the agent holding an unlocked session
 */

import type { ListResult, MutationResult, SecretMode } from '@shrine/ipc';
import type { AgentClient } from '@shrine/agent';
import type { SecretValue, ShrineAccess } from './types.js';

export class AgentAccess implements ShrineAccess {
  readonly kind = 'agent';

  constructor(private readonly client: AgentClient) {}

  async get(path: string): Promise<SecretValue> {
    const { value, ...metadata } = await this.client.get(path);
    return { ...metadata, value: Buffer.from(value, 'base64') };
  }

  set(path: string, value: Buffer, mode: SecretMode): Promise<MutationResult> {
    return this.client.set(path, value, mode);
  }

  remove(path: string): Promise<MutationResult> {
    return this.client.remove(path);
  }

  list(pattern?: string): Promise<ListResult> {
    return this.client.list(pattern);
  }
}
