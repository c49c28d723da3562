/**
 * Unlock strategies
 *
 * A ShrineAccess reads and writes secrets with a key it already knows how to
 * obtain: from the agent's session, or from a password in this process.
 */

import type { ListResult, MutationResult, SecretMetadata, SecretMode } from '@shrine/ipc';

export interface SecretValue extends SecretMetadata {
  path: string;
  value: Buffer;
}

export interface ShrineAccess {
  readonly kind: 'agent' | 'local';
  get(path: string): Promise<SecretValue>;
  set(path: string, value: Buffer, mode: SecretMode): Promise<MutationResult>;
  remove(path: string): Promise<MutationResult>;
  list(pattern?: string): Promise<ListResult>;
}
