/**
 * Secret metadata shared by storage, agent and CLI
 */

export type SecretMode = 'text' | 'binary';

export interface SecretMetadata {
  mode: SecretMode;
  /** `user@host` of the first writer */
  createdBy: string;
  /** ISO timestamp */
  createdAt: string;
  updatedBy?: string;
  updatedAt?: string;
}

/** A listed secret: its path and metadata, never its value */
export interface SecretEntry extends SecretMetadata {
  path: string;
}

export interface ListResult {
  total: number;
  entries: SecretEntry[];
}

/** Outcome of a persist, including non-fatal git warnings */
export interface MutationResult {
  warnings: string[];
}
