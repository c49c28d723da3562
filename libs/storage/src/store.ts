/**
 * In-memory secret store
 *
 * Map of secret path → secret. Lives only between load and persist; `wipe()`
 * zeroes every value.
 */

import { ValidationError } from '@shrine/ipc';
import type { SecretEntry, SecretMetadata, SecretMode } from '@shrine/ipc';
import { SecretBytes } from './secret-bytes.js';

export interface Secret extends SecretMetadata {
  value: SecretBytes;
}

/** Serialized form inside the encrypted payload; `value` is base64 */
export interface StoredSecret extends SecretMetadata {
  value: string;
}

/**
 * A secret path is `/`-delimited, non-empty, with no empty segment.
 */
export function validateSecretPath(path: string): void {
  if (path.length === 0) {
    throw new ValidationError('Secret path must not be empty');
  }
  if (path.split('/').some((segment) => segment.length === 0)) {
    throw new ValidationError(`Invalid secret path "${path}": empty segment`);
  }
}

/**
 * Compile a listing pattern. Patterns are regular expressions tested
 * anywhere in the path; anchor them to match whole paths.
 */
export function compilePattern(pattern: string | undefined): (path: string) => boolean {
  if (pattern === undefined || pattern === '') {
    return () => true;
  }
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid pattern "${pattern}": ${reason}`);
  }
  return (path) => regex.test(path);
}

export class SecretStore {
  private readonly secrets = new Map<string, Secret>();

  static fromStored(stored: Record<string, StoredSecret>): SecretStore {
    const store = new SecretStore();
    for (const [path, { value, ...metadata }] of Object.entries(stored)) {
      store.secrets.set(path, { ...metadata, value: SecretBytes.fromBase64(value) });
    }
    return store;
  }

  get size(): number {
    return this.secrets.size;
  }

  has(path: string): boolean {
    return this.secrets.has(path);
  }

  get(path: string): Secret | undefined {
    return this.secrets.get(path);
  }

  /**
   * Insert or overwrite. An overwrite keeps the creation metadata and records
   * who updated it and when.
   */
  set(path: string, value: SecretBytes, mode: SecretMode, author: string, now: Date = new Date()): void {
    validateSecretPath(path);
    const existing = this.secrets.get(path);
    if (existing) {
      existing.value.wipe();
      this.secrets.set(path, {
        value,
        mode,
        createdBy: existing.createdBy,
        createdAt: existing.createdAt,
        updatedBy: author,
        updatedAt: now.toISOString(),
      });
      return;
    }
    this.secrets.set(path, { value, mode, createdBy: author, createdAt: now.toISOString() });
  }

  remove(path: string): boolean {
    const existing = this.secrets.get(path);
    if (!existing) return false;
    existing.value.wipe();
    return this.secrets.delete(path);
  }

  /** Paths in code-unit order */
  paths(): string[] {
    return this.sorted().map(([path]) => path);
  }

  private sorted(): Array<[string, Secret]> {
    return [...this.secrets.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * Sorted entries whose path satisfies `matches`, without values.
   */
  list(matches: (path: string) => boolean = () => true): SecretEntry[] {
    return this.sorted()
      .filter(([path]) => matches(path))
      .map(([path, { value: _value, ...metadata }]) => ({ path, ...metadata }));
  }

  toStored(): Record<string, StoredSecret> {
    const stored: Record<string, StoredSecret> = {};
    for (const [path, { value, ...metadata }] of this.sorted()) {
      stored[path] = { ...metadata, value: value.toBase64() };
    }
    return stored;
  }

  wipe(): void {
    for (const secret of this.secrets.values()) {
      secret.value.wipe();
    }
    this.secrets.clear();
  }
}
