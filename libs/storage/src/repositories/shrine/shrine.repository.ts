/**
 * Shrine repository: the encrypted shrine file
 *
 * Reads decrypt a fresh copy of the file. Mutations hold the advisory lock
 * from load to persist, re-encrypt the whole store, replace the file
 * atomically and then hand the change to version control.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import {
  AlreadyExistsError,
  ConcurrentModificationError,
  DEFAULT_KDF_ITERATIONS,
  FILE_PERMISSIONS,
  LOCK_SUFFIX,
  NotFoundError,
  ValidationError,
  createConsoleLogger,
  gitEnabledConfig,
  parseConfigValue,
} from '@shrine/ipc';
import type { ListResult, Logger, MutationResult, SecretMode, ShrineConfig } from '@shrine/ipc';
import { decode, encode, readHeader } from '../../codec.js';
import type { DecodedShrine, ShrineHeader } from '../../codec.js';
import { deriveKey, generateSalt, wipeKey } from '../../crypto.js';
import type { DerivedKey } from '../../crypto.js';
import { fingerprint, isNotFound, readFileStrict, readFingerprint, toIoError, writeFileAtomic } from '../../fs/atomic.js';
import { withFileLock } from '../../fs/file-lock.js';
import { currentIdentity } from '../../identity.js';
import { parseImportLines } from '../../import/dotenv.js';
import type { KeySource } from '../../key-source.js';
import { SecretBytes } from '../../secret-bytes.js';
import { SecretStore, compilePattern } from '../../store.js';
import type { Secret } from '../../store.js';
import { noVersionControl } from '../../vcs/types.js';
import type { ChangeKind, VersionControl } from '../../vcs/types.js';
import { toInfo } from './shrine.model.js';
import type { DumpEntry, ImportResult, InitResult, OpenShrine, RekeyResult, ShrineInfo } from './shrine.model.js';
import { ImportSecretsSchema, InitShrineSchema, SetSecretModeSchema } from './shrine.schema.js';
import type { ImportSecretsInput, InitShrineInput } from './shrine.schema.js';

export interface ShrineRepositoryOptions {
  /** Path of the shrine file itself, not its folder */
  shrinePath: string;
  vcs?: VersionControl;
  logger?: Logger;
  lockTimeoutMs?: number;
  /** Work factor for new shrines */
  kdfIterations?: number;
  /** Recorded as createdBy / updatedBy; defaults to `user@host` */
  author?: string;
}

export class ShrineRepository {
  readonly shrinePath: string;
  private readonly lockPath: string;
  private readonly vcs: VersionControl;
  private readonly logger: Logger;
  private readonly lockTimeoutMs?: number;
  private readonly kdfIterations: number;
  private readonly author: string;

  constructor(options: ShrineRepositoryOptions) {
    this.shrinePath = options.shrinePath;
    this.lockPath = `${options.shrinePath}${LOCK_SUFFIX}`;
    this.vcs = options.vcs ?? noVersionControl;
    this.logger = options.logger ?? createConsoleLogger();
    this.lockTimeoutMs = options.lockTimeoutMs;
    this.kdfIterations = options.kdfIterations ?? DEFAULT_KDF_ITERATIONS;
    this.author = options.author ?? currentIdentity().label;
  }

  // ---- Lifecycle ----

  async exists(): Promise<boolean> {
    try {
      await fs.stat(this.shrinePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw toIoError(error, 'stat', this.shrinePath);
    }
  }

  /**
   * Header fields; no password needed.
   */
  async info(): Promise<ShrineInfo> {
    const blob = await readFileStrict(this.shrinePath);
    return toInfo(this.shrinePath, readHeader(blob).header);
  }

  async init(input: InitShrineInput): Promise<InitResult> {
    const data = this.validate(InitShrineSchema, input);
    const iterations = data.iterations ?? this.kdfIterations;
    await fs.mkdir(path.dirname(this.shrinePath), { recursive: true });
    const key =
      data.encryption === 'none' || data.password === undefined
        ? null
        : await deriveKey(data.password, generateSalt(), iterations);

    try {
      return await this.locked(async () => {
        const previous = await readFingerprint(this.shrinePath);
        if (previous !== null && !data.force) {
          throw new AlreadyExistsError(`A shrine already exists at ${this.shrinePath}; use --force to overwrite`);
        }

        const uuid = crypto.randomUUID();
        const config: ShrineConfig = data.git ? gitEnabledConfig() : {};
        const store = new SecretStore();
        await this.persist(encode(store, config, key, uuid), previous);
        this.logger.debug('Shrine initialized', { path: this.shrinePath, uuid, encryption: data.encryption });

        const { warnings } = await this.vcs.record('init', this.shrinePath, config);
        return { uuid, warnings };
      });
    } finally {
      if (key) wipeKey(key);
    }
  }

  /**
   * Decrypt the shrine. The returned store belongs to the caller.
   */
  async open(keySource: KeySource): Promise<OpenShrine> {
    const blob = await readFileStrict(this.shrinePath);
    const decoded = await this.decodeWith(keySource, blob);
    return { ...decoded, fingerprint: fingerprint(blob) };
  }

  /**
   * Derive the key for `password` and prove it opens the shrine. The caller
   * owns the returned key. An unencrypted shrine has nothing to unlock.
   */
  async unlock(password: string): Promise<DerivedKey> {
    const blob = await readFileStrict(this.shrinePath);
    const { header } = readHeader(blob);
    if (header.encryption === 'none') {
      throw new ValidationError(`Shrine at ${this.shrinePath} is not encrypted; there is nothing to unlock`);
    }
    const key = await deriveKey(password, header.kdf.salt, header.kdf.iterations);
    try {
      decode(blob, key).store.wipe();
    } catch (error) {
      wipeKey(key);
      throw error;
    }
    return key;
  }

  // ---- Secrets ----

  /**
   * A copy of the secret; the caller wipes its value when done.
   */
  async get(keySource: KeySource, secretPath: string): Promise<Secret> {
    return this.read(keySource, ({ store }) => {
      const secret = store.get(secretPath);
      if (!secret) {
        throw new NotFoundError(`Secret "${secretPath}" not found`);
      }
      return { ...secret, value: secret.value.clone() };
    });
  }

  async set(keySource: KeySource, secretPath: string, value: SecretBytes, mode?: SecretMode): Promise<MutationResult> {
    const resolvedMode = this.validate(SetSecretModeSchema, mode);
    const { warnings } = await this.mutate(keySource, 'update', ({ store }) => {
      store.set(secretPath, value.clone(), resolvedMode, this.author);
    });
    return { warnings };
  }

  async remove(keySource: KeySource, secretPath: string): Promise<MutationResult> {
    const { warnings } = await this.mutate(keySource, 'update', ({ store }) => {
      if (!store.remove(secretPath)) {
        throw new NotFoundError(`Secret "${secretPath}" not found`);
      }
    });
    return { warnings };
  }

  /**
   * Entries whose path matches `pattern` anywhere, sorted by path.
   */
  async list(keySource: KeySource, pattern?: string): Promise<ListResult> {
    const matches = compilePattern(pattern);
    return this.read(keySource, ({ store }) => {
      const entries = store.list(matches);
      return { total: entries.length, entries };
    });
  }

  /**
   * Sorted path/value pairs. The caller wipes the values.
   */
  async dump(keySource: KeySource, pattern?: string): Promise<DumpEntry[]> {
    const matches = compilePattern(pattern);
    return this.read(keySource, ({ store }) =>
      store
        .paths()
        .filter(matches)
        .flatMap((secretPath) => {
          const secret = store.get(secretPath);
          return secret ? [{ path: secretPath, value: secret.value.clone() }] : [];
        }),
    );
  }

  /**
   * Store every `KEY=value` line under `prefix + KEY`. The whole import is
   * one mutation; a bad line aborts it before anything is written.
   */
  async import(keySource: KeySource, input: ImportSecretsInput): Promise<ImportResult> {
    const data = this.validate(ImportSecretsSchema, input);
    const entries = parseImportLines(data.content);

    const { warnings } = await this.mutate(keySource, 'update', ({ store }) => {
      for (const entry of entries) {
        store.set(`${data.prefix}${entry.key}`, SecretBytes.fromString(entry.value), 'text', this.author);
      }
    });
    this.logger.debug('Imported secrets', { count: entries.length });
    return { imported: entries.length, warnings };
  }

  // ---- Config ----

  /**
   * The whole config map, or only `name` (NotFoundError when unset).
   */
  async getConfig(keySource: KeySource, name?: string): Promise<ShrineConfig> {
    return this.read(keySource, ({ config }) => {
      if (name === undefined) return { ...config };
      const value = config[name];
      if (value === undefined) {
        throw new NotFoundError(`Config key "${name}" is not set`);
      }
      return { [name]: value };
    });
  }

  /**
   * Change one option. Recorded like any mutation; git gating reads the
   * config as written.
   */
  async setConfig(keySource: KeySource, name: string, raw: string): Promise<MutationResult> {
    const value = parseConfigValue(name, raw);
    const { warnings } = await this.mutate(keySource, 'update', (shrine) => {
      shrine.config = { ...shrine.config, [name]: value };
    });
    return { warnings };
  }

  // ---- Re-keying ----

  /**
   * Re-encrypt under `newKey` with a new uuid; `null` stores the shrine
   * unencrypted. The old file stays in place until the new one is durable;
   * `newKey` is not wiped here.
   */
  async rekey(oldKeySource: KeySource, newKey: DerivedKey | null): Promise<RekeyResult> {
    const uuid = crypto.randomUUID();
    const { warnings } = await this.mutate(oldKeySource, 'update', () => undefined, { key: newKey, uuid });
    this.logger.debug('Shrine re-keyed', { path: this.shrinePath, uuid, encrypted: newKey !== null });
    return { uuid, warnings };
  }

  // ---- Internals ----

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(`Validation failed: ${result.error.message}`, result.error.issues);
    }
    return result.data;
  }

  private locked<T>(fn: () => Promise<T>): Promise<T> {
    return withFileLock(this.lockPath, { timeoutMs: this.lockTimeoutMs }, fn);
  }

  private async decodeWith(keySource: KeySource, blob: Buffer): Promise<DecodedShrine> {
    const key = await this.keyFor(keySource, readHeader(blob).header);
    try {
      return decode(blob, key);
    } finally {
      if (key) keySource.release?.(key);
    }
  }

  private keyFor(keySource: KeySource, header: ShrineHeader): Promise<DerivedKey | null> {
    return header.encryption === 'none' ? Promise.resolve(null) : keySource.keyFor(header);
  }

  private async read<T>(keySource: KeySource, fn: (shrine: DecodedShrine) => T): Promise<T> {
    const blob = await readFileStrict(this.shrinePath);
    const decoded = await this.decodeWith(keySource, blob);
    try {
      return fn(decoded);
    } finally {
      decoded.store.wipe();
    }
  }

  private async mutate<T>(
    keySource: KeySource,
    kind: ChangeKind,
    fn: (shrine: DecodedShrine) => T,
    reencrypt?: { key: DerivedKey | null; uuid: string },
  ): Promise<{ value: T; warnings: string[] }> {
    return this.locked(async () => {
      const blob = await readFileStrict(this.shrinePath);
      const loadedFingerprint = fingerprint(blob);
      const key = await this.keyFor(keySource, readHeader(blob).header);

      try {
        const shrine = decode(blob, key);
        try {
          const value = fn(shrine);
          const next = reencrypt
            ? encode(shrine.store, shrine.config, reencrypt.key, reencrypt.uuid)
            : encode(shrine.store, shrine.config, key, shrine.header.uuid);
          await this.persist(next, loadedFingerprint);

          const { warnings } = await this.vcs.record(kind, this.shrinePath, shrine.config);
          return { value, warnings };
        } finally {
          shrine.store.wipe();
        }
      } finally {
        if (key) keySource.release?.(key);
      }
    });
  }

  /**
   * Replace the file, provided it still has the fingerprint it had when it
   * was loaded (`null`: it did not exist).
   */
  private async persist(data: Buffer, expectedFingerprint: string | null): Promise<void> {
    await writeFileAtomic(this.shrinePath, data, {
      mode: FILE_PERMISSIONS.SHRINE_FILE,
      beforeRename: async () => {
        const current = await readFingerprint(this.shrinePath);
        if (current !== expectedFingerprint) {
          throw new ConcurrentModificationError();
        }
      },
    });
  }
}
