/**
 * Shrine Storage Library
 *
 * Encrypted single-file secret storage: key derivation, container codec,
 * locked atomic persistence, import and git recording.
 *
 * @packageDocumentation
 */

// Crypto
export {
  deriveKey,
  generateSalt,
  wipeKey,
  matchesKdfParams,
  ENCRYPTION_ALGORITHMS,
  KEY_LEN,
  SALT_LEN,
  NONCE_LEN,
} from './crypto.js';
export type { DerivedKey, EncryptionAlgorithm, KdfAlgorithm, KdfParams } from './crypto.js';

// Codec
export { encode, decode, verify, readHeader, writeHeader } from './codec.js';
export type { DecodedShrine, EncryptedHeader, PlainHeader, ShrineHeader } from './codec.js';

// Values
export { SecretBytes } from './secret-bytes.js';
export { SecretStore, compilePattern, validateSecretPath } from './store.js';
export type { Secret, StoredSecret } from './store.js';
export { currentIdentity } from './identity.js';

// Keys
export { PasswordKeySource, CachedKeySource } from './key-source.js';
export type { KeySource } from './key-source.js';

// Filesystem
export { writeFileAtomic, readFingerprint, fingerprint, isNotFound, toIoError, errnoCode, errorMessage } from './fs/atomic.js';
export { FileLock, withFileLock } from './fs/file-lock.js';
export type { FileLockOptions } from './fs/file-lock.js';

// Import
export { parseImportLines } from './import/dotenv.js';
export type { ImportEntry } from './import/dotenv.js';

// Repository
export * from './repositories/shrine/index.js';
export { convert } from './convert.js';
export type { ConvertOptions } from './convert.js';

// Version control
export * from './vcs/index.js';
