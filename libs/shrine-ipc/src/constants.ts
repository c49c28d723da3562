/**
 * Constants for shrine
 */

/** Name of the shrine file inside its folder */
export const SHRINE_FILENAME = 'shrine';

/** Magic bytes at the start of every shrine file */
export const SHRINE_MAGIC = 'shrine';

/** Container format version written by this release */
export const SHRINE_FORMAT_VERSION = 1;

/** Suffix of the advisory lock file created beside the shrine file */
export const LOCK_SUFFIX = '.lock';

/** PBKDF2 iteration count for new shrines (OWASP guidance for HMAC-SHA256) */
export const DEFAULT_KDF_ITERATIONS = 600_000;

/** Session lifetime when none is configured (15 minutes) */
export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1000;

/** Longest delay a Node timer accepts (2^31 - 1 ms); longer ones fire at once */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Upper bound for a configured session lifetime */
export const MAX_SESSION_TTL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

/** How long a mutation waits for the advisory lock */
export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;

/** Agent socket, pid and log file naming */
export const AGENT_SOCKET_PREFIX = 'shrine-';
export const AGENT_SOCKET_SUFFIX = '.sock';
export const AGENT_PID_SUFFIX = '.pid';
export const AGENT_LOG_FILE = 'shrine-agent.log';

/** Owner-only permissions */
export const FILE_PERMISSIONS = {
  SHRINE_FILE: 0o600,
  SOCKET: 0o600,
  RUNTIME_DIR: 0o700,
} as const;

/** Commit messages recorded after a persist */
export const COMMIT_MESSAGES = {
  INIT: 'Initialize shrine',
  UPDATE: 'Update shrine',
} as const;

/** Environment variables read by the CLI and agent */
export const ENV = {
  RUNTIME_DIR: 'SHRINE_RUNTIME_DIR',
  AGENT_TTL: 'SHRINE_AGENT_TTL',
  LOG_LEVEL: 'SHRINE_LOG_LEVEL',
  KDF_ITERATIONS: 'SHRINE_KDF_ITERATIONS',
  LOCK_TIMEOUT_MS: 'SHRINE_LOCK_TIMEOUT_MS',
} as const;

export const VERSION = '0.1.0';
