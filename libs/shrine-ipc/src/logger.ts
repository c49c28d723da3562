/**
 * Logger contract shared by storage, agent and CLI.
 *
 * Implementations must never receive secret values or passwords.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Console logger writing everything to stderr, so stdout stays free for
 * secret values piped by the CLI.
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix = '[shrine]'): Logger {
  const write = (msgLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[msgLevel] < LOG_LEVEL_PRIORITY[level]) return;
    if (meta && Object.keys(meta).length > 0) {
      console.error(`${prefix} ${message}`, meta);
    } else {
      console.error(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

/** Logger that drops everything; used by tests and quiet commands. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
