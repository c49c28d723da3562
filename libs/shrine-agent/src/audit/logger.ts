/**
 * Audit Logger
 *
 * Logs every agent request as a JSON line, and doubles as the agent's
 * operational logger. Entries carry the method and outcome only; secret
 * values and passwords never reach it.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { FILE_PERMISSIONS, LOG_LEVEL_PRIORITY } from '@shrine/ipc';
import type { Logger, LogLevel } from '@shrine/ipc';

export interface AuditEntry {
  id: string;
  timestamp: Date;
  method: string;
  outcome: 'success' | 'error';
  /** Stable error code or JSON-RPC code on failure */
  errorCode?: string | number;
  durationMs: number;
}

export interface AuditLoggerOptions {
  logPath: string;
  logLevel: LogLevel;
  maxFileSize?: number;
  maxFiles?: number;
  /** Mirror operational messages to the console */
  console?: boolean;
}

export class AuditLogger implements Logger {
  private logPath: string;
  private logLevel: LogLevel;
  private maxFileSize: number;
  private maxFiles: number;
  private mirrorToConsole: boolean;
  private writeStream: fs.WriteStream | null = null;
  private currentSize: number = 0;

  constructor(options: AuditLoggerOptions) {
    this.logPath = options.logPath;
    this.logLevel = options.logLevel;
    this.maxFileSize = options.maxFileSize || 10 * 1024 * 1024; // 10MB
    this.maxFiles = options.maxFiles || 5;
    this.mirrorToConsole = options.console ?? true;

    this.initializeStream();
  }

  private initializeStream(): void {
    const dir = path.dirname(this.logPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: FILE_PERMISSIONS.RUNTIME_DIR });
    }

    if (fs.existsSync(this.logPath)) {
      this.currentSize = fs.statSync(this.logPath).size;
    }

    this.writeStream = fs.createWriteStream(this.logPath, {
      flags: 'a',
      encoding: 'utf-8',
      mode: FILE_PERMISSIONS.SHRINE_FILE,
    });
  }

  private maybeRotate(): void {
    if (this.currentSize < this.maxFileSize) {
      return;
    }

    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.logPath}.${i}`;
      const newPath = `${this.logPath}.${i + 1}`;

      if (fs.existsSync(oldPath)) {
        if (i === this.maxFiles - 1) {
          fs.unlinkSync(oldPath);
        } else {
          fs.renameSync(oldPath, newPath);
        }
      }
    }

    if (fs.existsSync(this.logPath)) {
      fs.renameSync(this.logPath, `${this.logPath}.1`);
    }

    this.currentSize = 0;
    this.initializeStream();
  }

  private writeLine(record: Record<string, unknown>): void {
    this.maybeRotate();
    const line = JSON.stringify(record) + '\n';
    if (this.writeStream) {
      this.writeStream.write(line);
      this.currentSize += Buffer.byteLength(line);
    }
  }

  /**
   * Record one handled request
   */
  log(entry: AuditEntry): void {
    this.writeLine({ type: 'request', ...entry, timestamp: entry.timestamp.toISOString() });

    const level: LogLevel = entry.outcome === 'success' ? 'debug' : 'info';
    if (this.mirrorToConsole && this.shouldLog(level)) {
      const mark = entry.outcome === 'success' ? '✓' : '✗';
      const suffix = entry.errorCode !== undefined ? ` (${entry.errorCode})` : '';
      console.error(`[${entry.method}] ${mark}${suffix} ${entry.durationMs}ms`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.logLevel];
  }

  private message(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    this.writeLine({ type: 'log', level, timestamp: new Date().toISOString(), message, ...(data ? { data } : {}) });
    if (this.mirrorToConsole) {
      console.error(`[${level.toUpperCase()}] ${message}`, data || '');
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.message('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.message('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.message('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.message('error', message, data);
  }

  /**
   * Close the logger
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.writeStream) {
        this.writeStream.end(() => {
          this.writeStream = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
