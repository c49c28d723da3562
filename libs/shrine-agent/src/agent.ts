/**
 * Shrine agent
 *
 * Wires the session manager, repository and socket server together for one
 * shrine file, and owns the pid file and shutdown sequence.
 */

import * as fs from 'node:fs';
import { AlreadyExistsError, FILE_PERMISSIONS } from '@shrine/ipc';
import { GitVersionControl, ShrineRepository } from '@shrine/storage';
import type { VersionControl } from '@shrine/storage';
import { AuditLogger } from './audit/logger.js';
import { AgentClient } from './client/agent-client.js';
import type { AgentConfig } from './config.js';
import { handlers } from './handlers/index.js';
import { ensureRuntimeDir } from './paths.js';
import { AgentServer } from './server.js';
import { SessionManager } from './session.js';
import type { ClearReason } from './session.js';

export interface ShrineAgentOptions {
  config: AgentConfig;
  /** Defaults to git driven by the shrine's own config */
  vcs?: VersionControl;
  auditLogger?: AuditLogger;
}

export class ShrineAgent {
  readonly config: AgentConfig;
  readonly sessions: SessionManager;
  private readonly auditLogger: AuditLogger;
  private readonly server: AgentServer;
  private stopping: Promise<void> | null = null;
  private resolveStopped: () => void = () => undefined;
  /** Settles once the agent has fully stopped */
  readonly stopped = new Promise<void>((resolve) => {
    this.resolveStopped = resolve;
  });

  constructor(options: ShrineAgentOptions) {
    this.config = options.config;
    ensureRuntimeDir(this.config.runtimeDir);

    this.auditLogger =
      options.auditLogger ?? new AuditLogger({ logPath: this.config.logPath, logLevel: this.config.logLevel });
    this.sessions = new SessionManager(this.config.shrinePath, this.config.ttlMs);
    this.sessions.setClearHandler((reason: ClearReason) => {
      this.auditLogger.info('Session cleared', { reason });
    });

    const repository = new ShrineRepository({
      shrinePath: this.config.shrinePath,
      vcs: options.vcs ?? new GitVersionControl({ logger: this.auditLogger }),
      logger: this.auditLogger,
      lockTimeoutMs: this.config.lockTimeoutMs,
    });

    this.server = new AgentServer({
      socketPath: this.config.socketPath,
      handlers,
      auditLogger: this.auditLogger,
      deps: {
        shrinePath: this.config.shrinePath,
        sessions: this.sessions,
        repository,
        logger: this.auditLogger,
        requestShutdown: () => {
          setImmediate(() => {
            this.stop('shutdown').catch((error: unknown) => {
              this.auditLogger.error('Shutdown failed', {
                error: error instanceof Error ? error.message : String(error),
              });
            });
          });
        },
      },
    });
  }

  /**
   * Listen on the shrine's socket. Refuses when another agent already
   * answers there; a dead socket file is replaced.
   */
  async start(): Promise<void> {
    const existing = new AgentClient({ socketPath: this.config.socketPath, timeout: 2_000 });
    if (await existing.isAvailable()) {
      throw new AlreadyExistsError(`An agent is already serving ${this.config.shrinePath}`);
    }

    await this.server.start();
    fs.writeFileSync(this.config.pidPath, `${process.pid}\n`, { mode: FILE_PERMISSIONS.SHRINE_FILE });
    this.auditLogger.info('Agent listening', {
      socket: this.config.socketPath,
      shrine: this.config.shrinePath,
      ttlMs: this.config.ttlMs,
    });
  }

  /**
   * Wipe the session, stop serving and remove the socket and pid files.
   * Safe to call more than once.
   */
  stop(reason: ClearReason = 'shutdown'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  private async shutdown(reason: ClearReason): Promise<void> {
    this.sessions.clear(reason);
    await this.server.stop();
    fs.rmSync(this.config.pidPath, { force: true });
    this.auditLogger.info('Agent stopped', { reason });
    await this.auditLogger.close();
    this.resolveStopped();
  }
}
