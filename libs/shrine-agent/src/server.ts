/**
 * Unix Socket Server
 *
 * IPC server for the shrine agent. Handles JSON-RPC 2.0 requests over
 * newline-delimited JSON, one request at a time across all connections.
 */

import * as net from 'node:net';
import * as fs from 'node:fs';
import { randomUUID } from 'node:crypto';
import { FILE_PERMISSIONS, RPC_ERROR_CODES, isShrineError } from '@shrine/ipc';
import type { AgentMethod, JsonRpcError, JsonRpcResponse } from '@shrine/ipc';
import type { AuditLogger } from './audit/logger.js';
import { InvalidParamsError } from './handlers/types.js';
import type { HandlerDependencies, HandlerTable } from './handlers/types.js';

export interface AgentServerOptions {
  socketPath: string;
  handlers: HandlerTable;
  deps: HandlerDependencies;
  auditLogger: AuditLogger;
}

function isAgentMethod(method: string, handlers: HandlerTable): method is AgentMethod {
  return Object.prototype.hasOwnProperty.call(handlers, method);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AgentServer {
  private server: net.Server | null = null;
  private socketPath: string;
  private handlers: HandlerTable;
  private deps: HandlerDependencies;
  private auditLogger: AuditLogger;
  private connections: Set<net.Socket> = new Set();
  /** Tail of the request queue; every request chains onto it */
  private queue: Promise<void> = Promise.resolve();

  constructor(options: AgentServerOptions) {
    this.socketPath = options.socketPath;
    this.handlers = options.handlers;
    this.deps = options.deps;
    this.auditLogger = options.auditLogger;
  }

  /**
   * Start listening. A leftover socket file must already be gone or stale.
   */
  async start(): Promise<void> {
    if (fs.existsSync(this.socketPath)) {
      fs.unlinkSync(this.socketPath);
    }

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.handleConnection(socket);
      });
      this.server = server;

      server.once('error', reject);

      server.listen(this.socketPath, () => {
        server.off('error', reject);
        try {
          fs.chmodSync(this.socketPath, FILE_PERMISSIONS.SOCKET);
        } catch (error) {
          server.close();
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Stop the server and remove the socket file
   */
  async stop(): Promise<void> {
    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    const server = this.server;
    this.server = null;
    if (!server) return;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    fs.rmSync(this.socketPath, { force: true });
  }

  private handleConnection(socket: net.Socket): void {
    this.connections.add(socket);

    let buffer = '';

    socket.on('data', (data) => {
      buffer += data.toString();

      let newlineIndex: number;
      while ((newlineIndex = buffer.indexOf('\n')) !== -1) {
        const line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);

        if (line.trim()) {
          this.enqueue(line, socket);
        }
      }
    });

    socket.on('close', () => {
      this.connections.delete(socket);
    });

    socket.on('error', (error) => {
      this.auditLogger.warn('Socket error', { error: error.message });
      this.connections.delete(socket);
    });
  }

  private enqueue(line: string, socket: net.Socket): void {
    this.queue = this.queue
      .then(async () => {
        const response = await this.processRequest(line);
        if (!socket.destroyed) {
          socket.write(JSON.stringify(response) + '\n');
        }
      })
      .catch((error: unknown) => {
        this.auditLogger.error('Failed to answer request', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }

  /**
   * Process a JSON-RPC request. Never rejects.
   */
  private async processRequest(line: string): Promise<JsonRpcResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();

    let request: unknown;
    try {
      request = JSON.parse(line);
    } catch {
      return this.errorResponse(null, { code: RPC_ERROR_CODES.PARSE_ERROR, message: 'Parse error' });
    }

    if (!isRecord(request)) {
      return this.errorResponse(null, { code: RPC_ERROR_CODES.INVALID_REQUEST, message: 'Invalid Request' });
    }

    const { jsonrpc, method, params } = request;
    const id = typeof request['id'] === 'string' || typeof request['id'] === 'number' ? request['id'] : null;
    if (jsonrpc !== '2.0' || typeof method !== 'string' || id === null) {
      return this.errorResponse(id, { code: RPC_ERROR_CODES.INVALID_REQUEST, message: 'Invalid Request' });
    }

    if (!isAgentMethod(method, this.handlers)) {
      return this.errorResponse(id, { code: RPC_ERROR_CODES.METHOD_NOT_FOUND, message: 'Method not found' });
    }

    try {
      const result = await this.handlers[method].run(params, this.deps, {
        requestId,
        timestamp: new Date(startTime),
      });

      this.auditLogger.log({
        id: requestId,
        timestamp: new Date(startTime),
        method,
        outcome: 'success',
        durationMs: Date.now() - startTime,
      });

      return { jsonrpc: '2.0', id, result };
    } catch (error) {
      const rpcError = this.toRpcError(error);

      this.auditLogger.log({
        id: requestId,
        timestamp: new Date(startTime),
        method,
        outcome: 'error',
        errorCode: rpcError.data?.code ?? rpcError.code,
        durationMs: Date.now() - startTime,
      });

      return this.errorResponse(id, rpcError);
    }
  }

  private toRpcError(error: unknown): JsonRpcError {
    if (error instanceof InvalidParamsError) {
      return { code: RPC_ERROR_CODES.INVALID_PARAMS, message: error.message };
    }
    if (isShrineError(error)) {
      return { code: RPC_ERROR_CODES.DOMAIN_ERROR, message: error.message, data: { code: error.code } };
    }
    this.auditLogger.error('Request processing error', {
      error: error instanceof Error ? error.message : String(error),
    });
    return { code: RPC_ERROR_CODES.INTERNAL_ERROR, message: 'Internal error' };
  }

  private errorResponse(id: string | number | null, error: JsonRpcError): JsonRpcResponse {
    return { jsonrpc: '2.0', id, error };
  }
}
