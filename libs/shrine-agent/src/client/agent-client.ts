/**
 * Agent Client
 *
 * Client for the shrine agent over its Unix socket. One connection per
 * request; responses are checked against the result schemas and domain
 * errors come back as the same ShrineError class the agent threw.
 */

import * as net from 'node:net';
import { randomUUID } from 'node:crypto';
import {
  AGENT_RESULT_SCHEMAS,
  AgentUnavailableError,
  IoError,
  JsonRpcResponseSchema,
  RPC_ERROR_CODES,
  ValidationError,
  errorFromCode,
} from '@shrine/ipc';
import type {
  AgentMethod,
  AgentMethodMap,
  JsonRpcError,
  JsonRpcRequest,
  ListResult,
  LockResult,
  MutationResult,
  PingResult,
  SecretMode,
  ShrineError,
  ShutdownResult,
  StatusResult,
  UnlockResult,
  WireSecret,
} from '@shrine/ipc';

export interface AgentClientOptions {
  socketPath: string;
  /** Request timeout in ms */
  timeout?: number;
}

/** Connect failures that mean nobody is serving the socket */
const UNREACHABLE_CODES = new Set(['ENOENT', 'ECONNREFUSED', 'ENOTSOCK', 'ECONNRESET']);

export class AgentClient {
  readonly socketPath: string;
  private timeout: number;

  constructor(options: AgentClientOptions) {
    this.socketPath = options.socketPath;
    this.timeout = options.timeout ?? 30_000;
  }

  async ping(): Promise<PingResult> {
    return this.request('ping', {});
  }

  async status(): Promise<StatusResult> {
    return this.request('status', {});
  }

  async unlock(password: string): Promise<UnlockResult> {
    return this.request('unlock', { password });
  }

  async lock(): Promise<LockResult> {
    return this.request('lock', {});
  }

  /**
   * Fetch a secret; `value` is base64.
   */
  async get(path: string): Promise<WireSecret> {
    return this.request('get', { path });
  }

  async set(path: string, value: Buffer, mode: SecretMode = 'text'): Promise<MutationResult> {
    return this.request('set', { path, value: value.toString('base64'), mode });
  }

  async remove(path: string): Promise<MutationResult> {
    return this.request('remove', { path });
  }

  async list(pattern?: string): Promise<ListResult> {
    return this.request('list', pattern === undefined ? {} : { pattern });
  }

  async shutdown(): Promise<ShutdownResult> {
    return this.request('shutdown', {});
  }

  /**
   * Check if an agent answers on the socket
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.ping();
      return true;
    } catch (error) {
      if (error instanceof AgentUnavailableError) return false;
      throw error;
    }
  }

  private async request<M extends AgentMethod>(
    method: M,
    params: Record<string, unknown>,
  ): Promise<AgentMethodMap[M]['result']> {
    const raw = await this.socketRequest(method, params);
    const parsed = AGENT_RESULT_SCHEMAS[method].safeParse(raw);
    if (!parsed.success) {
      throw new IoError(`Invalid ${method} response from agent`);
    }
    return parsed.data;
  }

  private socketRequest(method: AgentMethod, params: Record<string, unknown>): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);
      const id = randomUUID();

      let responseData = '';
      let settled = false;
      let timeoutId: NodeJS.Timeout | undefined;

      const finish = (error: Error | null, result?: unknown): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        socket.destroy();
        if (error) reject(error);
        else resolve(result);
      };

      socket.on('connect', () => {
        const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
        socket.write(JSON.stringify(request) + '\n');

        timeoutId = setTimeout(() => {
          finish(new IoError(`Agent did not answer ${method} within ${this.timeout}ms`));
        }, this.timeout);
      });

      socket.on('data', (data) => {
        responseData += data.toString();

        const newlineIndex = responseData.indexOf('\n');
        if (newlineIndex === -1) return;

        let body: unknown;
        try {
          body = JSON.parse(responseData.slice(0, newlineIndex));
        } catch {
          finish(new IoError('Invalid response from agent'));
          return;
        }

        const response = JsonRpcResponseSchema.safeParse(body);
        if (!response.success) {
          finish(new IoError('Invalid response from agent'));
        } else if (response.data.error) {
          finish(toClientError(response.data.error));
        } else {
          finish(null, response.data.result);
        }
      });

      socket.on('error', (error) => {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        if (code && UNREACHABLE_CODES.has(code)) {
          finish(new AgentUnavailableError(`No agent listening on ${this.socketPath}`));
        } else {
          finish(new IoError(`Agent connection failed: ${error.message}`));
        }
      });

      socket.on('close', () => {
        finish(new IoError('Agent closed the connection without answering'));
      });
    });
  }
}

function toClientError(error: JsonRpcError): ShrineError {
  if (error.data) {
    return errorFromCode(error.data.code, error.message);
  }
  if (error.code === RPC_ERROR_CODES.INVALID_PARAMS) {
    return new ValidationError(error.message);
  }
  return new IoError(`Agent error ${error.code}: ${error.message}`);
}
