/**
 * Agent wire protocol
 *
 * JSON-RPC 2.0 over newline-delimited JSON on a Unix socket.
 */

import type { ListResult, MutationResult, SecretMetadata } from './secret.js';

export type AgentMethod =
  | 'ping'
  | 'status'
  | 'unlock'
  | 'lock'
  | 'get'
  | 'set'
  | 'remove'
  | 'list'
  | 'shutdown';

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string | number;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  /** Stable shrine error code for domain failures */
  data?: { code: string };
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}

export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  DOMAIN_ERROR: 1000,
} as const;

export type AgentState = 'locked' | 'unlocking' | 'unlocked';

export interface PingResult {
  pong: true;
  pid: number;
  version: string;
  shrinePath: string;
}

export interface StatusResult {
  state: AgentState;
  shrinePath: string;
  /** Epoch ms; present while unlocked */
  expiresAt?: number;
}

export interface UnlockResult {
  expiresAt: number;
}

export interface LockResult {
  locked: true;
}

export interface ShutdownResult {
  stopping: true;
}

/** A secret as it travels over the socket; `value` is base64 */
export interface WireSecret extends SecretMetadata {
  path: string;
  value: string;
}

/**
 * Params and result per method; the client and the server handler table are
 * both typed against this map.
 */
export interface AgentMethodMap {
  ping: { params: Record<string, never>; result: PingResult };
  status: { params: Record<string, never>; result: StatusResult };
  unlock: { params: { password: string }; result: UnlockResult };
  lock: { params: Record<string, never>; result: LockResult };
  get: { params: { path: string }; result: WireSecret };
  set: { params: { path: string; value: string; mode: SecretMetadata['mode'] }; result: MutationResult };
  remove: { params: { path: string }; result: MutationResult };
  list: { params: { pattern?: string }; result: ListResult };
  shutdown: { params: Record<string, never>; result: ShutdownResult };
}
