/**
 * Handler types
 */

import type { z } from 'zod';
import type { AgentMethod, AgentMethodMap, Logger } from '@shrine/ipc';
import type { ShrineRepository } from '@shrine/storage';
import type { SessionManager } from '../session.js';

export interface HandlerContext {
  /** Request ID for tracing */
  requestId: string;
  timestamp: Date;
}

export interface HandlerDependencies {
  shrinePath: string;
  sessions: SessionManager;
  repository: ShrineRepository;
  logger: Logger;
  /** Stop the agent once the current response is written */
  requestShutdown: () => void;
}

/**
 * Params that failed their schema; answered with JSON-RPC -32602.
 */
export class InvalidParamsError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(message);
    this.name = 'InvalidParamsError';
  }
}

export interface RegisteredHandler<M extends AgentMethod = AgentMethod> {
  method: M;
  run(
    params: unknown,
    deps: HandlerDependencies,
    context: HandlerContext,
  ): Promise<AgentMethodMap[M]['result']>;
}

export type HandlerTable = { [M in AgentMethod]: RegisteredHandler<M> };

/**
 * Bind a params schema to a handler. The handler only ever sees params that
 * passed the schema.
 */
export function defineHandler<M extends AgentMethod, P>(
  method: M,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  handle: (params: P, deps: HandlerDependencies, context: HandlerContext) => Promise<AgentMethodMap[M]['result']>,
): RegisteredHandler<M> {
  return {
    method,
    async run(params, deps, context) {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        const first = parsed.error.issues[0];
        const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
        throw new InvalidParamsError(`Invalid params: ${where}${first?.message ?? 'invalid'}`, parsed.error.issues);
      }
      return handle(parsed.data, deps, context);
    },
  };
}
