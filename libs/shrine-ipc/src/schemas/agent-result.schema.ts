/**
 * Zod schemas for agent responses
 *
 * The client parses every response against these before handing results
 * to callers.
 */

import { z } from 'zod';
import type { AgentMethod, AgentMethodMap } from '../types/agent.js';
import { SecretModeSchema } from './agent.schema.js';

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.object({ code: z.string() }).optional(),
});

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional(),
});

const SecretMetadataSchema = z.object({
  mode: SecretModeSchema,
  createdBy: z.string(),
  createdAt: z.string(),
  updatedBy: z.string().optional(),
  updatedAt: z.string().optional(),
});

const MutationResultSchema = z.object({
  warnings: z.array(z.string()),
});

type ResultSchemas = {
  [M in AgentMethod]: z.ZodType<AgentMethodMap[M]['result'], z.ZodTypeDef, unknown>;
};

export const AGENT_RESULT_SCHEMAS: ResultSchemas = {
  ping: z.object({
    pong: z.literal(true),
    pid: z.number().int(),
    version: z.string(),
    shrinePath: z.string(),
  }),
  status: z.object({
    state: z.enum(['locked', 'unlocking', 'unlocked']),
    shrinePath: z.string(),
    expiresAt: z.number().optional(),
  }),
  unlock: z.object({ expiresAt: z.number() }),
  lock: z.object({ locked: z.literal(true) }),
  get: SecretMetadataSchema.extend({ path: z.string(), value: z.string() }),
  set: MutationResultSchema,
  remove: MutationResultSchema,
  list: z.object({
    total: z.number().int(),
    entries: z.array(SecretMetadataSchema.extend({ path: z.string() })),
  }),
  shutdown: z.object({ stopping: z.literal(true) }),
};
