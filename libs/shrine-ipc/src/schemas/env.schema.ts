/**
 * Environment settings shared by the CLI and the agent
 */

import { z } from 'zod';
import {
  DEFAULT_KDF_ITERATIONS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_SESSION_TTL_MS,
  ENV,
  MAX_SESSION_TTL_SECONDS,
} from '../constants.js';
import { ValidationError } from '../errors.js';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const ShrineEnvSchema = z.object({
  runtimeDir: z.preprocess(blankToUndefined, z.string().optional()),
  /** Seconds */
  agentTtl: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().max(MAX_SESSION_TTL_SECONDS).optional(),
  ),
  logLevel: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('warn')),
  kdfIterations: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(DEFAULT_KDF_ITERATIONS)),
  lockTimeoutMs: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(DEFAULT_LOCK_TIMEOUT_MS)),
});

export type ShrineEnv = z.output<typeof ShrineEnvSchema>;

/**
 * Read `SHRINE_*` variables. Invalid values are a ValidationError naming the
 * variable.
 */
export function loadShrineEnv(env: NodeJS.ProcessEnv = process.env): ShrineEnv {
  const result = ShrineEnvSchema.safeParse({
    runtimeDir: env[ENV.RUNTIME_DIR],
    agentTtl: env[ENV.AGENT_TTL],
    logLevel: env[ENV.LOG_LEVEL],
    kdfIterations: env[ENV.KDF_ITERATIONS],
    lockTimeoutMs: env[ENV.LOCK_TIMEOUT_MS],
  });

  if (!result.success) {
    const names: Record<string, string> = {
      runtimeDir: ENV.RUNTIME_DIR,
      agentTtl: ENV.AGENT_TTL,
      logLevel: ENV.LOG_LEVEL,
      kdfIterations: ENV.KDF_ITERATIONS,
      lockTimeoutMs: ENV.LOCK_TIMEOUT_MS,
    };
    const issue = result.error.issues[0];
    const field = String(issue?.path[0] ?? '');
    throw new ValidationError(`Invalid ${names[field] ?? 'environment'}: ${issue?.message ?? 'invalid value'}`, result.error.issues);
  }

  return result.data;
}

/** Session TTL in milliseconds */
export function sessionTtlMs(env: ShrineEnv): number {
  return env.agentTtl !== undefined ? env.agentTtl * 1000 : DEFAULT_SESSION_TTL_MS;
}
