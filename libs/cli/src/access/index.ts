/**
 * Pick the unlock strategy for a command
 */

import { AgentUnavailableError, SessionExpiredError } from '@shrine/ipc';
import type { CliContext } from '../context.js';
import { AgentAccess } from './agent.js';
import { LocalAccess } from './local.js';
import type { ShrineAccess } from './types.js';

export { AgentAccess } from './agent.js';
export { LocalAccess } from './local.js';
export type { SecretValue, ShrineAccess } from './types.js';

/** How long to wait for an agent before taking the cold path */
const AGENT_PING_TIMEOUT_MS = 2_000;

/**
 * The agent serving this shrine when one answers, else undefined.
 */
export async function findAgent(ctx: CliContext): Promise<AgentAccess | undefined> {
  const client = ctx.agentClient(AGENT_PING_TIMEOUT_MS);
  if (!(await client.isAvailable())) return undefined;
  return new AgentAccess(ctx.agentClient());
}

export function localAccess(ctx: CliContext): LocalAccess {
  return new LocalAccess(ctx.repository, () => ctx.keySource());
}

/**
 * Run `fn` through the agent when it has a session, otherwise in process.
 * A locked, expired or vanished agent gives the same result as no agent.
 */
export async function withShrineAccess<T>(ctx: CliContext, fn: (access: ShrineAccess) => Promise<T>): Promise<T> {
  const agent = await findAgent(ctx);
  if (agent) {
    try {
      return await fn(agent);
    } catch (error) {
      if (!(error instanceof SessionExpiredError || error instanceof AgentUnavailableError)) {
        throw error;
      }
      ctx.logger.debug('Agent has no session; using the password', { reason: error.code });
    }
  }
  return fn(localAccess(ctx));
}

/**
 * Drop the agent's session after the key changed under it.
 */
export async function lockRunningAgent(ctx: CliContext): Promise<void> {
  const client = ctx.agentClient(AGENT_PING_TIMEOUT_MS);
  if (await client.isAvailable()) {
    await client.lock();
    ctx.logger.info('Locked the running agent');
  }
}
