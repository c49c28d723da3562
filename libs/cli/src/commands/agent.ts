/**
 * agent command
 *
 * Starts and stops the session agent for the selected shrine, and unlocks or
 * locks its session.
 */

import { Command, InvalidArgumentError } from 'commander';
import { AgentUnavailableError, MAX_SESSION_TTL_SECONDS } from '@shrine/ipc';
import { getRuntimeDir } from '@shrine/agent';
import type { AgentClient } from '@shrine/agent';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';
import { startAgentProcess, waitForAgentExit } from '../utils/agent-process.js';

interface StartOptions {
  ttl?: number;
  foreground?: boolean;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0 || seconds > MAX_SESSION_TTL_SECONDS) {
    throw new InvalidArgumentError(`Expected a whole number of seconds between 1 and ${MAX_SESSION_TTL_SECONDS}.`);
  }
  return seconds;
}

async function requireAgent(ctx: CliContext): Promise<AgentClient> {
  const client = ctx.agentClient();
  if (!(await client.isAvailable())) {
    throw new AgentUnavailableError('No agent is running for this shrine; start one with `shrine agent start`');
  }
  return client;
}

export function createAgentCommand(io: CliEnvironment): Command {
  const cmd = new Command('agent').description('Manage the session agent');

  cmd
    .command('start')
    .description('Start the agent for this shrine')
    .option('-t, --ttl <seconds>', 'Session lifetime in seconds', parseSeconds)
    .option('-f, --foreground', 'Run in the foreground (blocking)')
    .action(async (options: StartOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const client = ctx.agentClient();

      if (await client.isAvailable()) {
        const { pid } = await client.ping();
        ctx.print(`Agent already running (pid ${pid})`);
        return;
      }

      const result = await startAgentProcess(client, {
        shrinePath: ctx.shrinePath,
        runtimeDir: getRuntimeDir(ctx.settings, io.env),
        ttl: options.ttl,
        foreground: options.foreground,
        env: io.env,
        cwd: io.cwd,
      });

      if (!result.started) {
        throw new AgentUnavailableError(result.message);
      }
      if (!options.foreground) {
        ctx.print(`Agent started${result.pid !== undefined ? ` (pid ${result.pid})` : ''}`);
      }
    });

  cmd
    .command('stop')
    .description('Stop the agent; its session is wiped')
    .action(async (_options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const client = ctx.agentClient();

      if (!(await client.isAvailable())) {
        ctx.print('Agent is not running');
        return;
      }
      await client.shutdown();
      await waitForAgentExit(client);
      ctx.print('Agent stopped');
    });

  cmd
    .command('status')
    .description('Show whether the agent runs and holds a session')
    .action(async (_options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const client = ctx.agentClient();

      if (!(await client.isAvailable())) {
        ctx.print('Running: false');
        return;
      }

      const [{ pid }, status] = await Promise.all([client.ping(), client.status()]);
      ctx.print('Running: true');
      ctx.print(`PID:     ${pid}`);
      ctx.print(`State:   ${status.state}`);
      if (status.expiresAt !== undefined) {
        ctx.print(`Expires: ${new Date(status.expiresAt).toISOString()}`);
      }
    });

  cmd
    .command('unlock')
    .description('Give the agent the password for this shrine')
    .action(async (_options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const client = await requireAgent(ctx);
      const { expiresAt } = await client.unlock(await ctx.password());
      ctx.print(`Unlocked until ${new Date(expiresAt).toISOString()}`);
    });

  cmd
    .command('lock')
    .description('Make the agent forget the key')
    .action(async (_options: unknown, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const client = await requireAgent(ctx);
      await client.lock();
      ctx.print('Locked');
    });

  return cmd;
}
