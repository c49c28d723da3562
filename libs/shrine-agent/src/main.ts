#!/usr/bin/env node
/**
 * Shrine agent entry point
 *
 * Serves one shrine file until shut down over the socket or by a signal.
 *
 * @example
 * ```bash
 * shrine-agent --shrine ~/secrets/shrine --ttl 600
 * ```
 */

import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { MAX_SESSION_TTL_SECONDS, SHRINE_FILENAME, VERSION, isShrineError } from '@shrine/ipc';
import { ShrineAgent } from './agent.js';
import { loadAgentConfig } from './config.js';

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0 || seconds > MAX_SESSION_TTL_SECONDS) {
    throw new InvalidArgumentError(`Expected a whole number of seconds between 1 and ${MAX_SESSION_TTL_SECONDS}.`);
  }
  return seconds;
}

interface AgentCliOptions {
  shrine: string;
  ttl?: number;
  runtimeDir?: string;
}

async function run(options: AgentCliOptions): Promise<void> {
  const config = loadAgentConfig(options.shrine, { ttl: options.ttl, runtimeDir: options.runtimeDir });
  const agent = new ShrineAgent({ config });

  await agent.start();
  console.error(`shrine-agent ${VERSION} serving ${config.shrinePath}`);
  console.error(`Socket: ${config.socketPath}`);

  const shutdown = (signal: string): void => {
    console.error(`Received ${signal}, shutting down...`);
    agent.stop('shutdown').catch((error: unknown) => {
      console.error('Shutdown failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await agent.stopped;
}

function createProgram(): Command {
  return new Command()
    .name('shrine-agent')
    .description('Cache an unlocked shrine key for a limited time')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-s, --shrine <path>', 'Shrine file to serve', path.join(process.cwd(), SHRINE_FILENAME))
    .option('-t, --ttl <seconds>', 'Session lifetime in seconds', parseSeconds)
    .option('--runtime-dir <dir>', 'Directory for the socket, pid file and log')
    .action(async (options: AgentCliOptions) => {
      await run(options);
    });
}

createProgram()
  .parseAsync(process.argv)
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(isShrineError(error) && error.exitCode > 0 ? error.exitCode : 1);
  });
