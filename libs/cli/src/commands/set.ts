/**
 * set command
 */

import { Command } from 'commander';
import { withShrineAccess } from '../access/index.js';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

interface SetOptions {
  stdin?: boolean;
  binary?: boolean;
}

export function createSetCommand(io: CliEnvironment): Command {
  return new Command('set')
    .description('Create or replace a secret')
    .argument('<path>', 'Secret path, e.g. db/password')
    .argument('[value]', 'Secret value; asked for when omitted')
    .option('--stdin', 'Read the value from standard input')
    .option('-b, --binary', 'Store the value as binary')
    .action(async (secretPath: string, value: string | undefined, options: SetOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);

      let bytes: Buffer;
      if (options.stdin) {
        bytes = await io.readStdin();
      } else if (value !== undefined) {
        bytes = Buffer.from(value, 'utf8');
      } else {
        bytes = Buffer.from(await io.promptPassword(`Enter \`${secretPath}\` value: `), 'utf8');
      }

      try {
        const result = await withShrineAccess(ctx, (access) =>
          access.set(secretPath, bytes, options.binary ? 'binary' : 'text'),
        );
        ctx.printWarnings(result.warnings);
      } finally {
        bytes.fill(0);
      }
    });
}
