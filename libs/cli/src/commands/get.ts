/**
 * get command
 */

import { Command, Option } from 'commander';
import { withShrineAccess } from '../access/index.js';
import type { SecretValue } from '../access/index.js';
import { CliContext } from '../context.js';
import type { CliEnvironment } from '../context.js';

type Encoding = 'auto' | 'raw' | 'base64';

interface GetOptions {
  encoding: Encoding;
}

/**
 * Bytes to print. `auto` prints text as is and binary as base64 on a
 * terminal, raw otherwise.
 */
export function encodeSecret(secret: SecretValue, encoding: Encoding, isTTY: boolean): Buffer {
  switch (encoding) {
    case 'raw':
      return secret.value;
    case 'base64':
      return Buffer.from(secret.value.toString('base64'));
    case 'auto':
      return secret.mode === 'binary' && isTTY ? Buffer.from(secret.value.toString('base64')) : secret.value;
  }
}

export function createGetCommand(io: CliEnvironment): Command {
  return new Command('get')
    .description('Print a secret value')
    .argument('<path>', 'Secret path')
    .addOption(
      new Option('-e, --encoding <encoding>', 'Output encoding').choices(['auto', 'raw', 'base64']).default('auto'),
    )
    .action(async (secretPath: string, options: GetOptions, command: Command) => {
      const ctx = CliContext.fromCommand(command, io);
      const secret = await withShrineAccess(ctx, (access) => access.get(secretPath));
      io.stdout.write(encodeSecret(secret, options.encoding, io.stdout.isTTY === true));
    });
}
